import { GrantFinderConfig } from "../types";
import { ConfigError } from "./errors";

export type EnvSource = Record<string, string | boolean | undefined>;

export const DEFAULT_CONFIG: GrantFinderConfig = {
  apiKey: null,
  num: 15,
  top: 8,
  retryDelaySeconds: 2,
  retries: 5,
  completionModel: "gemini-2.5-flash",
  embeddingModel: "gemini-embedding-001",
  embeddingDimensions: 1536,
  temperature: 0.7,
  generationMaxTokens: 900,
  classificationMaxTokens: 60,
  cacheTtlSeconds: 86400,
};

type NumericKey = {
  [K in keyof GrantFinderConfig]: GrantFinderConfig[K] extends number ? K : never;
}[keyof GrantFinderConfig];

interface NumericField {
  key: NumericKey;
  env: string;
  integer: boolean;
  min: number;
  max?: number;
}

const NUMERIC_FIELDS: NumericField[] = [
  { key: "num", env: "GRANT_NUM", integer: true, min: 1 },
  { key: "top", env: "GRANT_TOP", integer: true, min: 1 },
  { key: "retryDelaySeconds", env: "GRANT_RETRY_DELAY_SECONDS", integer: false, min: 0 },
  { key: "retries", env: "GRANT_RETRIES", integer: true, min: 1 },
  { key: "embeddingDimensions", env: "GRANT_EMBEDDING_DIMENSIONS", integer: true, min: 1 },
  { key: "temperature", env: "GRANT_TEMPERATURE", integer: false, min: 0, max: 2 },
  { key: "generationMaxTokens", env: "GRANT_GENERATION_MAX_TOKENS", integer: true, min: 1 },
  { key: "classificationMaxTokens", env: "GRANT_CLASSIFICATION_MAX_TOKENS", integer: true, min: 1 },
  { key: "cacheTtlSeconds", env: "GRANT_CACHE_TTL_SECONDS", integer: false, min: 0 },
];

/** Reads `NAME`, falling back to the `VITE_NAME` spelling Vite exposes to the browser. */
const readEnv = (env: EnvSource, name: string): string | null => {
  const raw = env[name] ?? env[`VITE_${name}`];
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const parseNumber = (field: NumericField, raw: string, problems: string[]): number | null => {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    problems.push(`${field.env} must be a number (got "${raw}").`);
    return null;
  }
  if (field.integer && !Number.isInteger(value)) {
    problems.push(`${field.env} must be an integer (got "${raw}").`);
    return null;
  }
  if (value < field.min) {
    problems.push(`${field.env} must be >= ${field.min} (got "${raw}").`);
    return null;
  }
  if (field.max !== undefined && value > field.max) {
    problems.push(`${field.env} must be <= ${field.max} (got "${raw}").`);
    return null;
  }
  return value;
};

export const loadGrantFinderConfig = (env: EnvSource): GrantFinderConfig => {
  const problems: string[] = [];
  const config: GrantFinderConfig = { ...DEFAULT_CONFIG };

  config.apiKey = readEnv(env, "GEMINI_API_KEY");
  config.completionModel = readEnv(env, "GRANT_COMPLETION_MODEL") ?? DEFAULT_CONFIG.completionModel;
  config.embeddingModel = readEnv(env, "GRANT_EMBEDDING_MODEL") ?? DEFAULT_CONFIG.embeddingModel;

  for (const field of NUMERIC_FIELDS) {
    const raw = readEnv(env, field.env);
    if (raw === null) continue;
    const value = parseNumber(field, raw, problems);
    if (value !== null) {
      config[field.key] = value;
    }
  }

  if (config.top > config.num) {
    problems.push(`GRANT_TOP (${config.top}) must not exceed GRANT_NUM (${config.num}).`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return Object.freeze(config);
};
