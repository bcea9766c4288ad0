import { CandidateGrant, GrantFinderConfig } from "../types";

export interface GenerationCacheEntry {
  candidates: CandidateGrant[];
  storedAt: number;
}

export interface GenerationCache {
  get(key: string): CandidateGrant[] | undefined;
  set(key: string, candidates: CandidateGrant[]): void;
  clear(): void;
  readonly size: number;
}

type GenerationKeyFields = Pick<GrantFinderConfig, "num" | "completionModel" | "temperature" | "generationMaxTokens">;

const normalizeInputText = (value: string): string => value.replace(/\s+/g, " ").trim();

const toHex = (buffer: ArrayBuffer): string =>
  Array.from(new Uint8Array(buffer))
    .map(value => value.toString(16).padStart(2, "0"))
    .join("");

export const computeGenerationKey = async (mission: string, config: GrantFinderConfig): Promise<string> => {
  const normalizedPayload = JSON.stringify({
    mission: normalizeInputText(mission),
    num: config.num,
    completionModel: config.completionModel,
    temperature: config.temperature,
    generationMaxTokens: config.generationMaxTokens,
  });

  const subtle = globalThis.crypto?.subtle;
  if (!subtle) {
    throw new Error("Web Crypto API is unavailable; cannot compute SHA-256 cache key.");
  }

  const digest = await subtle.digest("SHA-256", new TextEncoder().encode(normalizedPayload));
  return toHex(digest);
};

export const createGenerationCache = (ttlSeconds: number, now: () => number = Date.now): GenerationCache => {
  const entries = new Map<string, GenerationCacheEntry>();
  const ttlMs = ttlSeconds * 1000;

  return {
    get(key) {
      const entry = entries.get(key);
      if (!entry) return undefined;
      if (now() - entry.storedAt >= ttlMs) {
        entries.delete(key);
        return undefined;
      }
      return entry.candidates.map(candidate => ({ ...candidate }));
    },
    set(key, candidates) {
      entries.set(key, {
        candidates: candidates.map(candidate => ({ ...candidate })),
        storedAt: now(),
      });
    },
    clear() {
      entries.clear();
    },
    get size() {
      return entries.size;
    },
  };
};
