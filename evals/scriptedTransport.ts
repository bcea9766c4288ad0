import {
  CompletionParams,
  CompletionResponse,
  EmbeddingParams,
  EmbeddingResponse,
  ModelTransport,
} from "../services/modelClient";

export interface ScriptedScenario {
  /** Raw completion text returned for the candidate-generation request. */
  generation: string;
  /** Raw classification text per grant title. */
  verdicts?: Record<string, string>;
  defaultVerdict: string;
  /** Embedding per input text; the key `mission` answers the mission statement. */
  embeddings: Record<string, number[]>;
  defaultEmbedding: number[];
}

export interface ScriptedCalls {
  generation: number;
  classification: string[];
  embedding: string[];
}

export type ScriptedTransport = ModelTransport & { calls: ScriptedCalls };

const GRANT_TITLE_LINE = /^Grant title: (.*)$/m;

const promptText = (params: CompletionParams): string =>
  params.contents.map(content => content.parts.map(part => part.text).join("\n")).join("\n");

/** In-process stand-in for the Gemini SDK, answering from a fixed scenario. */
export const createScriptedTransport = (scenario: ScriptedScenario, mission: string): ScriptedTransport => {
  const calls: ScriptedCalls = { generation: 0, classification: [], embedding: [] };

  const generateContent = async (params: CompletionParams): Promise<CompletionResponse> => {
    if (params.config.systemInstruction) {
      calls.generation += 1;
      return { text: scenario.generation };
    }

    const title = promptText(params).match(GRANT_TITLE_LINE)?.[1] ?? "";
    calls.classification.push(title);
    return { text: scenario.verdicts?.[title] ?? scenario.defaultVerdict };
  };

  const embedContent = async (params: EmbeddingParams): Promise<EmbeddingResponse> => {
    calls.embedding.push(params.contents);
    const key = params.contents === mission ? "mission" : params.contents;
    return { embeddings: [{ values: scenario.embeddings[key] ?? scenario.defaultEmbedding }] };
  };

  return { models: { generateContent, embedContent }, calls };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isVector = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every(item => typeof item === "number");

const isStringRecord = (value: unknown): value is Record<string, string> =>
  isRecord(value) && Object.values(value).every(item => typeof item === "string");

const isVectorRecord = (value: unknown): value is Record<string, number[]> =>
  isRecord(value) && Object.values(value).every(isVector);

/** Validates a scenario read from a fixture file. */
export const parseScenario = (value: unknown): ScriptedScenario => {
  const errors: string[] = [];
  if (!isRecord(value)) {
    throw new Error("Scenario must be an object.");
  }

  const { generation, verdicts, defaultVerdict, embeddings, defaultEmbedding } = value;
  if (typeof generation !== "string") errors.push("generation must be a string.");
  if (verdicts !== undefined && !isStringRecord(verdicts)) errors.push("verdicts must map titles to strings.");
  if (typeof defaultVerdict !== "string") errors.push("defaultVerdict must be a string.");
  if (!isVectorRecord(embeddings)) errors.push("embeddings must map texts to number[].");
  if (!isVector(defaultEmbedding)) errors.push("defaultEmbedding must be number[].");

  if (
    errors.length > 0 ||
    typeof generation !== "string" ||
    typeof defaultVerdict !== "string" ||
    !isVectorRecord(embeddings) ||
    !isVector(defaultEmbedding)
  ) {
    throw new Error(`Invalid scenario: ${errors.join(" | ")}`);
  }

  return {
    generation,
    verdicts: isStringRecord(verdicts) ? verdicts : undefined,
    defaultVerdict,
    embeddings,
    defaultEmbedding,
  };
};
