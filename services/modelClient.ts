import { GoogleGenAI } from "@google/genai";
import { ChatMessage, GrantFinderConfig } from "../types";
import { ConfigError, ModelCallError, ModelOperation, describeError } from "./errors";

interface CompletionContent {
  role: "user" | "model";
  parts: Array<{ text: string }>;
}

export interface CompletionParams {
  model: string;
  contents: CompletionContent[];
  config: {
    systemInstruction?: string;
    maxOutputTokens: number;
    temperature: number;
    responseMimeType: "application/json";
    thinkingConfig: { thinkingBudget: number };
  };
}

export interface CompletionResponse {
  text?: string;
}

export interface EmbeddingParams {
  model: string;
  contents: string;
  config: { outputDimensionality: number };
}

export interface EmbeddingResponse {
  embeddings?: Array<{ values?: number[] }>;
}

/** The slice of the Gemini SDK the client talks to. */
export interface ModelTransport {
  models: {
    generateContent: (params: CompletionParams) => Promise<CompletionResponse>;
    embedContent: (params: EmbeddingParams) => Promise<EmbeddingResponse>;
  };
}

export interface ModelClient {
  complete(messages: ChatMessage[], maxTokens: number): Promise<string>;
  embed(text: string): Promise<number[]>;
  /** Monotonic count of rate-limit retries issued by this client. */
  readonly retryCount: number;
}

export interface RetryEvent {
  operation: ModelOperation;
  attempt: number;
  delayMs: number;
}

export interface ResilientClientOptions {
  transport?: ModelTransport;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
}

type ClientSettings = Pick<
  GrantFinderConfig,
  | "apiKey"
  | "retries"
  | "retryDelaySeconds"
  | "completionModel"
  | "embeddingModel"
  | "embeddingDimensions"
  | "temperature"
>;

type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; attempts: number; lastError: unknown };

const RATE_LIMIT_STATUS = 429;

const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export const isRateLimitError = (error: unknown): boolean => {
  const maybeError = error as { status?: unknown; code?: unknown; message?: unknown } | null;
  const status =
    typeof maybeError?.status === "number"
      ? maybeError.status
      : typeof maybeError?.code === "number"
        ? maybeError.code
        : null;

  if (status === RATE_LIMIT_STATUS) return true;

  const message = String(maybeError?.message ?? error ?? "").toLowerCase();
  return (
    message.includes("resource_exhausted") ||
    message.includes("rate limit") ||
    message.includes("too many requests") ||
    message.includes("429")
  );
};

/** Wait before attempt `attempt + 1`: DELAY * 2^attempt seconds plus up to one second of jitter. */
export const computeBackoffMs = (attempt: number, baseDelaySeconds: number, jitter: number): number =>
  Math.round((baseDelaySeconds * (2 ** attempt) + jitter) * 1000);

export const createModelTransport = (apiKey: string | null): ModelTransport => {
  if (!apiKey) {
    throw new ConfigError([
      "Missing Gemini API key: set GEMINI_API_KEY (VITE_GEMINI_API_KEY for the browser build) and restart.",
    ]);
  }
  return new GoogleGenAI({ apiKey });
};

const toCompletionRequest = (messages: ChatMessage[]) => {
  const systemInstruction = messages
    .filter(message => message.role === "system")
    .map(message => message.content)
    .join("\n\n");
  const contents: CompletionContent[] = messages
    .filter(message => message.role !== "system")
    .map((message): CompletionContent => ({
      role: message.role === "assistant" ? "model" : "user",
      parts: [{ text: message.content }],
    }));

  return { systemInstruction: systemInstruction || undefined, contents };
};

export const createResilientClient = (
  settings: ClientSettings,
  options: ResilientClientOptions = {}
): ModelClient => {
  const transport = options.transport ?? createModelTransport(settings.apiKey);
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  let retryCount = 0;

  const withRateLimitRetry = async <T>(
    operation: ModelOperation,
    call: () => Promise<T>
  ): Promise<AttemptOutcome<T>> => {
    let lastError: unknown;

    for (let attempt = 0; attempt < settings.retries; attempt += 1) {
      try {
        return { ok: true, value: await call() };
      } catch (error) {
        if (!isRateLimitError(error)) {
          throw new ModelCallError(
            "fatal",
            operation,
            attempt + 1,
            `${operation} failed: ${describeError(error)}`,
            { cause: error }
          );
        }

        lastError = error;
        if (attempt + 1 >= settings.retries) break;

        const delayMs = computeBackoffMs(attempt, settings.retryDelaySeconds, random());
        retryCount += 1;
        console.warn(`[modelClient] ${operation} rate-limited (attempt ${attempt + 1}/${settings.retries}); retrying in ${delayMs} ms`);
        options.onRetry?.({ operation, attempt, delayMs });
        await wait(delayMs);
      }
    }

    return { ok: false, attempts: settings.retries, lastError };
  };

  const complete = async (messages: ChatMessage[], maxTokens: number): Promise<string> => {
    const { systemInstruction, contents } = toCompletionRequest(messages);
    if (contents.length === 0) {
      throw new ModelCallError("fatal", "complete", 0, "complete requires at least one user or assistant message");
    }

    const outcome = await withRateLimitRetry("complete", () =>
      transport.models.generateContent({
        model: settings.completionModel,
        contents,
        config: {
          systemInstruction,
          maxOutputTokens: maxTokens,
          temperature: settings.temperature,
          responseMimeType: "application/json",
          thinkingConfig: { thinkingBudget: 0 },
        },
      })
    );

    if (!outcome.ok) {
      throw new ModelCallError(
        "rate_limited",
        "complete",
        outcome.attempts,
        `Gemini is still rate-limiting after ${outcome.attempts} attempts. Try again later.`,
        { cause: outcome.lastError }
      );
    }

    return outcome.value.text?.trim() ?? "";
  };

  const embed = async (text: string): Promise<number[]> => {
    const outcome = await withRateLimitRetry("embed", () =>
      transport.models.embedContent({
        model: settings.embeddingModel,
        contents: text,
        config: { outputDimensionality: settings.embeddingDimensions },
      })
    );

    if (!outcome.ok) {
      console.warn(`[modelClient] embed rate-limited after ${outcome.attempts} attempts; using a zero vector`);
      return new Array<number>(settings.embeddingDimensions).fill(0);
    }

    const values = outcome.value.embeddings?.[0]?.values;
    if (!values || values.length === 0) {
      throw new ModelCallError("fatal", "embed", 1, "embed failed: response contained no embedding values");
    }
    return values;
  };

  return {
    complete,
    embed,
    get retryCount() {
      return retryCount;
    },
  };
};
