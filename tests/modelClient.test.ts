import { beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../services/configService";
import { ConfigError, ModelCallError } from "../services/errors";
import {
  CompletionParams,
  CompletionResponse,
  EmbeddingParams,
  EmbeddingResponse,
  computeBackoffMs,
  createModelTransport,
  createResilientClient,
  isRateLimitError,
} from "../services/modelClient";

const SETTINGS = {
  ...DEFAULT_CONFIG,
  apiKey: "test-secret",
  retries: 5,
  retryDelaySeconds: 2,
  embeddingDimensions: 4,
};

const rateLimitError = () => Object.assign(new Error("Too Many Requests"), { status: 429 });

const buildHarness = ({
  generate = async (): Promise<CompletionResponse> => ({ text: "[]" }),
  embed = async (): Promise<EmbeddingResponse> => ({ embeddings: [{ values: [1, 0, 0, 0] }] }),
}: {
  generate?: (params: CompletionParams) => Promise<CompletionResponse>;
  embed?: (params: EmbeddingParams) => Promise<EmbeddingResponse>;
} = {}) => {
  const generateContent = vi.fn(generate);
  const embedContent = vi.fn(embed);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const client = createResilientClient(SETTINGS, {
    transport: { models: { generateContent, embedContent } },
    sleep,
    random: () => 0.5,
  });
  return { client, generateContent, embedContent, sleep };
};

const USER_TURN = [{ role: "user" as const, content: "List grants." }];

describe("resilient model client", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("makes exactly RETRIES completion attempts on repeated rate limits, then fails the run", async () => {
    const { client, generateContent, sleep } = buildHarness({
      generate: async () => {
        throw rateLimitError();
      },
    });

    const failure = await client.complete(USER_TURN, 100).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ModelCallError);
    expect(failure).toMatchObject({ kind: "rate_limited", operation: "complete", attempts: 5 });
    expect(generateContent).toHaveBeenCalledTimes(5);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2500, 4500, 8500, 16500]);
    expect(client.retryCount).toBe(4);
  });

  it("returns a zero vector of the configured dimension after exhausting embedding retries", async () => {
    const { client, embedContent, sleep } = buildHarness({
      embed: async () => {
        throw rateLimitError();
      },
    });

    await expect(client.embed("college readiness")).resolves.toEqual([0, 0, 0, 0]);
    expect(embedContent).toHaveBeenCalledTimes(5);

    const waits = sleep.mock.calls.map(([ms]) => ms);
    expect(waits).toHaveLength(4);
    waits.slice(1).forEach((wait, index) => {
      expect(wait).toBeGreaterThanOrEqual(waits[index]);
    });
  });

  it("does not retry failures other than rate limiting", async () => {
    const { client, generateContent, sleep } = buildHarness({
      generate: async () => {
        throw Object.assign(new Error("API key not valid"), { status: 400 });
      },
    });

    await expect(client.complete(USER_TURN, 100)).rejects.toMatchObject({
      kind: "fatal",
      operation: "complete",
      attempts: 1,
      message: "complete failed: API key not valid",
    });
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("propagates non-rate-limit embedding failures instead of falling back", async () => {
    const { client, embedContent } = buildHarness({
      embed: async () => {
        throw new Error("socket hang up");
      },
    });

    await expect(client.embed("mission")).rejects.toMatchObject({ kind: "fatal", operation: "embed" });
    expect(embedContent).toHaveBeenCalledTimes(1);
  });

  it("recovers when a rate limit clears before the attempts run out", async () => {
    let calls = 0;
    const { client, sleep } = buildHarness({
      generate: async () => {
        calls += 1;
        if (calls < 3) throw new Error("RESOURCE_EXHAUSTED: quota exceeded");
        return { text: '  {"feasibility":"High"}  ' };
      },
    });

    await expect(client.complete(USER_TURN, 60)).resolves.toBe('{"feasibility":"High"}');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2500, 4500]);
    expect(client.retryCount).toBe(2);
  });

  it("reports each scheduled retry to the onRetry hook", async () => {
    const onRetry = vi.fn();
    let calls = 0;
    const client = createResilientClient(SETTINGS, {
      transport: {
        models: {
          generateContent: async () => ({ text: "[]" }),
          embedContent: async () => {
            calls += 1;
            if (calls === 1) throw rateLimitError();
            return { embeddings: [{ values: [0, 1, 0, 0] }] };
          },
        },
      },
      sleep: async () => undefined,
      random: () => 0,
      onRetry,
    });

    await expect(client.embed("mission")).resolves.toEqual([0, 1, 0, 0]);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith({ operation: "embed", attempt: 0, delayMs: 2000 });
  });

  it("sends system turns as the system instruction with the configured sampling settings", async () => {
    const { client, generateContent } = buildHarness();

    await client.complete(
      [
        { role: "system", content: "You are a concise grants researcher." },
        { role: "user", content: "List grants." },
      ],
      900
    );

    expect(generateContent).toHaveBeenCalledWith({
      model: "gemini-2.5-flash",
      contents: [{ role: "user", parts: [{ text: "List grants." }] }],
      config: {
        systemInstruction: "You are a concise grants researcher.",
        maxOutputTokens: 900,
        temperature: 0.7,
        responseMimeType: "application/json",
        thinkingConfig: { thinkingBudget: 0 },
      },
    });
  });

  it("requests embeddings at the configured dimension", async () => {
    const { client, embedContent } = buildHarness();

    await expect(client.embed("mission text")).resolves.toEqual([1, 0, 0, 0]);
    expect(embedContent).toHaveBeenCalledWith({
      model: "gemini-embedding-001",
      contents: "mission text",
      config: { outputDimensionality: 4 },
    });
  });

  it("rejects a request without user turns before calling the service", async () => {
    const { client, generateContent } = buildHarness();

    await expect(client.complete([{ role: "system", content: "Be brief." }], 10)).rejects.toMatchObject({
      kind: "fatal",
      attempts: 0,
    });
    expect(generateContent).not.toHaveBeenCalled();
  });

  it("requires an API key to build the Gemini transport", () => {
    expect(() => createModelTransport(null)).toThrow(ConfigError);
  });
});

describe("rate-limit detection and backoff", () => {
  it("recognizes 429 statuses and quota messages only", () => {
    expect(isRateLimitError(rateLimitError())).toBe(true);
    expect(isRateLimitError({ code: 429 })).toBe(true);
    expect(isRateLimitError(new Error("RESOURCE_EXHAUSTED"))).toBe(true);
    expect(isRateLimitError(new Error("permission denied"))).toBe(false);
    expect(isRateLimitError(null)).toBe(false);
  });

  it("doubles the base delay per attempt and adds the jitter", () => {
    expect(computeBackoffMs(0, 2, 0)).toBe(2000);
    expect(computeBackoffMs(1, 2, 0.25)).toBe(4250);
    expect(computeBackoffMs(3, 2, 0.999)).toBe(16999);
  });
});
