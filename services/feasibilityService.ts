import { AssessedGrant, ChatMessage, Feasibility, GrantFinderConfig, ScoredGrant } from "../types";
import { describeError, isModelCallError } from "./errors";
import { ModelClient } from "./modelClient";

export const PARSE_ERROR_RATIONALE = "parse error";

const FEASIBILITY_LEVELS: Array<Exclude<Feasibility, "Unknown">> = ["High", "Medium", "Low"];

interface FeasibilityVerdict {
  feasibility: Feasibility;
  why: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const normalizeFeasibility = (value: unknown): Feasibility => {
  if (typeof value !== "string") return "Unknown";
  const normalized = value.trim().toLowerCase();
  return FEASIBILITY_LEVELS.find(level => level.toLowerCase() === normalized) ?? "Unknown";
};

const parseObject = (text: string): Record<string, unknown> | null => {
  const trimmed = text.trim();
  const fenceMatch = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const body = fenceMatch ? fenceMatch[1] : trimmed;
  const candidates = [body, body.match(/\{[\s\S]*\}/)?.[0]];

  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      const value: unknown = JSON.parse(candidate);
      if (isRecord(value)) return value;
    } catch {
      // fall through to the salvaged object, if any
    }
  }
  return null;
};

/** Returns null when the response holds no JSON object. */
export const parseFeasibilityVerdict = (text: string): FeasibilityVerdict | null => {
  const record = parseObject(text);
  if (!record) return null;
  return {
    feasibility: normalizeFeasibility(record.feasibility),
    why: typeof record.why === "string" ? record.why.trim() : "",
  };
};

export const buildFeasibilityPrompt = (grant: ScoredGrant, mission: string): ChatMessage[] => [
  {
    role: "user",
    content: [
      `Nonprofit mission:\n${mission}`,
      `Grant title: ${grant.title}`,
      `Grant description: ${grant.summary}`,
      'Answer ONLY with JSON like {"feasibility":"High|Medium|Low","why":"<one sentence>"}',
    ].join("\n\n"),
  },
];

const fallback = (grant: ScoredGrant): AssessedGrant => ({
  ...grant,
  feasibility: "Unknown",
  rationale: PARSE_ERROR_RATIONALE,
});

/**
 * Unparseable verdicts and failed calls degrade to `Unknown` for this grant only.
 * An exhausted rate limit propagates and ends the run.
 */
export const classifyGrant = async (
  client: ModelClient,
  grant: ScoredGrant,
  mission: string,
  config: Pick<GrantFinderConfig, "classificationMaxTokens">
): Promise<AssessedGrant> => {
  let raw: string;
  try {
    raw = await client.complete(buildFeasibilityPrompt(grant, mission), config.classificationMaxTokens);
  } catch (error) {
    if (isModelCallError(error) && error.kind === "rate_limited") {
      throw error;
    }
    console.warn(`[feasibility] "${grant.title}" left Unknown: ${describeError(error)}`);
    return fallback(grant);
  }

  const verdict = parseFeasibilityVerdict(raw);
  if (!verdict) {
    console.warn(`[feasibility] "${grant.title}" left Unknown: unparseable verdict ${JSON.stringify(raw.slice(0, 120))}`);
    return fallback(grant);
  }

  return { ...grant, feasibility: verdict.feasibility, rationale: verdict.why };
};

export const classifyShortlist = async (
  client: ModelClient,
  shortlist: ScoredGrant[],
  mission: string,
  config: Pick<GrantFinderConfig, "classificationMaxTokens">
): Promise<AssessedGrant[]> => {
  const assessed: AssessedGrant[] = [];
  for (const grant of shortlist) {
    assessed.push(await classifyGrant(client, grant, mission, config));
  }
  return assessed;
};
