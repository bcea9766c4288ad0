import { CandidateGrant, ChatMessage, EmptyReason, GrantFinderConfig } from "../types";
import { ModelClient } from "./modelClient";
import { toLocalDateKey } from "./resultTableService";

export type ExtractionOutcome =
  | { status: "ok"; candidates: CandidateGrant[]; salvaged: boolean }
  | { status: "empty"; reason: EmptyReason; candidates: [] };

export type ParsedCandidateList =
  | { ok: true; candidates: CandidateGrant[]; salvaged: boolean }
  | { ok: false };

const CANDIDATE_FIELDS: Array<keyof CandidateGrant> = ["title", "sponsor", "amount", "summary", "deadline", "url"];
const RAW_PREVIEW_CHARS = 200;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asFieldText = (value: unknown): string => {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
};

const stripCodeFence = (text: string): string => {
  const trimmed = text.trim();
  const fenceMatch = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenceMatch ? fenceMatch[1] : trimmed;
};

const tryParseJson = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

/** JSON-mode responses often wrap the list, e.g. `{"grants":[...]}`. */
const unwrapList = (value: unknown): unknown[] | null => {
  if (Array.isArray(value)) return value;
  if (!isRecord(value)) return null;
  const nested = Object.values(value).find(Array.isArray);
  return nested ?? null;
};

const toCandidate = (record: Record<string, unknown>): CandidateGrant =>
  CANDIDATE_FIELDS.reduce<CandidateGrant>(
    (candidate, field) => {
      candidate[field] = asFieldText(record[field]);
      return candidate;
    },
    { title: "", sponsor: "", amount: "", summary: "", deadline: "", url: "" }
  );

export const parseCandidateList = (text: string, limit: number): ParsedCandidateList => {
  const body = stripCodeFence(text);
  if (!body) return { ok: false };

  let salvaged = false;
  let parsed = tryParseJson(body);
  if (!parsed.ok) {
    const arrayMatch = body.match(/\[[\s\S]*\]/);
    if (!arrayMatch) return { ok: false };
    parsed = tryParseJson(arrayMatch[0]);
    salvaged = true;
  }
  if (!parsed.ok) return { ok: false };

  const list = unwrapList(parsed.value);
  if (!list) return { ok: false };

  const candidates = list.filter(isRecord).map(toCandidate).slice(0, limit);
  return { ok: true, candidates, salvaged };
};

export const buildCandidatePrompt = (mission: string, num: number, today: Date): ChatMessage[] => [
  { role: "system", content: "You are a concise grants researcher." },
  {
    role: "user",
    content: [
      `Provide exactly ${num} CURRENT U.S. grant opportunities (open as of ${toLocalDateKey(today)}) ` +
        "for a nonprofit with this mission:",
      mission,
      "",
      "Return nothing except a JSON array. Each element must be an object with exactly these string keys: " +
        "title, sponsor, amount, summary, deadline, url. Use the maximum award in USD for amount " +
        "and YYYY-MM-DD or 'rolling' for deadline.",
    ].join("\n"),
  },
];

export const extractCandidates = async (
  client: ModelClient,
  mission: string,
  config: Pick<GrantFinderConfig, "num" | "generationMaxTokens">,
  today: Date = new Date()
): Promise<ExtractionOutcome> => {
  const raw = await client.complete(buildCandidatePrompt(mission, config.num, today), config.generationMaxTokens);
  const parsed = parseCandidateList(raw, config.num);

  if (!parsed.ok) {
    console.warn(
      `[extraction] could not parse a grant list from the model response: ${raw.slice(0, RAW_PREVIEW_CHARS)}`
    );
    return { status: "empty", reason: "parse_error", candidates: [] };
  }

  if (parsed.candidates.length === 0) {
    return { status: "empty", reason: "no_grants", candidates: [] };
  }

  return { status: "ok", candidates: parsed.candidates, salvaged: parsed.salvaged };
};
