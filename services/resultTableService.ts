import { AssessedGrant, Feasibility } from "../types";

export type DeadlineStatus = "open" | "passed" | "unknown";

export interface ResultRow {
  rank: number;
  title: string;
  sponsor: string;
  similarity: number;
  matchPercent: number;
  feasibility: Feasibility;
  why_fit: string;
  deadline: string;
  url: string;
  amount: string;
  deadlineStatus: DeadlineStatus;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const RESULT_COLUMNS = ["title", "sponsor", "amount", "similarity", "feasibility", "why_fit", "deadline", "url"] as const;

const FEASIBILITY_VALUES: Feasibility[] = ["High", "Medium", "Low", "Unknown"];
const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

const toDateKey = (date: Date): string => date.toISOString().slice(0, 10);

/** `YYYY-MM-DD` of the calendar day in the local time zone. */
export const toLocalDateKey = (date: Date): string =>
  [
    String(date.getFullYear()).padStart(4, "0"),
    String(date.getMonth() + 1).padStart(2, "0"),
    String(date.getDate()).padStart(2, "0"),
  ].join("-");

export const getDeadlineStatus = (deadline: string, today: Date): DeadlineStatus => {
  const trimmed = deadline.trim();
  if (trimmed.toLowerCase() === "rolling") return "open";

  const match = trimmed.match(ISO_DATE_PREFIX);
  if (!match) return "unknown";

  const parsed = new Date(`${match[1]}-${match[2]}-${match[3]}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime()) || toDateKey(parsed) !== match[0]) return "unknown";

  return match[0] >= toLocalDateKey(today) ? "open" : "passed";
};

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const toResultRows = (grants: AssessedGrant[], today: Date = new Date()): ResultRow[] =>
  grants.map((grant, index) => ({
    rank: index + 1,
    title: grant.title,
    sponsor: grant.sponsor,
    similarity: round(grant.similarity, 3),
    matchPercent: round(grant.similarity * 100, 1),
    feasibility: grant.feasibility,
    why_fit: grant.rationale,
    deadline: grant.deadline,
    url: grant.url,
    amount: grant.amount ?? "",
    deadlineStatus: getDeadlineStatus(grant.deadline, today),
  }));

export const validateResultTable = (grants: AssessedGrant[], top: number): ValidationResult => {
  const errors: string[] = [];

  if (grants.length > top) {
    errors.push(`table has ${grants.length} rows but the shortlist size is ${top}.`);
  }

  grants.forEach((grant, index) => {
    if (!Number.isFinite(grant.similarity)) {
      errors.push(`grants[${index}].similarity must be a finite number.`);
    }
    if (index > 0 && grant.similarity > grants[index - 1].similarity) {
      errors.push(`grants[${index}].similarity is higher than the row above it.`);
    }
    if (!FEASIBILITY_VALUES.includes(grant.feasibility)) {
      errors.push(`grants[${index}].feasibility must be one of ${FEASIBILITY_VALUES.join("|")}.`);
    }
    if (typeof grant.rationale !== "string") {
      errors.push(`grants[${index}].rationale must be a string.`);
    }
  });

  return { valid: errors.length === 0, errors };
};
