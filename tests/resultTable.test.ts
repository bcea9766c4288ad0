import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  RESULT_COLUMNS,
  getDeadlineStatus,
  toLocalDateKey,
  toResultRows,
  validateResultTable,
} from "../services/resultTableService";
import { AssessedGrant } from "../types";

const TODAY = new Date(2026, 9, 19, 15, 0);

const assessed = (title: string, similarity: number, overrides: Partial<AssessedGrant> = {}): AssessedGrant => ({
  title,
  sponsor: "Sponsor",
  summary: "Summary",
  deadline: "rolling",
  url: "https://grants.example.org/a",
  similarity,
  feasibility: "Medium",
  rationale: "Serves students.",
  ...overrides,
});

describe("deadline status", () => {
  it("treats rolling deadlines and today or later as open", () => {
    expect(getDeadlineStatus("rolling", TODAY)).toBe("open");
    expect(getDeadlineStatus(" Rolling ", TODAY)).toBe("open");
    expect(getDeadlineStatus("2026-10-19", TODAY)).toBe("open");
    expect(getDeadlineStatus("2027-01-15T17:00:00Z", TODAY)).toBe("open");
  });

  it("marks earlier dates passed and anything else unknown", () => {
    expect(getDeadlineStatus("2026-10-18", TODAY)).toBe("passed");
    expect(getDeadlineStatus("2026-02-30", TODAY)).toBe("unknown");
    expect(getDeadlineStatus("Spring 2027", TODAY)).toBe("unknown");
    expect(getDeadlineStatus("", TODAY)).toBe("unknown");
  });
});

describe("deadline status in a time zone behind UTC", () => {
  const originalTz = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = "America/New_York";
  });

  afterAll(() => {
    if (originalTz === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = originalTz;
    }
  });

  it("keeps a deadline open through the local evening of its last day", () => {
    const eveningInNewYork = new Date("2026-10-20T01:30:00Z");

    expect(toLocalDateKey(eveningInNewYork)).toBe("2026-10-19");
    expect(getDeadlineStatus("2026-10-19", eveningInNewYork)).toBe("open");
    expect(getDeadlineStatus("2026-10-18", eveningInNewYork)).toBe("passed");
  });
});

describe("result rows", () => {
  it("exposes the table columns in display order", () => {
    expect(RESULT_COLUMNS).toEqual(["title", "sponsor", "amount", "similarity", "feasibility", "why_fit", "deadline", "url"]);
  });

  it("ranks rows and rounds the similarity for display", () => {
    const rows = toResultRows(
      [assessed("First", 0.87654, { feasibility: "High", rationale: "Direct fit.", amount: "$50,000" }), assessed("Second", 0.25, { deadline: "2026-01-15" })],
      TODAY
    );

    expect(rows).toEqual([
      {
        rank: 1,
        title: "First",
        sponsor: "Sponsor",
        similarity: 0.877,
        matchPercent: 87.7,
        feasibility: "High",
        why_fit: "Direct fit.",
        deadline: "rolling",
        url: "https://grants.example.org/a",
        amount: "$50,000",
        deadlineStatus: "open",
      },
      {
        rank: 2,
        title: "Second",
        sponsor: "Sponsor",
        similarity: 0.25,
        matchPercent: 25,
        feasibility: "Medium",
        why_fit: "Serves students.",
        deadline: "2026-01-15",
        url: "https://grants.example.org/a",
        amount: "",
        deadlineStatus: "passed",
      },
    ]);
  });
});

describe("result table validation", () => {
  it("accepts a sorted table within the shortlist size", () => {
    expect(validateResultTable([assessed("A", 0.9), assessed("B", 0.9), assessed("C", 0)], 3)).toEqual({
      valid: true,
      errors: [],
    });
  });

  it("flags oversized, unsorted and non-finite tables", () => {
    const result = validateResultTable([assessed("A", 0.2), assessed("B", 0.5), assessed("C", Number.NaN)], 2);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "table has 3 rows but the shortlist size is 2.",
      "grants[1].similarity is higher than the row above it.",
      "grants[2].similarity must be a finite number.",
    ]);
  });
});
