import { validateResultTable } from "../services/resultTableService";
import { GrantFinderConfig, GrantSearchResult } from "../types";

export interface EvalAssertionResult {
  name: string;
  pass: boolean;
  details?: string;
}

export interface EvalExpectation {
  status: GrantSearchResult["status"];
  emptyReason?: "no_grants" | "parse_error";
  firstTitle?: string;
  rows?: number;
  unknownCount?: number;
}

export interface EvalAssertionInput {
  fixtureId: string;
  config: GrantFinderConfig;
  result: GrantSearchResult;
  expect: EvalExpectation;
}

const buildAssertion = (name: string, pass: boolean, details?: string): EvalAssertionResult => ({
  name,
  pass,
  details,
});

export const runAssertions = ({ config, result, expect }: EvalAssertionInput): EvalAssertionResult[] => {
  const assertions: EvalAssertionResult[] = [
    buildAssertion("run status", result.status === expect.status, `expected ${expect.status}, got ${result.status}`),
  ];

  if (result.status === "empty") {
    if (expect.emptyReason) {
      assertions.push(
        buildAssertion(
          "empty reason",
          result.reason === expect.emptyReason,
          `expected ${expect.emptyReason}, got ${result.reason}`
        )
      );
    }
    return assertions;
  }

  const validation = validateResultTable(result.grants, config.top);
  assertions.push(buildAssertion("result table invariants", validation.valid, validation.errors.join(" | ") || undefined));
  assertions.push(
    buildAssertion(
      "every row has a feasibility verdict",
      result.grants.every(grant => typeof grant.feasibility === "string" && grant.feasibility.length > 0)
    )
  );

  if (expect.rows !== undefined) {
    assertions.push(
      buildAssertion("row count", result.grants.length === expect.rows, `expected ${expect.rows}, got ${result.grants.length}`)
    );
  }

  if (expect.firstTitle !== undefined) {
    const firstTitle = result.grants[0]?.title;
    assertions.push(
      buildAssertion("best match first", firstTitle === expect.firstTitle, `expected "${expect.firstTitle}", got "${firstTitle}"`)
    );
  }

  if (expect.unknownCount !== undefined) {
    const unknownCount = result.grants.filter(grant => grant.feasibility === "Unknown").length;
    assertions.push(
      buildAssertion(
        "unknown verdicts",
        unknownCount === expect.unknownCount,
        `expected ${expect.unknownCount}, got ${unknownCount}`
      )
    );
  }

  return assertions;
};
