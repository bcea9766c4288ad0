import fs from "node:fs";
import path from "node:path";
import { EvalExpectation, runAssertions } from "./assertions";
import { buildEvalReport, EvalFixtureRunResult, writeEvalReport } from "./report";
import { createScriptedTransport, parseScenario } from "./scriptedTransport";
import { EnvSource, loadGrantFinderConfig } from "../services/configService";
import { describeError } from "../services/errors";
import { runGrantPipeline } from "../services/grantPipeline";
import { MISSION_STATEMENT } from "../services/mission";
import { createResilientClient } from "../services/modelClient";

interface FixtureConfig {
  id: string;
  directory: string;
  env: EnvSource;
  expect: EvalExpectation;
}

const FIXTURE_ROOT = path.resolve(process.cwd(), "evals", "fixtures");

const FIXTURES: FixtureConfig[] = [
  {
    id: "A_ranked-fifteen",
    directory: "ranked-fifteen",
    env: { GRANT_NUM: "15", GRANT_TOP: "8", GRANT_EMBEDDING_DIMENSIONS: "3" },
    expect: { status: "ready", firstTitle: "Grant 3", rows: 8, unknownCount: 0 },
  },
  {
    id: "B_prose-wrapped",
    directory: "prose-wrapped",
    env: { GRANT_NUM: "5", GRANT_TOP: "3", GRANT_EMBEDDING_DIMENSIONS: "2" },
    expect: { status: "ready", firstTitle: "College Access Challenge", rows: 2, unknownCount: 1 },
  },
  {
    id: "C_unparseable",
    directory: "unparseable",
    env: {},
    expect: { status: "empty", emptyReason: "parse_error" },
  },
  {
    id: "D_empty-list",
    directory: "empty-list",
    env: {},
    expect: { status: "empty", emptyReason: "no_grants" },
  },
];

const readScenario = (directory: string) =>
  parseScenario(JSON.parse(fs.readFileSync(path.join(FIXTURE_ROOT, directory, "scenario.json"), "utf8")));

const evaluateSingleRun = async (fixture: FixtureConfig): Promise<EvalFixtureRunResult> => {
  const startedAt = Date.now();

  try {
    const config = loadGrantFinderConfig(fixture.env);
    const transport = createScriptedTransport(readScenario(fixture.directory), MISSION_STATEMENT);
    const client = createResilientClient(config, { transport });
    const result = await runGrantPipeline(client, config);
    const assertionResults = runAssertions({ fixtureId: fixture.id, config, result, expect: fixture.expect });

    return {
      fixtureId: fixture.id,
      status: result.status,
      durationMs: Date.now() - startedAt,
      pass: assertionResults.every(assertion => assertion.pass),
      assertionResults,
    };
  } catch (error) {
    return {
      fixtureId: fixture.id,
      status: "failed",
      durationMs: Date.now() - startedAt,
      pass: false,
      assertionResults: [
        {
          name: "pipeline execution",
          pass: false,
          details: describeError(error),
        },
      ],
      error: describeError(error),
    };
  }
};

const main = async (): Promise<void> => {
  const runs: EvalFixtureRunResult[] = [];
  for (const fixture of FIXTURES) {
    const run = await evaluateSingleRun(fixture);
    runs.push(run);
    console.log(`[${run.pass ? "PASS" : "FAIL"}] ${run.fixtureId} :: ${run.status} (${run.durationMs} ms)`);
    run.assertionResults
      .filter(assertion => !assertion.pass)
      .forEach(assertion => {
        console.log(`  - ${assertion.name}: ${assertion.details ?? "failed"}`);
      });
  }

  const report = buildEvalReport(runs);
  writeEvalReport(report);

  console.log("");
  console.log(`Eval summary: ${report.summary.passedRuns}/${report.summary.totalRuns} passed.`);
  console.log("Report written to evals/report.json");

  if (report.summary.failedRuns > 0) {
    process.exitCode = 1;
  }
};

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
