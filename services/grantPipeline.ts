import {
  GrantFinderConfig,
  GrantSearchResult,
  PipelineProgress,
  PipelineState,
  RunTrace,
} from "../types";
import { PipelineBusyError } from "./errors";
import { ExtractionOutcome, extractCandidates } from "./extractionService";
import { classifyShortlist } from "./feasibilityService";
import { GenerationCache, computeGenerationKey, createGenerationCache } from "./generationCache";
import { MISSION_STATEMENT } from "./mission";
import { ModelClient, ResilientClientOptions, createResilientClient } from "./modelClient";
import { rankCandidates } from "./relevanceService";
import { validateResultTable } from "./resultTableService";

const PHASE_INFO: Record<PipelineState, { message: string; pct: number }> = {
  idle: { message: "Waiting to start", pct: 0 },
  generating: { message: "Asking Gemini for current grant opportunities...", pct: 15 },
  ranking: { message: "Scoring grants against the mission...", pct: 45 },
  classifying: { message: "Assessing feasibility of the shortlist...", pct: 75 },
  ready: { message: "Grant search complete", pct: 100 },
  empty: { message: "Gemini returned no usable grants", pct: 100 },
  failed: { message: "Grant search failed", pct: 0 },
};

export const getPhaseInfo = (state: PipelineState): PipelineProgress => ({ state, ...PHASE_INFO[state] });

export interface PipelineRunOptions {
  mission?: string;
  cache?: GenerationCache;
  onStateChange?: (progress: PipelineProgress) => void;
  runId?: number;
  today?: Date;
  now?: () => Date;
}

export const runGrantPipeline = async (
  client: ModelClient,
  config: GrantFinderConfig,
  options: PipelineRunOptions = {}
): Promise<GrantSearchResult> => {
  const mission = options.mission ?? MISSION_STATEMENT;
  const now = options.now ?? (() => new Date());
  const report = (state: PipelineState) => options.onStateChange?.(getPhaseInfo(state));
  const startedAt = now().toISOString();
  const retriesAtStart = client.retryCount;

  const buildTrace = (configHash: string, candidateCount: number, cacheHit: boolean): RunTrace => ({
    runId: options.runId ?? 1,
    configHash,
    completionModel: config.completionModel,
    embeddingModel: config.embeddingModel,
    startedAt,
    finishedAt: now().toISOString(),
    candidateCount,
    retries: client.retryCount - retriesAtStart,
    cacheHit,
  });

  report("idle");
  try {
    report("generating");
    const configHash = await computeGenerationKey(mission, config);
    const cached = options.cache?.get(configHash);
    let outcome: ExtractionOutcome;
    if (cached) {
      outcome = { status: "ok", candidates: cached, salvaged: false };
    } else {
      outcome = await extractCandidates(client, mission, config, options.today);
      if (outcome.status === "ok") {
        options.cache?.set(configHash, outcome.candidates);
      }
    }

    if (outcome.status === "empty") {
      report("empty");
      return { status: "empty", reason: outcome.reason, grants: [], trace: buildTrace(configHash, 0, false) };
    }

    const { candidates } = outcome;

    report("ranking");
    const shortlist = await rankCandidates(client, candidates, mission, config);

    report("classifying");
    const grants = await classifyShortlist(client, shortlist, mission, config);

    const validation = validateResultTable(grants, config.top);
    if (!validation.valid) {
      throw new Error(`Result table validation failed: ${validation.errors.join(" | ")}`);
    }

    report("ready");
    return {
      status: "ready",
      grants,
      trace: buildTrace(configHash, candidates.length, Boolean(cached)),
    };
  } catch (error) {
    report("failed");
    throw error;
  }
};

export interface GrantFinder {
  run(onStateChange?: (progress: PipelineProgress) => void): Promise<GrantSearchResult>;
  readonly running: boolean;
}

export interface GrantFinderDeps {
  client?: ModelClient;
  clientOptions?: ResilientClientOptions;
  cache?: GenerationCache;
  mission?: string;
}

/** Owns the client and generation cache; rejects a trigger while a run is in flight. */
export const createGrantFinder = (config: GrantFinderConfig, deps: GrantFinderDeps = {}): GrantFinder => {
  const cache = deps.cache ?? createGenerationCache(config.cacheTtlSeconds);
  let client = deps.client;
  let running = false;
  let runCount = 0;

  const run = async (onStateChange?: (progress: PipelineProgress) => void): Promise<GrantSearchResult> => {
    if (running) {
      throw new PipelineBusyError();
    }

    running = true;
    runCount += 1;
    try {
      client ??= createResilientClient(config, deps.clientOptions);
      return await runGrantPipeline(client, config, {
        mission: deps.mission,
        cache,
        onStateChange,
        runId: runCount,
      });
    } finally {
      running = false;
    }
  };

  return {
    run,
    get running() {
      return running;
    },
  };
};
