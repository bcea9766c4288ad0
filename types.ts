export interface CandidateGrant {
  title: string;
  sponsor: string;
  summary: string;
  deadline: string;
  url: string;
  /** Maximum award in USD as the model wrote it. */
  amount?: string;
}

export interface ScoredGrant extends CandidateGrant {
  similarity: number;
}

export type Feasibility = 'High' | 'Medium' | 'Low' | 'Unknown';

export interface AssessedGrant extends ScoredGrant {
  feasibility: Feasibility;
  rationale: string;
}

export type ResultTable = AssessedGrant[];

export type EmptyReason = 'no_grants' | 'parse_error';

export interface RunTrace {
  runId: number;
  configHash: string;
  completionModel: string;
  embeddingModel: string;
  startedAt: string;
  finishedAt: string;
  candidateCount: number;
  retries: number;
  cacheHit: boolean;
}

export type GrantSearchResult =
  | {
      status: 'ready';
      grants: ResultTable;
      trace: RunTrace;
    }
  | {
      status: 'empty';
      reason: EmptyReason;
      grants: [];
      trace: RunTrace;
    };

export type PipelineState =
  | 'idle'
  | 'generating'
  | 'ranking'
  | 'classifying'
  | 'ready'
  | 'empty'
  | 'failed';

export interface PipelineProgress {
  state: PipelineState;
  message: string;
  pct: number;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GrantFinderConfig {
  apiKey: string | null;
  /** Candidates requested from the model. */
  num: number;
  /** Shortlist size; never larger than `num`. */
  top: number;
  retryDelaySeconds: number;
  retries: number;
  completionModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  temperature: number;
  generationMaxTokens: number;
  classificationMaxTokens: number;
  cacheTtlSeconds: number;
}
