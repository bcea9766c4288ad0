export type ModelFailureKind = 'rate_limited' | 'fatal';

export type ModelOperation = 'complete' | 'embed';

export class ModelCallError extends Error {
  readonly kind: ModelFailureKind;
  readonly operation: ModelOperation;
  readonly attempts: number;

  constructor(
    kind: ModelFailureKind,
    operation: ModelOperation,
    attempts: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ModelCallError';
    this.kind = kind;
    this.operation = operation;
    this.attempts = attempts;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid grant finder configuration: ${problems.join(' | ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class PipelineBusyError extends Error {
  constructor() {
    super('A grant search is already running; wait for it to finish before starting another.');
    this.name = 'PipelineBusyError';
  }
}

export const isModelCallError = (error: unknown): error is ModelCallError => error instanceof ModelCallError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
