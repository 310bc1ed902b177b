/**
 * Error taxonomy.
 * Every failure the evolver raises on purpose is an EvolverError with a stable `code`,
 * so the CLI can print it without a stack trace.
 */

export class EvolverError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** LLM output missing a required structural field. */
export class MalformedOutputError extends EvolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_OUTPUT', message, details);
  }
}

export class InvariantViolationError extends EvolverError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('INVARIANT_VIOLATION', `${violations.length} invariant violation(s) found`, { violations });
    this.violations = violations;
  }
}

/** Final phase found no active idea with an overall score. */
export class NoScoredIdeasError extends EvolverError {
  constructor(runId: string) {
    super('NO_SCORED_IDEAS', `No active scored ideas to compose a final result for run ${runId}`, { runId });
  }
}

export class NotEnoughIdeasError extends EvolverError {
  constructor(eligible: number, active: number) {
    super(
      'NOT_ENOUGH_IDEAS',
      `Need at least 2 scored active ideas for a tournament (found ${eligible} scored of ${active} active)`,
      { eligible, active }
    );
  }
}

export class StorageError extends EvolverError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('STORAGE_ERROR', `${message}: ${path}${cause instanceof Error ? ` (${cause.message})` : ''}`, { path });
    this.path = path;
  }
}

export class DivideByZeroError extends EvolverError {
  constructor() {
    super('DIVIDE_BY_ZERO', 'Scoring weights sum to zero');
  }
}

export class ConfigError extends EvolverError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class RunNotFoundError extends EvolverError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', `Run ${runId} not found`, { runId });
  }
}

export class ProfileFormatError extends EvolverError {
  constructor(message: string) {
    super('PROFILE_FORMAT', message);
  }
}
