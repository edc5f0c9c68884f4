import type { RolloutState } from './types';

export type PipelineErrorKind = 'configuration' | 'execution' | 'timeout' | 'cancellation';

/**
 * Base class for every failure the engine reports.
 * `kind` is what callers branch on; the message is for operators.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  toJSON(): { kind: PipelineErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

/** Malformed definition or missing secret. Raised before any side effect; never retried. */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
  name = 'ConfigurationError';
}

/** An external action (docker, kubectl, a shell step) exited non-zero. */
export class ExecutionError extends PipelineError {
  readonly kind = 'execution';
  name = 'ExecutionError';

  constructor(
    message: string,
    readonly exitCode: number,
  ) {
    super(message);
  }
}

/**
 * Rollout did not converge in time. The workload may still converge later,
 * so this stays distinct from ExecutionError.
 */
export class TimeoutError extends PipelineError {
  readonly kind = 'timeout';
  name = 'TimeoutError';

  constructor(
    message: string,
    readonly lastState: RolloutState,
  ) {
    super(message);
  }
}

/** Caller-initiated abort. Not a true failure; must not trigger retries. */
export class CancellationError extends PipelineError {
  readonly kind = 'cancellation';
  name = 'CancellationError';
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
