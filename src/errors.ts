export type ErrorKind =
  | 'NotReady'
  | 'BackendUnavailable'
  | 'DimensionMismatch'
  | 'NotAFailure'
  | 'MalformedRecord'
  | 'Config';

/**
 * Base class for every failure the analysis core reports to its callers.
 * `kind` lets callers branch without instanceof chains.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The embedding provider was never initialized or failed to load. */
export class NotReadyError extends AnalysisError {
  readonly kind = 'NotReady';

  constructor(public readonly model: string, detail?: string, options?: { cause?: unknown }) {
    super(`Embedding provider "${model}" is not ready${detail ? `: ${detail}` : ''}`, options);
  }
}

export class BackendUnavailableError extends AnalysisError {
  readonly kind = 'BackendUnavailable';

  constructor(
    public readonly backend: string,
    detail: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${backend} unavailable: ${detail}`, options);
  }
}

export class DimensionMismatchError extends AnalysisError {
  readonly kind = 'DimensionMismatch';

  constructor(public readonly expected: number, public readonly actual: number) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`);
  }
}

export class NotAFailureError extends AnalysisError {
  readonly kind = 'NotAFailure';

  constructor(public readonly eventId: string) {
    super(`Event "${eventId}" is not a failure (status FAILED with level ERROR required)`);
  }
}

/** An ingested record could not be turned into a TestEvent. */
export class MalformedRecordError extends AnalysisError {
  readonly kind = 'MalformedRecord';

  constructor(public readonly position: number, public readonly issues: string[]) {
    super(`Malformed record #${position}: ${issues.join('; ')}`);
  }
}

export class ConfigError extends AnalysisError {
  readonly kind = 'Config';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function errorKind(err: unknown): string {
  if (err instanceof AnalysisError) return err.kind;
  if (err instanceof Error) return err.name;
  return 'Unknown';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
