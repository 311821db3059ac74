import { types } from 'util';

export type PreflightErrorKind =
  | 'InvalidHostPattern'
  | 'InvalidConcurrency'
  | 'MissingOrUnreadableScript'
  | 'InvalidOption';

/**
 * Raised before any remote session is opened. The whole run is aborted and
 * nothing is written to the report stream.
 */
export class PreflightError extends Error {
  constructor(
    readonly kind: PreflightErrorKind,
    message: string,
  ) {
    super(message);
    this.name = kind;
  }
}

export class InvalidHostPatternError extends PreflightError {
  constructor(
    readonly pattern: string,
    reason: string,
  ) {
    super('InvalidHostPattern', `invalid host pattern "${pattern}": ${reason}`);
  }
}

export class InvalidConcurrencyError extends PreflightError {
  constructor(value: unknown) {
    super('InvalidConcurrency', `--processes must be a positive integer (got ${JSON.stringify(value)})`);
  }
}

export class MissingOrUnreadableScriptError extends PreflightError {
  constructor(
    readonly scriptPath: string | undefined,
    reason: string,
  ) {
    super(
      'MissingOrUnreadableScript',
      scriptPath ? `script file '${scriptPath}' ${reason}` : `--script ${reason}`,
    );
  }
}

export class InvalidOptionError extends PreflightError {
  constructor(message: string) {
    super('InvalidOption', message);
  }
}

export function errorMessage(err: unknown): string {
  return types.isNativeError(err) ? err.message : String(err);
}
