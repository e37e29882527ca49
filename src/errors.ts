// ============================================
// ERRORS
// ============================================
// Every failure the comparison core can raise. `status` is what the HTTP
// layer answers with; `code` is what the socket channel reports.

export class ReplayCompareError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/**
 * Malformed or too-short input
 */
export class InputError extends ReplayCompareError {
  constructor(message: string) {
    super(message, 400, 'INPUT_ERROR');
  }
}

export class EmptyTraceError extends InputError {
  constructor(owner: string) {
    super(`Trace for "${owner}" has no events`);
  }
}

export class InvalidModeError extends ReplayCompareError {
  readonly mode: unknown;

  constructor(mode: unknown) {
    super(`\`mode\` must be one of 'double' or 'single', got ${JSON.stringify(mode) ?? String(mode)}`, 400, 'INVALID_MODE');
    this.mode = mode;
  }
}

/**
 * A floating-point computation overflowed or produced an invalid value
 */
export class NumericFaultError extends ReplayCompareError {
  constructor(operation: string, value: number) {
    super(`Floating-point fault in ${operation}: ${value}`, 422, 'NUMERIC_FAULT');
  }
}

export function isReplayCompareError(err: unknown): err is ReplayCompareError {
  return err instanceof ReplayCompareError;
}
