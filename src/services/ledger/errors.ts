export type LedgerErrorKind = 'ValidationError' | 'StorageCorruption' | 'IOFailure';

export type ValidationReason =
  | 'InvalidDate'
  | 'NegativeAmount'
  | 'InvalidAmount'
  | 'EmptyCategory'
  | 'InvalidNote'
  | 'InvalidInput';

export abstract class LedgerError extends Error {
  abstract readonly kind: LedgerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised before any write when an expense fails validation,
 * and when a date range bound is not a calendar date.
 */
export class ValidationError extends LedgerError {
  readonly kind = 'ValidationError';

  constructor(
    readonly reason: ValidationReason,
    message: string,
  ) {
    super(message);
  }
}

export class StorageCorruption extends LedgerError {
  readonly kind = 'StorageCorruption';

  constructor(
    readonly path: string,
    readonly line: number,
    detail: string,
  ) {
    super(`Corrupt ledger ${path} at line ${line}: ${detail}`);
  }
}

export class IOFailure extends LedgerError {
  readonly kind = 'IOFailure';

  constructor(
    readonly path: string,
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
