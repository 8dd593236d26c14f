/**
 * Error taxonomy for the acoustic model
 */

/** Codes carried by {@link DomainError} */
export type DomainErrorCode =
  | 'NEGATIVE_SPEED'
  | 'NON_POSITIVE_RANGE'
  | 'INVALID_ONSET_SPEED'
  | 'INVALID_INPUT'
  | 'INVALID_PROFILE'
  | 'DUPLICATE_PROFILE'
  | 'EMPTY_COMPARISON'
  | 'INVALID_SWEEP';

/** Codes carried by {@link NotFoundError} */
export type NotFoundErrorCode = 'PROFILE_NOT_FOUND';

export type SonarModelErrorCode = DomainErrorCode | NotFoundErrorCode;

/** Base class for every error raised by the model */
export class SonarModelError extends Error {
  readonly code: SonarModelErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SonarModelErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SonarModelError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Input violates a mathematical precondition of the model
 * (negative speed, non-positive range, zero onset speed, ...)
 */
export class DomainError extends SonarModelError {
  declare readonly code: DomainErrorCode;

  constructor(code: DomainErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, context);
    this.name = 'DomainError';
  }
}

/** A requested profile name does not match the registry */
export class NotFoundError extends SonarModelError {
  declare readonly code: NotFoundErrorCode;
  readonly requested: string;

  constructor(requested: string, known: readonly string[] = []) {
    const hint = known.length > 0 ? ` (known: ${known.join(', ')})` : '';
    super('PROFILE_NOT_FOUND', `Unknown submarine profile "${requested}"${hint}`, { requested });
    this.name = 'NotFoundError';
    this.requested = requested;
  }
}

/**
 * Reject a computed quantity that overflowed or went undefined
 */
export function assertFinite(value: number, quantity: string, context: Record<string, unknown>): number {
  if (!Number.isFinite(value)) {
    throw new DomainError('INVALID_INPUT', `${quantity} is not finite (${value}) for the given inputs`, {
      ...context,
      [quantity]: value,
    });
  }
  return value;
}

export function isSonarModelError(value: unknown): value is SonarModelError {
  return value instanceof SonarModelError;
}
