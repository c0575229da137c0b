/**
 * Error taxonomy for the calculation engines.
 *
 * Every failure is raised synchronously at the offending call. Callers narrow
 * on `code` (or `instanceof`) and decide how to present it; the engines never
 * print.
 */

export type CalculationErrorCode = 'UNKNOWN_UNIT' | 'KIND_MISMATCH' | 'INVALID_INPUT';

export abstract class CalculationError extends Error {
  abstract readonly code: CalculationErrorCode;
}

/** A unit symbol is not registered for the stated quantity kind. */
export class UnknownUnitError extends CalculationError {
  readonly code = 'UNKNOWN_UNIT';

  constructor(readonly unit: string, readonly kind: string) {
    super(`Unit '${unit}' is not a registered ${kind} unit`);
    this.name = 'UnknownUnitError';
  }
}

/** The two units of a conversion belong to different quantity kinds. */
export class KindMismatchError extends CalculationError {
  readonly code = 'KIND_MISMATCH';

  constructor(
    readonly fromUnit: string,
    readonly toUnit: string,
    readonly fromKinds: readonly string[],
    readonly toKinds: readonly string[],
  ) {
    super(
      `Cannot convert '${fromUnit}' (${fromKinds.join('/')}) to '${toUnit}' (${toKinds.join('/')}): ` +
      `units measure different quantities`,
    );
    this.name = 'KindMismatchError';
  }
}

/** A dimension, rate or parameter set is outside what the calculation accepts. */
export class InvalidInputError extends CalculationError {
  readonly code = 'INVALID_INPUT';

  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export function isCalculationError(err: unknown): err is CalculationError {
  return err instanceof CalculationError;
}

/**
 * Throw InvalidInputError unless `value` is a finite number strictly above zero.
 */
export function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${field} must be a finite number greater than zero (got ${value})`, field);
  }
}

/**
 * Throw InvalidInputError unless `value` is a finite number at or above zero.
 */
export function requireNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${field} must be a finite number of zero or more (got ${value})`, field);
  }
}
