// ============================================================================
// FOILGEN — Error Types
// ============================================================================

import type { Side } from '../types/airfoil';

/** Base class for every error raised by the geometry pipeline. */
export class AirfoilError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A written value falls outside its declared bounds, or a NACA designation
 * does not match the four-digit pattern. Store state is unchanged.
 */
export class ValidationError extends AirfoilError {
  readonly field: string;
  readonly value: unknown;
  readonly min?: number;
  readonly max?: number;

  constructor(
    field: string,
    value: unknown,
    message: string,
    bounds?: { min: number; max: number },
  ) {
    super(message);
    this.field = field;
    this.value = value;
    this.min = bounds?.min;
    this.max = bounds?.max;
  }
}

/** The PARSEC linear system for one surface has no usable solution. */
export class NumericalError extends AirfoilError {
  readonly side: Side;

  constructor(side: Side, message: string) {
    super(message);
    this.side = side;
  }
}

/** Format any thrown value as a single display line. */
export function formatAirfoilError(err: unknown): string {
  if (err instanceof AirfoilError) return `[${err.name}] ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
