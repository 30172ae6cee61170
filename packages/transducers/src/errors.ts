/** Reason codes for rejected transducer or source parameters. */
export type TransducerConfigErrorReason =
  | "not_integer"
  | "negative"
  | "not_positive"
  | "zero_step"
  | "out_of_range";

/** Error thrown when a transducer or source is constructed with an invalid parameter. */
export class TransducerConfigError extends Error {
  constructor(
    readonly transducer: string,
    readonly parameter: string,
    readonly reason: TransducerConfigErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "TransducerConfigError";
  }
}

/**
 * Require a non-negative integer count (Take, Drop, RepeatEach, takeLast).
 */
export function requireCount(transducer: string, parameter: string, value: number): number {
  if (!Number.isInteger(value)) {
    throw new TransducerConfigError(
      transducer,
      parameter,
      "not_integer",
      `${transducer}: ${parameter} must be an integer, got ${value}`,
    );
  }
  if (value < 0) {
    throw new TransducerConfigError(
      transducer,
      parameter,
      "negative",
      `${transducer}: ${parameter} must not be negative, got ${value}`,
    );
  }
  return value;
}

/**
 * Require a positive integer size (Chunk, Aperture).
 */
export function requireSize(transducer: string, parameter: string, value: number): number {
  if (!Number.isInteger(value)) {
    throw new TransducerConfigError(
      transducer,
      parameter,
      "not_integer",
      `${transducer}: ${parameter} must be an integer, got ${value}`,
    );
  }
  if (value < 1) {
    throw new TransducerConfigError(
      transducer,
      parameter,
      "not_positive",
      `${transducer}: ${parameter} must be at least 1, got ${value}`,
    );
  }
  return value;
}

/**
 * Require a probability in `[0, 1]` (quantile).
 */
export function requireFraction(transducer: string, parameter: string, value: number): number {
  if (!(value >= 0 && value <= 1)) {
    throw new TransducerConfigError(
      transducer,
      parameter,
      "out_of_range",
      `${transducer}: ${parameter} must be between 0 and 1, got ${value}`,
    );
  }
  return value;
}
