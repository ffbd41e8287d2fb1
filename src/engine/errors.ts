/**
 * Error taxonomy for allocation runs.
 *
 * Every error is raised where it is detected and propagates to the caller.
 * A stage may re-raise a `ComputationError` under its own name, with the
 * original as `cause`. Allocation is deterministic, so none of these is
 * retryable.
 */

export type RateioErrorCode =
  | "SCHEMA"
  | "UNMATCHED_KEY"
  | "COMPUTATION"
  | "CONSERVATION";

export abstract class RateioError extends Error {
  abstract readonly code: RateioErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A column a stage reads is missing, or holds a value of the wrong type. */
export class SchemaError extends RateioError {
  readonly name = "SchemaError";
  readonly code = "SCHEMA";

  constructor(
    message: string,
    public readonly column: string,
    public readonly table?: string
  ) {
    super(message);
  }
}

/** A grouping key on one side of a stage has no counterpart on the other. */
export class UnmatchedKeyError extends RateioError {
  readonly name = "UnmatchedKeyError";
  readonly code = "UNMATCHED_KEY";

  constructor(
    message: string,
    public readonly stage: string,
    public readonly key: string
  ) {
    super(message);
  }
}

/** Non-finite, overflowing or contract-violating numbers during a split. */
export class ComputationError extends RateioError {
  readonly name = "ComputationError";
  readonly code = "COMPUTATION";

  constructor(message: string, public readonly stage?: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** The total leaving a stage differs from the total entering it. */
export class ConservationError extends RateioError {
  readonly name = "ConservationError";
  readonly code = "CONSERVATION";

  constructor(
    message: string,
    public readonly stage: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(message);
  }

  get difference(): number {
    return this.actual - this.expected;
  }
}
