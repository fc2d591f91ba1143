import { isLeft, type Either } from "./data/either.js";

/** Reason codes for cursor construction failures. */
export type CursorErrorReason = "InvalidStepSize";

/**
 * Returned in a `Left` by `Range` construction when the step is zero.
 */
export interface InvalidStepSize {
  readonly _tag: "InvalidStepSize";
  readonly message: string;
}

export const InvalidStepSize: InvalidStepSize = {
  _tag: "InvalidStepSize",
  message: "Range step must be non-zero",
};

/** Error thrown by `unwrap` when a constructor result is a `Left`. */
export class CursorError extends Error {
  constructor(
    readonly reason: CursorErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "CursorError";
  }
}

/**
 * Take the value out of a constructor result, throwing a `CursorError`
 * for a `Left`.
 */
export function unwrap<A>(result: Either<InvalidStepSize, A>): A {
  if (isLeft(result)) {
    throw new CursorError(result.left._tag, result.left.message);
  }
  return result.right;
}
