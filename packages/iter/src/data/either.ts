/**
 * Either Data Type
 *
 * An Either<E, A> is either Left<E> (failure) or Right<A> (success).
 * Fallible constructors return it instead of throwing.
 */

// ============================================================================
// Either Type Definition
// ============================================================================

export type Either<E, A> = Left<E> | Right<A>;

export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Right value
 */
export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return isRight(either) ? Right(f(either.right)) : either;
}

/**
 * Pattern match on Either
 */
export function match<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  return isLeft(either) ? onLeft(either.left) : onRight(either.right);
}
