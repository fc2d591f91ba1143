/**
 * Option Data Type
 *
 * Option represents an optional value: every Option<A> is either Some(a)
 * or None. Unlike a nullable, the tag keeps "no value" apart from a
 * present `null` or `undefined`, so a cursor over nullable payloads still
 * signals exhaustion unambiguously.
 */

// ============================================================================
// Option Type Definition
// ============================================================================

/**
 * Option data type - either Some (present) or None (absent)
 */
export type Option<A> = Some<A> | None;

/**
 * Some variant - carries the value
 */
export interface Some<A> {
  readonly _tag: "Some";
  readonly value: A;
}

/**
 * None variant - no value
 */
export interface None {
  readonly _tag: "None";
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Some value
 */
export function Some<A>(value: A): Option<A> {
  return { _tag: "Some", value };
}

/**
 * The None value (singleton)
 */
export const None: Option<never> = { _tag: "None" };

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is Some<A> {
  return opt._tag === "Some";
}

export function isNone<A>(opt: Option<A>): opt is None {
  return opt._tag === "None";
}

// ============================================================================
// Destructors
// ============================================================================

/**
 * Get the value or a fallback
 */
export function getOrElse<A>(opt: Option<A>, fallback: () => A): A {
  return isSome(opt) ? opt.value : fallback();
}
