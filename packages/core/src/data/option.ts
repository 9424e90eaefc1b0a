/**
 * Option Data Type (Zero-Cost Implementation)
 *
 * Option represents an optional value: every Option<A> is either a value A or null.
 * Parse guards such as `Console.readInt` use it for "no value could be read".
 *
 * ## Runtime Representation
 *
 * ```typescript
 * Option<number>  // At runtime: number | null
 * Some(42)        // At runtime: 42
 * None            // At runtime: null
 * ```
 *
 * A must not include null; `Option<string | null>` collapses to `string | null`.
 */

// ============================================================================
// Option Type Definition (Zero-Cost)
// ============================================================================

/**
 * Option data type - either a value A or null
 */
export type Option<A> = A | null;

/**
 * Some type - represents presence of a non-null value
 */
export type Some<A> = A;

/**
 * None type - represents absence of value
 */
export type None = null;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Some value (just returns the value as-is)
 */
export function Some<A>(value: A): Option<A> {
  return value;
}

/**
 * The None value (null)
 */
export const None: Option<never> = null;

/**
 * Create an Option from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value === undefined ? null : value;
}

/**
 * Create an Option from a predicate
 */
export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Option<A> {
  return predicate(value) ? value : null;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return opt === null ? null : f(opt);
}

export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  return opt === null ? null : f(opt);
}

/**
 * Pattern match on Option
 */
export function fold<A, B>(opt: Option<A>, onNone: () => B, onSome: (a: A) => B): B {
  return opt === null ? onNone() : onSome(opt);
}

/**
 * Get the value or a lazily computed default
 */
export function getOrElse<A>(opt: Option<A>, defaultValue: () => A): A {
  return opt === null ? defaultValue() : opt;
}
