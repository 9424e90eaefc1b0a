/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * An Either<E, A> is either Left<E> (representing failure/error) or Right<A> (representing success).
 * By convention, Right is the "right" (correct/success) case.
 *
 * `Thunk.attempt` reports its outcome as an `Either<Error, A>`.
 */

// ============================================================================
// Either Type Definition
// ============================================================================

/**
 * Either data type - either Left (error) or Right (success)
 */
export type Either<E, A> = Left<E> | Right<A>;

/**
 * Left variant - represents failure/error
 */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/**
 * Right variant - represents success
 */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

/**
 * Create a Right value
 */
export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

/**
 * Create an Either from a try/catch
 */
export function tryCatch<E, A>(f: () => A, onError: (error: unknown) => E): Either<E, A> {
  try {
    return Right(f());
  } catch (error) {
    return Left(onError(error));
  }
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
 * Map over the Left value
 */
export function mapLeft<E, A, E2>(either: Either<E, A>, f: (e: E) => E2): Either<E2, A> {
  return isLeft(either) ? Left(f(either.left)) : either;
}

/**
 * Pattern match on Either
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  return isLeft(either) ? onLeft(either.left) : onRight(either.right);
}

/**
 * Get the Right value or compute a default from the Left
 */
export function getOrElse<E, A>(either: Either<E, A>, onLeft: (e: E) => A): A {
  return isLeft(either) ? onLeft(either.left) : either.right;
}
