/**
 * Thunk - a deferred, possibly failing computation
 *
 * Thunk<A> wraps a producer of A. Nothing runs until `unsafeRun` is called,
 * and every call re-runs the producer; results are never cached.
 */

import { Either, Left, Right } from "../data/either.js";
import { toError } from "../errors.js";
import type { Terminal } from "../console/terminal.js";

export class Thunk<A> {
  constructor(readonly unsafeRun: () => A) {}

  /**
   * Wrap a producer without invoking it
   */
  static succeed<A>(producer: () => A): Thunk<A> {
    return new Thunk(producer);
  }

  /**
   * A thunk that throws `error` every time it is forced
   */
  static fail<A = never>(error: Error): Thunk<A> {
    return new Thunk<A>(() => {
      throw error;
    });
  }

  /**
   * Write one line to `terminal` when forced
   */
  static writeLine(terminal: Terminal, line: string): Thunk<void> {
    return new Thunk(() => terminal.writeLine(line));
  }

  /**
   * Read one line from `terminal` when forced
   */
  static readLine(terminal: Terminal): Thunk<string> {
    return new Thunk(() => terminal.readLine());
  }

  map<B>(f: (a: A) => B): Thunk<B> {
    return new Thunk(() => f(this.unsafeRun()));
  }

  flatMap<B>(f: (a: A) => Thunk<B>): Thunk<B> {
    return new Thunk(() => f(this.unsafeRun()).unsafeRun());
  }

  /**
   * Convert a thrown failure into a Left; never throws itself
   */
  attempt(): Thunk<Either<Error, A>> {
    return new Thunk(() => {
      try {
        return Right<Error, A>(this.unsafeRun());
      } catch (e) {
        return Left<Error, A>(toError(e));
      }
    });
  }
}
