/**
 * Console Algebra
 *
 * Console<A> is an immutable description of a program that may read a line,
 * write a line, or produce a value of type A. Building a Console<A> performs
 * no I/O; only the interpreter (`runConsole`) talks to a terminal.
 *
 * Every combinator is derived from `flatMap`, which pushes the continuation
 * past pending reads and writes until it reaches the terminal `Done` node.
 */

import { Option, Some, None } from "../data/option.js";

// ============================================================================
// Console ADT Definition
// ============================================================================

/**
 * Base Console type - one of the three instruction nodes
 */
export type Console<A> = ReadLine<A> | WriteLine<A> | Done<A>;

/**
 * ReadLine - request one line of input; the continuation picks the rest of the program
 */
export interface ReadLine<A> {
  readonly _tag: "ReadLine";
  readonly next: (line: string) => Console<A>;
}

/**
 * WriteLine - emit `line`, then continue with `next`
 */
export interface WriteLine<A> {
  readonly _tag: "WriteLine";
  readonly line: string;
  readonly next: Console<A>;
}

/**
 * Done - a deferred pure value, forced only when reached
 */
export interface Done<A> {
  readonly _tag: "Done";
  readonly value: () => A;
}

// ============================================================================
// Parsing
// ============================================================================

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a decimal integer: an optional sign followed by digits, nothing else.
 */
export function parseInteger(s: string): Option<number> {
  if (!INTEGER.test(s)) return None;
  const n = Number(s);
  return Number.isSafeInteger(n) ? Some(n) : None;
}

// ============================================================================
// Result Accumulator
// ============================================================================

/** Collected results, newest first */
type Results<A> = { readonly head: A; readonly tail: Results<A> } | null;

function toArray<A>(results: Results<A>): A[] {
  const out: A[] = [];
  for (let node = results; node !== null; node = node.tail) {
    out.push(node.head);
  }
  return out.reverse();
}

// ============================================================================
// Console Constructors
// ============================================================================

const unit: Console<void> = { _tag: "Done", value: () => undefined };

const readLine: Console<string> = {
  _tag: "ReadLine",
  next: (line) => ({ _tag: "Done", value: () => line }),
};

export const Console = {
  ReadLine<A>(next: (line: string) => Console<A>): Console<A> {
    return { _tag: "ReadLine", next };
  },

  WriteLine<A>(line: string, next: Console<A>): Console<A> {
    return { _tag: "WriteLine", line, next };
  },

  Done<A>(value: () => A): Console<A> {
    return { _tag: "Done", value };
  },

  /**
   * Read one line of input
   */
  readLine,

  /**
   * Write one line of output
   */
  writeLine(line: string): Console<void> {
    return Console.WriteLine(line, unit);
  },

  /**
   * Lift a pure value
   */
  succeed<A>(value: A): Console<A> {
    return Console.Done(() => value);
  },

  /**
   * Lift a computation that runs only when the Done node is forced
   */
  sync<A>(thunk: () => A): Console<A> {
    return Console.Done(thunk);
  },

  /**
   * The program that does nothing and returns undefined
   */
  unit,

  // ==========================================================================
  // Sequencing
  // ==========================================================================

  /**
   * FlatMap - sequential composition.
   *
   * Runs of writes are rebuilt in a loop rather than by recursion, so long
   * output chains do not deepen the stack at construction time.
   */
  flatMap<A, B>(self: Console<A>, f: (a: A) => Console<B>): Console<B> {
    const lines: string[] = [];
    let current = self;
    while (current._tag === "WriteLine") {
      lines.push(current.line);
      current = current.next;
    }

    let result: Console<B>;
    if (current._tag === "ReadLine") {
      const k = current.next;
      result = Console.ReadLine((line) => Console.flatMap(k(line), f));
    } else {
      result = f(current.value());
    }

    for (let i = lines.length - 1; i >= 0; i--) {
      result = Console.WriteLine(lines[i], result);
    }
    return result;
  },

  map<A, B>(self: Console<A>, f: (a: A) => B): Console<B> {
    return Console.flatMap(self, (a) => Console.Done(() => f(a)));
  },

  /**
   * Zip - run `self` then `other`, keep both results
   */
  zip<A, B>(self: Console<A>, other: Console<B>): Console<[A, B]> {
    return Console.flatMap(self, (a) => Console.map(other, (b): [A, B] => [a, b]));
  },

  /**
   * Run both, keep the second result
   */
  zipRight<A, B>(self: Console<A>, other: Console<B>): Console<B> {
    return Console.map(Console.zip(self, other), (pair) => pair[1]);
  },

  /**
   * Run both, keep the first result
   */
  zipLeft<A, B>(self: Console<A>, other: Console<B>): Console<A> {
    return Console.map(Console.zip(self, other), (pair) => pair[0]);
  },

  flatten<A>(self: Console<Console<A>>): Console<A> {
    return Console.flatMap(self, (inner) => inner);
  },

  /**
   * Replace the result with a constant
   */
  as<A, B>(self: Console<A>, b: B): Console<B> {
    return Console.map(self, () => b);
  },

  void_<A>(self: Console<A>): Console<void> {
    return Console.as(self, undefined);
  },

  // ==========================================================================
  // Lists
  // ==========================================================================

  /**
   * Sequence programs left to right, collecting their results in order
   */
  collectAll<A>(programs: ReadonlyArray<Console<A>>): Console<A[]> {
    // Results so far travel forward in an accumulator, so each ReadLine
    // continuation hands back the rest of the list without wrapping it.
    const from = (start: number, collected: Results<A>): Console<A[]> => {
      const lines: string[] = [];
      let results = collected;
      let i = start;
      let result: Console<A[]> | undefined;

      while (result === undefined) {
        if (i >= programs.length) {
          const done = results;
          result = Console.Done(() => toArray(done));
          break;
        }

        let current = programs[i];
        while (current._tag === "WriteLine") {
          lines.push(current.line);
          current = current.next;
        }

        if (current._tag === "ReadLine") {
          const k = current.next;
          const next = i + 1;
          const before = results;
          result = Console.ReadLine((line) =>
            Console.flatMap(k(line), (a) => from(next, { head: a, tail: before })),
          );
        } else {
          results = { head: current.value(), tail: results };
          i++;
        }
      }

      for (let j = lines.length - 1; j >= 0; j--) {
        result = Console.WriteLine(lines[j], result);
      }
      return result;
    };
    return from(0, null);
  },

  /**
   * Build one program per value and sequence them
   */
  foreach<A, B>(values: ReadonlyArray<A>, body: (a: A) => Console<B>): Console<B[]> {
    return Console.collectAll(values.map(body));
  },

  // ==========================================================================
  // Parse Guards
  // ==========================================================================

  /**
   * Read a line and parse it; a parse failure is None, never an exception
   */
  readAs<A>(parse: (s: string) => Option<A>): Console<Option<A>> {
    return Console.map(readLine, parse);
  },

  /**
   * Read an integer
   */
  get readInt(): Console<Option<number>> {
    return Console.readAs(parseInteger);
  },
};
