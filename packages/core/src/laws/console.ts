/**
 * Console Laws
 *
 * Two Console programs are equivalent under a script when interpreting each
 * against a fresh TestTerminal fed that script writes the same lines, leaves
 * the same unread input and ends with the same result (or the same error).
 *
 * Monad Laws:
 *   - Left identity: flatMap(succeed(a), f) === f(a)
 *   - Right identity: flatMap(fa, succeed) === fa
 *   - Associativity: flatMap(flatMap(fa, f), g) === flatMap(fa, a => flatMap(f(a), g))
 *
 * Zip ordering: zip(fa, fb) runs fa's effects before fb's
 *
 * @module
 */

import { Console } from "../console/console.js";
import { runConsole } from "../console/interpreter.js";
import { TestTerminal } from "../console/terminal.js";
import { Either, tryCatch } from "../data/either.js";
import { toError } from "../errors.js";

// ============================================================================
// Law Types
// ============================================================================

export interface Law {
  readonly name: string;
  readonly description: string;
  readonly check: () => boolean;
}

export type LawSet = ReadonlyArray<Law>;

export interface LawVerificationResult {
  readonly name: string;
  readonly passed: boolean;
}

// ============================================================================
// Equivalence by Interpretation
// ============================================================================

export interface Interpretation<A> {
  readonly output: ReadonlyArray<string>;
  readonly remainingInput: ReadonlyArray<string>;
  readonly result: Either<Error, A>;
}

/**
 * Run a program against a fresh TestTerminal fed `script`
 */
export function interpret<A>(program: Console<A>, script: ReadonlyArray<string>): Interpretation<A> {
  const terminal = new TestTerminal(script);
  const result = tryCatch(() => runConsole(program, terminal), toError);
  return {
    output: terminal.output,
    remainingInput: terminal.remainingInput,
    result,
  };
}

/**
 * Equality for Console<A> under a fixed input script
 */
export interface EqConsole<A> {
  readonly eqv: (x: Console<A>, y: Console<A>) => boolean;
}

function sameLines(x: ReadonlyArray<string>, y: ReadonlyArray<string>): boolean {
  return x.length === y.length && x.every((line, i) => line === y[i]);
}

export function equivalent<A>(
  script: ReadonlyArray<string>,
  eqA: (x: A, y: A) => boolean = Object.is,
): EqConsole<A> {
  return {
    eqv: (x, y) => {
      const rx = interpret(x, script);
      const ry = interpret(y, script);
      if (!sameLines(rx.output, ry.output) || !sameLines(rx.remainingInput, ry.remainingInput)) {
        return false;
      }
      if (rx.result._tag === "Left" || ry.result._tag === "Left") {
        return (
          rx.result._tag === "Left" &&
          ry.result._tag === "Left" &&
          rx.result.left.message === ry.result.left.message
        );
      }
      return eqA(rx.result.right, ry.result.right);
    },
  };
}

// ============================================================================
// Law Generators
// ============================================================================

/**
 * The values each law is checked at
 */
export interface LawSamples<A> {
  readonly value: A;
  readonly program: Console<A>;
  readonly other: Console<A>;
  readonly f: (a: A) => Console<A>;
  readonly g: (a: A) => Console<A>;
  readonly h: (a: A) => A;
}

/**
 * `EZip` compares the paired results of `zip`
 */
export function consoleLaws<A>(E: EqConsole<A>, s: LawSamples<A>, EZip: EqConsole<[A, A]>): LawSet {
  return [
    {
      name: "left identity",
      description: "succeed is left identity for flatMap: flatMap(succeed(a), f) === f(a)",
      check: () => E.eqv(Console.flatMap(Console.succeed(s.value), s.f), s.f(s.value)),
    },
    {
      name: "right identity",
      description: "succeed is right identity for flatMap: flatMap(fa, succeed) === fa",
      check: () => E.eqv(Console.flatMap(s.program, Console.succeed), s.program),
    },
    {
      name: "associativity",
      description:
        "flatMap is associative: flatMap(flatMap(fa, f), g) === flatMap(fa, a => flatMap(f(a), g))",
      check: () =>
        E.eqv(
          Console.flatMap(Console.flatMap(s.program, s.f), s.g),
          Console.flatMap(s.program, (a) => Console.flatMap(s.f(a), s.g)),
        ),
    },
    {
      name: "map derived from flatMap",
      description: "map(fa, h) === flatMap(fa, a => succeed(h(a)))",
      check: () =>
        E.eqv(
          Console.map(s.program, s.h),
          Console.flatMap(s.program, (a) => Console.succeed(s.h(a))),
        ),
    },
    {
      name: "zip ordering",
      description: "zip(fa, fb) === flatMap(fa, a => map(fb, b => [a, b]))",
      check: () =>
        EZip.eqv(
          Console.zip(s.program, s.other),
          Console.flatMap(s.program, (a) => Console.map(s.other, (b): [A, A] => [a, b])),
        ),
    },
    {
      name: "zipRight derived from flatMap",
      description: "zipRight(fa, fb) === flatMap(fa, () => fb)",
      check: () =>
        E.eqv(
          Console.zipRight(s.program, s.other),
          Console.flatMap(s.program, () => s.other),
        ),
    },
    {
      name: "zipLeft derived from flatMap",
      description: "zipLeft(fa, fb) === flatMap(fa, a => as(fb, a))",
      check: () =>
        E.eqv(
          Console.zipLeft(s.program, s.other),
          Console.flatMap(s.program, (a) => Console.as(s.other, a)),
        ),
    },
  ];
}

/**
 * Check every law in a set
 */
export function verifyLaws(laws: LawSet): LawVerificationResult[] {
  return laws.map((law) => ({ name: law.name, passed: law.check() }));
}
