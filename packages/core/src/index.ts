/**
 * @lineio/core — a console effect algebra
 *
 * Console<A> describes line-oriented reads and writes without performing
 * them; `runConsole` executes a description against a Terminal. Thunk<A> is
 * the companion wrapper for deferred, possibly failing computations.
 *
 * @example
 * ```typescript
 * import { Console, runConsole, nodeTerminal } from "@lineio/core";
 *
 * const hello = Console.flatMap(
 *   Console.zipRight(Console.writeLine("What is your name?"), Console.readLine),
 *   (name) => Console.writeLine(`Hello, ${name}!`),
 * );
 *
 * runConsole(hello, nodeTerminal());
 * ```
 */

// ============================================================================
// Data Types
// ============================================================================

export type { Option } from "./data/option.js";
export {
  Some,
  None,
  fromNullable,
  fromPredicate,
  isSome,
  isNone,
  fold as foldOption,
  getOrElse as getOrElseOption,
} from "./data/option.js";

export type { Either } from "./data/either.js";
export {
  Left,
  Right,
  tryCatch,
  isLeft,
  isRight,
  fold as foldEither,
  mapLeft,
  getOrElse as getOrElseEither,
} from "./data/either.js";

// ============================================================================
// Console
// ============================================================================

export { Console, parseInteger } from "./console/console.js";
export type { ReadLine, WriteLine, Done } from "./console/console.js";
export { runConsole } from "./console/interpreter.js";
export { nodeTerminal, TestTerminal } from "./console/terminal.js";
export type { Terminal, NodeTerminalOptions } from "./console/terminal.js";
export { program, ConsoleFluent } from "./console/fluent.js";

// ============================================================================
// Thunk
// ============================================================================

export { Thunk } from "./thunk/thunk.js";

// ============================================================================
// Laws
// ============================================================================

export { consoleLaws, equivalent, interpret, verifyLaws } from "./laws/console.js";
export type {
  Law,
  LawSet,
  LawSamples,
  LawVerificationResult,
  EqConsole,
  Interpretation,
} from "./laws/console.js";

// ============================================================================
// Config & Errors
// ============================================================================

export { config } from "./config.js";
export type { LineioConfig, TerminalConfig, EndOfInputMode } from "./config.js";
export { EndOfInputError, UsageError, toError } from "./errors.js";
