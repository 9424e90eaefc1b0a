/**
 * Sample programs written against the Console algebra and Thunk
 */

import { Console, Thunk, type Terminal } from "@lineio/core";

// ============================================================================
// Small Programs
// ============================================================================

export const unit: Console<void> = Console.succeed(undefined);

export const fortyTwo: Console<number> = Console.succeed(42);

export const askName: Console<void> = Console.writeLine("What is your name?");

export const readName: Console<string> = Console.readLine;

export function greetUser(name: string): Console<void> {
  return Console.writeLine(`Hello, ${name}!`);
}

/**
 * Ask for a name, read it, greet
 */
export const sayHello: Console<void> = Console.flatMap(askName, () =>
  Console.flatMap(readName, (name) => greetUser(name)),
);

/**
 * Prompt for an integer and say whether one was entered
 */
export const readIntReport: Console<void> = Console.flatMap(
  Console.zipRight(Console.writeLine("Enter an integer:"), Console.readInt),
  (n) => Console.writeLine(n === null ? "That is not an integer." : `You entered ${n}.`),
);

// ============================================================================
// Questionnaire
// ============================================================================

export const questions: ReadonlyArray<string> = [
  "What is your name?",
  "Where were you born?",
  "Where do you live?",
  "What is your age?",
  "What is your favorite programming language?",
];

const ask = (question: string): Console<string> =>
  Console.flatMap(Console.writeLine(question), () => Console.readLine);

export const answers: ReadonlyArray<Console<string>> = questions.map(ask);

export const answers2: Console<string[]> = Console.collectAll(answers);

export const answers3: Console<string[]> = Console.foreach(questions, ask);

/**
 * Echo each question with the reply it got
 */
export function reportAnswers(replies: ReadonlyArray<string>): Console<void> {
  return Console.void_(
    Console.foreach(
      questions.map((question, i): [string, string | undefined] => [question, replies[i]]),
      ([question, reply]) => Console.writeLine(`${question} ${reply ?? "(no answer)"}`),
    ),
  );
}

// ============================================================================
// Thunk Versions
// ============================================================================

export const printLn =
  (terminal: Terminal) =>
  (line: string): Thunk<void> =>
    Thunk.writeLine(terminal, line);

export const readLn = (terminal: Terminal): Thunk<string> => Thunk.readLine(terminal);

export function thunkProgram(terminal: Terminal): Thunk<void> {
  const print = printLn(terminal);
  return print("What is your name?")
    .flatMap(() => readLn(terminal))
    .flatMap((name) => print(`Hello, ${name}!`));
}
