/**
 * Fluent API (method-chain style) over Console
 */

import { Console } from "./console.js";
import { runConsole } from "./interpreter.js";
import type { Terminal } from "./terminal.js";

/**
 * Wrap a Console program for method chaining
 */
export function program<A>(computation: Console<A>): ConsoleFluent<A> {
  return new ConsoleFluent(computation);
}

export class ConsoleFluent<A> {
  constructor(private readonly _program: Console<A>) {}

  get program(): Console<A> {
    return this._program;
  }

  map<B>(f: (a: A) => B): ConsoleFluent<B> {
    return new ConsoleFluent(Console.map(this._program, f));
  }

  flatMap<B>(f: (a: A) => Console<B>): ConsoleFluent<B> {
    return new ConsoleFluent(Console.flatMap(this._program, f));
  }

  zip<B>(that: Console<B>): ConsoleFluent<[A, B]> {
    return new ConsoleFluent(Console.zip(this._program, that));
  }

  /**
   * Run `that` after this program and keep its result
   */
  zipRight<B>(that: Console<B>): ConsoleFluent<B> {
    return new ConsoleFluent(Console.zipRight(this._program, that));
  }

  /**
   * Run `that` after this program and keep this program's result
   */
  zipLeft<B>(that: Console<B>): ConsoleFluent<A> {
    return new ConsoleFluent(Console.zipLeft(this._program, that));
  }

  as<B>(b: B): ConsoleFluent<B> {
    return new ConsoleFluent(Console.as(this._program, b));
  }

  void_(): ConsoleFluent<void> {
    return new ConsoleFluent(Console.void_(this._program));
  }

  run(terminal: Terminal): A {
    return runConsole(this._program, terminal);
  }
}
