/**
 * Console Runner (Interpreter)
 *
 * Walks a Console description and performs its reads and writes against a
 * Terminal. The walk is a loop over the current node, so stack usage stays
 * constant however long the program is.
 */

import type { Console } from "./console.js";
import type { Terminal } from "./terminal.js";

/**
 * Run a Console program to completion and return its result.
 *
 * Errors thrown by the terminal or while forcing a Done node are not caught.
 */
export function runConsole<A>(program: Console<A>, terminal: Terminal): A {
  let current = program;

  while (true) {
    switch (current._tag) {
      case "ReadLine": {
        current = current.next(terminal.readLine());
        break;
      }

      case "WriteLine": {
        terminal.writeLine(current.line);
        current = current.next;
        break;
      }

      case "Done":
        return current.value();

      default: {
        const _exhaustive: never = current;
        throw new Error(`Unknown Console tag: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
}

