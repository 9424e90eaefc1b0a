/**
 * Terminal - the line-oriented capability a Console program runs against
 *
 * `nodeTerminal` talks to real file descriptors; `TestTerminal` replays a
 * script and records what was written.
 */

import * as fs from "fs";
import { StringDecoder } from "string_decoder";
import { config, type EndOfInputMode } from "../config.js";
import { EndOfInputError } from "../errors.js";

// ============================================================================
// Terminal Capability
// ============================================================================

export interface Terminal {
  /** Block until one line of input is available and return it without its newline */
  readLine(): string;
  /** Emit one line of output */
  writeLine(line: string): void;
}

// ============================================================================
// Node Terminal
// ============================================================================

export interface NodeTerminalOptions {
  /** File descriptor to read from (default: 0, stdin) */
  readonly input?: number;
  /** File descriptor to write to (default: 1, stdout) */
  readonly output?: number;
  /** Defaults to `terminal.trimCarriageReturn` from config */
  readonly trimCarriageReturn?: boolean;
  /** Defaults to `terminal.endOfInput` from config */
  readonly endOfInput?: EndOfInputMode;
}

const CHUNK_SIZE = 4096;
const RETRY_DELAY_MS = 10;

const sleeper = new Int32Array(new SharedArrayBuffer(4));

/** Block the thread without spinning */
function pause(ms: number): void {
  Atomics.wait(sleeper, 0, 0, ms);
}

function configuredEndOfInput(): EndOfInputMode {
  return config.get<unknown>("terminal.endOfInput") === "empty" ? "empty" : "fail";
}

function configuredTrimCarriageReturn(): boolean {
  return config.get<unknown>("terminal.trimCarriageReturn") !== false;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * A synchronous terminal over file descriptors.
 *
 * Input is read in chunks and split on "\n"; a final line without a trailing
 * newline is still returned before end of input is reported.
 */
export function nodeTerminal(options: NodeTerminalOptions = {}): Terminal {
  const input = options.input ?? 0;
  const output = options.output ?? 1;
  const trimCarriageReturn = options.trimCarriageReturn ?? configuredTrimCarriageReturn();
  const endOfInput = options.endOfInput ?? configuredEndOfInput();

  const decoder = new StringDecoder("utf8");
  const chunk = Buffer.alloc(CHUNK_SIZE);
  let pending = "";
  let ended = false;

  function readChunk(): number {
    for (;;) {
      try {
        return fs.readSync(input, chunk, 0, CHUNK_SIZE, null);
      } catch (e) {
        // Non-blocking stdin reports EAGAIN until data arrives
        if (isErrnoException(e) && e.code === "EAGAIN") {
          pause(RETRY_DELAY_MS);
          continue;
        }
        if (isErrnoException(e) && e.code === "EOF") return 0;
        throw e;
      }
    }
  }

  function clean(line: string): string {
    return trimCarriageReturn && line.endsWith("\r") ? line.slice(0, -1) : line;
  }

  return {
    readLine(): string {
      for (;;) {
        const newline = pending.indexOf("\n");
        if (newline >= 0) {
          const line = pending.slice(0, newline);
          pending = pending.slice(newline + 1);
          return clean(line);
        }

        if (ended) {
          if (pending.length > 0) {
            const line = pending;
            pending = "";
            return clean(line);
          }
          if (endOfInput === "empty") return "";
          throw new EndOfInputError();
        }

        const bytesRead = readChunk();
        if (bytesRead === 0) {
          ended = true;
          pending += decoder.end();
        } else {
          pending += decoder.write(chunk.subarray(0, bytesRead));
        }
      }
    },

    writeLine(line: string): void {
      fs.writeSync(output, `${line}\n`);
    },
  };
}

// ============================================================================
// Test Terminal
// ============================================================================

/**
 * In-memory terminal that replays scripted input lines and records output.
 */
export class TestTerminal implements Terminal {
  private readonly _input: string[];
  private readonly _output: string[] = [];
  private _position = 0;

  constructor(input: ReadonlyArray<string> = []) {
    this._input = [...input];
  }

  readLine(): string {
    if (this._position >= this._input.length) {
      throw new EndOfInputError("Scripted input exhausted");
    }
    return this._input[this._position++];
  }

  writeLine(line: string): void {
    this._output.push(line);
  }

  /**
   * Lines written so far
   */
  get output(): ReadonlyArray<string> {
    return this._output;
  }

  /**
   * Scripted lines not yet read
   */
  get remainingInput(): ReadonlyArray<string> {
    return this._input.slice(this._position);
  }
}
