/**
 * Diagnostic output for the CLI
 *
 * Everything goes to stderr so that a program's own output on stdout stays
 * untouched. Debug lines appear only in verbose mode.
 */

import type { Terminal } from "@lineio/core";

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  red: "\x1b[31m",
};

type Color = Exclude<keyof typeof COLORS, "reset">;

export interface LoggerOptions {
  readonly verbose: boolean;
  readonly color: boolean;
  readonly write: (line: string) => void;
}

export interface Logger {
  readonly verbose: boolean;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createLogger(options: LoggerOptions): Logger {
  const paint = (color: Color, text: string): string =>
    options.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;

  return {
    verbose: options.verbose,
    info: (message) => options.write(`${paint("blue", "ℹ")} ${message}`),
    success: (message) => options.write(`${paint("green", "✓")} ${message}`),
    warn: (message) => options.write(`${paint("yellow", "⚠")} ${message}`),
    error: (message) => options.write(`${paint("red", "✗")} ${message}`),
    debug: (message) => {
      if (options.verbose) options.write(`${paint("dim", "·")} ${message}`);
    },
  };
}

/**
 * Wrap a terminal so every read and write is traced through `logger.debug`
 */
export function tracingTerminal(terminal: Terminal, logger: Logger): Terminal {
  return {
    readLine() {
      const line = terminal.readLine();
      logger.debug(`read: ${JSON.stringify(line)}`);
      return line;
    },
    writeLine(line) {
      logger.debug(`write: ${JSON.stringify(line)}`);
      terminal.writeLine(line);
    },
  };
}
