/**
 * Error types shared by the terminals and the CLI
 */

/**
 * Raised by a terminal asked for a line after its input is exhausted.
 */
export class EndOfInputError extends Error {
  constructor(message: string = "End of input reached") {
    super(message);
    this.name = "EndOfInputError";
  }
}

/**
 * Raised for malformed command-line arguments.
 */
export class UsageError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 2,
  ) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Normalise a thrown value into an Error
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
