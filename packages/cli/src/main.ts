/**
 * lineio CLI -- run one of the sample console programs
 *
 * Usage:
 *   lineio <program> [--verbose]
 */

import {
  Console,
  UsageError,
  config,
  nodeTerminal,
  runConsole,
  toError,
  type Terminal,
} from "@lineio/core";
import { createLogger, tracingTerminal } from "./log.js";
import { answers2, answers3, readIntReport, reportAnswers, sayHello, thunkProgram } from "./programs.js";

export const ExitSuccess = 0;
export const ExitFailure = 1;

// ============================================================================
// Programs
// ============================================================================

interface ProgramEntry {
  readonly description: string;
  readonly run: (terminal: Terminal) => unknown;
}

const PROGRAMS = {
  hello: {
    description: "Ask for your name and greet you",
    run: (terminal) => runConsole(sayHello, terminal),
  },
  questions: {
    description: "Ask five questions (collectAll) and echo the answers",
    run: (terminal) => runConsole(Console.flatMap(answers2, reportAnswers), terminal),
  },
  "questions-foreach": {
    description: "Ask the same questions built with foreach",
    run: (terminal) => runConsole(Console.flatMap(answers3, reportAnswers), terminal),
  },
  "read-int": {
    description: "Read a line and parse it as an integer",
    run: (terminal) => runConsole(readIntReport, terminal),
  },
  thunk: {
    description: "The hello program written with Thunk",
    run: (terminal) => thunkProgram(terminal).unsafeRun(),
  },
} satisfies Record<string, ProgramEntry>;

type ProgramName = keyof typeof PROGRAMS;

function isProgramName(name: string): name is ProgramName {
  return Object.prototype.hasOwnProperty.call(PROGRAMS, name);
}

// ============================================================================
// Arguments
// ============================================================================

interface CliOptions {
  program?: ProgramName;
  verbose: boolean;
  help: boolean;
}

export function parseArgs(args: ReadonlyArray<string>): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (options.program !== undefined) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    } else if (isProgramName(arg)) {
      options.program = arg;
    } else {
      throw new UsageError(`Unknown program: ${arg}`);
    }
  }

  if (!options.help && options.program === undefined) {
    throw new UsageError("Missing program name");
  }
  return options;
}

export function helpText(): string {
  const width = Math.max(...Object.keys(PROGRAMS).map((name) => name.length));
  const programs = Object.entries(PROGRAMS)
    .map(([name, entry]) => `  ${name.padEnd(width)}  ${entry.description}`)
    .join("\n");

  return `lineio - run a sample console program

USAGE:
  lineio <program> [options]

PROGRAMS:
${programs}

OPTIONS:
  -v, --verbose   Trace every read and write on stderr
  -h, --help      Show this help message`;
}

// ============================================================================
// Entry Point
// ============================================================================

export interface MainOptions {
  /** Defaults to stdin/stdout */
  readonly terminal?: Terminal;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
  readonly color?: boolean;
}

/**
 * Run the CLI and return its exit code
 */
export function main(args: ReadonlyArray<string>, options: MainOptions = {}): number {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));

  let cli: CliOptions;
  try {
    cli = parseArgs(args);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    createLogger({ verbose: false, color: options.color ?? false, write: stderr }).error(e.message);
    stderr("Run 'lineio --help' for usage.");
    return e.exitCode;
  }

  if (cli.help || cli.program === undefined) {
    stdout(helpText());
    return ExitSuccess;
  }

  const color = options.color ?? process.stderr.isTTY === true;
  let logger = createLogger({ verbose: cli.verbose, color, write: stderr });

  try {
    // Reading config can fail on a malformed config file
    if (!cli.verbose && config.has("debug")) {
      logger = createLogger({ verbose: true, color, write: stderr });
    }
    const base = options.terminal ?? nodeTerminal();
    const terminal = logger.verbose ? tracingTerminal(base, logger) : base;

    logger.debug(`running ${cli.program}`);
    PROGRAMS[cli.program].run(terminal);
    logger.debug("done");
    return ExitSuccess;
  } catch (e) {
    logger.error(toError(e).message);
    return ExitFailure;
  }
}
