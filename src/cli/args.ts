import { UsageError } from "../errors.js";

export interface CliOptions {
  /** Positional input path; the configured default applies when absent. */
  inputPath?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
}

export const HELP_TEXT = `
  tapeshift: convert Turing-machine tables between tape conventions

  Usage: tapeshift [input.in] [options]

  The first line of the input selects the conversion:
    ;I   doubly-infinite tape  ->  bounded (Sipser) tape
    ;S   bounded (Sipser) tape ->  doubly-infinite tape

  The result is written next to the input with the .out extension.

  Options:
    --config <path>        JSON configuration (reserved symbols, extensions)
    --verbose, -v          Verbose logging
    --help, -h             Show this help
`;

/** Parse CLI arguments (without the node and script entries). */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--config": {
        const value = args[++i];
        if (value === undefined) throw new UsageError("--config requires a path");
        options.configPath = value;
        break;
      }
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        if (arg.startsWith("-")) throw new UsageError(`Unknown option: ${arg}`);
        if (options.inputPath !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        options.inputPath = arg;
    }
  }

  return options;
}
