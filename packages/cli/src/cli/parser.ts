/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let file: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (call description file)
    if (command && !file && !arg.startsWith("-")) {
      file = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-x":
      case "--xlen":
        options.xlen = args[++i] ?? "";
        break;
      case "-f":
      case "--flen":
        options.flen = args[++i] ?? "";
        break;
    }
  }

  return { command, file, options };
};
