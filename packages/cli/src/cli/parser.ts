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
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Command, then positional program files
    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        files.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", files: [], options: {} };
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
      case "--json":
        options.json = true;
        break;
      default:
        return { command: `unknown-option:${arg}`, files: [], options };
    }
  }

  return { command, files, options };
};
