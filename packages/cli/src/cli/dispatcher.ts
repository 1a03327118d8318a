/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand } from "../commands/check.js";
import type { TypestateConfig } from "../types.js";
import { CONFIG_FILE_NAME, EXIT_OK, EXIT_USAGE, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`typestate v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  if (parsed.command.startsWith("unknown-option:")) {
    console.error(
      `Error: Unknown option '${parsed.command.slice("unknown-option:".length)}'`
    );
    console.error("Run 'typestate --help' for usage information");
    return EXIT_USAGE;
  }

  if (parsed.command !== "check") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'typestate --help' for usage information");
    return EXIT_USAGE;
  }

  // Load config; without one, files must be given on the command line
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: TypestateConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT_USAGE;
    }
    fileConfig = configResult.value;
  }

  const projectRoot = configPath ? dirname(configPath) : cwd;
  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    parsed.files,
    cwd
  );

  if (config.inputs.length === 0) {
    console.error("Error: No program files to check");
    console.error(
      `Pass files to 'typestate check' or list them under 'inputs' in ${CONFIG_FILE_NAME}`
    );
    return EXIT_USAGE;
  }

  if (config.verbose) {
    console.log(
      configPath
        ? `Using ${configPath}`
        : `No ${CONFIG_FILE_NAME} found, checking ${config.inputs.length} file(s)`
    );
  }

  return checkCommand(config);
};
