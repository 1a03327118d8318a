/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import type { Result } from "@typestate/frontend";
import { CONFIG_FILE_NAME } from "./cli/constants.js";
import type {
  CliOptions,
  OutputFormat,
  ResolvedConfig,
  TypestateConfig,
} from "./types.js";

const KNOWN_KEYS = new Set([
  "$schema",
  "inputs",
  "format",
  "verbose",
  "quiet",
  "boolType",
]);

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFormat = (value: unknown): value is OutputFormat =>
  value === "text" || value === "json";

/**
 * Validate the parsed contents of typestate.json
 */
export const validateConfig = (
  value: unknown
): Result<TypestateConfig, string> => {
  if (!isRecord(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const unknownKey = Object.keys(value).find((key) => !KNOWN_KEYS.has(key));
  if (unknownKey !== undefined) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: unknown option '${unknownKey}'`,
    };
  }

  const { $schema, inputs, format, verbose, quiet, boolType } = value;

  if ($schema !== undefined && typeof $schema !== "string") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: '$schema' must be a string`,
    };
  }
  if (
    inputs !== undefined &&
    !(Array.isArray(inputs) && inputs.every((i) => typeof i === "string"))
  ) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'inputs' must be a list of file paths`,
    };
  }
  if (format !== undefined && !isFormat(format)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'format' must be "text" or "json"`,
    };
  }
  if (verbose !== undefined && typeof verbose !== "boolean") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'verbose' must be a boolean`,
    };
  }
  if (quiet !== undefined && typeof quiet !== "boolean") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'quiet' must be a boolean`,
    };
  }
  if (
    boolType !== undefined &&
    (typeof boolType !== "string" || boolType.length === 0)
  ) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'boolType' must be a type name`,
    };
  }

  return {
    ok: true,
    value: {
      $schema,
      inputs: Array.isArray(inputs)
        ? inputs.filter((i): i is string => typeof i === "string")
        : undefined,
      format,
      verbose,
      quiet,
      boolType,
    },
  };
};

/**
 * Load typestate.json
 */
export const loadConfig = (
  configPath: string
): Result<TypestateConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find typestate.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find typestate.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Files given on the command line replace the configured inputs and are
 * taken relative to the working directory; configured inputs are relative
 * to the project root.
 */
export const resolveConfig = (
  config: TypestateConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  files: readonly string[] = [],
  cwd: string = projectRoot
): ResolvedConfig => {
  const inputs =
    files.length > 0
      ? files.map((f) => resolve(cwd, f))
      : (config.inputs ?? []).map((f) => resolve(projectRoot, f));

  const quiet = cliOptions.quiet ?? config.quiet ?? false;

  return {
    projectRoot,
    inputs,
    format: cliOptions.json ? "json" : (config.format ?? "text"),
    verbose: !quiet && (cliOptions.verbose ?? config.verbose ?? false),
    quiet,
    boolType: config.boolType,
  };
};
