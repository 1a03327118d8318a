/**
 * Type definitions for CLI
 */

import type { Diagnostic } from "@typestate/frontend";

export type OutputFormat = "text" | "json";

/**
 * Typestate configuration file (typestate.json)
 */
export type TypestateConfig = {
  readonly $schema?: string;
  /** Program documents to check, relative to the config file */
  readonly inputs?: readonly string[];
  readonly format?: OutputFormat;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  /** User type `If` conditions must have */
  readonly boolType?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  json?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing typestate.json, or the cwd
  readonly inputs: readonly string[]; // Absolute paths
  readonly format: OutputFormat;
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly boolType: string | undefined;
};

/**
 * One line of `check` output
 */
export type CheckEntry = {
  readonly file: string;
  readonly function?: string;
  readonly accepted: boolean;
  /** `∀T, 'a. name` for an accepted generic function */
  readonly quantified?: string;
  readonly nodesChecked?: number;
  readonly diagnostic?: Diagnostic;
};

export type ParsedArgs = {
  readonly command: string;
  readonly files: readonly string[];
  readonly options: CliOptions;
};
