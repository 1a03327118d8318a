/**
 * typestate check command - verify program documents
 */

import { relative } from "node:path";
import { formatDiagnostic, loadProgramFile } from "@typestate/frontend";
import { formatVerdict, verifyProgram } from "@typestate/verifier";
import {
  EXIT_LOAD_ERROR,
  EXIT_OK,
  EXIT_REJECTED,
} from "../cli/constants.js";
import type { CheckEntry, ResolvedConfig } from "../types.js";

export type CheckOutcome = {
  readonly entries: readonly CheckEntry[];
  readonly exitCode: number;
};

/**
 * Load and verify every input. A document that fails to load is reported
 * and skipped; the remaining documents are still checked.
 */
export const runCheck = (config: ResolvedConfig): CheckOutcome => {
  const entries: CheckEntry[] = [];
  let loadFailed = false;
  let rejected = false;

  for (const input of config.inputs) {
    const file = relative(config.projectRoot, input) || input;

    const loaded = loadProgramFile(input);
    if (!loaded.ok) {
      loadFailed = true;
      entries.push({ file, accepted: false, diagnostic: loaded.error });
      continue;
    }

    const verdicts = verifyProgram(loaded.value, {
      boolType: config.boolType,
    });
    if (!verdicts.ok) {
      rejected = true;
      entries.push({ file, accepted: false, diagnostic: verdicts.error });
      continue;
    }

    for (const verdict of verdicts.value) {
      if (verdict.accepted) {
        entries.push({
          file,
          function: verdict.name,
          accepted: true,
          quantified: formatVerdict(verdict),
          nodesChecked: verdict.nodesChecked,
        });
      } else {
        rejected = true;
        entries.push({
          file,
          function: verdict.name,
          accepted: false,
          diagnostic: verdict.diagnostic,
        });
      }
    }
  }

  const exitCode = loadFailed
    ? EXIT_LOAD_ERROR
    : rejected
      ? EXIT_REJECTED
      : EXIT_OK;
  return { entries, exitCode };
};

/**
 * Text form of one entry, or undefined when the entry is not shown at the
 * configured verbosity
 */
export const formatEntry = (
  entry: CheckEntry,
  config: ResolvedConfig
): string | undefined => {
  if (entry.diagnostic !== undefined) {
    return `${entry.file}: ${formatDiagnostic(entry.diagnostic)}`;
  }
  if (!config.verbose || entry.function === undefined) {
    return undefined;
  }
  return `${entry.file}: ${entry.quantified ?? entry.function}: ok (${entry.nodesChecked ?? 0} nodes)`;
};

/**
 * Print an outcome in the configured format
 */
export const reportCheck = (
  outcome: CheckOutcome,
  config: ResolvedConfig
): void => {
  if (config.format === "json") {
    console.log(JSON.stringify(outcome.entries, null, 2));
    return;
  }

  for (const entry of outcome.entries) {
    const line = formatEntry(entry, config);
    if (line === undefined) continue;
    if (entry.accepted) {
      console.log(line);
    } else {
      console.error(line);
    }
  }

  if (!config.quiet) {
    const accepted = outcome.entries.filter((e) => e.accepted).length;
    const rejected = outcome.entries.length - accepted;
    console.log(
      `${accepted} function(s) accepted, ${rejected} rejected in ${config.inputs.length} file(s)`
    );
  }
};

export const checkCommand = (config: ResolvedConfig): number => {
  const outcome = runCheck(config);
  reportCheck(outcome, config);
  return outcome.exitCode;
};
