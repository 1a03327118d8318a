/**
 * Programmatic entry points of the typestate command line
 */

export * from "./cli/index.js";
export {
  type CheckOutcome,
  runCheck,
  formatEntry,
  reportCheck,
  checkCommand,
} from "./commands/check.js";
export { validateConfig, loadConfig, findConfig, resolveConfig } from "./config.js";
export type * from "./types.js";
