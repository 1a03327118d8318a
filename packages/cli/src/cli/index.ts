/**
 * CLI - Public API
 */

export {
  VERSION,
  CONFIG_FILE_NAME,
  EXIT_OK,
  EXIT_USAGE,
  EXIT_LOAD_ERROR,
  EXIT_REJECTED,
} from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
