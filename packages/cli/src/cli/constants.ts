/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: { readonly version: string } = require("../../package.json");

export const VERSION = packageJson.version;

export const CONFIG_FILE_NAME = "typestate.json";

/**
 * Process exit codes
 */
export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_LOAD_ERROR = 2;
export const EXIT_REJECTED = 3;
