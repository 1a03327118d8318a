/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
typestate - typestate IR verifier v${VERSION}

USAGE:
  typestate <command> [options]

COMMANDS:
  check [files...]          Verify every function of the given program documents
  help                      Show this message
  version                   Show version

OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Report every accepted function
  -q, --quiet               Report rejections only
  -c, --config <file>       Config file path (default: typestate.json)
  --json                    Print results as a JSON array

EXIT CODES:
  0  every function accepted
  1  usage or configuration error
  2  a program document could not be loaded
  3  at least one function rejected

EXAMPLES:
  typestate check examples/move.yaml
  typestate check --json a.yaml b.yaml
  typestate check -c ci/typestate.json
`);
};
