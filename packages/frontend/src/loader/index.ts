/**
 * Program loading - public API
 */

import { readFileSync, existsSync } from "node:fs";
import type { IrProgram } from "../ir/types/index.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error } from "../types/result.js";
import { parseProgramDocument } from "./program-loader.js";

export { parseProgramDocument } from "./program-loader.js";
export type { TypeScope } from "./type-parser.js";
export { parseType, parseLifetime, parseWhereClause } from "./type-parser.js";

/**
 * Read and parse a program document from disk
 */
export const loadProgramFile = (
  filePath: string
): Result<IrProgram, Diagnostic> => {
  if (!existsSync(filePath)) {
    return error(
      createDiagnostic("InvalidProgram", `Program file not found: ${filePath}`, {
        rule: "load",
        source: { file: filePath, path: "$" },
      })
    );
  }
  return parseProgramDocument(readFileSync(filePath, "utf-8"), filePath);
};
