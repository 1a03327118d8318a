/**
 * Typestate Frontend - IR model, diagnostics and program loader
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type RuleName,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticDetails,
  createDiagnostic,
  withRule,
  atLabel,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./ir/types/index.js";
export * from "./ir/format.js";
export * as builders from "./ir/builders.js";
export * from "./loader/index.js";
