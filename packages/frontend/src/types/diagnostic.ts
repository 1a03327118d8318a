/**
 * Diagnostic types for the typestate verifier
 */

/**
 * Every verifier finding rejects; there are no warnings
 */
export type DiagnosticSeverity = "error";

export type DiagnosticCode =
  | "TypeMismatch" // Declared and derived context differ
  | "UseAfterMove" // Consumed a location that is uninitialized
  | "DoubleInit" // Assigned a location that is already initialized
  | "DanglingLifetime" // Lifetime ended or used while not live
  | "ObligationUnproved" // Outlives bound not entailed
  | "NonExhaustiveSwitch" // Branch union fails to cover the switched type
  | "UnresolvedTraitBound" // Trait fact or external declaration missing
  | "MalformedContext" // Totality violated or label table inconsistent
  | "InvalidProgram"; // Input document could not be loaded

/**
 * Checking rule that produced a diagnostic
 */
export type RuleName =
  | "assign"
  | "call"
  | "if"
  | "switch"
  | "drop"
  | "lifetimeBegin"
  | "lifetimeEnd"
  | "deadCode"
  | "entry"
  | "exit"
  | "successor"
  | "labels"
  | "load";

/**
 * Position inside an input document (file plus a dotted key path)
 */
export type SourceLocation = {
  readonly file: string;
  readonly path: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly functionName?: string;
  readonly label?: string;
  readonly rule?: RuleName;
  /** Rendered context or type the rule required */
  readonly expected?: string;
  /** Rendered context or type the rule found */
  readonly actual?: string;
  /** Rendered offending locations */
  readonly locations: readonly string[];
  readonly source?: SourceLocation;
  readonly hint?: string;
};

export type DiagnosticDetails = {
  readonly rule?: RuleName;
  readonly expected?: string;
  readonly actual?: string;
  readonly locations?: readonly string[];
  readonly source?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  details: DiagnosticDetails = {}
): Diagnostic => ({
  code,
  severity: "error",
  message,
  rule: details.rule,
  expected: details.expected,
  actual: details.actual,
  locations: details.locations ?? [],
  source: details.source,
  hint: details.hint,
});

/**
 * Attach the rule that was being checked, keeping one set by a nested check
 */
export const withRule = (
  diagnostic: Diagnostic,
  rule: RuleName
): Diagnostic =>
  diagnostic.rule !== undefined ? diagnostic : { ...diagnostic, rule };

/**
 * Attach the function and label a node check failed at
 */
export const atLabel = (
  diagnostic: Diagnostic,
  functionName: string,
  label: string
): Diagnostic => ({
  ...diagnostic,
  functionName: diagnostic.functionName ?? functionName,
  label: diagnostic.label ?? label,
});

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.source) {
    parts.push(`${diagnostic.source.file}:${diagnostic.source.path}`);
  }

  const where = [diagnostic.functionName, diagnostic.label]
    .filter((part): part is string => part !== undefined)
    .join("@");
  if (where.length > 0) {
    parts.push(`${where}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  if (diagnostic.rule) {
    parts.push(`[${diagnostic.rule}]`);
  }
  parts.push(diagnostic.message);

  if (diagnostic.locations.length > 0) {
    parts.push(`(at ${diagnostic.locations.join(", ")})`);
  }
  if (diagnostic.expected !== undefined) {
    parts.push(`expected ${diagnostic.expected}`);
  }
  if (diagnostic.actual !== undefined) {
    parts.push(`actual ${diagnostic.actual}`);
  }
  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
