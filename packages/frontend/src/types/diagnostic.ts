/**
 * Diagnostics for inspection findings
 *
 * Library code never logs. It returns diagnostics and the caller decides
 * whether to show them.
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Type signatures (TP1001-TP1099)
  | "TP1001" // Empty type signature
  | "TP1002" // Unbalanced brackets in type signature
  | "TP1003" // Truncated type signature
  | "TP1004" // Irregular type signature
  // Value access (TP2001-TP2099)
  | "TP2001" // Value field could not be read
  // Extraction (TP3001-TP3099)
  | "TP3001" // Transform dimensions do not fit its kind
  | "TP3002" // Unrecognized transform kind
  | "TP3003" // Dimension flow violation
  | "TP3004" // Uninitialized value
  // Dispatch (TP4001-TP4099)
  | "TP4001" // Dispatch entry shadowed by an earlier entry
  | "TP4002" // Duplicate dispatch pattern
  // Command line (TP5001-TP5099)
  | "TP5001" // Unknown command or option
  | "TP5002" // Missing argument
  | "TP5003" // Invalid option value
  | "TP5004" // Input file not found
  | "TP5005" // Invalid JSON input
  | "TP5006" // Invalid snapshot document
  | "TP5007" // Invalid configuration file
  | "TP5008"; // Value is not a descriptor

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Access path of the value the finding is about, e.g. `desc.transforms_[1]` */
  readonly path?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  path?: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  path,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.path) {
    parts.push(`${diagnostic.path}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (
  initial: readonly Diagnostic[] = []
): DiagnosticsCollector => ({
  diagnostics: initial,
  hasErrors: initial.some(isError),
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const addDiagnostics = (
  collector: DiagnosticsCollector,
  diagnostics: readonly Diagnostic[]
): DiagnosticsCollector =>
  diagnostics.length === 0
    ? collector
    : {
        diagnostics: [...collector.diagnostics, ...diagnostics],
        hasErrors: collector.hasErrors || diagnostics.some(isError),
      };

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
