/**
 * tileprobe frontend - type signatures, value access and model extraction
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  addDiagnostics,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/errors.js";

export * from "./signature/type-node.js";
export * from "./signature/parser.js";
export * from "./signature/format.js";

export * from "./value/live-value.js";
export * from "./value/snapshot.js";

export * from "./extract/common.js";
export * from "./extract/integers.js";
export * from "./extract/transform.js";
export * from "./extract/descriptor.js";
export * from "./extract/validate.js";
export * from "./extract/coordinate.js";
export * from "./extract/view.js";
export * from "./extract/distribution.js";
export * from "./extract/window.js";
export * from "./extract/containers.js";
