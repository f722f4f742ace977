/**
 * typemerge core - type expression algebra, alias expansion and signature
 * merging
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
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./sequence/sequences.js";
export * from "./type-expr/index.js";
export * from "./alias/alias-table.js";
export * from "./alias/alias-expander.js";
export * from "./merge/signature-merger.js";
export * from "./codec/decode.js";
