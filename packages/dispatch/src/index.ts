/**
 * Signet Dispatch - conditional, signature-aware multiple dispatch
 */

export {
  type DiagnosticCode,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./errors.js";
export * from "./signature/index.js";
export * from "./constraints.js";
export * from "./registry.js";
