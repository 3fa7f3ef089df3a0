// src/index.ts
// Accessible values - Public API
//
// Typed, shareable attribute values for accessibility states and properties.

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./value";

// ═══════════════════════════════════════════════════════════════════════════════
// WEAK REFERENTS
// ═══════════════════════════════════════════════════════════════════════════════

export { WeakReferent, isAccessible, objectAddress, type Accessible, type WeakNotify } from "./weak/referent";

// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./collect";

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { SEVERITY_RANK, atLeast, type Diagnostic, type DiagnosticSeverity } from "./outcome/diagnostic";
export { ContractViolation, failure, isFailureReason, type Failure, type FailureReason } from "./outcome/failure";
export {
  done,
  fail,
  isDone,
  isFail,
  match,
  mapOutcome,
  unwrap,
  unwrapOr,
  type Done,
  type Fail,
  type Outcome,
} from "./outcome/outcome";
export {
  ConsoleReporter,
  CollectingReporter,
  formatDiagnostic,
  getDiagnosticReporter,
  setDiagnosticReporter,
  type DiagnosticReporter,
} from "./ports/reporter";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./config";
