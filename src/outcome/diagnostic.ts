export type DiagnosticSeverity = "critical" | "error" | "warning" | "info" | "hint";

/**
 * Ordering used to filter diagnostics; higher is more severe.
 */
export const SEVERITY_RANK: Record<DiagnosticSeverity, number> = {
  hint: 0,
  info: 1,
  warning: 2,
  error: 3,
  critical: 4,
};

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export function atLeast(diag: Diagnostic, min: DiagnosticSeverity): boolean {
  return SEVERITY_RANK[diag.severity] >= SEVERITY_RANK[min];
}
