import { getConfig } from "../config/config";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";
import { ContractViolation } from "../outcome/failure";
import { getDiagnosticReporter } from "../ports/reporter";

type Params = Record<string, string | number>;

/**
 * Report a broken caller contract. Throws a ContractViolation when
 * contracts run in "throw" mode; otherwise the caller continues with a
 * null or zero result.
 */
export function contractFailed(code: DiagnosticCode, params?: Params): void {
  const diag = makeDiagnostic(code, params);
  getDiagnosticReporter().report(diag);

  if (getConfig().contracts.mode === "throw") {
    throw new ContractViolation(diag);
  }
}

/**
 * Returns `cond`; reports `code` when it does not hold.
 *
 * ```ts
 * if (!ensure(value !== null, "E0100", { what: "value" })) return null;
 * ```
 */
export function ensure(cond: boolean, code: DiagnosticCode, params?: Params): boolean {
  if (!cond) contractFailed(code, params);
  return cond;
}

/**
 * Configuration-table errors are reported and never thrown.
 */
export function critical(code: DiagnosticCode, params?: Params): void {
  getDiagnosticReporter().report(makeDiagnostic(code, params));
}

export function describeActual(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
