import type { Diagnostic } from "./diagnostic";

export type FailureReason = "contract-violation" | "invalid-token";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

/**
 * Thrown by contract checks when contracts run in "throw" mode.
 * Contract violations are programmer errors, never caused by end users.
 */
export class ContractViolation extends Error {
  readonly failure: Failure;

  constructor(diagnostic: Diagnostic) {
    super(`${diagnostic.code}: ${diagnostic.message}`);
    this.name = "ContractViolation";
    this.failure = failure("contract-violation", diagnostic.message, {
      diagnostics: [diagnostic],
    });
  }

  get code(): string {
    return this.failure.diagnostics[0]?.code ?? "";
  }
}
