import { describe, it, expect } from "vitest";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import { atLeast } from "../../src/outcome/diagnostic";
import { ContractViolation, failure, isFailureReason } from "../../src/outcome/failure";
import { done, fail, isDone, isFail, mapOutcome, match, unwrap, unwrapOr, type Outcome } from "../../src/outcome/outcome";

describe("diagnostic codes", () => {
  it("keys every code by its own name", () => {
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.code).toBe(key);
    }
  });

  it("declares one value error, for token parsing", () => {
    const valueCodes = Object.values(DIAGNOSTIC_CODES).filter(def => def.category === "Value");
    expect(valueCodes.map(def => def.code)).toEqual(["E0300"]);
  });

  it("fills in message templates", () => {
    const diag = makeDiagnostic("E0106", { name: "busy", expected: "boolean", actual: "int" });

    expect(diag).toEqual({
      code: "E0106",
      severity: "error",
      category: "Contract",
      message: 'Argument type mismatch for "busy": expected boolean, got int',
      data: { name: "busy", expected: "boolean", actual: "int" },
    });
  });

  it("leaves unfilled placeholders in place", () => {
    expect(makeDiagnostic("E0100").message).toBe("Missing {what}");
  });

  it("marks configuration errors critical", () => {
    const diag = makeDiagnostic("E0200", { space: "state", name: "busy" });
    expect(diag.severity).toBe("critical");
    expect(atLeast(diag, "error")).toBe(true);
    expect(atLeast(makeDiagnostic("E0105", { value: 1.5 }), "critical")).toBe(false);
  });
});

describe("Failure", () => {
  it("defaults to no diagnostics", () => {
    const f = failure("invalid-token", "bad");
    expect(f.diagnostics).toEqual([]);
    expect(isFailureReason(f, "invalid-token")).toBe(true);
    expect(isFailureReason(f, "contract-violation")).toBe(false);
  });

  it("wraps a diagnostic in a ContractViolation", () => {
    const error = new ContractViolation(makeDiagnostic("E0109", { space: "state", id: -1 }));

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ContractViolation");
    expect(error.message).toBe("E0109: Unknown accessible state: -1");
    expect(error.code).toBe("E0109");
    expect(error.failure.reason).toBe("contract-violation");
  });
});

describe("Outcome", () => {
  const ok: Outcome<number> = done(2);
  const bad: Outcome<number> = fail(failure("invalid-token", "Invalid token “x” for sort"));

  it("distinguishes Done from Fail", () => {
    expect(isDone(ok)).toBe(true);
    expect(isFail(bad)).toBe(true);
  });

  it("matches both branches", () => {
    const summarize = (o: Outcome<number>) =>
      match(o, {
        done: d => `done ${d.value}`,
        fail: f => `fail ${f.failure.reason}`,
      });

    expect(summarize(ok)).toBe("done 2");
    expect(summarize(bad)).toBe("fail invalid-token");
  });

  it("maps only Done values", () => {
    expect(mapOutcome(ok, n => n * 10)).toEqual(done(20));
    expect(mapOutcome<number, number>(bad, n => n * 10)).toBe(bad);
  });

  it("unwraps", () => {
    expect(unwrap(ok)).toBe(2);
    expect(() => unwrap(bad)).toThrow("Invalid token “x” for sort");
    expect(unwrapOr(bad, 0)).toBe(0);
  });
});
