import { describe, it, expect } from "vitest";
import { ArgCursor } from "../../src/collect/cursor";
import { Arg } from "../../src/collect/types";
import { WeakReferent } from "../../src/weak/referent";
import { captureDiagnostics } from "../helpers/capture";

describe("ArgCursor", () => {
  const reporter = captureDiagnostics();

  it("reads arguments in order", () => {
    const label = new WeakReferent("Label");
    const cursor = new ArgCursor([Arg.boolean(true), Arg.string("Save"), Arg.number(0.5), Arg.ref(label)]);

    expect(cursor.boolean("busy")).toBe(true);
    expect(cursor.string("label")).toBe("Save");
    expect(cursor.position).toBe(2);
    expect(cursor.remaining).toBe(2);
    expect(cursor.number("valuenow")).toBe(0.5);
    expect(cursor.ref("labelledby")).toBe(label);
    expect(cursor.remaining).toBe(0);
    expect(reporter.diagnostics).toEqual([]);
  });

  it("keeps tristates, enums and ints apart", () => {
    const cursor = new ArgCursor([Arg.tristate(1), Arg.enum(2), Arg.int(3)]);

    expect(cursor.tristate("expanded")).toBe(1);
    expect(cursor.enumeration("sort")).toBe(2);
    expect(cursor.int("level")).toBe(3);
  });

  it("reports an exhausted list", () => {
    const cursor = new ArgCursor([]);

    expect(cursor.boolean("busy")).toBeUndefined();
    expect(reporter.codes()).toEqual(["E0107"]);
    expect(reporter.diagnostics[0]?.message).toBe('Argument list exhausted while collecting "busy"');
  });

  it("consumes a mismatched argument", () => {
    const cursor = new ArgCursor([Arg.int(1), Arg.boolean(true)]);

    expect(cursor.boolean("busy")).toBeUndefined();
    expect(cursor.position).toBe(1);
    expect(reporter.diagnostics[0]?.message).toBe('Argument type mismatch for "busy": expected boolean, got int');

    expect(cursor.boolean("hidden")).toBe(true);
    expect(reporter.codes()).toEqual(["E0106"]);
  });
});
