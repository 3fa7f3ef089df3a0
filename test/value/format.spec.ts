import { describe, it, expect } from "vitest";
import { formatGeneral } from "../../src/value/format";

describe("formatGeneral", () => {
  it.each([
    [0, "0"],
    [-0, "-0"],
    [42, "42"],
    [100, "100"],
    [3.14, "3.14"],
    [-2.5, "-2.5"],
    [0.5, "0.5"],
    [1 / 3, "0.333333"],
    [123456, "123456"],
    [1234567, "1.23457e+06"],
    [1e6, "1e+06"],
    [999999.5, "1e+06"],
    [0.0001, "0.0001"],
    [0.00001, "1e-05"],
  ])("formats %d as %s", (input, expected) => {
    expect(formatGeneral(input)).toBe(expected);
  });

  it.each([
    [12345.25, "12345.2"],
    [-12345.25, "-12345.2"],
    [12345.75, "12345.8"],
    [999998.5, "999998"],
    [1234565, "1.23456e+06"],
    [1234575, "1.23458e+06"],
  ])("rounds the exact halfway value %d to even", (input, expected) => {
    expect(formatGeneral(input)).toBe(expected);
  });

  it("spells out non-finite numbers", () => {
    expect(formatGeneral(NaN)).toBe("nan");
    expect(formatGeneral(Infinity)).toBe("inf");
    expect(formatGeneral(-Infinity)).toBe("-inf");
  });
});
