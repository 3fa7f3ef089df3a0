import { describe, it, expect } from "vitest";
import { isDone, isFail } from "../../src/outcome/outcome";
import { equal, toString } from "../../src/value/container";
import {
  autocompleteValue,
  booleanValue,
  checkedValue,
  expandedValue,
  getBoolean,
  getToken,
  getTristate,
  grabbedValue,
  invalidValue,
  orientationValue,
  parseToken,
  pressedValue,
  selectedValue,
  sortValue,
  tokenFamilyOf,
} from "../../src/value/static";
import {
  ACCESSIBLE_VALUE_UNDEFINED,
  AccessibleAutocomplete,
  AccessibleInvalidState,
  AccessibleSort,
  AccessibleTristate,
  Orientation,
  isTokenInFamily,
  tokenName,
} from "../../src/value/tokens";
import { captureDiagnostics, must } from "../helpers/capture";

describe("static values", () => {
  const reporter = captureDiagnostics();

  describe("booleans", () => {
    it("hands out one shared value per truth value", () => {
      expect(booleanValue(true)).toBe(booleanValue(true));
      expect(booleanValue(false)).not.toBe(booleanValue(true));
      expect(getBoolean(booleanValue(true))).toBe(true);
      expect(toString(booleanValue(false))).toBe("false");
    });

    it("returns false when read from another kind", () => {
      expect(getBoolean(must(checkedValue(AccessibleTristate.True)))).toBe(false);
      expect(reporter.codes()).toEqual(["E0101"]);
    });
  });

  describe("tristates", () => {
    it("covers undefined, false and true", () => {
      expect(toString(must(expandedValue(ACCESSIBLE_VALUE_UNDEFINED)))).toBe("undefined");
      expect(toString(must(expandedValue(AccessibleTristate.False)))).toBe("false");
      expect(toString(must(grabbedValue(AccessibleTristate.True)))).toBe("true");
      expect(getTristate(must(selectedValue(AccessibleTristate.False)))).toBe(0);
    });

    it("rejects values outside the set", () => {
      expect(expandedValue(AccessibleTristate.Mixed)).toBeNull();
      expect(reporter.codes()).toEqual(["E0104"]);
      expect(reporter.diagnostics[0]?.message).toBe("Invalid expanded token: 2");
    });
  });

  describe("tokens", () => {
    it("prints token names", () => {
      expect(toString(must(checkedValue(AccessibleTristate.Mixed)))).toBe("mixed");
      expect(toString(must(pressedValue(ACCESSIBLE_VALUE_UNDEFINED)))).toBe("undefined");
      expect(toString(must(sortValue(AccessibleSort.Descending)))).toBe("descending");
      expect(toString(must(autocompleteValue(AccessibleAutocomplete.Both)))).toBe("both");
      expect(toString(must(orientationValue(Orientation.Vertical)))).toBe("vertical");
    });

    it("remembers the family", () => {
      const value = must(sortValue(AccessibleSort.Ascending));
      expect(tokenFamilyOf(value)).toBe("sort");
      expect(getToken(value)).toBe(AccessibleSort.Ascending);
    });

    it("does not equate tokens from different families", () => {
      const checked = must(checkedValue(AccessibleTristate.True));
      const pressed = must(pressedValue(AccessibleTristate.True));
      expect(equal(checked, pressed)).toBe(false);
      expect(equal(checked, must(checkedValue(AccessibleTristate.True)))).toBe(true);
    });

    it("rejects undefined for families without it", () => {
      expect(invalidValue(ACCESSIBLE_VALUE_UNDEFINED)).toBeNull();
      expect(reporter.diagnostics[0]?.message).toBe("Invalid invalid token: -1");
    });

    it("rejects out of range tokens", () => {
      expect(orientationValue(2)).toBeNull();
      expect(reporter.codes()).toEqual(["E0104"]);
    });

    it("rejects fractional tokens", () => {
      expect(sortValue(1.5)).toBeNull();
      expect(reporter.diagnostics.map(d => d.message)).toEqual(["Invalid sort token: 1.5"]);
    });
  });

  describe("token families", () => {
    it("checks membership", () => {
      expect(isTokenInFamily("checked", ACCESSIBLE_VALUE_UNDEFINED)).toBe(true);
      expect(isTokenInFamily("sort", ACCESSIBLE_VALUE_UNDEFINED)).toBe(false);
      expect(isTokenInFamily("invalid", AccessibleInvalidState.Spelling)).toBe(true);
      expect(isTokenInFamily("orientation", 2)).toBe(false);
      expect(isTokenInFamily("autocomplete", 1.5)).toBe(false);
    });

    it("names tokens", () => {
      expect(tokenName("invalid", AccessibleInvalidState.Grammar)).toBe("grammar");
      expect(tokenName("autocomplete", AccessibleAutocomplete.Inline)).toBe("inline");
      expect(tokenName("pressed", ACCESSIBLE_VALUE_UNDEFINED)).toBe("undefined");
    });
  });

  describe("parseToken", () => {
    it("finds tokens by name", () => {
      const outcome = parseToken("sort", "ascending");
      expect(isDone(outcome)).toBe(true);
      if (isDone(outcome)) {
        expect(outcome.value).toBe(sortValue(AccessibleSort.Ascending));
      }
    });

    it("accepts undefined where the family allows it", () => {
      const outcome = parseToken("checked", "undefined");
      expect(isDone(outcome) && getToken(outcome.value)).toBe(ACCESSIBLE_VALUE_UNDEFINED);
    });

    it("fails on unknown names without reporting", () => {
      const outcome = parseToken("orientation", "undefined");
      expect(isFail(outcome)).toBe(true);
      if (isFail(outcome)) {
        expect(outcome.failure.reason).toBe("invalid-token");
        expect(outcome.failure.message).toBe("Invalid token “undefined” for orientation");
        expect(outcome.failure.diagnostics.map(d => d.code)).toEqual(["E0300"]);
        expect(outcome.failure.context).toEqual({ family: "orientation", text: "undefined" });
      }
      expect(reporter.diagnostics).toEqual([]);
    });
  });
});
