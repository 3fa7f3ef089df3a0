/**
 * Public API smoke test: a widget sets its states and properties through
 * the package entry point only.
 */

import { describe, it, expect } from "vitest";
import {
  AccessibleProperty,
  AccessibleState,
  Arg,
  ArgCursor,
  Box,
  CollectingReporter,
  WeakReferent,
  collectForProperty,
  collectForPropertyValue,
  collectForState,
  defaultForProperty,
  equal,
  getDiagnosticReporter,
  parseToken,
  release,
  setDiagnosticReporter,
  toString,
  unwrap,
} from "../src";

describe("accessible-values entry point", () => {
  it("collects a widget's attributes", () => {
    const reporter = new CollectingReporter();
    const previous = setDiagnosticReporter(reporter);

    try {
      const label = new WeakReferent("Label");
      const cursor = new ArgCursor([Arg.boolean(false), Arg.ref(label), Arg.string("Volume")]);

      const disabled = collectForState(AccessibleState.Disabled, cursor);
      const labelledBy = collectForProperty(AccessibleProperty.LabelledBy, cursor);
      const valueText = collectForProperty(AccessibleProperty.ValueText, cursor);

      expect(disabled && toString(disabled)).toBe("false");
      expect(valueText && toString(valueText)).toBe("Volume");
      expect(equal(defaultForProperty(AccessibleProperty.ValueText), collectForPropertyValue(AccessibleProperty.ValueText, Box.string("")))).toBe(true);

      label.dispose();
      expect(labelledBy && toString(labelledBy)).toBe("<null>");
      if (labelledBy) release(labelledBy);

      expect(toString(unwrap(parseToken("autocomplete", "list")))).toBe("list");
      expect(reporter.diagnostics).toEqual([]);
      expect(getDiagnosticReporter()).toBe(reporter);
    } finally {
      setDiagnosticReporter(previous);
    }
  });
});
