import { ACCESSIBLE_VALUE_UNDEFINED, AccessibleInvalidState } from "../../value/tokens";
import {
  booleanValue,
  checkedValue,
  expandedValue,
  grabbedValue,
  invalidValue,
  pressedValue,
  selectedValue,
} from "../../value/static";
import { AccessibleState } from "../identifiers";
import type { CollectRow } from "../types";

/**
 * One row per state, indexed by state identifier.
 *
 * | State    | Collected type | Default   |
 * |----------|----------------|-----------|
 * | busy     | boolean        | false     |
 * | checked  | enum           | undefined |
 * | disabled | boolean        | false     |
 * | expanded | tristate       | undefined |
 * | grabbed  | tristate       | undefined |
 * | hidden   | boolean        | false     |
 * | invalid  | enum           | false     |
 * | pressed  | enum           | undefined |
 * | selected | tristate       | undefined |
 */
export const stateDescriptors: readonly CollectRow<AccessibleState>[] = [
  { id: AccessibleState.Busy, ctype: "boolean", name: "busy", ctor: booleanValue, fallback: false },
  { id: AccessibleState.Checked, ctype: "enum", name: "checked", ctor: checkedValue, fallback: ACCESSIBLE_VALUE_UNDEFINED },
  { id: AccessibleState.Disabled, ctype: "boolean", name: "disabled", ctor: booleanValue, fallback: false },
  { id: AccessibleState.Expanded, ctype: "tristate", name: "expanded", ctor: expandedValue, fallback: ACCESSIBLE_VALUE_UNDEFINED },
  { id: AccessibleState.Grabbed, ctype: "tristate", name: "grabbed", ctor: grabbedValue, fallback: ACCESSIBLE_VALUE_UNDEFINED },
  { id: AccessibleState.Hidden, ctype: "boolean", name: "hidden", ctor: booleanValue, fallback: false },
  { id: AccessibleState.Invalid, ctype: "enum", name: "invalid", ctor: invalidValue, fallback: AccessibleInvalidState.False },
  { id: AccessibleState.Pressed, ctype: "enum", name: "pressed", ctor: pressedValue, fallback: ACCESSIBLE_VALUE_UNDEFINED },
  { id: AccessibleState.Selected, ctype: "tristate", name: "selected", ctor: selectedValue, fallback: ACCESSIBLE_VALUE_UNDEFINED },
];
