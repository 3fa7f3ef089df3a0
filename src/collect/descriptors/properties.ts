import { intValue, numberValue, referenceValue, stringValue } from "../../value/basic";
import { autocompleteValue, booleanValue, orientationValue, sortValue } from "../../value/static";
import { AccessibleAutocomplete, AccessibleSort, Orientation } from "../../value/tokens";
import { AccessibleProperty as P } from "../identifiers";
import type { AccessibleProperty } from "../identifiers";
import type { CollectRow } from "../types";

/**
 * One row per property, indexed by property identifier.
 *
 * Relationship properties (and "relevant") have no default: an unset
 * relationship is absent, not an empty value.
 */
export const propertyDescriptors: readonly CollectRow<AccessibleProperty>[] = [
  { id: P.ActiveDescendant, ctype: "ref", name: "activedescendant", ctor: referenceValue },
  { id: P.Autocomplete, ctype: "enum", name: "autocomplete", ctor: autocompleteValue, fallback: AccessibleAutocomplete.None },
  { id: P.Controls, ctype: "ref", name: "controls", ctor: referenceValue },
  { id: P.DescribedBy, ctype: "ref", name: "describedby", ctor: referenceValue },
  { id: P.FlowTo, ctype: "ref", name: "flowto", ctor: referenceValue },
  { id: P.HasPopup, ctype: "boolean", name: "haspopup", ctor: booleanValue, fallback: false },
  { id: P.Label, ctype: "string", name: "label", ctor: stringValue, fallback: "" },
  { id: P.LabelledBy, ctype: "ref", name: "labelledby", ctor: referenceValue },
  { id: P.Level, ctype: "int", name: "level", ctor: intValue, fallback: 0 },
  { id: P.MultiLine, ctype: "boolean", name: "multiline", ctor: booleanValue, fallback: false },
  { id: P.MultiSelectable, ctype: "boolean", name: "multiselectable", ctor: booleanValue, fallback: false },
  { id: P.Orientation, ctype: "enum", name: "orientation", ctor: orientationValue, fallback: Orientation.Horizontal },
  { id: P.Owns, ctype: "ref", name: "owns", ctor: referenceValue },
  { id: P.PosInSet, ctype: "int", name: "posinset", ctor: intValue, fallback: 0 },
  { id: P.ReadOnly, ctype: "boolean", name: "readonly", ctor: booleanValue, fallback: false },
  { id: P.Relevant, ctype: "string", name: "relevant", ctor: stringValue },
  { id: P.Required, ctype: "boolean", name: "required", ctor: booleanValue, fallback: false },
  { id: P.SetSize, ctype: "int", name: "setsize", ctor: intValue, fallback: 0 },
  { id: P.Sort, ctype: "enum", name: "sort", ctor: sortValue, fallback: AccessibleSort.None },
  { id: P.ValueMax, ctype: "number", name: "valuemax", ctor: numberValue, fallback: 0 },
  { id: P.ValueMin, ctype: "number", name: "valuemin", ctor: numberValue, fallback: 0 },
  { id: P.ValueNow, ctype: "number", name: "valuenow", ctor: numberValue, fallback: 0 },
  { id: P.ValueText, ctype: "string", name: "valuetext", ctor: stringValue, fallback: "" },
];
