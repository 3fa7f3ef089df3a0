/**
 * Accessible states: dynamic conditions of an element.
 * `None` is a sentinel and never has a descriptor.
 */
export const AccessibleState = {
  None: -1,
  Busy: 0,
  Checked: 1,
  Disabled: 2,
  Expanded: 3,
  Grabbed: 4,
  Hidden: 5,
  Invalid: 6,
  Pressed: 7,
  Selected: 8,
} as const;
export type AccessibleState = (typeof AccessibleState)[keyof typeof AccessibleState];

/**
 * Accessible properties: descriptive attributes of an element.
 */
export const AccessibleProperty = {
  ActiveDescendant: 0,
  Autocomplete: 1,
  Controls: 2,
  DescribedBy: 3,
  FlowTo: 4,
  HasPopup: 5,
  Label: 6,
  LabelledBy: 7,
  Level: 8,
  MultiLine: 9,
  MultiSelectable: 10,
  Orientation: 11,
  Owns: 12,
  PosInSet: 13,
  ReadOnly: 14,
  Relevant: 15,
  Required: 16,
  SetSize: 17,
  Sort: 18,
  ValueMax: 19,
  ValueMin: 20,
  ValueNow: 21,
  ValueText: 22,
} as const;
export type AccessibleProperty = (typeof AccessibleProperty)[keyof typeof AccessibleProperty];

export const ALL_STATES: readonly AccessibleState[] = Object.values(AccessibleState).filter(
  state => state !== AccessibleState.None
);

export const ALL_PROPERTIES: readonly AccessibleProperty[] = Object.values(AccessibleProperty);
