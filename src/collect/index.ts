export * from "./identifiers";
export * from "./types";
export * from "./cursor";
export * from "./box";
export * from "./table";

import type { AccessibleValue } from "../value/kind";
import type { ValueBox } from "./box";
import type { ArgCursor } from "./cursor";
import { propertyDescriptors } from "./descriptors/properties";
import { stateDescriptors } from "./descriptors/states";
import { ALL_PROPERTIES, ALL_STATES, type AccessibleProperty, type AccessibleState } from "./identifiers";
import { CollectTable } from "./table";

export const stateTable = new CollectTable<AccessibleState>("state", stateDescriptors, ALL_STATES);
export const propertyTable = new CollectTable<AccessibleProperty>("property", propertyDescriptors, ALL_PROPERTIES);

export function defaultForState(state: AccessibleState): AccessibleValue | null {
  return stateTable.defaultFor(state);
}

export function defaultForProperty(property: AccessibleProperty): AccessibleValue | null {
  return propertyTable.defaultFor(property);
}

export function collectForState(state: AccessibleState, cursor: ArgCursor): AccessibleValue | null {
  return stateTable.collectFromArgs(state, cursor);
}

export function collectForProperty(property: AccessibleProperty, cursor: ArgCursor): AccessibleValue | null {
  return propertyTable.collectFromArgs(property, cursor);
}

export function collectForStateValue(state: AccessibleState, box: ValueBox): AccessibleValue | null {
  return stateTable.collectFromBox(state, box);
}

export function collectForPropertyValue(property: AccessibleProperty, box: ValueBox): AccessibleValue | null {
  return propertyTable.collectFromBox(property, box);
}

export function stateName(state: AccessibleState): string | null {
  return stateTable.nameOf(state);
}

export function propertyName(property: AccessibleProperty): string | null {
  return propertyTable.nameOf(property);
}

export { stateDescriptors, propertyDescriptors };
