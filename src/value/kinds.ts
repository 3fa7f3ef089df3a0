import { formatGeneral } from "./format";
import type { ValueKind, WeakSlot } from "./kind";
import { TRISTATE_NAMES, tokenName } from "./tokens";
import { objectAddress, type Accessible } from "../weak/referent";

/** Numbers closer than this compare equal */
export const NUMBER_TOLERANCE = 0.001;

export const EMPTY_SLOT: WeakSlot = Object.freeze({ tag: "Empty" });

export function liveTarget(slot: WeakSlot): Accessible | null {
  if (slot.tag === "Empty") return null;
  return slot.target.deref() ?? null;
}

// ─────────────────────────────────────────────────────────────────
// Static kinds
// ─────────────────────────────────────────────────────────────────

export const BOOLEAN_KIND: ValueKind<"Boolean"> = {
  tag: "Boolean",
  typeName: "BooleanAccessibleValue",
  zero: () => ({ value: false }),
  equal: (a, b) => a.payload.value === b.payload.value,
  print: (value, buffer) => {
    buffer.append(value.payload.value ? "true" : "false");
  },
};

export const TRISTATE_KIND: ValueKind<"Tristate"> = {
  tag: "Tristate",
  typeName: "TristateAccessibleValue",
  zero: () => ({ value: 0 }),
  equal: (a, b) => a.payload.value === b.payload.value,
  print: (value, buffer) => {
    buffer.append(TRISTATE_NAMES[value.payload.value] ?? "undefined");
  },
};

export const TOKEN_KIND: ValueKind<"Token"> = {
  tag: "Token",
  typeName: "TokenAccessibleValue",
  zero: () => ({ family: "checked", value: 0 }),
  equal: (a, b) =>
    a.payload.family === b.payload.family && a.payload.value === b.payload.value,
  print: (value, buffer) => {
    buffer.append(tokenName(value.payload.family, value.payload.value));
  },
};

// ─────────────────────────────────────────────────────────────────
// Dynamic kinds
// ─────────────────────────────────────────────────────────────────

export const INT_KIND: ValueKind<"Int"> = {
  tag: "Int",
  typeName: "IntAccessibleValue",
  zero: () => ({ value: 0 }),
  equal: (a, b) => a.payload.value === b.payload.value,
  print: (value, buffer) => {
    buffer.append(String(value.payload.value));
  },
};

export const NUMBER_KIND: ValueKind<"Number"> = {
  tag: "Number",
  typeName: "NumberAccessibleValue",
  zero: () => ({ value: 0 }),
  equal: (a, b) => Math.abs(a.payload.value - b.payload.value) < NUMBER_TOLERANCE,
  print: (value, buffer) => {
    buffer.append(formatGeneral(value.payload.value));
  },
};

export const STRING_KIND: ValueKind<"String"> = {
  tag: "String",
  typeName: "StringAccessibleValue",
  zero: () => ({ value: "", length: 0 }),
  equal: (a, b) => {
    if (a.payload.length !== b.payload.length) return false;
    return a.payload.value === b.payload.value;
  },
  print: (value, buffer) => {
    buffer.append(value.payload.value);
  },
};

export const REFERENCE_KIND: ValueKind<"Reference"> = {
  tag: "Reference",
  typeName: "ReferenceAccessibleValue",
  zero: () => ({ slot: EMPTY_SLOT }),
  // Two cleared references are both "no reference", and so equal
  equal: (a, b) => liveTarget(a.payload.slot) === liveTarget(b.payload.slot),
  finalize: value => {
    const { slot } = value.payload;
    if (slot.tag === "Live") {
      slot.target.deref()?.removeWeakNotify(slot.notify);
    }
    value.payload = { slot: EMPTY_SLOT };
  },
  print: (value, buffer) => {
    const target = liveTarget(value.payload.slot);
    if (target !== null) {
      buffer.append(`${target.typeName}<${objectAddress(target)}>`);
    } else {
      buffer.append("<null>");
    }
  },
};
