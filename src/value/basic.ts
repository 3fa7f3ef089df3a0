// src/value/basic.ts
// Dynamically allocated values: integers, numbers, strings, references

import { allocate, expectKind } from "./container";
import type { AccessibleValue } from "./kind";
import { EMPTY_SLOT, INT_KIND, NUMBER_KIND, REFERENCE_KIND, STRING_KIND, liveTarget } from "./kinds";
import { describeActual, ensure } from "../contract/contract";
import { isAccessible, type Accessible, type WeakNotify } from "../weak/referent";

export function intValue(value: number): AccessibleValue<"Int"> | null {
  if (!ensure(Number.isInteger(value), "E0105", { value: String(value) })) return null;

  const res = allocate(INT_KIND);
  if (res === null) return null;

  res.payload = { value };
  return res;
}

export function getInt(value: AccessibleValue): number {
  return expectKind(value, INT_KIND)?.payload.value ?? 0;
}

export function numberValue(value: number): AccessibleValue<"Number"> | null {
  if (!ensure(typeof value === "number", "E0100", { what: "number" })) return null;

  const res = allocate(NUMBER_KIND);
  if (res === null) return null;

  res.payload = { value };
  return res;
}

export function getNumber(value: AccessibleValue): number {
  return expectKind(value, NUMBER_KIND)?.payload.value ?? 0;
}

export function stringValue(text: string): AccessibleValue<"String"> | null {
  if (!ensure(typeof text === "string", "E0100", { what: "string" })) return null;

  const res = allocate(STRING_KIND);
  if (res === null) return null;

  res.payload = { value: text, length: text.length };
  return res;
}

export function getString(value: AccessibleValue): string | null {
  return expectKind(value, STRING_KIND)?.payload.value ?? null;
}

/**
 * A non-owning reference to an accessible object.
 *
 * The value subscribes to the referent's weak notifications: if the
 * referent is disposed first the value reads as an empty reference, and
 * if the value is finalized first it unsubscribes.
 */
export function referenceValue(referent: Accessible): AccessibleValue<"Reference"> | null {
  if (!ensure(isAccessible(referent), "E0110", { actual: describeActual(referent) })) return null;

  const res = allocate(REFERENCE_KIND);
  if (res === null) return null;

  const notify: WeakNotify = () => {
    res.payload = { slot: EMPTY_SLOT };
  };
  res.payload = { slot: { tag: "Live", target: new WeakRef(referent), notify } };
  referent.addWeakNotify(notify);

  return res;
}

export function getReference(value: AccessibleValue): Accessible | null {
  const self = expectKind(value, REFERENCE_KIND);
  return self === null ? null : liveTarget(self.payload.slot);
}
