// src/value/container.ts
// Shared, kind-tagged value container

import { TextBuffer } from "./buffer";
import type { AccessibleValue, Lifetime, PayloadMap, ValueKind, ValueTag } from "./kind";
import { isRegisteredKind } from "./registry";
import { contractFailed, ensure } from "../contract/contract";

const STATIC_LIFETIME: Lifetime = Object.freeze({ tag: "Static" });

/**
 * Allocate a counted value of the given kind, holding one reference and
 * the kind's zero payload. Constructors fill in the payload afterwards.
 *
 * Returns null (after reporting) when the kind is missing or is not one
 * of the registered kinds.
 */
export function allocate<T extends ValueTag>(kind: ValueKind<T>): AccessibleValue<T> | null {
  if (!ensure(kind !== null && kind !== undefined, "E0100", { what: "value kind" })) return null;
  if (!ensure(isRegisteredKind(kind), "E0102", { kind: kind.typeName })) return null;

  return {
    kind,
    lifetime: { tag: "Counted", refCount: 1 },
    payload: kind.zero(),
  };
}

/**
 * Build a process-lifetime value. Acquire and release are no-ops on it.
 */
export function staticValue<T extends ValueTag>(kind: ValueKind<T>, payload: PayloadMap[T]): AccessibleValue<T> {
  Object.freeze(payload);
  return Object.freeze({ kind, lifetime: STATIC_LIFETIME, payload });
}

/**
 * Acquire a reference. Returns the same value.
 */
export function acquire<V extends AccessibleValue>(value: V): V {
  if (!ensure(value !== null && value !== undefined, "E0100", { what: "value" })) return value;

  const { lifetime } = value;
  switch (lifetime.tag) {
    case "Static":
      break;
    case "Counted":
      lifetime.refCount += 1;
      break;
    case "Finalized":
      contractFailed("E0103", { kind: value.kind.typeName });
      break;
  }

  return value;
}

/**
 * Release a reference. The last release runs the kind's finalizer.
 */
export function release(value: AccessibleValue): void {
  if (!ensure(value !== null && value !== undefined, "E0100", { what: "value" })) return;

  const { lifetime } = value;
  switch (lifetime.tag) {
    case "Static":
      return;
    case "Finalized":
      contractFailed("E0103", { kind: value.kind.typeName });
      return;
    case "Counted":
      lifetime.refCount -= 1;
      if (lifetime.refCount === 0) {
        value.kind.finalize?.(value);
        value.lifetime = { tag: "Finalized" };
      }
  }
}

/**
 * Null-safe equality. Values of different kinds are never equal.
 */
export function equal(a: AccessibleValue | null | undefined, b: AccessibleValue | null | undefined): boolean {
  if (a === b) return true;
  if (a === null || a === undefined || b === null || b === undefined) {
    // null and undefined both mean "no value"
    return (a === null || a === undefined) && (b === null || b === undefined);
  }
  if (a.kind !== b.kind) return false;

  return a.kind.equal(a, b);
}

export function print(value: AccessibleValue, buffer: TextBuffer): void {
  if (!ensure(value !== null && value !== undefined, "E0100", { what: "value" })) return;
  if (!ensure(buffer !== null && buffer !== undefined, "E0100", { what: "buffer" })) return;

  value.kind.print?.(value, buffer);
}

export function toString(value: AccessibleValue): string {
  const buffer = new TextBuffer();
  print(value, buffer);
  return buffer.toString();
}

// ─────────────────────────────────────────────────────────────────
// Introspection
// ─────────────────────────────────────────────────────────────────

/**
 * Current count; static values report Infinity, finalized values 0.
 */
export function refCount(value: AccessibleValue): number {
  switch (value.lifetime.tag) {
    case "Static":
      return Infinity;
    case "Counted":
      return value.lifetime.refCount;
    case "Finalized":
      return 0;
  }
}

export function isStatic(value: AccessibleValue): boolean {
  return value.lifetime.tag === "Static";
}

export function isFinalized(value: AccessibleValue): boolean {
  return value.lifetime.tag === "Finalized";
}

/**
 * Narrow a value to one kind. Reports a kind mismatch (or a use after
 * the last release) and returns null otherwise.
 */
export function expectKind<T extends ValueTag>(
  value: AccessibleValue | null | undefined,
  kind: ValueKind<T>
): AccessibleValue<T> | null {
  if (value === null || value === undefined) {
    contractFailed("E0100", { what: "value" });
    return null;
  }
  if (!hasKind(value, kind)) {
    contractFailed("E0101", { expected: kind.typeName, actual: value.kind.typeName });
    return null;
  }
  if (!ensure(!isFinalized(value), "E0103", { kind: kind.typeName })) return null;
  return value;
}

export function hasKind<T extends ValueTag>(value: AccessibleValue, kind: ValueKind<T>): value is AccessibleValue<T> {
  return value.kind === kind;
}
