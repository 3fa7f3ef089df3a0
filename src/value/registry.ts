import type { ValueKind, ValueTag } from "./kind";
import {
  BOOLEAN_KIND,
  INT_KIND,
  NUMBER_KIND,
  REFERENCE_KIND,
  STRING_KIND,
  TOKEN_KIND,
  TRISTATE_KIND,
} from "./kinds";

/**
 * One kind per representation. Fixed when the module loads; values may
 * only be allocated with a kind from this table.
 */
export const VALUE_KINDS: Readonly<{ [T in ValueTag]: ValueKind<T> }> = Object.freeze({
  Boolean: BOOLEAN_KIND,
  Tristate: TRISTATE_KIND,
  Token: TOKEN_KIND,
  Int: INT_KIND,
  Number: NUMBER_KIND,
  String: STRING_KIND,
  Reference: REFERENCE_KIND,
});

export const VALUE_TAGS: readonly ValueTag[] = Object.freeze(
  ["Boolean", "Tristate", "Token", "Int", "Number", "String", "Reference"] satisfies ValueTag[]
);

export function kindFor<T extends ValueTag>(tag: T): ValueKind<T> {
  return VALUE_KINDS[tag];
}

export function isRegisteredKind(kind: ValueKind | null | undefined): kind is ValueKind {
  if (kind === null || kind === undefined) return false;
  return VALUE_TAGS.includes(kind.tag) && VALUE_KINDS[kind.tag] === kind;
}
