import type { TextBuffer } from "./buffer";
import type { TokenFamily } from "./tokens";
import type { Accessible, WeakNotify } from "../weak/referent";

/**
 * Closed set of value representations.
 */
export type ValueTag =
  | "Boolean"
  | "Tristate"
  | "Token"
  | "Int"
  | "Number"
  | "String"
  | "Reference";

/**
 * Weak pointer held by reference values. Becomes Empty when the referent
 * is disposed or when the value is finalized.
 */
export type WeakSlot =
  | { tag: "Empty" }
  | { tag: "Live"; target: WeakRef<Accessible>; notify: WeakNotify };

export interface PayloadMap {
  Boolean: { value: boolean };
  Tristate: { value: number };
  Token: { family: TokenFamily; value: number };
  Int: { value: number };
  Number: { value: number };
  String: { value: string; length: number };
  Reference: { slot: WeakSlot };
}

/**
 * Static values live for the whole process and are never counted.
 * Counted values are finalized when their last reference is released.
 */
export type Lifetime =
  | { tag: "Static" }
  | { tag: "Counted"; refCount: number }
  | { tag: "Finalized" };

export interface AccessibleValue<T extends ValueTag = ValueTag> {
  readonly kind: ValueKind<T>;
  lifetime: Lifetime;
  payload: PayloadMap[T];
}

/**
 * Behaviour shared by every value of one representation.
 *
 * `equal` is only called with two values of this kind; the container
 * checks kinds before dispatching.
 */
export interface ValueKind<T extends ValueTag = ValueTag> {
  readonly tag: T;
  /** For diagnostics only */
  readonly typeName: string;
  zero(): PayloadMap[T];
  equal(a: AccessibleValue<T>, b: AccessibleValue<T>): boolean;
  finalize?(value: AccessibleValue<T>): void;
  print?(value: AccessibleValue<T>, buffer: TextBuffer): void;
}
