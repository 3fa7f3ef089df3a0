// src/collect/types.ts
// Descriptor rows and typed collection arguments

import type { AccessibleValue } from "../value/kind";
import type { Accessible } from "../weak/referent";

// ─────────────────────────────────────────────────────────────────
// Arguments
// ─────────────────────────────────────────────────────────────────

/**
 * One pre-typed argument. Callers build a list of these instead of
 * passing untyped positional values.
 */
export type CollectArg =
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "int"; readonly value: number }
  | { readonly type: "tristate"; readonly value: number }
  | { readonly type: "enum"; readonly value: number }
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "ref"; readonly value: Accessible };

export type ArgType = CollectArg["type"];

export type ArgValue<C extends ArgType> = Extract<CollectArg, { type: C }>["value"];

export const Arg = {
  boolean: (value: boolean): CollectArg => ({ type: "boolean", value }),
  int: (value: number): CollectArg => ({ type: "int", value }),
  tristate: (value: number): CollectArg => ({ type: "tristate", value }),
  enum: (value: number): CollectArg => ({ type: "enum", value }),
  number: (value: number): CollectArg => ({ type: "number", value }),
  string: (value: string): CollectArg => ({ type: "string", value }),
  ref: (value: Accessible): CollectArg => ({ type: "ref", value }),
};

export function isArg<C extends ArgType>(arg: CollectArg, type: C): arg is Extract<CollectArg, { type: C }> {
  return arg.type === type;
}

/**
 * Where a collected value comes from. Each read consumes (at most) one
 * input; `undefined` means the read failed and was reported.
 */
export interface ArgSource {
  boolean(name: string): boolean | undefined;
  int(name: string): number | undefined;
  tristate(name: string): number | undefined;
  enumeration(name: string): number | undefined;
  number(name: string): number | undefined;
  string(name: string): string | undefined;
  ref(name: string): Accessible | undefined;
}

// ─────────────────────────────────────────────────────────────────
// Descriptor rows
// ─────────────────────────────────────────────────────────────────

/** "invalid" marks a row whose argument type was never filled in */
export type CollectType = "invalid" | ArgType;

export const COLLECT_TYPES: readonly CollectType[] = [
  "invalid",
  "boolean",
  "int",
  "tristate",
  "enum",
  "number",
  "string",
  "ref",
];

export type ValueCtor<C extends ArgType> = (value: ArgValue<C>) => AccessibleValue | null;

export type TypedRow<Id extends number, C extends ArgType> = {
  readonly id: Id;
  readonly ctype: C;
  /** Attribute name, used in diagnostics and tracing */
  readonly name: string;
  readonly ctor: ValueCtor<C>;
  /** Argument for the default value; absent when there is no default */
  readonly fallback?: ArgValue<C>;
};

export type InvalidRow<Id extends number> = {
  readonly id: Id;
  readonly ctype: "invalid";
  readonly name: string;
};

export type CollectRow<Id extends number = number> =
  | { [C in ArgType]: TypedRow<Id, C> }[ArgType]
  | InvalidRow<Id>;
