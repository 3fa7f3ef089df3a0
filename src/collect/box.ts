import { contractFailed } from "../contract/contract";
import type { Accessible } from "../weak/referent";
import type { ArgSource } from "./types";

/**
 * A dynamically typed value, as handed over by property-binding layers.
 */
export type ValueBox =
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "int"; readonly value: number }
  | { readonly type: "enum"; readonly enumName: string; readonly value: number }
  | { readonly type: "double"; readonly value: number }
  | { readonly type: "string"; readonly value: string | null }
  | { readonly type: "object"; readonly value: Accessible | null };

export type BoxType = ValueBox["type"];

export const Box = {
  boolean: (value: boolean): ValueBox => ({ type: "boolean", value }),
  int: (value: number): ValueBox => ({ type: "int", value }),
  enum: (enumName: string, value: number): ValueBox => ({ type: "enum", enumName, value }),
  double: (value: number): ValueBox => ({ type: "double", value }),
  string: (value: string | null): ValueBox => ({ type: "string", value }),
  object: (value: Accessible | null): ValueBox => ({ type: "object", value }),
};

function holds<T extends BoxType>(box: ValueBox, type: T): box is Extract<ValueBox, { type: T }> {
  return box.type === type;
}

/**
 * Reads the single value held by a box. Tristates are read from int
 * boxes; a null string or object is a broken contract.
 */
export class BoxSource implements ArgSource {
  constructor(private readonly box: ValueBox) {}

  boolean(name: string): boolean | undefined {
    return this.expect("boolean", name)?.value;
  }

  int(name: string): number | undefined {
    return this.expect("int", name)?.value;
  }

  tristate(name: string): number | undefined {
    return this.expect("int", name)?.value;
  }

  enumeration(name: string): number | undefined {
    return this.expect("enum", name)?.value;
  }

  number(name: string): number | undefined {
    return this.expect("double", name)?.value;
  }

  string(name: string): string | undefined {
    const box = this.expect("string", name);
    if (box === undefined) return undefined;
    if (box.value === null) {
      contractFailed("E0100", { what: `string for "${name}"` });
      return undefined;
    }
    return box.value;
  }

  ref(name: string): Accessible | undefined {
    const box = this.expect("object", name);
    if (box === undefined) return undefined;
    if (box.value === null) {
      contractFailed("E0100", { what: `object for "${name}"` });
      return undefined;
    }
    return box.value;
  }

  private expect<T extends BoxType>(type: T, name: string): Extract<ValueBox, { type: T }> | undefined {
    const box = this.box;
    const actual = box.type;
    if (!holds(box, type)) {
      contractFailed("E0108", { name, expected: type, actual });
      return undefined;
    }
    return box;
  }
}
