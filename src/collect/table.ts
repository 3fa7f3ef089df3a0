import { contractFailed, critical } from "../contract/contract";
import type { AccessibleValue } from "../value/kind";
import type { Accessible } from "../weak/referent";
import { BoxSource, type ValueBox } from "./box";
import type { ArgCursor } from "./cursor";
import { COLLECT_TYPES, type ArgSource, type CollectRow } from "./types";

export type AttributeSpace = "state" | "property";

export interface TableValidation {
  valid: boolean;
  errors: string[];
}

/**
 * Serves a row's declared default as the single argument to collect.
 */
class FallbackSource implements ArgSource {
  constructor(private readonly row: CollectRow) {}

  boolean(): boolean | undefined {
    const row = this.row;
    return row.ctype === "boolean" ? row.fallback : undefined;
  }

  int(): number | undefined {
    const row = this.row;
    return row.ctype === "int" ? row.fallback : undefined;
  }

  tristate(): number | undefined {
    const row = this.row;
    return row.ctype === "tristate" ? row.fallback : undefined;
  }

  enumeration(): number | undefined {
    const row = this.row;
    return row.ctype === "enum" ? row.fallback : undefined;
  }

  number(): number | undefined {
    const row = this.row;
    return row.ctype === "number" ? row.fallback : undefined;
  }

  string(): string | undefined {
    const row = this.row;
    return row.ctype === "string" ? row.fallback : undefined;
  }

  ref(): Accessible | undefined {
    const row = this.row;
    return row.ctype === "ref" ? row.fallback : undefined;
  }
}

/**
 * Collection dispatch over one identifier space.
 *
 * Each row names the argument type its constructor takes; collecting
 * reads one argument of that type from a source and hands it to the
 * constructor.
 */
export class CollectTable<Id extends number> {
  constructor(
    readonly space: AttributeSpace,
    private readonly table: readonly CollectRow<Id>[],
    private readonly ids: readonly Id[]
  ) {}

  /**
   * Row for `id`. Unknown identifiers (including sentinels) are a broken
   * caller contract.
   */
  lookup(id: Id): CollectRow<Id> | null {
    const row = this.ids.includes(id) ? this.table[id] : undefined;
    if (row === undefined) {
      contractFailed("E0109", { space: this.space, id: String(id) });
      return null;
    }
    return row;
  }

  nameOf(id: Id): string | null {
    return this.lookup(id)?.name ?? null;
  }

  rows(): readonly CollectRow<Id>[] {
    return this.table;
  }

  /**
   * A fresh value holding the declared default, or null when the
   * attribute has no default (callers treat that as unset).
   */
  defaultFor(id: Id): AccessibleValue | null {
    const row = this.lookup(id);
    if (row === null) return null;

    if (row.ctype === "invalid" || !COLLECT_TYPES.includes(row.ctype)) {
      critical("E0201", { space: this.space, name: row.name });
      return null;
    }
    if (row.fallback === undefined) return null;

    return this.construct(row, new FallbackSource(row));
  }

  /**
   * Consume one argument from `cursor` and build the value for `id`.
   */
  collectFromArgs(id: Id, cursor: ArgCursor): AccessibleValue | null {
    const row = this.lookup(id);
    if (row === null) return null;
    return this.construct(row, cursor);
  }

  /**
   * Build the value for `id` from a dynamically typed box.
   */
  collectFromBox(id: Id, box: ValueBox): AccessibleValue | null {
    const row = this.lookup(id);
    if (row === null) return null;
    return this.construct(row, new BoxSource(box));
  }

  /**
   * Every identifier must resolve to a row carrying that identifier, a
   * name, a known argument type and a constructor.
   */
  validate(): TableValidation {
    const errors: string[] = [];

    for (const id of this.ids) {
      const row = this.table[id];
      if (row === undefined) {
        errors.push(`${this.space} ${id}: missing descriptor`);
        continue;
      }
      const label = row.name || `${this.space} ${id}`;
      if (row.id !== id) {
        errors.push(`${label}: found at ${id} but declares ${row.id}`);
      }
      if (!row.name) {
        errors.push(`${label}: missing name`);
      }
      if (row.ctype === "invalid" || !COLLECT_TYPES.includes(row.ctype)) {
        errors.push(`${label}: unknown collect type "${String(row.ctype)}"`);
      } else if (typeof row.ctor !== "function") {
        errors.push(`${label}: missing constructor`);
      }
    }

    if (this.table.length !== this.ids.length) {
      errors.push(`${this.space} table has ${this.table.length} rows for ${this.ids.length} identifiers`);
    }

    return { valid: errors.length === 0, errors };
  }

  private construct(row: CollectRow<Id>, source: ArgSource): AccessibleValue | null {
    const { name } = row;

    switch (row.ctype) {
      case "boolean": {
        const value = source.boolean(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "int": {
        const value = source.int(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "tristate": {
        const value = source.tristate(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "enum": {
        const value = source.enumeration(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "number": {
        const value = source.number(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "string": {
        const value = source.string(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "ref": {
        const value = source.ref(name);
        return value === undefined ? null : row.ctor(value);
      }
      case "invalid":
      default:
        critical("E0200", { space: this.space, name });
        return null;
    }
  }
}
