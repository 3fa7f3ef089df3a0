import { contractFailed } from "../contract/contract";
import type { Accessible } from "../weak/referent";
import { isArg, type ArgSource, type ArgType, type ArgValue, type CollectArg } from "./types";

/**
 * Reads typed arguments in order.
 *
 * ```ts
 * const cursor = new ArgCursor([Arg.boolean(true), Arg.string("Save")]);
 * collectForState(AccessibleState.Busy, cursor);
 * collectForProperty(AccessibleProperty.Label, cursor);
 * ```
 */
export class ArgCursor implements ArgSource {
  private pos = 0;

  constructor(private readonly args: readonly CollectArg[]) {}

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.args.length - this.pos;
  }

  boolean(name: string): boolean | undefined {
    return this.take("boolean", name);
  }

  int(name: string): number | undefined {
    return this.take("int", name);
  }

  tristate(name: string): number | undefined {
    return this.take("tristate", name);
  }

  enumeration(name: string): number | undefined {
    return this.take("enum", name);
  }

  number(name: string): number | undefined {
    return this.take("number", name);
  }

  string(name: string): string | undefined {
    return this.take("string", name);
  }

  ref(name: string): Accessible | undefined {
    return this.take("ref", name);
  }

  /**
   * Consume one argument. A mismatched argument is still consumed.
   */
  private take<C extends ArgType>(type: C, name: string): ArgValue<C> | undefined {
    const arg = this.args[this.pos];
    if (arg === undefined) {
      contractFailed("E0107", { name });
      return undefined;
    }
    this.pos += 1;

    const actual = arg.type;
    if (!isArg(arg, type)) {
      contractFailed("E0106", { name, expected: type, actual });
      return undefined;
    }
    return arg.value;
  }
}
