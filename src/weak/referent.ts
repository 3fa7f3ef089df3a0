/**
 * Weak referents.
 *
 * An accessible object is owned by the accessible tree, never by a value
 * that points at it. A reference value subscribes to the object's weak
 * notifications instead, and drops its pointer when the object goes away.
 */

export type WeakNotify = (referent: Accessible) => void;

/**
 * The part of the accessible object contract that reference values use.
 */
export interface Accessible {
  /** Type name shown when a reference to this object is printed */
  readonly typeName: string;
  addWeakNotify(notify: WeakNotify): void;
  removeWeakNotify(notify: WeakNotify): void;
}

export function isAccessible(value: unknown): value is Accessible {
  if (typeof value !== "object" || value === null) return false;
  return (
    "typeName" in value &&
    typeof value.typeName === "string" &&
    "addWeakNotify" in value &&
    typeof value.addWeakNotify === "function" &&
    "removeWeakNotify" in value &&
    typeof value.removeWeakNotify === "function"
  );
}

/**
 * Base class for objects that can be weakly referenced.
 * `dispose()` runs every registered notification once, in registration
 * order, and then forgets them.
 */
export class WeakReferent implements Accessible {
  private notifies: WeakNotify[] = [];
  private isDisposed = false;

  constructor(readonly typeName: string) {}

  get disposed(): boolean {
    return this.isDisposed;
  }

  addWeakNotify(notify: WeakNotify): void {
    if (this.isDisposed) {
      notify(this);
      return;
    }
    this.notifies.push(notify);
  }

  removeWeakNotify(notify: WeakNotify): void {
    const idx = this.notifies.indexOf(notify);
    if (idx >= 0) this.notifies.splice(idx, 1);
  }

  get weakNotifyCount(): number {
    return this.notifies.length;
  }

  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;

    const pending = this.notifies;
    this.notifies = [];
    for (const notify of pending) {
      notify(this);
    }
  }
}

const addresses = new WeakMap<object, number>();
let nextAddress = 1;

/**
 * Stable per-object marker, e.g. `0x0000002a`. Objects have no address in
 * JavaScript; markers are handed out in first-seen order.
 */
export function objectAddress(obj: object): string {
  let addr = addresses.get(obj);
  if (addr === undefined) {
    addr = nextAddress++;
    addresses.set(obj, addr);
  }
  return `0x${addr.toString(16).padStart(8, "0")}`;
}
