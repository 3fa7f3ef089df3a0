import type { Failure } from "./failure";

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
}

export type Outcome<A> = Done<A> | Fail;

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export function fail(f: Failure): Fail {
  return { tag: "Fail", failure: f };
}

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  if (isDone(o)) {
    return done(fn(o.value));
  }
  return o;
}

export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new Error(o.failure.message);
}

export function unwrapOr<A>(o: Outcome<A>, defaultValue: A): A {
  return isDone(o) ? o.value : defaultValue;
}
