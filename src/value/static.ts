// src/value/static.ts
// Process-lifetime values: booleans, tristates and tokens

import { expectKind, staticValue } from "./container";
import type { AccessibleValue } from "./kind";
import { BOOLEAN_KIND, TOKEN_KIND, TRISTATE_KIND } from "./kinds";
import {
  ACCESSIBLE_VALUE_UNDEFINED,
  AccessibleTristate,
  TOKEN_FAMILIES,
  isTokenInFamily,
  type TokenFamily,
} from "./tokens";
import { contractFailed } from "../contract/contract";
import { makeDiagnostic } from "../outcome/codes";
import { failure } from "../outcome/failure";
import { done, fail, type Outcome } from "../outcome/outcome";

// ─────────────────────────────────────────────────────────────────
// Booleans
// ─────────────────────────────────────────────────────────────────

const TRUE_VALUE = staticValue(BOOLEAN_KIND, { value: true });
const FALSE_VALUE = staticValue(BOOLEAN_KIND, { value: false });

export function booleanValue(value: boolean): AccessibleValue<"Boolean"> {
  return value ? TRUE_VALUE : FALSE_VALUE;
}

export function getBoolean(value: AccessibleValue): boolean {
  return expectKind(value, BOOLEAN_KIND)?.payload.value ?? false;
}

// ─────────────────────────────────────────────────────────────────
// Tristates
// ─────────────────────────────────────────────────────────────────

const TRISTATE_VALUES = new Map<number, AccessibleValue<"Tristate">>(
  [ACCESSIBLE_VALUE_UNDEFINED, AccessibleTristate.False, AccessibleTristate.True].map(
    (state): [number, AccessibleValue<"Tristate">] => [state, staticValue(TRISTATE_KIND, { value: state })]
  )
);

function tristateValue(state: number, name: string): AccessibleValue<"Tristate"> | null {
  const res = TRISTATE_VALUES.get(state);
  if (res === undefined) {
    contractFailed("E0104", { family: name, value: String(state) });
    return null;
  }
  return res;
}

export function expandedValue(state: number): AccessibleValue<"Tristate"> | null {
  return tristateValue(state, "expanded");
}

export function grabbedValue(state: number): AccessibleValue<"Tristate"> | null {
  return tristateValue(state, "grabbed");
}

export function selectedValue(state: number): AccessibleValue<"Tristate"> | null {
  return tristateValue(state, "selected");
}

export function getTristate(value: AccessibleValue): number {
  return expectKind(value, TRISTATE_KIND)?.payload.value ?? ACCESSIBLE_VALUE_UNDEFINED;
}

// ─────────────────────────────────────────────────────────────────
// Tokens
// ─────────────────────────────────────────────────────────────────

function buildFamily(family: TokenFamily): Map<number, AccessibleValue<"Token">> {
  const def = TOKEN_FAMILIES[family];
  const values = new Map<number, AccessibleValue<"Token">>();
  if (def.allowsUndefined) {
    values.set(ACCESSIBLE_VALUE_UNDEFINED, staticValue(TOKEN_KIND, { family, value: ACCESSIBLE_VALUE_UNDEFINED }));
  }
  def.tokens.forEach((_, value) => {
    values.set(value, staticValue(TOKEN_KIND, { family, value }));
  });
  return values;
}

const TOKEN_VALUES: Record<TokenFamily, Map<number, AccessibleValue<"Token">>> = {
  checked: buildFamily("checked"),
  pressed: buildFamily("pressed"),
  invalid: buildFamily("invalid"),
  autocomplete: buildFamily("autocomplete"),
  orientation: buildFamily("orientation"),
  sort: buildFamily("sort"),
};

export function tokenValue(family: TokenFamily, value: number): AccessibleValue<"Token"> | null {
  const res = isTokenInFamily(family, value) ? TOKEN_VALUES[family].get(value) : undefined;
  if (res === undefined) {
    contractFailed("E0104", { family, value: String(value) });
    return null;
  }
  return res;
}

export const checkedValue = (value: number) => tokenValue("checked", value);
export const pressedValue = (value: number) => tokenValue("pressed", value);
export const invalidValue = (value: number) => tokenValue("invalid", value);
export const autocompleteValue = (value: number) => tokenValue("autocomplete", value);
export const orientationValue = (value: number) => tokenValue("orientation", value);
export const sortValue = (value: number) => tokenValue("sort", value);

export function getToken(value: AccessibleValue): number {
  return expectKind(value, TOKEN_KIND)?.payload.value ?? ACCESSIBLE_VALUE_UNDEFINED;
}

export function tokenFamilyOf(value: AccessibleValue): TokenFamily | null {
  return expectKind(value, TOKEN_KIND)?.payload.family ?? null;
}

/**
 * Look up a token by name, e.g. `parseToken("sort", "ascending")`.
 * "undefined" is accepted by families that allow an undefined token.
 */
export function parseToken(family: TokenFamily, text: string): Outcome<AccessibleValue<"Token">> {
  const def = TOKEN_FAMILIES[family];

  let token: number | undefined;
  if (text === "undefined") {
    token = def.allowsUndefined ? ACCESSIBLE_VALUE_UNDEFINED : undefined;
  } else {
    const index = def.tokens.indexOf(text);
    token = index >= 0 ? index : undefined;
  }

  const res = token === undefined ? undefined : TOKEN_VALUES[family].get(token);
  if (res === undefined) {
    const diag = makeDiagnostic("E0300", { value: text, name: family });
    return fail(failure("invalid-token", diag.message, {
      diagnostics: [diag],
      context: { family, text },
    }));
  }
  return done(res);
}
