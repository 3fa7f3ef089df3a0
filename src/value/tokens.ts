/**
 * Enumerated token sets used by tristate and token values.
 */

/** Token value meaning "not set" for families that allow it */
export const ACCESSIBLE_VALUE_UNDEFINED = -1;

export const AccessibleTristate = {
  False: 0,
  True: 1,
  Mixed: 2,
} as const;
export type AccessibleTristate = (typeof AccessibleTristate)[keyof typeof AccessibleTristate];

export const AccessibleInvalidState = {
  False: 0,
  True: 1,
  Grammar: 2,
  Spelling: 3,
} as const;
export type AccessibleInvalidState = (typeof AccessibleInvalidState)[keyof typeof AccessibleInvalidState];

export const AccessibleAutocomplete = {
  None: 0,
  Inline: 1,
  List: 2,
  Both: 3,
} as const;
export type AccessibleAutocomplete = (typeof AccessibleAutocomplete)[keyof typeof AccessibleAutocomplete];

export const Orientation = {
  Horizontal: 0,
  Vertical: 1,
} as const;
export type Orientation = (typeof Orientation)[keyof typeof Orientation];

export const AccessibleSort = {
  None: 0,
  Ascending: 1,
  Descending: 2,
  Other: 3,
} as const;
export type AccessibleSort = (typeof AccessibleSort)[keyof typeof AccessibleSort];

export type TokenFamily = "checked" | "pressed" | "invalid" | "autocomplete" | "orientation" | "sort";

export interface TokenFamilyDef {
  /** Token names, indexed by token value */
  readonly tokens: readonly string[];
  /** Whether ACCESSIBLE_VALUE_UNDEFINED is a member of the family */
  readonly allowsUndefined: boolean;
}

export const TOKEN_FAMILIES: Readonly<Record<TokenFamily, TokenFamilyDef>> = {
  checked: { tokens: ["false", "true", "mixed"], allowsUndefined: true },
  pressed: { tokens: ["false", "true", "mixed"], allowsUndefined: true },
  invalid: { tokens: ["false", "true", "grammar", "spelling"], allowsUndefined: false },
  autocomplete: { tokens: ["none", "inline", "list", "both"], allowsUndefined: false },
  orientation: { tokens: ["horizontal", "vertical"], allowsUndefined: false },
  sort: { tokens: ["none", "ascending", "descending", "other"], allowsUndefined: false },
};

/** Tristate values are undefined, false or true */
export const TRISTATE_NAMES: Readonly<Record<number, string>> = {
  [ACCESSIBLE_VALUE_UNDEFINED]: "undefined",
  [AccessibleTristate.False]: "false",
  [AccessibleTristate.True]: "true",
};

export function isTokenInFamily(family: TokenFamily, value: number): boolean {
  const def = TOKEN_FAMILIES[family];
  if (value === ACCESSIBLE_VALUE_UNDEFINED) return def.allowsUndefined;
  return Number.isInteger(value) && value >= 0 && value < def.tokens.length;
}

export function tokenName(family: TokenFamily, value: number): string {
  if (value === ACCESSIBLE_VALUE_UNDEFINED) return "undefined";
  return TOKEN_FAMILIES[family].tokens[value] ?? "undefined";
}
