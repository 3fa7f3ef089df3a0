export * from "./kind";
export * from "./buffer";
export * from "./tokens";
export { formatGeneral } from "./format";
export { NUMBER_TOLERANCE, EMPTY_SLOT } from "./kinds";
export { VALUE_KINDS, VALUE_TAGS, kindFor, isRegisteredKind } from "./registry";
export {
  allocate,
  staticValue,
  acquire,
  release,
  equal,
  print,
  toString,
  refCount,
  isStatic,
  isFinalized,
  expectKind,
  hasKind,
} from "./container";
export * from "./basic";
export * from "./static";
