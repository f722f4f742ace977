/**
 * Type expression barrel exports
 */

export type {
  TypeExpr,
  NominalForm,
  NominalTypeExpr,
  NestedTypeExpr,
  TupleTypeExpr,
  FunctionTypeExpr,
  FunctionAttribute,
  CallingConvention,
  OptionalTypeExpr,
  ImplicitlyUnwrappedOptionalTypeExpr,
  NullabilityUnspecifiedTypeExpr,
  WrapperTypeExpr,
  WrapperKind,
} from "./types.js";

export {
  nominalType,
  typeName,
  genericType,
  genericTypeOf,
  nestedType,
  voidType,
  tupleType,
  tupleTypeOf,
  functionType,
  optionalType,
  implicitlyUnwrappedOptionalType,
  nullabilityUnspecifiedType,
  wrapperOfKind,
  autoclosure,
  escaping,
  convention,
  renderFunctionAttribute,
  normalizeAttributes,
  unionAttributes,
} from "./builders.js";

export {
  isWrapperType,
  isNullabilityUnspecified,
  unwrapOnce,
  deepUnwrap,
  wrappingOther,
  withSameOptionalityAs,
  tryMapTypeExpr,
  mapTypeExpr,
  asNonnullDeep,
  tupleElements,
  nominalTypeName,
  typeNameOf,
} from "./type-ops.js";

export { stableTypeKey, typeExprsEqual } from "./type-keys.js";
export { renderNominal, renderTypeExpr } from "./render.js";
