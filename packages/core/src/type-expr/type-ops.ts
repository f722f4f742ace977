/**
 * Structural operations over type expressions
 *
 * Everything here is pure: each operation returns a new value (or the input
 * itself when nothing changes) and never mutates its arguments.
 */

import { type Result, ok } from "../types/result.js";
import { functionType, wrapperOfKind } from "./builders.js";
import type {
  NominalForm,
  TupleTypeExpr,
  TypeExpr,
  WrapperTypeExpr,
} from "./types.js";

export const isWrapperType = (type: TypeExpr): type is WrapperTypeExpr =>
  type.kind === "optional" ||
  type.kind === "implicitlyUnwrappedOptional" ||
  type.kind === "nullabilityUnspecified";

export const isNullabilityUnspecified = (type: TypeExpr): boolean =>
  type.kind === "nullabilityUnspecified";

/**
 * Remove one level of optionality. Non-wrapper types are returned as-is.
 */
export const unwrapOnce = (type: TypeExpr): TypeExpr =>
  isWrapperType(type) ? type.inner : type;

/**
 * Remove every outer level of optionality, down to the first non-wrapper type
 */
export const deepUnwrap = (type: TypeExpr): TypeExpr =>
  isWrapperType(type) ? deepUnwrap(type.inner) : type;

/**
 * Rebuild the optionality chain of `type` around `other`.
 *
 * The exact sequence of wrapper kinds is kept, e.g. `Int?!` wrapping `String`
 * gives `String?!`. When `type` has no optionality, `other` is returned.
 */
export const wrappingOther = (type: TypeExpr, other: TypeExpr): TypeExpr =>
  isWrapperType(type)
    ? wrapperOfKind(type.kind, wrappingOther(type.inner, other))
    : other;

/**
 * Returns the base (deep-unwrapped) shape of `type` wrapped in the same
 * optionality chain as `reference`
 */
export const withSameOptionalityAs = (
  type: TypeExpr,
  reference: TypeExpr
): TypeExpr => wrappingOther(reference, deepUnwrap(type));

/**
 * Fallible variant of `mapTypeExpr`. The first error aborts the traversal.
 */
export const tryMapTypeExpr = <E>(
  type: TypeExpr,
  transform: (type: TypeExpr) => Result<TypeExpr, E>
): Result<TypeExpr, E> => {
  switch (type.kind) {
    case "optional":
    case "implicitlyUnwrappedOptional":
    case "nullabilityUnspecified": {
      const inner = tryMapTypeExpr(type.inner, transform);
      return inner.ok ? ok(wrapperOfKind(type.kind, inner.value)) : inner;
    }

    case "function": {
      const returnType = tryMapTypeExpr(type.returnType, transform);
      if (!returnType.ok) {
        return returnType;
      }
      const parameters: TypeExpr[] = [];
      for (const parameter of type.parameters) {
        const mapped = tryMapTypeExpr(parameter, transform);
        if (!mapped.ok) {
          return mapped;
        }
        parameters.push(mapped.value);
      }
      return ok(functionType(returnType.value, parameters, type.attributes));
    }

    case "nominal":
    case "nested":
    case "tuple":
      return transform(type);
  }
};

/**
 * Map a type expression.
 *
 * Wrappers and function types are rebuilt around their mapped children and
 * are never handed to `transform` themselves; nominal, nested and tuple types
 * are passed to `transform` whole (their own children are left to it).
 */
export const mapTypeExpr = (
  type: TypeExpr,
  transform: (type: TypeExpr) => TypeExpr
): TypeExpr => {
  const result = tryMapTypeExpr<never>(type, (t) => ok(transform(t)));
  return result.ok ? result.value : result.error;
};

/**
 * Strip optionality from a type and from every function return and parameter
 * type nested in it.
 *
 * With `stripUnspecifiedOnly`, only a single outer `nullabilityUnspecified`
 * level is removed at each position and explicit optionals are kept.
 */
export const asNonnullDeep = (
  type: TypeExpr,
  stripUnspecifiedOnly = false
): TypeExpr => {
  const stripped = stripUnspecifiedOnly
    ? type.kind === "nullabilityUnspecified"
      ? type.inner
      : type
    : deepUnwrap(type);

  if (stripped.kind !== "function") {
    return stripped;
  }

  return functionType(
    asNonnullDeep(stripped.returnType, stripUnspecifiedOnly),
    stripped.parameters.map((p) => asNonnullDeep(p, stripUnspecifiedOnly)),
    stripped.attributes
  );
};

/**
 * Elements of a tuple as a plain list (empty for `Void`)
 */
export const tupleElements = (type: TupleTypeExpr): readonly TypeExpr[] =>
  type.elements;

export const nominalTypeName = (nominal: NominalForm): string => nominal.name;

/**
 * Outer type name of a type, looking through optionality.
 * Only nominal types have one; the name of a generic type is its base name.
 */
export const typeNameOf = (type: TypeExpr): string | undefined => {
  const base = deepUnwrap(type);
  return base.kind === "nominal" ? nominalTypeName(base.nominal) : undefined;
};
