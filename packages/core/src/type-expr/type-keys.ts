import { renderFunctionAttribute } from "./builders.js";
import { tupleElements } from "./type-ops.js";
import type { FunctionAttribute, NominalForm, TypeExpr } from "./types.js";

const nominalKey = (nominal: NominalForm): string => {
  switch (nominal.kind) {
    case "typeName":
      return `name:${JSON.stringify(nominal.name)}`;
    case "generic":
      return `gen:${JSON.stringify(nominal.name)}<${nominal.arguments.map(stableTypeKey).join(",")}>`;
  }
};

const attributesKey = (attributes: readonly FunctionAttribute[]): string =>
  [...new Set(attributes.map(renderFunctionAttribute))].sort().join(" ");

/**
 * Canonical identity of a type expression.
 *
 * Two expressions have the same key exactly when they are structurally
 * equal. Attribute order and duplicates do not affect the key; the three
 * wrapper kinds are kept apart (unlike their rendered text).
 */
export const stableTypeKey = (type: TypeExpr): string => {
  switch (type.kind) {
    case "nominal":
      return nominalKey(type.nominal);

    case "nested":
      return `nested:${type.components.map(nominalKey).join(".")}`;

    case "tuple":
      return `tuple:(${tupleElements(type).map(stableTypeKey).join(",")})`;

    case "function": {
      const params = type.parameters.map(stableTypeKey).join(",");
      return `fn:[${attributesKey(type.attributes)}](${params})->${stableTypeKey(type.returnType)}`;
    }

    case "optional":
      return `opt:${stableTypeKey(type.inner)}`;

    case "implicitlyUnwrappedOptional":
      return `iuo:${stableTypeKey(type.inner)}`;

    case "nullabilityUnspecified":
      return `unspec:${stableTypeKey(type.inner)}`;
  }
};

export const typeExprsEqual = (left: TypeExpr, right: TypeExpr): boolean =>
  left === right || stableTypeKey(left) === stableTypeKey(right);
