/**
 * Canonical text rendering of type expressions
 *
 * Used for diagnostics and reports:
 * - `Int`, `Dictionary<String, Int>`, `Outer.Inner`
 * - `@escaping (Int, String) -> Void`
 * - `Void`, `(Int, String)`
 * - `Int?` for optionals, `Int!` for both implicitly unwrapped and
 *   nullability-unspecified types
 */

import { normalizeAttributes, renderFunctionAttribute } from "./builders.js";
import { tupleElements } from "./type-ops.js";
import type { NominalForm, TypeExpr } from "./types.js";

export const renderNominal = (nominal: NominalForm): string => {
  switch (nominal.kind) {
    case "typeName":
      return nominal.name;

    case "generic":
      return `${nominal.name}<${nominal.arguments.map(renderTypeExpr).join(", ")}>`;
  }
};

export const renderTypeExpr = (type: TypeExpr): string => {
  switch (type.kind) {
    case "nominal":
      return renderNominal(type.nominal);

    case "nested":
      return type.components.map(renderNominal).join(".");

    case "function": {
      const attributes = normalizeAttributes(type.attributes)
        .map(renderFunctionAttribute)
        .join(" ");
      const signature = `(${type.parameters.map(renderTypeExpr).join(", ")}) -> ${renderTypeExpr(type.returnType)}`;
      return attributes ? `${attributes} ${signature}` : signature;
    }

    case "tuple":
      return tupleElements(type).length === 0
        ? "Void"
        : `(${tupleElements(type).map(renderTypeExpr).join(", ")})`;

    case "optional":
      return `${renderTypeExpr(type.inner)}?`;

    case "implicitlyUnwrappedOptional":
    case "nullabilityUnspecified":
      return `${renderTypeExpr(type.inner)}!`;
  }
};
