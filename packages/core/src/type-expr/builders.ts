/**
 * Type expression builders
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";
import {
  type OneOrMore,
  type TwoOrMore,
  isOneOrMore,
  isTwoOrMore,
} from "../sequence/sequences.js";
import type {
  CallingConvention,
  FunctionAttribute,
  FunctionTypeExpr,
  ImplicitlyUnwrappedOptionalTypeExpr,
  NestedTypeExpr,
  NominalForm,
  NominalTypeExpr,
  NullabilityUnspecifiedTypeExpr,
  OptionalTypeExpr,
  TupleTypeExpr,
  TypeExpr,
  WrapperKind,
  WrapperTypeExpr,
} from "./types.js";

export const nominalType = (nominal: NominalForm): NominalTypeExpr => ({
  kind: "nominal",
  nominal,
});

export const typeName = (name: string): NominalTypeExpr =>
  nominalType({ kind: "typeName", name });

export const genericType = (
  name: string,
  typeArguments: OneOrMore<TypeExpr>
): NominalTypeExpr => ({
  kind: "nominal",
  nominal: { kind: "generic", name, arguments: typeArguments },
});

/**
 * Build a generic type from an unchecked argument list
 */
export const genericTypeOf = (
  name: string,
  typeArguments: readonly TypeExpr[]
): Result<NominalTypeExpr, Diagnostic> =>
  isOneOrMore(typeArguments)
    ? ok(genericType(name, typeArguments))
    : error(
        createDiagnostic(
          "TMG1002",
          "error",
          `Generic type '${name}' requires at least one type argument`,
          `Use a plain type name for '${name}' instead`
        )
      );

export const nestedType = (
  components: TwoOrMore<NominalForm>
): NestedTypeExpr => ({
  kind: "nested",
  components,
});

export const voidType: TupleTypeExpr = { kind: "tuple", elements: [] };

export const tupleType = (elements: TwoOrMore<TypeExpr>): TupleTypeExpr => ({
  kind: "tuple",
  elements,
});

/**
 * Build a tuple from an unchecked element list.
 * No elements gives `Void`; exactly one element is rejected.
 */
export const tupleTypeOf = (
  elements: readonly TypeExpr[]
): Result<TupleTypeExpr, Diagnostic> => {
  if (elements.length === 0) {
    return ok(voidType);
  }
  if (!isTwoOrMore(elements)) {
    return error(
      createDiagnostic(
        "TMG1003",
        "error",
        "A tuple type must have zero or at least two elements",
        "Use the element type directly instead of a one-element tuple"
      )
    );
  }
  return ok(tupleType(elements));
};

export const autoclosure: FunctionAttribute = { kind: "autoclosure" };

export const escaping: FunctionAttribute = { kind: "escaping" };

export const convention = (kind: CallingConvention): FunctionAttribute => ({
  kind: "convention",
  convention: kind,
});

export const renderFunctionAttribute = (
  attribute: FunctionAttribute
): string => {
  switch (attribute.kind) {
    case "autoclosure":
      return "@autoclosure";
    case "escaping":
      return "@escaping";
    case "convention":
      return `@convention(${attribute.convention})`;
  }
};

/**
 * Deduplicate attributes and sort them by rendered text
 */
export const normalizeAttributes = (
  attributes: Iterable<FunctionAttribute>
): readonly FunctionAttribute[] => {
  const byText = new Map<string, FunctionAttribute>();
  for (const attribute of attributes) {
    byText.set(renderFunctionAttribute(attribute), attribute);
  }
  return [...byText.keys()].sort().flatMap((text) => {
    const attribute = byText.get(text);
    return attribute ? [attribute] : [];
  });
};

export const unionAttributes = (
  left: readonly FunctionAttribute[],
  right: readonly FunctionAttribute[]
): readonly FunctionAttribute[] => normalizeAttributes([...left, ...right]);

export const functionType = (
  returnType: TypeExpr,
  parameters: readonly TypeExpr[],
  attributes: Iterable<FunctionAttribute> = []
): FunctionTypeExpr => ({
  kind: "function",
  returnType,
  parameters,
  attributes: normalizeAttributes(attributes),
});

export const optionalType = (inner: TypeExpr): OptionalTypeExpr => ({
  kind: "optional",
  inner,
});

export const implicitlyUnwrappedOptionalType = (
  inner: TypeExpr
): ImplicitlyUnwrappedOptionalTypeExpr => ({
  kind: "implicitlyUnwrappedOptional",
  inner,
});

export const nullabilityUnspecifiedType = (
  inner: TypeExpr
): NullabilityUnspecifiedTypeExpr => ({
  kind: "nullabilityUnspecified",
  inner,
});

export const wrapperOfKind = (
  kind: WrapperKind,
  inner: TypeExpr
): WrapperTypeExpr => {
  switch (kind) {
    case "optional":
      return optionalType(inner);
    case "implicitlyUnwrappedOptional":
      return implicitlyUnwrappedOptionalType(inner);
    case "nullabilityUnspecified":
      return nullabilityUnspecifiedType(inner);
  }
};
