/**
 * Type expression model (TypeExpr and its variants)
 *
 * All values are immutable plain objects discriminated by `kind`. The same
 * shape is used on the wire (see codec/).
 */

import type { OneOrMore, TwoOrMore } from "../sequence/sequences.js";

export type TypeExpr =
  | NominalTypeExpr
  | NestedTypeExpr
  | TupleTypeExpr
  | FunctionTypeExpr
  | OptionalTypeExpr
  | ImplicitlyUnwrappedOptionalTypeExpr
  | NullabilityUnspecifiedTypeExpr;

/**
 * A plain type name (`Int`) or a generic type (`Array<Int>`)
 */
export type NominalForm =
  | { readonly kind: "typeName"; readonly name: string }
  | {
      readonly kind: "generic";
      readonly name: string;
      readonly arguments: OneOrMore<TypeExpr>;
    };

export type NominalTypeExpr = {
  readonly kind: "nominal";
  readonly nominal: NominalForm;
};

/**
 * Member type path, e.g. `Outer.Inner<T>`
 */
export type NestedTypeExpr = {
  readonly kind: "nested";
  readonly components: TwoOrMore<NominalForm>;
};

/**
 * Tuple type. The empty tuple is `Void`; a non-empty tuple has at least two
 * elements.
 */
export type TupleTypeExpr = {
  readonly kind: "tuple";
  readonly elements: readonly [] | TwoOrMore<TypeExpr>;
};

export type CallingConvention = "block" | "c";

export type FunctionAttribute =
  | { readonly kind: "autoclosure" }
  | { readonly kind: "escaping" }
  | { readonly kind: "convention"; readonly convention: CallingConvention };

/**
 * Function (closure) type.
 *
 * `attributes` is a set: builders keep it deduplicated and sorted by rendered
 * text, and equality ignores its order.
 */
export type FunctionTypeExpr = {
  readonly kind: "function";
  readonly returnType: TypeExpr;
  readonly parameters: readonly TypeExpr[];
  readonly attributes: readonly FunctionAttribute[];
};

export type OptionalTypeExpr = {
  readonly kind: "optional";
  readonly inner: TypeExpr;
};

export type ImplicitlyUnwrappedOptionalTypeExpr = {
  readonly kind: "implicitlyUnwrappedOptional";
  readonly inner: TypeExpr;
};

/**
 * Nullability not annotated in the declaring source. Renders like an
 * implicitly unwrapped optional but is a distinct variant.
 */
export type NullabilityUnspecifiedTypeExpr = {
  readonly kind: "nullabilityUnspecified";
  readonly inner: TypeExpr;
};

export type WrapperTypeExpr =
  | OptionalTypeExpr
  | ImplicitlyUnwrappedOptionalTypeExpr
  | NullabilityUnspecifiedTypeExpr;

export type WrapperKind = WrapperTypeExpr["kind"];
