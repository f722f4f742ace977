/**
 * Signature merging
 *
 * Reconciles two type expressions that describe the same declaration (for
 * example the same method seen in two different source artifacts) into the
 * type that should replace the second one.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { type Result, ok } from "../types/result.js";
import type { TypeExpr } from "../type-expr/types.js";
import { functionType, unionAttributes } from "../type-expr/builders.js";
import {
  asNonnullDeep,
  deepUnwrap,
  isNullabilityUnspecified,
  withSameOptionalityAs,
} from "../type-expr/type-ops.js";
import { typeExprsEqual } from "../type-expr/type-keys.js";
import { emptyAliasTable } from "../alias/alias-table.js";
import { TypeAliasExpander } from "../alias/alias-expander.js";

/**
 * Merge `type2` towards `type1` and return the replacement for `type2`.
 *
 * 1. Function types with the same parameter count are merged component-wise
 *    (return type and each parameter), their attribute sets are unioned, and
 *    the result keeps the optionality of `type2`.
 * 2. When `type2` has unspecified nullability but `type1` does not, and both
 *    agree once unspecified markers are stripped, `type1`'s optionality is
 *    adopted.
 * 3. When the result equals the alias-expanded `type1`, `type1` itself is
 *    returned so the aliased spelling is kept.
 *
 * Only a cycle in the alias table can make this fail. Inputs nested
 * thousands of levels deep exhaust the call stack and throw a RangeError
 * instead.
 */
export const mergeTypeSignatures = (
  type1: TypeExpr,
  type2: TypeExpr,
  expander: TypeAliasExpander = new TypeAliasExpander(emptyAliasTable)
): Result<TypeExpr, Diagnostic> => {
  const type1Expanded = expander.expand(type1);
  if (!type1Expanded.ok) {
    return type1Expanded;
  }
  let type2Expanded = expander.expand(type2);
  if (!type2Expanded.ok) {
    return type2Expanded;
  }

  let merged = type2;

  const fn1 = deepUnwrap(type1Expanded.value);
  const fn2 = deepUnwrap(type2Expanded.value);
  if (
    fn1.kind === "function" &&
    fn2.kind === "function" &&
    fn1.parameters.length === fn2.parameters.length
  ) {
    const returnType = mergeTypeSignatures(
      fn1.returnType,
      fn2.returnType,
      expander
    );
    if (!returnType.ok) {
      return returnType;
    }

    const parameters: TypeExpr[] = [];
    for (const [index, left] of fn1.parameters.entries()) {
      const right = fn2.parameters[index];
      if (right === undefined) {
        continue;
      }
      const parameter = mergeTypeSignatures(left, right, expander);
      if (!parameter.ok) {
        return parameter;
      }
      parameters.push(parameter.value);
    }

    merged = withSameOptionalityAs(
      functionType(
        returnType.value,
        parameters,
        unionAttributes(fn2.attributes, fn1.attributes)
      ),
      merged
    );

    type2Expanded = expander.expand(merged);
    if (!type2Expanded.ok) {
      return type2Expanded;
    }
  }

  if (!isNullabilityUnspecified(type1) && isNullabilityUnspecified(merged)) {
    const type1NonnullDeep = asNonnullDeep(
      deepUnwrap(type1Expanded.value),
      true
    );
    const type2NonnullDeep = asNonnullDeep(
      deepUnwrap(type2Expanded.value),
      true
    );

    if (typeExprsEqual(type1NonnullDeep, type2NonnullDeep)) {
      merged = withSameOptionalityAs(type2NonnullDeep, type1);
    }
  }

  // Prefer the aliased spelling when both sides denote the same type
  if (typeExprsEqual(merged, type1Expanded.value)) {
    return ok(type1);
  }

  return ok(merged);
};

export type SignaturePair = {
  readonly left: TypeExpr;
  readonly right: TypeExpr;
};

/**
 * Merges signatures against one alias expander
 */
export class SignatureMerger {
  constructor(private readonly expander: TypeAliasExpander) {}

  merge(type1: TypeExpr, type2: TypeExpr): Result<TypeExpr, Diagnostic> {
    return mergeTypeSignatures(type1, type2, this.expander);
  }

  /**
   * Merge each pair in order. Stops at the first failure.
   */
  mergeAll(
    pairs: readonly SignaturePair[]
  ): Result<readonly TypeExpr[], Diagnostic> {
    const merged: TypeExpr[] = [];
    for (const pair of pairs) {
      const result = this.merge(pair.left, pair.right);
      if (!result.ok) {
        return result;
      }
      merged.push(result.value);
    }
    return ok(merged);
  }
}
