/**
 * Type alias expansion
 *
 * Replaces every nominal type name that resolves through a TypeAliasProvider
 * with the name it ultimately stands for. Only names are substituted: the
 * surrounding structure (generic arguments, optionality, function shape) is
 * kept. Aliases whose target has no outer type name (tuples, functions,
 * nested types) leave the alias name in place.
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";
import type { NominalForm, TypeExpr } from "../type-expr/types.js";
import {
  genericType,
  nestedType,
  nominalType,
  typeName,
} from "../type-expr/builders.js";
import { isOneOrMore, isTwoOrMore } from "../sequence/sequences.js";
import { tryMapTypeExpr, typeNameOf } from "../type-expr/type-ops.js";
import type { TypeAliasProvider } from "./alias-table.js";

export class TypeAliasExpander {
  constructor(private readonly provider: TypeAliasProvider) {}

  /**
   * Expand aliases in a type expression.
   *
   * Fails with TMG2001 when the alias table is cyclic along the expanded
   * chain. There is no depth limit: alias chains or type nesting thousands
   * of levels deep exhaust the call stack and throw a RangeError instead of
   * returning an error.
   */
  expand(type: TypeExpr): Result<TypeExpr, Diagnostic> {
    // Names currently being expanded, outermost first
    const aliasesInStack: string[] = [];
    return this.expandType(type, aliasesInStack);
  }

  private expandType(
    type: TypeExpr,
    aliasesInStack: string[]
  ): Result<TypeExpr, Diagnostic> {
    return tryMapTypeExpr(type, (leaf): Result<TypeExpr, Diagnostic> => {
      switch (leaf.kind) {
        case "nominal": {
          const nominal = this.expandNominal(leaf.nominal, aliasesInStack);
          return nominal.ok ? ok(nominalType(nominal.value)) : nominal;
        }

        case "nested": {
          const components: NominalForm[] = [];
          for (const component of leaf.components) {
            const expanded = this.expandNominal(component, aliasesInStack);
            if (!expanded.ok) {
              return expanded;
            }
            components.push(expanded.value);
          }
          return ok(isTwoOrMore(components) ? nestedType(components) : leaf);
        }

        default:
          return ok(leaf);
      }
    });
  }

  private expandNominal(
    nominal: NominalForm,
    aliasesInStack: string[]
  ): Result<NominalForm, Diagnostic> {
    const name = this.expandName(nominal.name, aliasesInStack);
    if (!name.ok) {
      return name;
    }

    if (nominal.kind === "typeName") {
      return ok(typeName(name.value).nominal);
    }

    const typeArguments: TypeExpr[] = [];
    for (const argument of nominal.arguments) {
      const expanded = this.expandType(argument, aliasesInStack);
      if (!expanded.ok) {
        return expanded;
      }
      typeArguments.push(expanded.value);
    }

    return ok(
      isOneOrMore(typeArguments)
        ? genericType(name.value, typeArguments).nominal
        : typeName(name.value).nominal
    );
  }

  private expandName(
    name: string,
    aliasesInStack: string[]
  ): Result<string, Diagnostic> {
    const aliased = this.provider.resolveAlias(name);
    if (aliased === undefined) {
      return ok(name);
    }

    return this.pushingAlias(
      name,
      aliasesInStack,
      (): Result<string, Diagnostic> => {
        const target = typeNameOf(aliased);
        return target === undefined
          ? ok(name)
          : this.expandName(target, aliasesInStack);
      }
    );
  }

  private pushingAlias<T>(
    name: string,
    aliasesInStack: string[],
    work: () => Result<T, Diagnostic>
  ): Result<T, Diagnostic> {
    if (aliasesInStack.includes(name)) {
      const chain = [...aliasesInStack, name];
      return error(
        createDiagnostic(
          "TMG2001",
          "error",
          `Cycle found while expanding type aliases: ${chain.join(" -> ")}`,
          `Remove the self-referencing definition of '${name}' from the alias table`
        )
      );
    }

    aliasesInStack.push(name);
    try {
      return work();
    } finally {
      aliasesInStack.pop();
    }
  }
}
