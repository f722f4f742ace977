import { type TypeExpr, renderTypeExpr } from "@typemerge/core";
import type { OutputFormat } from "../types.js";

/**
 * Output lines for a list of types: one rendered type per line, or a single
 * JSON array of encoded types. When any type is labelled, the JSON entries
 * become `{ "name", "type" }` objects (`name` left out for unlabelled ones).
 */
export const formatTypes = (
  types: readonly TypeExpr[],
  format: OutputFormat,
  labels: readonly (string | undefined)[] = []
): readonly string[] => {
  if (format === "json") {
    const entries = labels.some((label) => label !== undefined)
      ? types.map((type, index) => {
          const name = labels[index];
          return name === undefined ? { type } : { name, type };
        })
      : types;
    return [JSON.stringify(entries, undefined, 2)];
  }
  return types.map((type, index) => {
    const label = labels[index];
    const text = renderTypeExpr(type);
    return label ? `${label}: ${text}` : text;
  });
};
