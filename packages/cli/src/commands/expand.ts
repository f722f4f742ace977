/**
 * typemerge expand - expand type aliases in the types of a document
 */

import {
  type Result,
  TypeAliasExpander,
  TypeAliasTable,
  all,
  error,
  ok,
} from "@typemerge/core";
import { decodeTypesDocument, readDocument } from "../document.js";
import type { CommandError, ResolvedConfig } from "../types.js";
import { formatTypes } from "./output.js";

export const expandCommand = (
  documentPath: string,
  config: ResolvedConfig
): Result<readonly string[], CommandError> => {
  const document = readDocument(documentPath, decodeTypesDocument);
  if (!document.ok) {
    return document;
  }

  const aliases = TypeAliasTable.combine([
    config.aliases,
    document.value.aliases,
  ]);
  if (config.verbose) {
    console.error(
      `Expanding ${document.value.types.length} type(s) with ${aliases.size} alias(es)`
    );
  }

  const expander = new TypeAliasExpander(aliases);
  const expanded = all(
    document.value.types.map((type) => expander.expand(type))
  );
  if (!expanded.ok) {
    return error({ exitCode: 3, diagnostics: [expanded.error] });
  }

  return ok(formatTypes(expanded.value, config.format));
};
