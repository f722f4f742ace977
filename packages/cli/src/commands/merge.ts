/**
 * typemerge merge - merge the signature pairs of a document
 */

import {
  type Result,
  SignatureMerger,
  TypeAliasExpander,
  TypeAliasTable,
  error,
  ok,
} from "@typemerge/core";
import { decodeMergeDocument, readDocument } from "../document.js";
import type { CommandError, ResolvedConfig } from "../types.js";
import { formatTypes } from "./output.js";

/**
 * Merge each `{ name?, left, right }` pair. The result of a pair replaces
 * its `right` side. Document aliases extend the configured ones.
 */
export const mergeCommand = (
  documentPath: string,
  config: ResolvedConfig
): Result<readonly string[], CommandError> => {
  const document = readDocument(documentPath, decodeMergeDocument);
  if (!document.ok) {
    return document;
  }

  const { pairs } = document.value;
  const aliases = TypeAliasTable.combine([
    config.aliases,
    document.value.aliases,
  ]);

  if (config.verbose) {
    console.error(
      `Merging ${pairs.length} signature pair(s) with ${aliases.size} alias(es)`
    );
  }

  const merger = new SignatureMerger(new TypeAliasExpander(aliases));
  const merged = merger.mergeAll(pairs);
  if (!merged.ok) {
    return error({ exitCode: 3, diagnostics: [merged.error] });
  }

  return ok(
    formatTypes(
      merged.value,
      config.format,
      pairs.map((pair) => pair.name)
    )
  );
};
