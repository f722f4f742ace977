/**
 * typemerge render - print the canonical text of the types of a document
 */

import { type Result, ok, renderTypeExpr } from "@typemerge/core";
import { decodeTypesDocument, readDocument } from "../document.js";
import type { CommandError, ResolvedConfig } from "../types.js";

export const renderCommand = (
  documentPath: string,
  config: ResolvedConfig
): Result<readonly string[], CommandError> => {
  const document = readDocument(documentPath, decodeTypesDocument);
  if (!document.ok) {
    return document;
  }

  const rendered = document.value.types.map(renderTypeExpr);
  return ok(
    config.format === "json"
      ? [JSON.stringify(rendered, undefined, 2)]
      : rendered
  );
};
