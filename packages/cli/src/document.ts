/**
 * Signatures documents
 *
 * A document is a JSON object with an optional `aliases` table plus the
 * entries a command works on: `pairs` for merging, `types` for expansion and
 * rendering. Every invalid entry is reported, not just the first.
 */

import {
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
  type TypeExpr,
  type TypeAliasTable,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  decodeAliasTable,
  decodeTypeExpr,
  emptyAliasTable,
  error,
  mergeDiagnostics,
  ok,
} from "@typemerge/core";
import { isJsonObject, readJsonFile } from "./config.js";
import type { CommandError, NamedSignaturePair } from "./types.js";

export type MergeDocument = {
  readonly aliases: TypeAliasTable;
  readonly pairs: readonly NamedSignaturePair[];
};

export type TypesDocument = {
  readonly aliases: TypeAliasTable;
  readonly types: readonly TypeExpr[];
};

const invalidDocument = (path: string, message: string): Diagnostic =>
  createDiagnostic("TMG3002", "error", `${path}: ${message}`);

const single = (diagnostic: Diagnostic): DiagnosticsCollector =>
  addDiagnostic(createDiagnosticsCollector(), diagnostic);

/**
 * Decoding state shared by the document decoders
 */
class DocumentReader {
  private collector = createDiagnosticsCollector();

  constructor(readonly root: Readonly<Record<string, unknown>>) {}

  get diagnostics(): DiagnosticsCollector {
    return this.collector;
  }

  report(diagnostic: Diagnostic): void {
    this.collector = addDiagnostic(this.collector, diagnostic);
  }

  aliases(): TypeAliasTable {
    const value = this.root["aliases"];
    if (value === undefined) {
      return emptyAliasTable;
    }
    const table = decodeAliasTable(value, "$.aliases");
    if (!table.ok) {
      this.collector = mergeDiagnostics(this.collector, table.error);
      return emptyAliasTable;
    }
    return table.value;
  }

  list(field: string, expected: string): readonly unknown[] {
    const value = this.root[field];
    if (!Array.isArray(value)) {
      this.report(invalidDocument(`$.${field}`, `expected an array of ${expected}`));
      return [];
    }
    return value;
  }

  typeExpr(value: unknown, path: string): TypeExpr | undefined {
    const decoded = decodeTypeExpr(value, path);
    if (!decoded.ok) {
      this.report(decoded.error);
      return undefined;
    }
    return decoded.value;
  }

  finish<T>(document: T): Result<T, DiagnosticsCollector> {
    return this.collector.hasErrors ? error(this.collector) : ok(document);
  }
}

const documentReader = (
  value: unknown
): Result<DocumentReader, DiagnosticsCollector> =>
  isJsonObject(value)
    ? ok(new DocumentReader(value))
    : error(single(invalidDocument("$", "expected a JSON object")));

const decodePair = (
  reader: DocumentReader,
  value: unknown,
  path: string
): NamedSignaturePair | undefined => {
  if (!isJsonObject(value)) {
    reader.report(
      invalidDocument(path, 'expected an object with "left" and "right"')
    );
    return undefined;
  }

  const name = value["name"];
  if (name !== undefined && typeof name !== "string") {
    reader.report(invalidDocument(`${path}.name`, "expected a string"));
  }
  const left = reader.typeExpr(value["left"], `${path}.left`);
  const right = reader.typeExpr(value["right"], `${path}.right`);
  if (!left || !right) {
    return undefined;
  }

  return typeof name === "string" ? { name, left, right } : { left, right };
};

export const decodeMergeDocument = (
  value: unknown
): Result<MergeDocument, DiagnosticsCollector> => {
  const reader = documentReader(value);
  if (!reader.ok) {
    return reader;
  }

  const aliases = reader.value.aliases();
  const pairs: NamedSignaturePair[] = [];
  for (const [index, item] of reader.value
    .list("pairs", "signature pairs")
    .entries()) {
    const pair = decodePair(reader.value, item, `$.pairs[${index}]`);
    if (pair) {
      pairs.push(pair);
    }
  }

  return reader.value.finish({ aliases, pairs });
};

export const decodeTypesDocument = (
  value: unknown
): Result<TypesDocument, DiagnosticsCollector> => {
  const reader = documentReader(value);
  if (!reader.ok) {
    return reader;
  }

  const aliases = reader.value.aliases();
  const types: TypeExpr[] = [];
  for (const [index, item] of reader.value
    .list("types", "type expressions")
    .entries()) {
    const type = reader.value.typeExpr(item, `$.types[${index}]`);
    if (type) {
      types.push(type);
    }
  }

  return reader.value.finish({ aliases, types });
};

/**
 * Read a document file and decode it. Failures map to exit code 1.
 */
export const readDocument = <T>(
  documentPath: string,
  decode: (value: unknown) => Result<T, DiagnosticsCollector>
): Result<T, CommandError> => {
  const parsed = readJsonFile(documentPath);
  if (!parsed.ok) {
    return error({ exitCode: 1, diagnostics: [parsed.error] });
  }

  const decoded = decode(parsed.value);
  return decoded.ok
    ? decoded
    : error({ exitCode: 1, diagnostics: decoded.error.diagnostics });
};
