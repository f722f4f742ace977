import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type TypeAliasTable, emptyAliasTable } from "@typemerge/core";
import type { OutputFormat, ResolvedConfig } from "../types.js";

export const named = (name: string) => ({
  kind: "nominal",
  nominal: { kind: "typeName", name },
});

export const testConfig = (
  format: OutputFormat = "text",
  aliases: TypeAliasTable = emptyAliasTable
): ResolvedConfig => ({
  configPath: undefined,
  aliases,
  format,
  verbose: false,
  quiet: false,
});

/**
 * Write `document` to a temporary file and pass its path to `run`
 */
export const withDocument = (
  document: unknown,
  run: (documentPath: string) => void
): void => {
  const dir = mkdtempSync(join(tmpdir(), "typemerge-doc-"));
  try {
    const documentPath = join(dir, "document.json");
    writeFileSync(documentPath, JSON.stringify(document, null, 2), "utf-8");
    run(documentPath);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};
