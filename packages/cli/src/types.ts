/**
 * Type definitions for CLI
 */

import type { Diagnostic, TypeAliasTable, TypeExpr } from "@typemerge/core";

export type OutputFormat = "text" | "json";

export const isOutputFormat = (value: string): value is OutputFormat =>
  value === "text" || value === "json";

/**
 * Configuration file (typemerge.json)
 *
 * `aliases` stays undecoded here; it is decoded into an alias table when the
 * configuration is resolved.
 */
export type TypemergeConfig = {
  readonly $schema?: string;
  readonly aliases?: Readonly<Record<string, unknown>>;
  readonly aliasFiles?: readonly string[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  aliases?: string[]; // Extra alias table files, relative to the working directory
  format?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly configPath: string | undefined;
  readonly aliases: TypeAliasTable;
  readonly format: OutputFormat;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * A merge request from a signatures document
 */
export type NamedSignaturePair = {
  readonly name?: string;
  readonly left: TypeExpr;
  readonly right: TypeExpr;
};

/**
 * Failure of a command: the diagnostics to report and the process exit code
 */
export type CommandError = {
  readonly exitCode: number;
  readonly diagnostics: readonly Diagnostic[];
};
