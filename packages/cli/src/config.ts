/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
  TypeAliasTable,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  decodeAliasTable,
  error,
  flatMap,
  mapError,
  mergeDiagnostics,
  ok,
} from "@typemerge/core";
import {
  type CliOptions,
  type ResolvedConfig,
  type TypemergeConfig,
  isOutputFormat,
} from "./types.js";

export const CONFIG_FILE_NAME = "typemerge.json";

type JsonObject = Readonly<Record<string, unknown>>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Read and parse a JSON file
 */
export const readJsonFile = (filePath: string): Result<unknown, Diagnostic> => {
  try {
    const content = readFileSync(filePath, "utf-8");
    const value: unknown = JSON.parse(content);
    return ok(value);
  } catch (err) {
    return error(
      createDiagnostic(
        "TMG9002",
        "error",
        `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }
};

const invalidConfig = (
  configPath: string,
  message: string
): Result<TypemergeConfig, Diagnostic> =>
  error(createDiagnostic("TMG9003", "error", `${configPath}: ${message}`));

/**
 * Validate the parsed contents of typemerge.json
 */
export const validateConfig = (
  value: unknown,
  configPath: string
): Result<TypemergeConfig, Diagnostic> => {
  if (!isJsonObject(value)) {
    return invalidConfig(configPath, "expected a JSON object");
  }

  let schema: string | undefined;
  const rawSchema = value["$schema"];
  if (typeof rawSchema === "string") {
    schema = rawSchema;
  } else if (rawSchema !== undefined) {
    return invalidConfig(configPath, "'$schema' must be a string");
  }

  let aliases: JsonObject | undefined;
  const rawAliases = value["aliases"];
  if (isJsonObject(rawAliases)) {
    aliases = rawAliases;
  } else if (rawAliases !== undefined) {
    return invalidConfig(
      configPath,
      "'aliases' must be an object of alias definitions"
    );
  }

  let aliasFiles: readonly string[] | undefined;
  const rawAliasFiles = value["aliasFiles"];
  if (isStringArray(rawAliasFiles)) {
    aliasFiles = rawAliasFiles;
  } else if (rawAliasFiles !== undefined) {
    return invalidConfig(configPath, "'aliasFiles' must be an array of paths");
  }

  return ok({ $schema: schema, aliases, aliasFiles });
};

/**
 * Load typemerge.json
 */
export const loadConfig = (
  configPath: string
): Result<TypemergeConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "TMG9001",
        "error",
        `Config file not found: ${configPath}`,
        `Create ${CONFIG_FILE_NAME} or drop the --config option`
      )
    );
  }

  return flatMap(readJsonFile(configPath), (value) =>
    validateConfig(value, configPath)
  );
};

/**
 * Find typemerge.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Prefix every diagnostic message with the file it came from
 */
const inFile = (
  collector: DiagnosticsCollector,
  filePath: string
): DiagnosticsCollector =>
  collector.diagnostics.reduce(
    (result, diagnostic) =>
      addDiagnostic(result, {
        ...diagnostic,
        message: `${filePath}: ${diagnostic.message}`,
      }),
    createDiagnosticsCollector()
  );

/**
 * Load an alias table file (an object of alias name to encoded type)
 */
export const loadAliasFile = (
  filePath: string
): Result<TypeAliasTable, DiagnosticsCollector> => {
  const parsed = readJsonFile(filePath);
  if (!parsed.ok) {
    return error(addDiagnostic(createDiagnosticsCollector(), parsed.error));
  }

  return mapError(decodeAliasTable(parsed.value), (collector) =>
    inFile(collector, filePath)
  );
};

/**
 * Resolve final configuration from file + CLI args.
 *
 * Alias tables are combined in order: inline `aliases`, then `aliasFiles`
 * (relative to the config file), then `--aliases` files (relative to `cwd`).
 * Later definitions win. Every invalid table is reported.
 */
export const resolveConfig = (
  config: TypemergeConfig,
  cliOptions: CliOptions,
  configPath: string | undefined,
  cwd: string
): Result<ResolvedConfig, DiagnosticsCollector> => {
  const configDir = configPath ? dirname(configPath) : cwd;
  let collector = createDiagnosticsCollector();
  const tables: TypeAliasTable[] = [];

  if (config.aliases) {
    const inline = decodeAliasTable(config.aliases, "$.aliases");
    if (inline.ok) {
      tables.push(inline.value);
    } else {
      collector = mergeDiagnostics(
        collector,
        inFile(inline.error, configPath ?? CONFIG_FILE_NAME)
      );
    }
  }

  const aliasFiles = [
    ...(config.aliasFiles ?? []).map((file) => resolve(configDir, file)),
    ...(cliOptions.aliases ?? []).map((file) => resolve(cwd, file)),
  ];
  for (const aliasFile of aliasFiles) {
    const table = loadAliasFile(aliasFile);
    if (table.ok) {
      tables.push(table.value);
    } else {
      collector = mergeDiagnostics(collector, table.error);
    }
  }

  if (collector.hasErrors) {
    return error(collector);
  }

  const quiet = cliOptions.quiet ?? false;
  const format = cliOptions.format;

  const resolved: ResolvedConfig = {
    configPath,
    aliases: TypeAliasTable.combine(tables),
    format: format !== undefined && isOutputFormat(format) ? format : "text",
    verbose: (cliOptions.verbose ?? false) && !quiet,
    quiet,
  };
  return ok(resolved);
};
