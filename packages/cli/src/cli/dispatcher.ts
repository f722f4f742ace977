/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import { type Result, formatDiagnostic } from "@typemerge/core";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { mergeCommand } from "../commands/merge.js";
import { expandCommand } from "../commands/expand.js";
import { renderCommand } from "../commands/render.js";
import { demoCommand } from "../commands/demo.js";
import {
  type CommandError,
  type ResolvedConfig,
  type TypemergeConfig,
  isOutputFormat,
} from "../types.js";
import { COMMANDS_WITH_DOCUMENT, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

type CommandResult = Result<readonly string[], CommandError>;

/**
 * Print command output on stdout and diagnostics on stderr
 */
const report = (result: CommandResult): number => {
  if (!result.ok) {
    for (const diagnostic of result.error.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
    return result.error.exitCode;
  }
  for (const line of result.value) {
    console.log(line);
  }
  return 0;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`typemerge v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  const format = parsed.options.format ?? "text";
  if (!isOutputFormat(format)) {
    console.error(`Error: Unknown output format '${format}'`);
    console.error("Expected 'text' or 'json'");
    return 2;
  }

  if (parsed.options.aliases?.includes("")) {
    console.error("Error: Missing value for --aliases");
    console.error("Usage: --aliases <file>");
    return 2;
  }

  // Demo needs no config
  if (parsed.command === "demo") {
    return report(demoCommand(format));
  }

  if (!COMMANDS_WITH_DOCUMENT.includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'typemerge --help' for usage information");
    return 2;
  }

  if (!parsed.documentFile) {
    console.error("Error: Document path required");
    console.error(`Usage: typemerge ${parsed.command} <document.json>`);
    return 2;
  }

  // Load config (optional unless given explicitly)
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let config: TypemergeConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(formatDiagnostic(configResult.error));
      return 1;
    }
    config = configResult.value;
  }

  const resolved = resolveConfig(
    config,
    parsed.options,
    configPath ?? undefined,
    cwd
  );
  if (!resolved.ok) {
    for (const diagnostic of resolved.error.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
    return 1;
  }

  if (resolved.value.verbose) {
    console.error(
      configPath ? `Using config: ${configPath}` : "No config file found"
    );
  }

  const documentPath = resolve(cwd, parsed.documentFile);
  return report(
    dispatchDocumentCommand(parsed.command, documentPath, resolved.value)
  );
};

const dispatchDocumentCommand = (
  command: string,
  documentPath: string,
  config: ResolvedConfig
): CommandResult => {
  switch (command) {
    case "merge":
      return mergeCommand(documentPath, config);
    case "expand":
      return expandCommand(documentPath, config);
    default:
      return renderCommand(documentPath, config);
  }
};
