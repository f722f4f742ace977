/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export * from "./document.js";
export { mergeCommand } from "./commands/merge.js";
export { expandCommand } from "./commands/expand.js";
export { renderCommand } from "./commands/render.js";
export { demoCommand } from "./commands/demo.js";
