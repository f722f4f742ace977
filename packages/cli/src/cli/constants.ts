/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export const VERSION = packageJson.version;

export const COMMANDS_WITH_DOCUMENT: readonly string[] = [
  "merge",
  "expand",
  "render",
];
