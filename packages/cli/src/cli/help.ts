/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
typemerge - type expression expansion and signature merging v${VERSION}

USAGE:
  typemerge <command> [document] [options]

COMMANDS:
  merge <document>          Merge the signature pairs of a document
  expand <document>         Expand type aliases in the types of a document
  render <document>         Print the canonical text of the types of a document
  demo                      Merge a sample closure with its unspecified twin

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Print results only
  -c, --config <file>       Config file path (default: typemerge.json)
  -a, --aliases <file>      Additional alias table file (repeatable)
  -f, --format <format>     Output format: text or json (default: text)

DOCUMENTS:
  A document is a JSON object with an optional "aliases" table and
  "pairs" ({ "name", "left", "right" }) for merge, or "types" for
  expand and render. Types are encoded as objects discriminated by "kind".
  With --format json, merge prints { "name", "type" } entries when any
  pair is named, and otherwise a plain array in document order.

EXIT CODES:
  0  Success
  1  Invalid config, alias table or document
  2  Unknown command or missing argument
  3  Alias cycle during expansion or merge

EXAMPLES:
  typemerge demo
  typemerge merge signatures.json
  typemerge expand types.json --aliases aliases/foundation.json
  typemerge merge signatures.json --format json
`);
};
