/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse merge command", () => {
        const result = parseArgs(["merge"]);
        expect(result.command).to.equal("merge");
      });

      it("should parse demo command", () => {
        const result = parseArgs(["demo"]);
        expect(result.command).to.equal("demo");
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after other arguments", () => {
        const result = parseArgs(["merge", "doc.json", "-h"]);
        expect(result.command).to.equal("help");
        expect(result.options).to.deep.equal({});
      });

      it("should parse version command from --version", () => {
        const result = parseArgs(["--version"]);
        expect(result.command).to.equal("version");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should leave the command empty without arguments", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
      });
    });

    describe("Document File", () => {
      it("should parse document file after command", () => {
        const result = parseArgs(["expand", "types.json"]);
        expect(result.command).to.equal("expand");
        expect(result.documentFile).to.equal("types.json");
      });

      it("should parse document file after options", () => {
        const result = parseArgs(["merge", "--verbose", "docs/pairs.json"]);
        expect(result.documentFile).to.equal("docs/pairs.json");
        expect(result.options.verbose).to.be.true;
      });

      it("should handle no document file", () => {
        const result = parseArgs(["render"]);
        expect(result.documentFile).to.be.undefined;
      });
    });

    describe("Options", () => {
      it("should parse --verbose option", () => {
        const result = parseArgs(["merge", "--verbose"]);
        expect(result.options.verbose).to.be.true;
      });

      it("should parse -V short option for verbose", () => {
        const result = parseArgs(["merge", "-V"]);
        expect(result.options.verbose).to.be.true;
      });

      it("should parse --quiet option", () => {
        const result = parseArgs(["merge", "--quiet"]);
        expect(result.options.quiet).to.be.true;
      });

      it("should parse -q short option for quiet", () => {
        const result = parseArgs(["merge", "-q"]);
        expect(result.options.quiet).to.be.true;
      });

      it("should parse --config option with value", () => {
        const result = parseArgs(["merge", "--config", "custom.json"]);
        expect(result.options.config).to.equal("custom.json");
        expect(result.documentFile).to.be.undefined;
      });

      it("should parse -c short option for config", () => {
        const result = parseArgs(["merge", "-c", "custom.json"]);
        expect(result.options.config).to.equal("custom.json");
      });

      it("should collect repeated --aliases options in order", () => {
        const result = parseArgs([
          "expand",
          "types.json",
          "--aliases",
          "a.json",
          "-a",
          "b.json",
        ]);
        expect(result.options.aliases).to.deep.equal(["a.json", "b.json"]);
      });

      it("should record --aliases without a value as an empty path", () => {
        const result = parseArgs(["expand", "types.json", "--aliases"]);
        expect(result.options.aliases).to.deep.equal([""]);
      });

      it("should parse --format option with value", () => {
        const result = parseArgs(["merge", "pairs.json", "--format", "json"]);
        expect(result.options.format).to.equal("json");
      });

      it("should parse -f short option for format", () => {
        const result = parseArgs(["merge", "-f", "text"]);
        expect(result.options.format).to.equal("text");
      });
    });

    describe("Complex scenarios", () => {
      it("should parse a command with document and several options", () => {
        const result = parseArgs([
          "merge",
          "pairs.json",
          "-c",
          "conf/typemerge.json",
          "-a",
          "extra.json",
          "--format",
          "json",
          "--quiet",
        ]);
        expect(result).to.deep.equal({
          command: "merge",
          documentFile: "pairs.json",
          options: {
            config: "conf/typemerge.json",
            aliases: ["extra.json"],
            format: "json",
            quiet: true,
          },
        });
      });
    });
  });
});
