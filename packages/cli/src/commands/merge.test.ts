import { describe, it } from "mocha";
import { expect } from "chai";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  TypeAliasTable,
  escaping,
  functionType,
  typeName,
  voidType,
} from "@typemerge/core";
import { mergeCommand } from "./merge.js";
import { named, testConfig, withDocument } from "./test-helpers.js";

const voidFunction = (attributes: readonly object[] = []) => ({
  kind: "function",
  returnType: { kind: "tuple", elements: [] },
  parameters: [],
  attributes,
});

describe("Merge Command", () => {
  it("should print one merged type per pair", () => {
    const document = {
      aliases: { MyInt: named("Int") },
      pairs: [
        { name: "count", left: named("MyInt"), right: named("Int") },
        { left: voidFunction([{ kind: "escaping" }]), right: voidFunction() },
      ],
    };

    withDocument(document, (documentPath) => {
      const result = mergeCommand(documentPath, testConfig());
      expect(result).to.deep.equal({
        ok: true,
        value: ["count: MyInt", "@escaping () -> Void"],
      });
    });
  });

  it("should print named entries with the json format", () => {
    const document = {
      aliases: { MyInt: named("Int") },
      pairs: [
        { name: "count", left: named("MyInt"), right: named("Int") },
        { left: voidFunction([{ kind: "escaping" }]), right: voidFunction() },
      ],
    };

    withDocument(document, (documentPath) => {
      const result = mergeCommand(documentPath, testConfig("json"));
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value).to.have.length(1);
      expect(JSON.parse(result.value[0] ?? "")).to.deep.equal([
        { name: "count", type: typeName("MyInt") },
        { type: functionType(voidType, [], [escaping]) },
      ]);
    });
  });

  it("should print a plain JSON array when no pair is named", () => {
    withDocument(
      { pairs: [{ left: named("Int"), right: named("String") }] },
      (documentPath) => {
        const result = mergeCommand(documentPath, testConfig("json"));
        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(JSON.parse(result.value[0] ?? "")).to.deep.equal([
          typeName("String"),
        ]);
      }
    );
  });

  it("should use configured aliases", () => {
    const config = testConfig(
      "text",
      TypeAliasTable.fromRecord({ Handle: typeName("Int") })
    );

    withDocument(
      { pairs: [{ left: named("Handle"), right: named("Int") }] },
      (documentPath) => {
        expect(mergeCommand(documentPath, config)).to.deep.equal({
          ok: true,
          value: ["Handle"],
        });
      }
    );
  });

  it("should let document aliases override configured ones", () => {
    const config = testConfig(
      "text",
      TypeAliasTable.fromRecord({ Handle: typeName("Int") })
    );

    withDocument(
      {
        aliases: { Handle: named("String") },
        pairs: [{ left: named("Handle"), right: named("Int") }],
      },
      (documentPath) => {
        expect(mergeCommand(documentPath, config)).to.deep.equal({
          ok: true,
          value: ["Int"],
        });
      }
    );
  });

  it("should fail with exit code 3 on an alias cycle", () => {
    withDocument(
      {
        aliases: { A: named("B"), B: named("A") },
        pairs: [{ left: named("A"), right: named("Int") }],
      },
      (documentPath) => {
        const result = mergeCommand(documentPath, testConfig());
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error.exitCode).to.equal(3);
        expect(result.error.diagnostics.map((d) => d.message)).to.deep.equal([
          "Cycle found while expanding type aliases: A -> B -> A",
        ]);
      }
    );
  });

  it("should fail with exit code 1 on an invalid document", () => {
    withDocument({ pairs: [{ left: named("A") }] }, (documentPath) => {
      const result = mergeCommand(documentPath, testConfig());
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.exitCode).to.equal(1);
      expect(result.error.diagnostics.map((d) => d.message)).to.deep.equal([
        "$.pairs[0].right: expected an object, got undefined",
      ]);
    });
  });

  it("should fail with exit code 1 when the document cannot be read", () => {
    const documentPath = join(tmpdir(), "typemerge-missing", "pairs.json");
    const result = mergeCommand(documentPath, testConfig());
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.exitCode).to.equal(1);
    expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "TMG9002",
    ]);
  });
});
