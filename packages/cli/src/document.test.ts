import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type DiagnosticsCollector,
  type Result,
  escaping,
  functionType,
  typeName,
  voidType,
} from "@typemerge/core";
import { decodeMergeDocument, decodeTypesDocument } from "./document.js";

const named = (name: string) => ({
  kind: "nominal",
  nominal: { kind: "typeName", name },
});

const messagesOf = <T>(
  result: Result<T, DiagnosticsCollector>
): readonly string[] =>
  result.ok ? [] : result.error.diagnostics.map((d) => d.message);

describe("Signatures documents", () => {
  describe("decodeMergeDocument", () => {
    it("should decode named and unnamed pairs", () => {
      const result = decodeMergeDocument({
        aliases: { MyInt: named("Int") },
        pairs: [
          { name: "count", left: named("MyInt"), right: named("Int") },
          {
            left: {
              kind: "function",
              returnType: { kind: "tuple", elements: [] },
              parameters: [],
              attributes: [{ kind: "escaping" }],
            },
            right: {
              kind: "function",
              returnType: { kind: "tuple", elements: [] },
              parameters: [],
            },
          },
        ],
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.aliases.names()).to.deep.equal(["MyInt"]);
      expect(result.value.pairs).to.deep.equal([
        { name: "count", left: typeName("MyInt"), right: typeName("Int") },
        {
          left: functionType(voidType, [], [escaping]),
          right: functionType(voidType, []),
        },
      ]);
    });

    it("should reject a document that is not an object", () => {
      const result = decodeMergeDocument("pairs");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics).to.deep.equal([
        {
          code: "TMG3002",
          severity: "error",
          message: "$: expected a JSON object",
          hint: undefined,
        },
      ]);
    });

    it("should require a pairs array", () => {
      expect(messagesOf(decodeMergeDocument({}))).to.deep.equal([
        "$.pairs: expected an array of signature pairs",
      ]);
    });

    it("should report every invalid pair", () => {
      const result = decodeMergeDocument({
        aliases: { Loop: 7 },
        pairs: [
          { name: 1, left: named("A"), right: named("B") },
          "pair",
          { left: named("A"), right: { kind: "tuple", elements: [named("A")] } },
        ],
      });

      expect(messagesOf(result)).to.deep.equal([
        '$.aliases["Loop"]: expected an object, got number',
        "$.pairs[0].name: expected a string",
        '$.pairs[1]: expected an object with "left" and "right"',
        "$.pairs[2].right.elements: a tuple must have zero or at least two elements",
      ]);
    });
  });

  describe("decodeTypesDocument", () => {
    it("should decode types without aliases", () => {
      const result = decodeTypesDocument({ types: [named("Int")] });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.aliases.size).to.equal(0);
      expect(result.value.types).to.deep.equal([typeName("Int")]);
    });

    it("should require a types array", () => {
      expect(messagesOf(decodeTypesDocument({ types: {} }))).to.deep.equal([
        "$.types: expected an array of type expressions",
      ]);
    });

    it("should report the index of an invalid type", () => {
      expect(
        messagesOf(decodeTypesDocument({ types: [named("Int"), { kind: 3 }] }))
      ).to.deep.equal(["$.types[1].kind: unknown type expression kind 3"]);
    });
  });
});
