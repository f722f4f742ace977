import { describe, it } from "mocha";
import { expect } from "chai";
import {
  autoclosure,
  convention,
  escaping,
  functionType,
  genericType,
  implicitlyUnwrappedOptionalType,
  nestedType,
  nullabilityUnspecifiedType,
  optionalType,
  tupleType,
  typeName,
  voidType,
} from "./builders.js";
import { renderTypeExpr } from "./render.js";

const intType = typeName("Int");
const stringType = typeName("String");
const boolType = typeName("Bool");

describe("renderTypeExpr", () => {
  it("should render plain and generic nominal types", () => {
    expect(renderTypeExpr(intType)).to.equal("Int");
    expect(
      renderTypeExpr(
        genericType("Dictionary", [stringType, genericType("Array", [intType])])
      )
    ).to.equal("Dictionary<String, Array<Int>>");
  });

  it("should render nested types with dots", () => {
    const type = nestedType([
      { kind: "typeName", name: "Outer" },
      { kind: "generic", name: "Inner", arguments: [intType] },
    ]);
    expect(renderTypeExpr(type)).to.equal("Outer.Inner<Int>");
  });

  it("should render tuples", () => {
    expect(renderTypeExpr(voidType)).to.equal("Void");
    expect(renderTypeExpr(tupleType([intType, stringType, boolType]))).to.equal(
      "(Int, String, Bool)"
    );
  });

  it("should render function types without attributes", () => {
    expect(renderTypeExpr(functionType(voidType, []))).to.equal("() -> Void");
    expect(renderTypeExpr(functionType(boolType, [intType, stringType]))).to.equal(
      "(Int, String) -> Bool"
    );
  });

  it("should render attributes sorted by their text", () => {
    const type = functionType(stringType, [intType, boolType], [
      escaping,
      convention("c"),
      autoclosure,
    ]);
    expect(renderTypeExpr(type)).to.equal(
      "@autoclosure @convention(c) @escaping (Int, Bool) -> String"
    );
    expect(
      renderTypeExpr(functionType(voidType, [], [convention("block")]))
    ).to.equal("@convention(block) () -> Void");
  });

  it("should sort attributes of hand-built function types", () => {
    expect(
      renderTypeExpr({
        kind: "function",
        returnType: voidType,
        parameters: [],
        attributes: [escaping, autoclosure],
      })
    ).to.equal("@autoclosure @escaping () -> Void");
  });

  it("should render each optionality kind", () => {
    expect(renderTypeExpr(optionalType(intType))).to.equal("Int?");
    expect(renderTypeExpr(implicitlyUnwrappedOptionalType(intType))).to.equal(
      "Int!"
    );
    expect(renderTypeExpr(nullabilityUnspecifiedType(intType))).to.equal("Int!");
    expect(
      renderTypeExpr(optionalType(implicitlyUnwrappedOptionalType(intType)))
    ).to.equal("Int!?");
  });

  it("should append optionality directly after a function type", () => {
    expect(
      renderTypeExpr(optionalType(functionType(voidType, [intType], [escaping])))
    ).to.equal("@escaping (Int) -> Void?");
  });
});
