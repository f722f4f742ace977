import { describe, it } from "mocha";
import { expect } from "chai";
import { TypeAliasTable, emptyAliasTable } from "./alias-table.js";
import { optionalType, typeName } from "../type-expr/builders.js";

describe("TypeAliasTable", () => {
  it("should resolve defined aliases only", () => {
    const table = TypeAliasTable.fromRecord({ MyInt: typeName("Int") });

    expect(table.resolveAlias("MyInt")).to.deep.equal(typeName("Int"));
    expect(table.resolveAlias("Int")).to.be.undefined;
    expect(table.has("MyInt")).to.equal(true);
    expect(table.size).to.equal(1);
  });

  it("should let later entries win", () => {
    const table = new TypeAliasTable([
      ["Handle", typeName("Int32")],
      ["Handle", typeName("Int64")],
    ]);

    expect(table.resolveAlias("Handle")).to.deep.equal(typeName("Int64"));
    expect(table.names()).to.deep.equal(["Handle"]);
  });

  it("should combine tables in order", () => {
    const base = TypeAliasTable.fromRecord({
      Handle: typeName("Int32"),
      Name: typeName("String"),
    });
    const override = TypeAliasTable.fromRecord({
      Handle: optionalType(typeName("Int64")),
    });

    const combined = TypeAliasTable.combine([base, override]);
    expect(combined.size).to.equal(2);
    expect(combined.resolveAlias("Handle")).to.deep.equal(
      optionalType(typeName("Int64"))
    );
    expect(combined.resolveAlias("Name")).to.deep.equal(typeName("String"));
  });

  it("should provide an empty table", () => {
    expect(emptyAliasTable.size).to.equal(0);
    expect(emptyAliasTable.resolveAlias("Anything")).to.be.undefined;
  });
});
