/**
 * Decoding of JSON-encoded type expressions and alias tables
 *
 * The encoded form is the in-memory form: objects discriminated by `kind`,
 * e.g. `{ "kind": "optional", "inner": { "kind": "nominal", "nominal":
 * { "kind": "typeName", "name": "Int" } } }`. Decoding validates untrusted
 * input and reports the JSON path of the first offending value.
 */

import {
  type Diagnostic,
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { type Result, ok, error, map } from "../types/result.js";
import {
  type OneOrMore,
  type TwoOrMore,
  isOneOrMore,
  isTwoOrMore,
} from "../sequence/sequences.js";
import type {
  CallingConvention,
  FunctionAttribute,
  NominalForm,
  TypeExpr,
  WrapperKind,
} from "../type-expr/types.js";
import {
  autoclosure,
  convention,
  escaping,
  functionType,
  genericType,
  nestedType,
  nominalType,
  tupleType,
  typeName,
  voidType,
  wrapperOfKind,
} from "../type-expr/builders.js";
import { TypeAliasTable } from "../alias/alias-table.js";

type JsonObject = Readonly<Record<string, unknown>>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = <T>(path: string, message: string): Result<T, Diagnostic> =>
  error(createDiagnostic("TMG3001", "error", `${path}: ${message}`));

const describeValue = (value: unknown): string =>
  value === null ? "null" : Array.isArray(value) ? "array" : typeof value;

const decodeString = (
  value: unknown,
  path: string
): Result<string, Diagnostic> =>
  typeof value === "string" && value.length > 0
    ? ok(value)
    : invalid(path, `expected a non-empty string, got ${describeValue(value)}`);

const decodeList = <T>(
  value: unknown,
  path: string,
  decodeItem: (item: unknown, path: string) => Result<T, Diagnostic>
): Result<readonly T[], Diagnostic> => {
  if (!Array.isArray(value)) {
    return invalid(path, `expected an array, got ${describeValue(value)}`);
  }
  const items: T[] = [];
  for (const [index, item] of value.entries()) {
    const decoded = decodeItem(item, `${path}[${index}]`);
    if (!decoded.ok) {
      return decoded;
    }
    items.push(decoded.value);
  }
  return ok(items);
};

const decodeOneOrMore = <T>(
  value: unknown,
  path: string,
  decodeItem: (item: unknown, path: string) => Result<T, Diagnostic>
): Result<OneOrMore<T>, Diagnostic> => {
  const items = decodeList(value, path, decodeItem);
  if (!items.ok) {
    return items;
  }
  return isOneOrMore(items.value)
    ? ok(items.value)
    : invalid(path, "expected at least one element");
};

const decodeTwoOrMore = <T>(
  value: unknown,
  path: string,
  decodeItem: (item: unknown, path: string) => Result<T, Diagnostic>
): Result<TwoOrMore<T>, Diagnostic> => {
  const items = decodeList(value, path, decodeItem);
  if (!items.ok) {
    return items;
  }
  return isTwoOrMore(items.value)
    ? ok(items.value)
    : invalid(path, `expected at least two elements, got ${items.value.length}`);
};

export const decodeNominalForm = (
  value: unknown,
  path = "$"
): Result<NominalForm, Diagnostic> => {
  if (!isJsonObject(value)) {
    return invalid(path, `expected an object, got ${describeValue(value)}`);
  }
  const name = decodeString(value["name"], `${path}.name`);
  if (!name.ok) {
    return name;
  }

  switch (value["kind"]) {
    case "typeName":
      return ok(typeName(name.value).nominal);

    case "generic": {
      const typeArguments = decodeOneOrMore(
        value["arguments"],
        `${path}.arguments`,
        decodeTypeExpr
      );
      return typeArguments.ok
        ? ok(genericType(name.value, typeArguments.value).nominal)
        : typeArguments;
    }

    default:
      return invalid(
        `${path}.kind`,
        `expected "typeName" or "generic", got ${JSON.stringify(value["kind"])}`
      );
  }
};

const CONVENTIONS: readonly CallingConvention[] = ["block", "c"];

const isCallingConvention = (value: unknown): value is CallingConvention =>
  CONVENTIONS.some((c) => c === value);

export const decodeFunctionAttribute = (
  value: unknown,
  path = "$"
): Result<FunctionAttribute, Diagnostic> => {
  if (!isJsonObject(value)) {
    return invalid(path, `expected an object, got ${describeValue(value)}`);
  }

  switch (value["kind"]) {
    case "autoclosure":
      return ok(autoclosure);
    case "escaping":
      return ok(escaping);
    case "convention": {
      const kind = value["convention"];
      return isCallingConvention(kind)
        ? ok(convention(kind))
        : invalid(
            `${path}.convention`,
            `expected "block" or "c", got ${JSON.stringify(kind)}`
          );
    }
    default:
      return invalid(
        `${path}.kind`,
        `unknown function attribute ${JSON.stringify(value["kind"])}`
      );
  }
};

const decodeWrapper = (
  kind: WrapperKind,
  value: JsonObject,
  path: string
): Result<TypeExpr, Diagnostic> =>
  map(decodeTypeExpr(value["inner"], `${path}.inner`), (inner) =>
    wrapperOfKind(kind, inner)
  );

/**
 * Decode an untrusted JSON value into a type expression
 */
export const decodeTypeExpr = (
  value: unknown,
  path = "$"
): Result<TypeExpr, Diagnostic> => {
  if (!isJsonObject(value)) {
    return invalid(path, `expected an object, got ${describeValue(value)}`);
  }

  const kind = value["kind"];
  switch (kind) {
    case "nominal":
      return map(
        decodeNominalForm(value["nominal"], `${path}.nominal`),
        nominalType
      );

    case "nested":
      return map(
        decodeTwoOrMore(
          value["components"],
          `${path}.components`,
          decodeNominalForm
        ),
        nestedType
      );

    case "tuple": {
      const elements = decodeList(
        value["elements"],
        `${path}.elements`,
        decodeTypeExpr
      );
      if (!elements.ok) {
        return elements;
      }
      if (elements.value.length === 0) {
        return ok(voidType);
      }
      return isTwoOrMore(elements.value)
        ? ok(tupleType(elements.value))
        : invalid(
            `${path}.elements`,
            "a tuple must have zero or at least two elements"
          );
    }

    case "function": {
      const returnType = decodeTypeExpr(
        value["returnType"],
        `${path}.returnType`
      );
      if (!returnType.ok) {
        return returnType;
      }
      const parameters = decodeList(
        value["parameters"],
        `${path}.parameters`,
        decodeTypeExpr
      );
      if (!parameters.ok) {
        return parameters;
      }
      const attributes =
        value["attributes"] === undefined
          ? ok<readonly FunctionAttribute[], Diagnostic>([])
          : decodeList(
              value["attributes"],
              `${path}.attributes`,
              decodeFunctionAttribute
            );
      if (!attributes.ok) {
        return attributes;
      }
      return ok(
        functionType(returnType.value, parameters.value, attributes.value)
      );
    }

    case "optional":
      return decodeWrapper("optional", value, path);
    case "implicitlyUnwrappedOptional":
      return decodeWrapper("implicitlyUnwrappedOptional", value, path);
    case "nullabilityUnspecified":
      return decodeWrapper("nullabilityUnspecified", value, path);

    default:
      return invalid(
        `${path}.kind`,
        `unknown type expression kind ${JSON.stringify(kind)}`
      );
  }
};

/**
 * Decode an alias table: an object mapping alias names to encoded types.
 * Every invalid entry is reported.
 */
export const decodeAliasTable = (
  value: unknown,
  path = "$"
): Result<TypeAliasTable, DiagnosticsCollector> => {
  if (!isJsonObject(value)) {
    return error(
      addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic(
          "TMG3001",
          "error",
          `${path}: expected an object of alias definitions, got ${describeValue(value)}`
        )
      )
    );
  }

  let collector = createDiagnosticsCollector();
  const entries: [string, TypeExpr][] = [];
  for (const [name, encoded] of Object.entries(value)) {
    const decoded = decodeTypeExpr(encoded, `${path}[${JSON.stringify(name)}]`);
    if (decoded.ok) {
      entries.push([name, decoded.value]);
    } else {
      collector = addDiagnostic(collector, decoded.error);
    }
  }

  return collector.hasErrors ? error(collector) : ok(new TypeAliasTable(entries));
};

/**
 * JSON text of a type expression, readable back with `decodeTypeExpr`
 */
export const encodeTypeExpr = (type: TypeExpr, indent?: number): string =>
  JSON.stringify(type, undefined, indent);
