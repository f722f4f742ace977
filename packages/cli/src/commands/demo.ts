/**
 * typemerge demo - merge a closure type with its nullability-unspecified
 * twin
 */

import {
  type Result,
  autoclosure,
  error,
  functionType,
  mergeTypeSignatures,
  nullabilityUnspecifiedType,
  ok,
  typeName,
  voidType,
} from "@typemerge/core";
import type { CommandError, OutputFormat } from "../types.js";
import { formatTypes } from "./output.js";

export const demoCommand = (
  format: OutputFormat
): Result<readonly string[], CommandError> => {
  // @autoclosure (NSURLRequest) -> Void
  const declared = functionType(
    voidType,
    [typeName("NSURLRequest")],
    [autoclosure]
  );
  // Same closure as imported, with unknown nullability
  const imported = nullabilityUnspecifiedType(
    functionType(voidType, [typeName("NSURLRequest")], [autoclosure])
  );

  const merged = mergeTypeSignatures(declared, imported);
  if (!merged.ok) {
    return error({ exitCode: 3, diagnostics: [merged.error] });
  }
  return ok(formatTypes([merged.value], format));
};
