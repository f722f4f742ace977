/**
 * Fixed-minimum-length sequences
 *
 * `OneOrMore<T>` and `TwoOrMore<T>` are plain readonly tuples whose leading
 * elements are required by the type, so indexing, iteration, `length` and
 * structural equality all come from the array itself. The minimum length is
 * checked once, when an unchecked array is turned into one of these.
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";

export type OneOrMore<T> = readonly [T, ...T[]];

export type TwoOrMore<T> = readonly [T, T, ...T[]];

const tooShort = (minimum: number, actual: number): Diagnostic =>
  createDiagnostic(
    "TMG1001",
    "error",
    `Expected at least ${minimum} element${minimum === 1 ? "" : "s"}, got ${actual}`
  );

export const isOneOrMore = <T>(
  items: readonly T[]
): items is OneOrMore<T> => items.length >= 1;

export const isTwoOrMore = <T>(
  items: readonly T[]
): items is TwoOrMore<T> => items.length >= 2;

/**
 * Create a `OneOrMore` list from an array with at least one element
 */
export const oneOrMore = <T>(
  items: readonly T[]
): Result<OneOrMore<T>, Diagnostic> =>
  isOneOrMore(items)
    ? ok<OneOrMore<T>, Diagnostic>([...items])
    : error(tooShort(1, items.length));

/**
 * Create a `TwoOrMore` list from an array with at least two elements
 */
export const twoOrMore = <T>(
  items: readonly T[]
): Result<TwoOrMore<T>, Diagnostic> => {
  if (!isTwoOrMore(items)) {
    return error(tooShort(2, items.length));
  }
  const [first, second, ...remaining] = items;
  return ok<TwoOrMore<T>, Diagnostic>([first, second, ...remaining]);
};

export const one = <T>(value: T): OneOrMore<T> => [value];

export const two = <T>(first: T, second: T): TwoOrMore<T> => [first, second];

export const mapOneOrMore = <T, U>(
  items: OneOrMore<T>,
  fn: (item: T, index: number) => U
): OneOrMore<U> => {
  const [first, ...remaining] = items;
  return [fn(first, 0), ...remaining.map((item, i) => fn(item, i + 1))];
};

export const mapTwoOrMore = <T, U>(
  items: TwoOrMore<T>,
  fn: (item: T, index: number) => U
): TwoOrMore<U> => {
  const [first, second, ...remaining] = items;
  return [
    fn(first, 0),
    fn(second, 1),
    ...remaining.map((item, i) => fn(item, i + 2)),
  ];
};

/**
 * Last element of a non-empty list
 */
export const lastOf = <T>(items: OneOrMore<T>): T =>
  items.reduce((_, item) => item);
