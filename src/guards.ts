/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Null test used by compiled plans.
 *
 * Plans model a single "null" value. JavaScript has two (`null` and
 * `undefined`); both count as null so that a missing property on a plain
 * object behaves like a null reference.
 *
 * @param value
 *   Value to test.
 * @returns
 *   `true` for `null` and `undefined`.
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Checks whether a value implements the iteration protocol.
 *
 * Strings are excluded: they are iterable, but plans never treat a string
 * as a collection of characters.
 *
 * @param value
 *   Value to test.
 * @returns
 *   `true` if `value` is an object exposing `[Symbol.iterator]()`.
 */
export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Checks whether `value` has a callable member named `name`.
 *
 * @param value
 *   Candidate object.
 * @param name
 *   Method name to look for.
 * @returns
 *   `true` if `value[name]` is a function.
 */
export function hasMethod(value: unknown, name: string): boolean {
  return isRecord(value) && typeof value[name] === 'function';
}

/**
 * Exhaustiveness helper for discriminated unions.
 *
 * @param _value
 *   The value that should have been narrowed to `never`.
 * @param message
 *   Message for the error thrown when an unexpected value reaches run time.
 */
export function assertNever(_value: never, message: string): never {
  throw new Error(message);
}
