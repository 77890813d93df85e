import { NullReferenceError } from '../errors';
import { isNullish } from '../guards';
import { formatMessage } from '../report';

/**
 * Reads a named JS property from a runtime value.
 *
 * Used as the default accessor of declared properties and fields.
 * Primitive receivers are boxed so that members such as `length` on a
 * string resolve the way JavaScript resolves them.
 *
 * @param target - The receiver.
 * @param name - Property name.
 * @returns The property value.
 * @throws {NullReferenceError} When `target` is `null` or `undefined`.
 */
export function readMember(target: unknown, name: string): unknown {
  if (isNullish(target)) {
    throw new NullReferenceError(
      formatMessage('Cannot read member', name, 'the target is null.')
    );
  }
  return Reflect.get(Object(target), name);
}

/**
 * Writes a named JS property on a runtime value.
 *
 * @param target - The receiver.
 * @param name - Property name.
 * @param value - New value.
 * @throws {NullReferenceError} When `target` is `null` or `undefined`.
 */
export function writeMember(
  target: unknown,
  name: string,
  value: unknown
): void {
  if (isNullish(target)) {
    throw new NullReferenceError(
      formatMessage('Cannot assign member', name, 'the target is null.')
    );
  }
  Reflect.set(Object(target), name, value);
}
