import { InvalidCastError, NotSupportedError, NullReferenceError } from '../errors';
import { hasMethod, isNullish } from '../guards';
import { formatMessage } from '../report';

/**
 * Contract shared by every collection a plan can populate.
 *
 * Mirrors the mutable-collection capability the collection mapper relies on:
 * `clear`, then `add` per element, guarded by `isReadOnly`.
 */
export interface MutableCollection<T> extends Iterable<T> {
  add(item: T): void;
  clear(): void;
  readonly isReadOnly: boolean;
  readonly count: number;
}

/**
 * Growable, ordered collection (the default concrete collection of plans).
 */
export class List<T> implements MutableCollection<T> {
  private readonly items: T[];

  constructor(items: Iterable<T> = []) {
    this.items = [...items];
  }

  get isReadOnly(): boolean {
    return false;
  }

  get count(): number {
    return this.items.length;
  }

  add(item: T): void {
    this.items.push(item);
  }

  clear(): void {
    this.items.length = 0;
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Untyped list: the fallback container when a destination exposes no
 * typed collection contract.
 */
export class ArrayList extends List<unknown> {}

/**
 * Unordered collection of distinct items. Implements the typed collection
 * contract but not the list contract.
 */
export class HashSet<T> implements MutableCollection<T> {
  private readonly items = new Set<T>();

  constructor(items: Iterable<T> = []) {
    for (const item of items) this.items.add(item);
  }

  get isReadOnly(): boolean {
    return false;
  }

  get count(): number {
    return this.items.size;
  }

  add(item: T): void {
    this.items.add(item);
  }

  clear(): void {
    this.items.clear();
  }

  has(item: T): boolean {
    return this.items.has(item);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Read-only view over a list. Reports `isReadOnly: true` and rejects
 * mutation, which makes plans replace it instead of refilling it.
 */
export class ReadOnlyCollection<T> implements MutableCollection<T> {
  constructor(private readonly list: MutableCollection<T>) {}

  get isReadOnly(): boolean {
    return true;
  }

  get count(): number {
    return this.list.count;
  }

  add(): void {
    throw new NotSupportedError(
      formatMessage('Collection is read-only', 'ReadOnlyCollection', 'add is not supported.')
    );
  }

  clear(): void {
    throw new NotSupportedError(
      formatMessage('Collection is read-only', 'ReadOnlyCollection', 'clear is not supported.')
    );
  }

  toArray(): T[] {
    return [...this.list];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.list[Symbol.iterator]();
  }
}

/**
 * Structural check for {@link MutableCollection}.
 *
 * @param value
 *   Runtime value to test.
 * @returns
 *   `true` if `value` exposes `add`, `clear` and the iteration protocol.
 */
export function isMutableCollection(
  value: unknown
): value is MutableCollection<unknown> {
  return (
    hasMethod(value, 'add') &&
    hasMethod(value, 'clear') &&
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    'isReadOnly' in value
  );
}

/**
 * Narrows a method receiver to {@link MutableCollection}.
 *
 * @param target
 *   Receiver of a collection member.
 * @param memberName
 *   Member being invoked (for the error message).
 * @returns
 *   `target`, narrowed.
 * @throws {NullReferenceError} When `target` is null.
 * @throws {InvalidCastError} When `target` is not a collection.
 */
export function requireCollection(
  target: unknown,
  memberName: string
): MutableCollection<unknown> {
  if (isNullish(target)) {
    throw new NullReferenceError(
      formatMessage('Cannot invoke collection member', memberName, 'the target is null.')
    );
  }
  if (!isMutableCollection(target)) {
    throw new InvalidCastError(
      formatMessage('Cannot invoke collection member', memberName, 'the target is not a collection.')
    );
  }
  return target;
}
