import { InvalidCastError, NotSupportedError, NullReferenceError } from '../errors';
import { hasMethod, isIterable, isNullish, isRecord } from '../guards';
import { formatMessage } from '../report';

/**
 * Release capability: the runtime side of the disposal contract.
 */
export interface Disposable {
  dispose(): void;
}

/**
 * Cursor over a sequence: `moveNext` then read `current`.
 */
export interface Enumerator<T> {
  moveNext(): boolean;
  readonly current: T;
}

/**
 * Structural check for {@link Disposable}.
 */
export function isDisposable(value: unknown): value is Disposable {
  return hasMethod(value, 'dispose');
}

/**
 * Structural check for {@link Enumerator}.
 */
export function isEnumerator(value: unknown): value is Enumerator<unknown> {
  return hasMethod(value, 'moveNext') && isRecord(value) && 'current' in value;
}

/**
 * Enumerator over a JS iterator.
 *
 * `dispose` closes the underlying iterator (calling `return()`) when the
 * sequence was not exhausted, so generators run their `finally` blocks when a
 * loop exits early.
 */
export class IteratorEnumerator<T> implements Enumerator<T>, Disposable {
  private slot: { value: T } | undefined;
  private finished = false;

  constructor(private readonly iterator: Iterator<T>) {}

  moveNext(): boolean {
    if (this.finished) return false;

    const step = this.iterator.next();
    if (step.done) {
      this.finished = true;
      this.slot = undefined;
      return false;
    }

    this.slot = { value: step.value };
    return true;
  }

  get current(): T {
    if (!this.slot) {
      throw new NotSupportedError(
        formatMessage('Enumeration has not started or already finished', 'current')
      );
    }
    return this.slot.value;
  }

  dispose(): void {
    if (this.finished) return;
    this.finished = true;
    this.slot = undefined;
    this.iterator.return?.();
  }
}

/**
 * Opens an enumerator over any iterable runtime value.
 *
 * @param source
 *   The sequence.
 * @returns
 *   A disposable enumerator.
 * @throws {NullReferenceError} When `source` is null.
 * @throws {InvalidCastError} When `source` is not iterable.
 */
export function getEnumerator(source: unknown): IteratorEnumerator<unknown> {
  if (isNullish(source)) {
    throw new NullReferenceError(
      formatMessage('Cannot enumerate', 'getEnumerator', 'the source is null.')
    );
  }
  if (!isIterable(source)) {
    throw new InvalidCastError(
      formatMessage('Cannot enumerate', 'getEnumerator', 'the source is not iterable.')
    );
  }
  return new IteratorEnumerator(source[Symbol.iterator]());
}

/**
 * Narrows a method receiver to {@link Enumerator}.
 */
export function requireEnumerator(
  target: unknown,
  memberName: string
): Enumerator<unknown> {
  if (!isEnumerator(target)) {
    throw new InvalidCastError(
      formatMessage('Cannot invoke enumerator member', memberName, 'the target is not an enumerator.')
    );
  }
  return target;
}

/**
 * Narrows a method receiver to {@link Disposable}.
 */
export function requireDisposable(target: unknown): Disposable {
  if (!isDisposable(target)) {
    throw new InvalidCastError(
      formatMessage('Cannot invoke member', 'dispose', 'the target is not disposable.')
    );
  }
  return target;
}
