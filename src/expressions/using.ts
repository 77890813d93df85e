import { IDisposable } from '../metadata/builtins';
import {
  EMPTY,
  assign,
  block,
  callMethod,
  ifNullElse,
  tryFinally,
  typeAs,
  variable
} from '../ir/factory';
import type { Expression } from '../ir/nodes';

/**
 * Runs `body`, then releases `disposable` on every exit path.
 *
 * 1. Statically disposable: `try body finally disposable.dispose()`.
 * 2. Value type: `body` unchanged.
 * 3. Otherwise the release is probed at run time:
 *    `disposableVariable = disposable as IDisposable`, disposed when not null.
 *
 * @param disposable
 *   The resource; evaluated in the finalizer, so pass a variable.
 * @param body
 *   Guarded expression. The result has its type.
 */
export function using(disposable: Expression, body: Expression): Expression {
  let release: Expression;

  if (IDisposable.isAssignableFrom(disposable.type)) {
    release = callMethod(disposable, 'dispose');
  } else {
    if (disposable.type.isValueType) return body;

    const disposableVariable = variable(IDisposable, 'disposableVariable');
    release = block(
      [disposableVariable],
      [
        assign(disposableVariable, typeAs(disposable, IDisposable)),
        ifNullElse(disposableVariable, EMPTY, callMethod(disposableVariable, 'dispose'))
      ]
    );
  }

  return tryFinally(body, release);
}
