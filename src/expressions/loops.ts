import { Int32, Void } from '../metadata/builtins';
import {
  arrayIndex,
  assign,
  block,
  breakTo,
  callMethod,
  condition,
  constant,
  label,
  lessThan,
  loop,
  postIncrementAssign,
  property,
  toType,
  variable
} from '../ir/factory';
import type { Expression, ParameterExpression } from '../ir/nodes';
import { using } from './using';

/**
 * Iterates a sequence, binding each element to `loopVariable` and running
 * `body`.
 *
 * Arrays get a counted loop ({@link forEachArrayItem}). Other sequences are
 * walked through `getEnumerator()` / `moveNext()` / `current`, with the
 * loop wrapped in {@link using} so the enumerator is released on every
 * exit path.
 *
 * @param collection
 *   The sequence; evaluated once.
 * @param loopVariable
 *   Declared by the loop; receives `current` converted to its type.
 * @param body
 *   Runs once per element.
 */
export function forEach(
  collection: Expression,
  loopVariable: ParameterExpression,
  body: Expression
): Expression {
  if (collection.type.isArray) {
    return forEachArrayItem(collection, loopVariable, body);
  }

  const getEnumerator = callMethod(collection, 'getEnumerator');
  const enumerator = variable(getEnumerator.type, 'enumerator');
  const breakLabel = label('LoopBreak');

  return block(
    [enumerator, loopVariable],
    [
      assign(enumerator, getEnumerator),
      using(
        enumerator,
        loop(
          condition(
            callMethod(enumerator, 'moveNext'),
            block([], [
              assign(loopVariable, toType(property(enumerator, 'current'), loopVariable.type)),
              body
            ]),
            breakTo(breakLabel),
            Void
          ),
          breakLabel
        )
      )
    ]
  );
}

/**
 * Counted loop over an array:
 * `for (sourceArrayIndex = 0; sourceArrayIndex < array.length; sourceArrayIndex++)`.
 *
 * `array` is read on every iteration; pass a variable.
 */
export function forEachArrayItem(
  array: Expression,
  loopVariable: ParameterExpression,
  body: Expression
): Expression {
  const breakLabel = label('LoopBreak');
  const index = variable(Int32, 'sourceArrayIndex');

  return block(
    [index, loopVariable],
    [
      assign(index, constant(0, Int32)),
      loop(
        condition(
          lessThan(index, property(array, 'length')),
          block([], [
            assign(loopVariable, arrayIndex(array, index)),
            body,
            postIncrementAssign(index)
          ]),
          breakTo(breakLabel),
          Void
        ),
        breakLabel
      )
    ]
  );
}
