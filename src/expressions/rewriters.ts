import { toType } from '../ir/factory';
import type { Expression, LambdaExpression } from '../ir/nodes';
import { rewrite } from '../ir/visitor';

/**
 * Replaces every occurrence of `oldNode` (matched by id) with `newNode`.
 *
 * Neither input is modified; nodes on the path to a replacement are rebuilt
 * and every other subtree is shared.
 */
export function replace(
  expression: Expression,
  oldNode: Expression,
  newNode: Expression
): Expression {
  return rewrite(expression, node => (node.id === oldNode.id ? newNode : undefined));
}

/**
 * The body of `expression` with its parameters substituted, in order, by
 * `replacements`.
 *
 * Substitutes `min(replacements.length, parameters.length)` parameters;
 * the rest stay free in the result.
 */
export function replaceParameters(
  expression: LambdaExpression,
  ...replacements: Expression[]
): Expression {
  const count = Math.min(replacements.length, expression.parameters.length);
  let body = expression.body;

  for (let index = 0; index < count; index++) {
    const formal = expression.parameters[index];
    const actual = replacements[index];
    if (!formal || !actual) continue;

    body = rewrite(body, node =>
      node.nodeType === 'parameter' && node.id === formal.id ? actual : undefined
    );
  }

  return body;
}

/**
 * As {@link replaceParameters}, converting each replacement to the exact
 * type of the parameter it replaces first.
 */
export function convertReplaceParameters(
  expression: LambdaExpression,
  ...replacements: Expression[]
): Expression {
  const converted = replacements.map((replacement, index) => {
    const formal = expression.parameters[index];
    return formal ? toType(replacement, formal.type) : replacement;
  });

  return replaceParameters(expression, ...converted);
}
