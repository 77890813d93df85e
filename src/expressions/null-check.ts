import type { RuntimeType } from '../metadata/runtime-type';
import {
  FALSE,
  NULL,
  assign,
  block,
  call,
  condition,
  defaultOf,
  member,
  orElse,
  referenceEqual,
  toType,
  variable
} from '../ir/factory';
import type { Expression, ParameterExpression } from '../ir/nodes';
import { getChain } from './member-chain';

function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Rebuilds a chain link so that it reads from `target`.
 */
function retarget(expression: Expression, target: Expression): Expression {
  switch (expression.nodeType) {
    case 'member':
      return member(target, expression.member);
    case 'call':
      return expression.method.isStatic
        ? call(null, expression.method, [target, ...expression.args.slice(1)])
        : call(target, expression.method, expression.args);
    default:
      return expression;
  }
}

/**
 * Guards a member chain against null links.
 *
 * For `source.child.name` the result is
 *
 *   {
 *     let source; let sourceChild;
 *     ((false || (source = source) === null) || (sourceChild = source.child) === null)
 *       ? default
 *       : sourceChild.name
 *   }
 *
 * 1. One temporary per link holds the link's target; temporaries are named
 *    after the root parameter followed by each member name.
 * 2. The tests are joined with short-circuit OR, so no link past the first
 *    null one is read.
 * 3. Temporaries of value types cannot be null: their test is the constant
 *    `false` (the assignment is still made).
 *
 * @param expression
 *   Leaf of a member chain.
 * @param destinationType
 *   When it is `Nullable<T>` of the expression's type, the result has that
 *   type (so the default is `null`); otherwise the expression's type.
 * @returns
 *   The guarded expression, or `expression` unchanged when its chain is
 *   empty or not rooted at a parameter.
 */
export function nullCheck(expression: Expression, destinationType?: RuntimeType): Expression {
  const chain = getChain(expression);
  const [root] = chain;
  if (!root || root.target.nodeType !== 'parameter') return expression;

  const rootParameter = root.target;
  const variables: ParameterExpression[] = [];
  let anyNull: Expression = FALSE;
  let name = rootParameter.name;

  for (const link of chain) {
    const temporary = variable(link.target.type, name);
    name += capitalize(link.member.name);

    const previous = variables.at(-1);
    const assignment = assign(
      temporary,
      previous ? retarget(link.target, previous) : rootParameter
    );
    variables.push(temporary);

    const isNull = temporary.type.isValueType
      ? block([], [assignment, FALSE])
      : referenceEqual(assignment, NULL);
    anyNull = orElse(anyNull, isNull);
  }

  const last = variables.at(-1) ?? rootParameter;
  const nonNull = retarget(expression, last);
  const returnType =
    destinationType && destinationType.underlyingType === expression.type
      ? destinationType
      : expression.type;

  return block(variables, [
    condition(anyNull, defaultOf(returnType), toType(nonNull, returnType))
  ]);
}
