import { IrConstructionError } from '../errors';
import { assertNever } from '../guards';
import { formatMessage } from '../report';
import {
  arrayIndex,
  assign,
  binary,
  block,
  call,
  condition,
  convert,
  lambda,
  loop,
  member,
  newObject,
  tryFinally,
  typeAs,
  unary
} from './factory';
import type { Expression } from './nodes';
import { formatExpression } from './printer';

/**
 * Maps one node to its replacement.
 */
export type ExpressionMapper = (expression: Expression) => Expression;

/**
 * Returns a replacement for a node, or `undefined` to keep descending.
 */
export type ExpressionReplacer = (expression: Expression) => Expression | undefined;

function mapAll(
  expressions: readonly Expression[],
  visit: ExpressionMapper
): readonly Expression[] {
  const mapped = expressions.map(visit);
  return mapped.every((expression, index) => expression === expressions[index])
    ? expressions
    : mapped;
}

/**
 * Child nodes in evaluation order. Declarations (block locals, lambda
 * parameters) are not children.
 */
export function getChildren(expression: Expression): readonly Expression[] {
  switch (expression.nodeType) {
    case 'constant':
    case 'parameter':
    case 'default':
    case 'empty':
    case 'break':
      return [];
    case 'member':
      return [expression.target];
    case 'call':
      return expression.target ? [expression.target, ...expression.args] : expression.args;
    case 'conditional':
      return [expression.test, expression.ifTrue, expression.ifFalse];
    case 'block':
      return expression.expressions;
    case 'loop':
      return [expression.body];
    case 'assign':
      return [expression.left, expression.right];
    case 'binary':
      return [expression.left, expression.right];
    case 'unary':
    case 'convert':
    case 'typeAs':
      return [expression.operand];
    case 'new':
      return expression.args;
    case 'tryFinally':
      return [expression.body, expression.finalizer];
    case 'arrayIndex':
      return [expression.array, expression.index];
    case 'lambda':
      return [expression.body];
    default:
      return assertNever(expression, 'Unknown IR node.');
  }
}

/**
 * Rebuilds `expression` with every child replaced by `visit(child)`.
 *
 * Returns `expression` itself when no child changed; otherwise a new node
 * (new id) built through the validating factories, keeping the explicit
 * result type of blocks and conditionals.
 */
export function mapChildren(expression: Expression, visit: ExpressionMapper): Expression {
  switch (expression.nodeType) {
    case 'constant':
    case 'parameter':
    case 'default':
    case 'empty':
    case 'break':
      return expression;
    case 'member': {
      const target = visit(expression.target);
      return target === expression.target ? expression : member(target, expression.member);
    }
    case 'call': {
      const target = expression.target ? visit(expression.target) : null;
      const args = mapAll(expression.args, visit);
      return target === expression.target && args === expression.args
        ? expression
        : call(target, expression.method, args);
    }
    case 'conditional': {
      const test = visit(expression.test);
      const ifTrue = visit(expression.ifTrue);
      const ifFalse = visit(expression.ifFalse);
      return test === expression.test && ifTrue === expression.ifTrue && ifFalse === expression.ifFalse
        ? expression
        : condition(test, ifTrue, ifFalse, expression.type);
    }
    case 'block': {
      const expressions = mapAll(expression.expressions, visit);
      return expressions === expression.expressions
        ? expression
        : block(expression.variables, expressions, expression.type);
    }
    case 'loop': {
      const body = visit(expression.body);
      return body === expression.body ? expression : loop(body, expression.breakLabel);
    }
    case 'assign': {
      const left = visit(expression.left);
      const right = visit(expression.right);
      if (left === expression.left && right === expression.right) return expression;
      if (left.nodeType !== 'parameter' && left.nodeType !== 'member') {
        throw new IrConstructionError(
          formatMessage('Assignment target must stay a variable or member', formatExpression(left))
        );
      }
      return assign(left, right);
    }
    case 'binary': {
      const left = visit(expression.left);
      const right = visit(expression.right);
      return left === expression.left && right === expression.right
        ? expression
        : binary(expression.operator, left, right);
    }
    case 'unary': {
      const operand = visit(expression.operand);
      return operand === expression.operand ? expression : unary(expression.operator, operand);
    }
    case 'convert': {
      const operand = visit(expression.operand);
      return operand === expression.operand ? expression : convert(operand, expression.type);
    }
    case 'typeAs': {
      const operand = visit(expression.operand);
      return operand === expression.operand ? expression : typeAs(operand, expression.type);
    }
    case 'new': {
      const args = mapAll(expression.args, visit);
      return args === expression.args ? expression : newObject(expression.ctor, args);
    }
    case 'tryFinally': {
      const body = visit(expression.body);
      const finalizer = visit(expression.finalizer);
      return body === expression.body && finalizer === expression.finalizer
        ? expression
        : tryFinally(body, finalizer);
    }
    case 'arrayIndex': {
      const array = visit(expression.array);
      const index = visit(expression.index);
      return array === expression.array && index === expression.index
        ? expression
        : arrayIndex(array, index);
    }
    case 'lambda': {
      const body = visit(expression.body);
      return body === expression.body ? expression : lambda(expression.parameters, body);
    }
    default:
      return assertNever(expression, 'Unknown IR node.');
  }
}

/**
 * Pre-order rewrite.
 *
 * `replace` sees each node before its children. A returned node replaces
 * the subtree and is not descended into; `undefined` keeps the node and
 * rewrites its children. Untouched subtrees are shared with the input.
 */
export function rewrite(expression: Expression, replace: ExpressionReplacer): Expression {
  const replacement = replace(expression);
  if (replacement !== undefined) return replacement;
  return mapChildren(expression, child => rewrite(child, replace));
}

/**
 * Pre-order traversal of every node.
 */
export function walk(expression: Expression, visit: (expression: Expression) => void): void {
  visit(expression);
  for (const child of getChildren(expression)) walk(child, visit);
}
