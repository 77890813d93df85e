import { assertNever } from '../guards';
import type { BinaryOperator, Expression } from './nodes';

const BINARY_SYMBOLS: Record<BinaryOperator, string> = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
  lessThan: '<',
  greaterThan: '>',
  equal: '==',
  notEqual: '!=',
  referenceEqual: '===',
  orElse: '||',
  andAlso: '&&'
};

function formatConstant(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return `<${typeof value}>`;
}

function formatList(expressions: readonly Expression[]): string {
  return expressions.map(formatExpression).join(', ');
}

/**
 * Renders an IR tree as deterministic single-line text.
 *
 * The output reads like JavaScript but is not meant to be parsed: it names
 * offending expressions in error messages, and two trees built the same way
 * always print the same (node ids are not printed).
 *
 * @param expression
 *   Root of the tree to print.
 * @returns
 *   e.g. `source => (source.total + 1)`.
 */
export function formatExpression(expression: Expression): string {
  switch (expression.nodeType) {
    case 'constant':
      return formatConstant(expression.value);
    case 'parameter':
      return expression.name;
    case 'member':
      return `${formatExpression(expression.target)}.${expression.member.name}`;
    case 'call': {
      const receiver = expression.target
        ? formatExpression(expression.target)
        : expression.method.declaringType.name;
      return `${receiver}.${expression.method.name}(${formatList(expression.args)})`;
    }
    case 'conditional':
      return `(${formatExpression(expression.test)} ? ${formatExpression(expression.ifTrue)} : ${formatExpression(expression.ifFalse)})`;
    case 'block': {
      const locals = expression.variables
        .map(variable => `let ${variable.name}: ${variable.type.name}; `)
        .join('');
      return `{ ${locals}${expression.expressions.map(formatExpression).join('; ')} }`;
    }
    case 'loop':
      return `loop ${expression.breakLabel.name} ${formatExpression(expression.body)}`;
    case 'break':
      return `break ${expression.target.name}`;
    case 'assign':
      return `(${formatExpression(expression.left)} = ${formatExpression(expression.right)})`;
    case 'binary':
      return `(${formatExpression(expression.left)} ${BINARY_SYMBOLS[expression.operator]} ${formatExpression(expression.right)})`;
    case 'unary': {
      const operand = formatExpression(expression.operand);
      if (expression.operator === 'not') return `!${operand}`;
      if (expression.operator === 'negate') return `-${operand}`;
      return `${operand}++`;
    }
    case 'convert':
      return `convert(${formatExpression(expression.operand)}, ${expression.type.name})`;
    case 'typeAs':
      return `(${formatExpression(expression.operand)} as ${expression.type.name})`;
    case 'default':
      return `default(${expression.type.name})`;
    case 'new':
      return `new ${expression.ctor.declaringType.name}(${formatList(expression.args)})`;
    case 'tryFinally':
      return `try ${formatExpression(expression.body)} finally ${formatExpression(expression.finalizer)}`;
    case 'arrayIndex':
      return `${formatExpression(expression.array)}[${formatExpression(expression.index)}]`;
    case 'lambda': {
      const body = formatExpression(expression.body);
      const [only, ...rest] = expression.parameters;
      return only && rest.length === 0
        ? `${only.name} => ${body}`
        : `(${formatList(expression.parameters)}) => ${body}`;
    }
    case 'empty':
      return 'empty';
    default:
      return assertNever(expression, 'Unknown IR node.');
  }
}
