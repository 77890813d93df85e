import { is, types } from 'estree-toolkit';
import { parse } from 'meriyah';
import { BooleanType, Double, Int32, StringType } from '../metadata/builtins';
import { findExtensionMethod } from '../metadata/extensions';
import type { RuntimeType } from '../metadata/runtime-type';
import { LambdaParseError } from '../errors';
import { isArray, isRecord } from '../guards';
import {
  NULL,
  andAlso,
  arrayIndex,
  binary,
  call,
  condition,
  constant,
  equal,
  ifNullElse,
  lambda,
  member,
  not,
  notEqual,
  orElse,
  parameter,
  referenceEqual,
  toType,
  unary
} from '../ir/factory';
import type { Expression, LambdaExpression, ParameterExpression } from '../ir/nodes';
import { formatMessage } from '../report';

type Scope = ReadonlyMap<string, ParameterExpression>;

function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

function unsupported(node: types.Node, detail?: string): never {
  throw new LambdaParseError(
    formatMessage('Unsupported syntax in mapping function', node.type, detail)
  );
}

/**
 * Parses the source of a function and returns its single expression.
 */
function getFunctionNode(code: string): types.ArrowFunctionExpression | types.FunctionExpression {
  let ast: unknown;
  try {
    ast = parse(`(${code})`);
  } catch (error) {
    throw new LambdaParseError(
      formatMessage('Mapping function source could not be parsed', code),
      { cause: error }
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new LambdaParseError('Expected parser output to be an ESTree Program node.');
  }

  const first = ast.body.at(0);
  if (!first || !is.expressionStatement(first)) {
    throw new LambdaParseError(
      formatMessage('Mapping function source is not an expression', code)
    );
  }

  const { expression } = first;
  if (is.arrowFunctionExpression(expression) || is.functionExpression(expression)) {
    return expression;
  }
  return unsupported(expression, 'expected an arrow function or function expression.');
}

/**
 * The returned expression: an expression body, or a block that is a single
 * `return` statement.
 */
function getBodyExpression(
  fn: types.ArrowFunctionExpression | types.FunctionExpression
): types.Expression {
  const { body } = fn;
  if (!is.blockStatement(body)) return body;

  const [statement] = body.body;
  if (body.body.length !== 1 || !statement || !is.returnStatement(statement) || !statement.argument) {
    return unsupported(body, 'a block body must be a single return statement.');
  }
  return statement.argument;
}

/**
 * Integers become `Int32`, other numbers `Double`.
 */
function convertLiteral(node: types.Literal): Expression {
  const { value } = node;

  switch (typeof value) {
    case 'string':
      return constant(value, StringType);
    case 'boolean':
      return constant(value, BooleanType);
    case 'number':
      return constant(value, Number.isInteger(value) ? Int32 : Double);
    case 'object':
      if (value === null) return NULL;
      break;
  }
  return unsupported(node, `literal ${String(value)}.`);
}

/**
 * Brings numeric operands to a common type: `Int32` widens to `Double`.
 */
function promote(left: Expression, right: Expression): [Expression, Expression] {
  if (left.type === Int32 && right.type === Double) return [toType(left, Double), right];
  if (left.type === Double && right.type === Int32) return [left, toType(right, Double)];
  return [left, right];
}

/**
 * `===` and `==`: reference equality when both sides may be null,
 * value equality otherwise.
 */
function convertEquality(left: Expression, right: Expression): Expression {
  const bothValues = left.type.isValueType && right.type.isValueType;
  if (left.type.admitsNull && right.type.admitsNull && !bothValues) {
    return referenceEqual(left, right);
  }
  const [a, b] = promote(left, right);
  return equal(a, b);
}

function convertBinary(node: types.BinaryExpression, scope: Scope): Expression {
  if (node.left.type === 'PrivateIdentifier') return unsupported(node.left);

  const left = convertNode(node.left, scope);
  const right = convertNode(node.right, scope);

  switch (node.operator) {
    case '+':
      return binary('add', ...promote(left, right));
    case '-':
      return binary('subtract', ...promote(left, right));
    case '*':
      return binary('multiply', ...promote(left, right));
    case '/':
      return binary('divide', ...promote(left, right));
    case '<':
      return binary('lessThan', ...promote(left, right));
    case '>':
      return binary('greaterThan', ...promote(left, right));
    case '===':
    case '==':
      return convertEquality(left, right);
    case '!==':
    case '!=': {
      const equality = convertEquality(left, right);
      return equality.nodeType === 'binary' && equality.operator === 'equal'
        ? notEqual(equality.left, equality.right)
        : not(equality);
    }
    default:
      return unsupported(node, `operator ${node.operator}.`);
  }
}

function convertMember(node: types.MemberExpression, scope: Scope): Expression {
  if (node.object.type === 'Super') return unsupported(node.object);
  const target = convertNode(node.object, scope);

  if (node.computed) {
    if (node.property.type === 'PrivateIdentifier') return unsupported(node.property);
    return arrayIndex(target, convertNode(node.property, scope));
  }

  if (!is.identifier(node.property)) return unsupported(node.property);
  const name = node.property.name;

  const descriptor = target.type.getInheritedProperty(name);
  if (!descriptor) {
    throw new LambdaParseError(
      formatMessage('Unknown member in mapping function', `${target.type.name}.${name}`)
    );
  }
  return member(target, descriptor);
}

/**
 * Instance methods of the receiver first, then sequence extension methods
 * (`items.count()`).
 */
function convertCall(node: types.CallExpression, scope: Scope): Expression {
  const { callee } = node;
  if (!is.memberExpression(callee) || callee.computed || !is.identifier(callee.property)) {
    return unsupported(callee, 'only method calls are supported.');
  }
  if (callee.object.type === 'Super') return unsupported(callee.object);

  const receiver = convertNode(callee.object, scope);
  const args = node.arguments.map(arg =>
    arg.type === 'SpreadElement' ? unsupported(arg) : convertNode(arg, scope)
  );
  const name = callee.property.name;

  const instanceMethod = receiver.type.getInheritedMethod(name);
  if (instanceMethod && !instanceMethod.isStatic) return call(receiver, instanceMethod, args);

  const extension = findExtensionMethod(name, receiver.type);
  if (extension) return call(null, extension, [receiver, ...args]);

  throw new LambdaParseError(
    formatMessage('Unknown method in mapping function', `${receiver.type.name}.${name}`)
  );
}

function convertNode(node: types.Expression, scope: Scope): Expression {
  if (is.identifier(node)) {
    const bound = scope.get(node.name);
    if (bound) return bound;
    if (node.name === 'undefined') return NULL;
    throw new LambdaParseError(
      formatMessage('Unknown identifier in mapping function', node.name, 'only parameters can be referenced.')
    );
  }
  if (is.literal(node)) return convertLiteral(node);
  if (is.memberExpression(node)) return convertMember(node, scope);
  if (is.callExpression(node)) return convertCall(node, scope);
  if (is.binaryExpression(node)) return convertBinary(node, scope);

  if (is.logicalExpression(node)) {
    const left = convertNode(node.left, scope);
    const right = convertNode(node.right, scope);
    switch (node.operator) {
      case '||':
        return orElse(left, right);
      case '&&':
        return andAlso(left, right);
      case '??':
        return ifNullElse(left, right, left);
    }
  }

  if (is.unaryExpression(node)) {
    // Compilers emit `void 0` for `undefined`.
    if (node.operator === 'void' && is.literal(node.argument)) return NULL;
    const operand = convertNode(node.argument, scope);
    if (node.operator === '!') return not(operand);
    if (node.operator === '-') return unary('negate', operand);
    return unsupported(node, `operator ${node.operator}.`);
  }

  if (is.conditionalExpression(node)) {
    return condition(
      convertNode(node.test, scope),
      convertNode(node.consequent, scope),
      convertNode(node.alternate, scope)
    );
  }

  return unsupported(node);
}

/**
 * Converts a mapping function into an IR lambda.
 *
 * The function's source is parsed, not executed. Supported bodies are
 * member reads, indexing, method and sequence-extension calls, arithmetic,
 * comparisons, logical operators, `??` and the conditional operator, over
 * the function's parameters and literals.
 *
 * 1. Parse `fn.toString()` as a single arrow or function expression.
 * 2. Bind each parameter to the runtime type at the same position.
 * 3. Convert the returned expression node by node; each node is checked by
 *    the IR factories.
 *
 * @param fn
 *   The mapping function, e.g. `(order) => order.customer.name`.
 * @param parameterTypes
 *   Runtime types of the parameters, by position.
 * @throws {LambdaParseError}
 *   On unsupported syntax, unknown identifiers or unknown members.
 */
export function parseLambda(
  fn: (...args: never[]) => unknown,
  parameterTypes: readonly RuntimeType[]
): LambdaExpression {
  const node = getFunctionNode(fn.toString());

  if (node.params.length > parameterTypes.length) {
    throw new LambdaParseError(
      formatMessage(
        'Mapping function takes too many parameters',
        String(node.params.length),
        `at most ${parameterTypes.length} are supported.`
      )
    );
  }

  const parameters = node.params.map((param, index) => {
    const type = parameterTypes[index];
    if (!is.identifier(param) || !type) return unsupported(param, 'parameters must be plain identifiers.');
    return parameter(type, param.name);
  });

  const scope: Scope = new Map(
    parameters.map((param): [string, ParameterExpression] => [param.name, param])
  );
  return lambda(parameters, convertNode(getBodyExpression(node), scope));
}
