import {
  BooleanType,
  Delegate,
  Double,
  Int32,
  ObjectType,
  Void
} from '../metadata/builtins';
import type {
  ConstructorDescriptor,
  DataMemberDescriptor,
  MethodDescriptor
} from '../metadata/members';
import type { RuntimeType } from '../metadata/runtime-type';
import { IrConstructionError } from '../errors';
import { formatMessage } from '../report';
import type {
  ArrayIndexExpression,
  AssignExpression,
  BinaryExpression,
  BinaryOperator,
  BlockExpression,
  BreakExpression,
  CallExpression,
  ConditionalExpression,
  ConstantExpression,
  ConvertExpression,
  DefaultExpression,
  EmptyExpression,
  Expression,
  LabelTarget,
  LambdaExpression,
  LoopExpression,
  MemberExpression,
  NewExpression,
  ParameterExpression,
  TryFinallyExpression,
  TypeAsExpression,
  UnaryExpression,
  UnaryOperator
} from './nodes';
import { formatExpression } from './printer';

let nextNodeId = 1;

/**
 * Allocates a node id. Ids are unique for the lifetime of the process.
 */
export function nextId(): number {
  return nextNodeId++;
}

function reject(headline: string, expression: Expression | string, detail: string): never {
  const subject = typeof expression === 'string' ? expression : formatExpression(expression);
  throw new IrConstructionError(formatMessage(headline, subject, detail));
}

function isNumeric(type: RuntimeType): boolean {
  return type === Int32 || type === Double;
}

function checkArguments(
  owner: string,
  parameterTypes: readonly RuntimeType[],
  args: readonly Expression[]
): void {
  if (parameterTypes.length !== args.length) {
    reject(
      'Wrong number of arguments for',
      owner,
      `expected ${parameterTypes.length}, got ${args.length}.`
    );
  }

  parameterTypes.forEach((parameterType, index) => {
    const arg = args[index];
    if (arg && !parameterType.isAssignableFrom(arg.type)) {
      reject(
        'Argument type mismatch in',
        owner,
        `argument ${index} is ${arg.type.name}, expected ${parameterType.name}.`
      );
    }
  });
}

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

export function constant(value: unknown, type: RuntimeType): ConstantExpression {
  const isNull = value === null || value === undefined;
  if (isNull ? !type.admitsNull : !type.isInstance(value)) {
    reject('Constant does not fit type', type.name, `received ${String(value)}.`);
  }
  return { nodeType: 'constant', id: nextId(), type, value: isNull ? null : value };
}

/**
 * A lambda parameter or block-local variable.
 */
export function parameter(type: RuntimeType, name: string): ParameterExpression {
  return { nodeType: 'parameter', id: nextId(), type, name };
}

export const variable = parameter;

export function label(name: string): LabelTarget {
  return { id: nextId(), name };
}

export function defaultOf(type: RuntimeType): DefaultExpression {
  return { nodeType: 'default', id: nextId(), type };
}

export function empty(): EmptyExpression {
  return { nodeType: 'empty', id: nextId(), type: Void };
}

export const FALSE = constant(false, BooleanType);
export const TRUE = constant(true, BooleanType);
export const NULL = constant(null, ObjectType);
export const EMPTY = empty();

// ---------------------------------------------------------------------------
// Member access and invocation
// ---------------------------------------------------------------------------

export function member(
  target: Expression,
  descriptor: DataMemberDescriptor
): MemberExpression {
  if (!descriptor.declaringType.isAssignableFrom(target.type)) {
    reject(
      'Member is not declared on target',
      target,
      `${descriptor.declaringType.name}.${descriptor.name} cannot be read from ${target.type.name}.`
    );
  }
  return { nodeType: 'member', id: nextId(), type: descriptor.type, target, member: descriptor };
}

/**
 * Reads a property of `target` by exact name, searching base types and
 * implemented interfaces.
 *
 * @throws {IrConstructionError} When the target type has no such property.
 */
export function property(target: Expression, name: string): MemberExpression {
  const descriptor = target.type.getInheritedProperty(name);
  if (!descriptor) {
    return reject('Unknown property on', target, `${target.type.name} has no member "${name}".`);
  }
  return member(target, descriptor);
}

/**
 * Invokes a method.
 *
 * @param target
 *   Receiver; `null` for static and extension-style methods.
 * @param method
 *   The method descriptor.
 * @param args
 *   Arguments, checked against the declared parameter types.
 */
export function call(
  target: Expression | null,
  method: MethodDescriptor,
  args: readonly Expression[] = []
): CallExpression {
  const owner = `${method.declaringType.name}.${method.name}`;

  if (method.isStatic && target) {
    reject('Static method called with a receiver', owner, formatExpression(target));
  }
  if (!method.isStatic) {
    if (!target) return reject('Instance method called without a receiver', owner, 'target is null.');
    if (!method.declaringType.isAssignableFrom(target.type)) {
      reject('Method is not declared on target', target, `${owner} cannot be called on ${target.type.name}.`);
    }
  }
  checkArguments(owner, method.parameterTypes, args);

  return { nodeType: 'call', id: nextId(), type: method.returnType, target, method, args };
}

/**
 * Invokes an instance method of `target` by name, searching base types and
 * implemented interfaces.
 */
export function callMethod(
  target: Expression,
  name: string,
  args: readonly Expression[] = []
): CallExpression {
  const method = target.type.getInheritedMethod(name);
  if (!method) {
    return reject('Unknown method on', target, `${target.type.name} has no method "${name}".`);
  }
  return call(target, method, args);
}

export function newObject(
  ctor: ConstructorDescriptor,
  args: readonly Expression[] = []
): NewExpression {
  checkArguments(`new ${ctor.declaringType.name}`, ctor.parameterTypes, args);
  return { nodeType: 'new', id: nextId(), type: ctor.declaringType, ctor, args };
}

export function arrayIndex(array: Expression, index: Expression): ArrayIndexExpression {
  const elementType = array.type.elementType;
  if (!elementType) return reject('Indexed value is not an array', array, `type is ${array.type.name}.`);
  if (index.type !== Int32) reject('Array index must be Int32', index, `type is ${index.type.name}.`);

  return { nodeType: 'arrayIndex', id: nextId(), type: elementType, array, index };
}

// ---------------------------------------------------------------------------
// Control flow
// ---------------------------------------------------------------------------

/**
 * `test ? ifTrue : ifFalse`.
 *
 * Without an explicit `type` both branches must have the same type. With
 * `Void`, branches of any type are allowed and their values discarded.
 */
export function condition(
  test: Expression,
  ifTrue: Expression,
  ifFalse: Expression,
  type?: RuntimeType
): ConditionalExpression {
  if (test.type !== BooleanType) reject('Condition test must be Boolean', test, `type is ${test.type.name}.`);

  const resultType = type ?? ifTrue.type;
  if (!resultType.isVoid) {
    for (const branch of [ifTrue, ifFalse]) {
      const fits = type ? resultType.isAssignableFrom(branch.type) : branch.type === resultType;
      if (!fits) {
        reject('Conditional branch type mismatch', branch, `type is ${branch.type.name}, expected ${resultType.name}.`);
      }
    }
  }

  return { nodeType: 'conditional', id: nextId(), type: resultType, test, ifTrue, ifFalse };
}

/**
 * `if (test) ifTrue`, typed `Void`.
 */
export function ifThen(test: Expression, ifTrue: Expression): ConditionalExpression {
  return condition(test, ifTrue, EMPTY, Void);
}

/**
 * A sequence with scoped locals. Its value is the last expression's.
 */
export function block(
  variables: readonly ParameterExpression[],
  expressions: readonly Expression[],
  type?: RuntimeType
): BlockExpression {
  const last = expressions.at(-1);
  if (!last) return reject('Block must contain at least one expression', 'block', 'received none.');

  const resultType = type ?? last.type;
  if (!resultType.isVoid && !resultType.isAssignableFrom(last.type)) {
    reject('Block result type mismatch', last, `type is ${last.type.name}, expected ${resultType.name}.`);
  }

  return { nodeType: 'block', id: nextId(), type: resultType, variables, expressions };
}

export function loop(body: Expression, breakLabel: LabelTarget): LoopExpression {
  return { nodeType: 'loop', id: nextId(), type: Void, body, breakLabel };
}

export function breakTo(target: LabelTarget): BreakExpression {
  return { nodeType: 'break', id: nextId(), type: Void, target };
}

/**
 * Runs `finalizer` on every exit from `body`, including a thrown error and
 * a `break` out of an enclosing loop.
 */
export function tryFinally(body: Expression, finalizer: Expression): TryFinallyExpression {
  return { nodeType: 'tryFinally', id: nextId(), type: body.type, body, finalizer };
}

export function assign(
  left: ParameterExpression | MemberExpression,
  right: Expression
): AssignExpression {
  if (left.nodeType === 'member' && !left.member.canWrite) {
    reject('Cannot assign read-only member', left, 'the member has no setter.');
  }
  if (!left.type.isAssignableFrom(right.type)) {
    reject('Assigned value type mismatch', right, `type is ${right.type.name}, expected ${left.type.name}.`);
  }

  return { nodeType: 'assign', id: nextId(), type: left.type, left, right };
}

export function lambda(
  parameters: readonly ParameterExpression[],
  body: Expression
): LambdaExpression {
  return {
    nodeType: 'lambda',
    id: nextId(),
    type: Delegate,
    parameters,
    body,
    returnType: body.type
  };
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export function binary(
  operator: BinaryOperator,
  left: Expression,
  right: Expression
): BinaryExpression {
  const mismatch = (detail: string) =>
    reject(`Invalid operands for ${operator}`, left, detail);

  let type: RuntimeType = BooleanType;

  switch (operator) {
    case 'add':
    case 'subtract':
    case 'multiply':
    case 'divide':
      if (left.type !== right.type || !isNumeric(left.type)) {
        mismatch(`${left.type.name} and ${right.type.name} are not matching numeric types.`);
      }
      type = left.type;
      break;
    case 'lessThan':
    case 'greaterThan':
      if (left.type !== right.type || !isNumeric(left.type)) {
        mismatch(`${left.type.name} and ${right.type.name} are not matching numeric types.`);
      }
      break;
    case 'equal':
    case 'notEqual':
      if (left.type !== right.type) mismatch(`${left.type.name} and ${right.type.name} differ.`);
      break;
    case 'referenceEqual':
      if (!left.type.admitsNull || !right.type.admitsNull) {
        mismatch(`${left.type.name} and ${right.type.name} must both admit null.`);
      }
      break;
    case 'orElse':
    case 'andAlso':
      if (left.type !== BooleanType || right.type !== BooleanType) {
        mismatch('both operands must be Boolean.');
      }
      break;
  }

  return { nodeType: 'binary', id: nextId(), type, operator, left, right };
}

export const add = (left: Expression, right: Expression) => binary('add', left, right);
export const lessThan = (left: Expression, right: Expression) => binary('lessThan', left, right);
export const equal = (left: Expression, right: Expression) => binary('equal', left, right);
export const notEqual = (left: Expression, right: Expression) => binary('notEqual', left, right);
export const referenceEqual = (left: Expression, right: Expression) =>
  binary('referenceEqual', left, right);
export const orElse = (left: Expression, right: Expression) => binary('orElse', left, right);
export const andAlso = (left: Expression, right: Expression) => binary('andAlso', left, right);

export function unary(operator: UnaryOperator, operand: Expression): UnaryExpression {
  switch (operator) {
    case 'not':
      if (operand.type !== BooleanType) reject('Operand of not must be Boolean', operand, `type is ${operand.type.name}.`);
      break;
    case 'negate':
      if (!isNumeric(operand.type)) reject('Operand of negate must be numeric', operand, `type is ${operand.type.name}.`);
      break;
    case 'postIncrementAssign':
      if (operand.nodeType !== 'parameter' || !isNumeric(operand.type)) {
        reject('Increment target must be a numeric variable', operand, `type is ${operand.type.name}.`);
      }
      break;
  }

  return { nodeType: 'unary', id: nextId(), type: operand.type, operator, operand };
}

export const not = (operand: Expression) => unary('not', operand);
export const postIncrementAssign = (operand: ParameterExpression) =>
  unary('postIncrementAssign', operand);

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

export function convert(operand: Expression, type: RuntimeType): ConvertExpression {
  if (operand.type.isVoid || type.isVoid) {
    reject('Cannot convert to or from Void', operand, `target type is ${type.name}.`);
  }
  return { nodeType: 'convert', id: nextId(), type, operand };
}

export function typeAs(operand: Expression, type: RuntimeType): TypeAsExpression {
  if (!type.admitsNull) {
    reject('Probing cast needs a type that admits null', operand, `${type.name} is a value type.`);
  }
  return { nodeType: 'typeAs', id: nextId(), type, operand };
}

/**
 * `expression` unchanged when it already has `type`, else a conversion.
 */
export function toType(expression: Expression, type: RuntimeType): Expression {
  return expression.type === type ? expression : convert(expression, type);
}

export function toObject(expression: Expression): Expression {
  return toType(expression, ObjectType);
}

/**
 * `expression == null ? then : otherwise`, choosing the null test from the
 * static type of `expression`.
 *
 * 1. Non-nullable value type: it is never null, the result is `otherwise`.
 * 2. `Nullable<T>`: value equality with a null of the same type.
 * 3. Anything else: reference equality with null.
 *
 * @param otherwise
 *   Converted to `then`'s type; defaults to that type's default.
 */
export function ifNullElse(
  expression: Expression,
  then: Expression,
  otherwise?: Expression
): Expression {
  const fallback = !otherwise
    ? defaultOf(then.type)
    : then.type.isVoid
      ? otherwise
      : toType(otherwise, then.type);
  const type = expression.type;

  if (!type.admitsNull) return fallback;

  const test = type.isNullable
    ? equal(expression, constant(null, type))
    : referenceEqual(expression, NULL);

  return condition(test, then, fallback, then.type);
}
