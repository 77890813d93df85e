import type { RuntimeType } from '../metadata/runtime-type';
import {
  CompileError,
  InvalidCastError,
  NullReferenceError
} from '../errors';
import { assertNever, isArray, isNullish } from '../guards';
import type {
  BinaryExpression,
  Expression,
  LambdaExpression,
  ParameterExpression
} from '../ir/nodes';
import { formatExpression } from '../ir/printer';
import { formatMessage } from '../report';

/**
 * Activation record of one call of a compiled lambda.
 *
 * `slots` holds parameters first, then every block local (each local gets
 * its own slot at compile time). `pendingBreak` is the id of the loop label
 * a `break` is unwinding to.
 */
type Frame = {
  readonly slots: unknown[];
  pendingBreak: number | undefined;
};

type Evaluator = (frame: Frame) => unknown;

/**
 * Variable id to slot index, for the variables in scope.
 */
type Scope = ReadonlyMap<number, number>;

type CompileState = {
  slotCount: number;
};

/**
 * A compiled lambda. Missing arguments are `null`.
 */
export type CompiledLambda = (...args: unknown[]) => unknown;

function resolveSlot(variable: ParameterExpression, scope: Scope): number {
  const slot = scope.get(variable.id);
  if (slot === undefined) {
    throw new CompileError(
      formatMessage('Variable is not in scope', variable.name, 'it is neither a parameter nor a block local.')
    );
  }
  return slot;
}

function nullReference(expression: Expression): NullReferenceError {
  return new NullReferenceError(
    formatMessage('Null reference in', formatExpression(expression))
  );
}

function requireNumber(value: unknown, expression: Expression): number {
  if (typeof value !== 'number') {
    throw new InvalidCastError(
      formatMessage('Expected a number in', formatExpression(expression), `received ${typeof value}.`)
    );
  }
  return value;
}

function isNullEqual(left: unknown, right: unknown): boolean {
  return isNullish(left) ? isNullish(right) : left === right;
}

/**
 * Converts a value to `type`, as `convert` nodes do.
 *
 * 1. Null: kept for types that admit null, an error otherwise.
 * 2. Value types: coerced (`Int32` truncates a `Double`).
 * 3. Reference and interface types: checked with the type's instance test.
 */
function convertValue(value: unknown, type: RuntimeType, expression: Expression): unknown {
  if (isNullish(value)) {
    if (type.admitsNull) return null;
    throw new InvalidCastError(
      formatMessage('Cannot convert null to', type.name, formatExpression(expression))
    );
  }
  if (type.isValueType) return type.coerce(value);
  if (type.isInstance(value)) return value;

  throw new InvalidCastError(
    formatMessage('Cannot convert value to', type.name, formatExpression(expression))
  );
}

function compileBinary(
  expression: BinaryExpression,
  scope: Scope,
  state: CompileState
): Evaluator {
  const left = compileNode(expression.left, scope, state);
  const right = compileNode(expression.right, scope, state);
  const isInteger = expression.left.type.name === 'Int32';

  const numbers = (frame: Frame): [number, number] => [
    requireNumber(left(frame), expression.left),
    requireNumber(right(frame), expression.right)
  ];

  switch (expression.operator) {
    case 'add':
      return frame => {
        const [a, b] = numbers(frame);
        return a + b;
      };
    case 'subtract':
      return frame => {
        const [a, b] = numbers(frame);
        return a - b;
      };
    case 'multiply':
      return frame => {
        const [a, b] = numbers(frame);
        return a * b;
      };
    case 'divide':
      return frame => {
        const [a, b] = numbers(frame);
        return isInteger ? Math.trunc(a / b) : a / b;
      };
    case 'lessThan':
      return frame => {
        const [a, b] = numbers(frame);
        return a < b;
      };
    case 'greaterThan':
      return frame => {
        const [a, b] = numbers(frame);
        return a > b;
      };
    case 'equal':
    case 'referenceEqual':
      return frame => isNullEqual(left(frame), right(frame));
    case 'notEqual':
      return frame => !isNullEqual(left(frame), right(frame));
    case 'orElse':
      return frame => left(frame) === true || right(frame) === true;
    case 'andAlso':
      return frame => left(frame) === true && right(frame) === true;
    default:
      return assertNever(expression.operator, 'Unknown binary operator.');
  }
}

/**
 * Reduces one node to an evaluator.
 */
function compileNode(expression: Expression, scope: Scope, state: CompileState): Evaluator {
  switch (expression.nodeType) {
    case 'constant': {
      const { value } = expression;
      return () => value;
    }
    case 'parameter': {
      const slot = resolveSlot(expression, scope);
      return frame => frame.slots[slot];
    }
    case 'default': {
      const { type } = expression;
      return () => type.defaultValue;
    }
    case 'empty':
      return () => undefined;
    case 'member': {
      const target = compileNode(expression.target, scope, state);
      const { member } = expression;
      return frame => {
        const receiver = target(frame);
        if (isNullish(receiver)) throw nullReference(expression);
        return member.get(receiver) ?? null;
      };
    }
    case 'call': {
      const target = expression.target ? compileNode(expression.target, scope, state) : undefined;
      const args = expression.args.map(arg => compileNode(arg, scope, state));
      const { method } = expression;
      const returnsVoid = method.returnType.isVoid;
      return frame => {
        let receiver: unknown = undefined;
        if (target) {
          receiver = target(frame);
          if (isNullish(receiver)) throw nullReference(expression);
        }
        const result = method.invoke(receiver, args.map(arg => arg(frame)));
        return returnsVoid ? undefined : (result ?? null);
      };
    }
    case 'conditional': {
      const test = compileNode(expression.test, scope, state);
      const ifTrue = compileNode(expression.ifTrue, scope, state);
      const ifFalse = compileNode(expression.ifFalse, scope, state);
      return frame => (test(frame) === true ? ifTrue(frame) : ifFalse(frame));
    }
    case 'block': {
      const inner = new Map(scope);
      const locals = expression.variables.map(variable => {
        const slot = state.slotCount++;
        inner.set(variable.id, slot);
        return { slot, type: variable.type };
      });
      const steps = expression.expressions.map(step => compileNode(step, inner, state));
      return frame => {
        for (const local of locals) frame.slots[local.slot] = local.type.defaultValue;

        let result: unknown = undefined;
        for (const step of steps) {
          result = step(frame);
          if (frame.pendingBreak !== undefined) return undefined;
        }
        return result;
      };
    }
    case 'loop': {
      const body = compileNode(expression.body, scope, state);
      const labelId = expression.breakLabel.id;
      return frame => {
        for (;;) {
          body(frame);
          if (frame.pendingBreak === labelId) {
            frame.pendingBreak = undefined;
            return undefined;
          }
          if (frame.pendingBreak !== undefined) return undefined;
        }
      };
    }
    case 'break': {
      const labelId = expression.target.id;
      return frame => {
        frame.pendingBreak = labelId;
        return undefined;
      };
    }
    case 'assign': {
      const value = compileNode(expression.right, scope, state);
      const { left } = expression;

      if (left.nodeType === 'parameter') {
        const slot = resolveSlot(left, scope);
        return frame => {
          const assigned = value(frame);
          frame.slots[slot] = assigned;
          return assigned;
        };
      }

      const target = compileNode(left.target, scope, state);
      const { member } = left;
      return frame => {
        const receiver = target(frame);
        if (isNullish(receiver)) throw nullReference(left);
        const assigned = value(frame);
        member.set(receiver, assigned);
        return assigned;
      };
    }
    case 'binary':
      return compileBinary(expression, scope, state);
    case 'unary': {
      const { operand } = expression;
      if (expression.operator === 'postIncrementAssign') {
        if (operand.nodeType !== 'parameter') {
          throw new CompileError(
            formatMessage('Increment target must be a variable', formatExpression(operand))
          );
        }
        const slot = resolveSlot(operand, scope);
        return frame => {
          const previous = requireNumber(frame.slots[slot], operand);
          frame.slots[slot] = previous + 1;
          return previous;
        };
      }

      const value = compileNode(operand, scope, state);
      return expression.operator === 'not'
        ? frame => value(frame) !== true
        : frame => -requireNumber(value(frame), operand);
    }
    case 'convert': {
      const operand = compileNode(expression.operand, scope, state);
      const { type } = expression;
      return frame => convertValue(operand(frame), type, expression);
    }
    case 'typeAs': {
      const operand = compileNode(expression.operand, scope, state);
      const { type } = expression;
      return frame => {
        const value = operand(frame);
        return !isNullish(value) && type.isInstance(value) ? value : null;
      };
    }
    case 'new': {
      const args = expression.args.map(arg => compileNode(arg, scope, state));
      const { ctor } = expression;
      return frame => ctor.invoke(args.map(arg => arg(frame)));
    }
    case 'tryFinally': {
      const body = compileNode(expression.body, scope, state);
      const finalizer = compileNode(expression.finalizer, scope, state);
      return frame => {
        try {
          return body(frame);
        } finally {
          const pending = frame.pendingBreak;
          frame.pendingBreak = undefined;
          finalizer(frame);
          frame.pendingBreak = pending;
        }
      };
    }
    case 'arrayIndex': {
      const array = compileNode(expression.array, scope, state);
      const index = compileNode(expression.index, scope, state);
      return frame => {
        const values = array(frame);
        if (isNullish(values)) throw nullReference(expression);
        if (!isArray(values)) {
          throw new InvalidCastError(
            formatMessage('Expected an array in', formatExpression(expression))
          );
        }
        const position = requireNumber(index(frame), expression.index);
        if (position < 0 || position >= values.length) {
          throw new RangeError(
            formatMessage('Array index out of range in', formatExpression(expression), `index ${position}.`)
          );
        }
        return values[position] ?? null;
      };
    }
    case 'lambda':
      throw new CompileError(
        formatMessage('Nested lambdas cannot be compiled', formatExpression(expression))
      );
    default:
      return assertNever(expression, 'Unknown IR node.');
  }
}

/**
 * Reduces an IR lambda to a JavaScript function.
 *
 * Variables are resolved to frame slots once, here; each call allocates a
 * fresh frame, so a compiled lambda is reentrant. `undefined` arguments
 * and member values are read as `null`.
 *
 * @param expression
 *   The lambda to compile. Its body must not contain lambdas.
 * @returns
 *   A function taking the lambda's parameters positionally.
 * @throws {CompileError}
 *   When the body references a variable that is not in scope, or contains
 *   a lambda.
 */
export function compileLambda(expression: LambdaExpression): CompiledLambda {
  const scope = new Map<number, number>();
  expression.parameters.forEach((parameter, index) => scope.set(parameter.id, index));

  const state: CompileState = { slotCount: expression.parameters.length };
  const body = compileNode(expression.body, scope, state);
  const parameterCount = expression.parameters.length;

  return (...args: unknown[]) => {
    const slots = new Array<unknown>(state.slotCount).fill(null);
    for (let index = 0; index < parameterCount; index++) {
      slots[index] = args[index] ?? null;
    }
    return body({ slots, pendingBreak: undefined });
  };
}
