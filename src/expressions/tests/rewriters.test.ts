import { describe, expect, it } from 'vitest';
import { Int32, ObjectType, StringType } from '../../metadata/builtins';
import { add, lambda, parameter, property, typeAs } from '../../ir/factory';
import { formatExpression } from '../../ir/printer';
import { convertReplaceParameters, replace, replaceParameters } from '../rewriters';
import { Order } from '../../tests/fixtures';

describe('Tree Rewriters', () => {
  it('substitutes parameters in order and leaves the rest free', () => {
    const a = parameter(Int32, 'a');
    const b = parameter(Int32, 'b');
    const sum = lambda([a, b], add(a, b));

    expect(formatExpression(replaceParameters(sum, parameter(Int32, 'x')))).toBe('(x + b)');
    expect(formatExpression(sum)).toBe('(a, b) => (a + b)');
  });

  it('ignores replacements beyond the parameter list', () => {
    const a = parameter(Int32, 'a');
    const x = parameter(Int32, 'x');
    expect(replaceParameters(lambda([a], a), x, parameter(Int32, 'y'))).toBe(x);
  });

  it('substitutes a parameter with a member access', () => {
    const total = parameter(Int32, 'total');
    const order = parameter(Order, 'order');
    const body = replaceParameters(lambda([total], add(total, total)), property(order, 'total'));

    expect(formatExpression(body)).toBe('(order.total + order.total)');
  });

  it('converts replacements to the parameter type', () => {
    const value = parameter(ObjectType, 'value');
    const probe = lambda([value], typeAs(value, StringType));

    expect(formatExpression(convertReplaceParameters(probe, parameter(Int32, 'count')))).toBe(
      '(convert(count, Object) as String)'
    );
  });

  it('replaces nodes by identity, not by shape', () => {
    const first = parameter(Int32, 'n');
    const second = parameter(Int32, 'n');
    const result = replace(add(first, second), first, parameter(Int32, 'm'));

    expect(formatExpression(result)).toBe('(m + n)');
  });
});
