import { describe, expect, it } from 'vitest';
import { Int32 } from '../../metadata/builtins';
import { IrConstructionError } from '../../errors';
import { add, assign, block, constant, parameter, property } from '../factory';
import type { Expression } from '../nodes';
import { formatExpression } from '../printer';
import { getChildren, rewrite, walk } from '../visitor';
import { replace } from '../../expressions/rewriters';
import { Order } from '../../tests/fixtures';

describe('IR Visitor', () => {
  it('lists children in evaluation order', () => {
    const left = parameter(Int32, 'left');
    const right = parameter(Int32, 'right');
    expect(getChildren(add(left, right))).toEqual([left, right]);
  });

  it('walks nodes in pre-order', () => {
    const order = parameter(Order, 'order');
    const visited: string[] = [];
    walk(add(property(order, 'total'), constant(1, Int32)), node => visited.push(node.nodeType));
    expect(visited).toEqual(['binary', 'member', 'parameter', 'constant']);
  });

  it('rebuilds only the path to a replaced node', () => {
    const order = parameter(Order, 'order');
    const other = parameter(Order, 'other');
    const one = constant(1, Int32);
    const original = add(property(order, 'total'), one);

    const rewritten = replace(original, order, other);

    expect(formatExpression(rewritten)).toBe('(other.total + 1)');
    expect(formatExpression(original)).toBe('(order.total + 1)');
    expect(getChildren(rewritten)[1]).toBe(one);
  });

  it('returns the same node when nothing matches', () => {
    const original = add(parameter(Int32, 'a'), parameter(Int32, 'b'));
    expect(replace(original, parameter(Int32, 'a'), constant(0, Int32))).toBe(original);
  });

  it('does not descend into a replacement', () => {
    const a = parameter(Int32, 'a');
    const replacement = add(a, a);
    const seen: Expression[] = [];

    const result = rewrite(add(a, constant(2, Int32)), node => {
      seen.push(node);
      return node.id === a.id ? replacement : undefined;
    });

    expect(formatExpression(result)).toBe('((a + a) + 2)');
    expect(seen).not.toContain(replacement);
  });

  it('rejects a rewrite that turns an assignment target into a value', () => {
    const value = parameter(Int32, 'value');
    const tree = block([value], [assign(value, constant(1, Int32)), value]);

    expect(() => replace(tree, value, constant(3, Int32))).toThrow(IrConstructionError);
  });
});
