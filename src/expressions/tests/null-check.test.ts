import { describe, expect, it } from 'vitest';
import { Int32, nullableOf } from '../../metadata/builtins';
import { add, constant, lambda, parameter, property } from '../../ir/factory';
import { formatExpression } from '../../ir/printer';
import { compileLambda } from '../../compiler/compile';
import { nullCheck } from '../null-check';
import { Outer, Root } from '../../tests/fixtures';

function rootValuePath() {
  const source = parameter(Root, 'source');
  return { source, path: property(property(property(source, 'middle'), 'leaf'), 'value') };
}

/**
 * Test suite: null-guarded member chains.
 *
 * Coverage:
 * - Printed shape of the guard.
 * - Value-type links.
 * - Short-circuit evaluation.
 * - Nullable destinations.
 */
describe('nullCheck', () => {
  it('guards each reference link with a named temporary', () => {
    const { path } = rootValuePath();

    expect(formatExpression(nullCheck(path))).toBe(
      '{ let source: Root; let sourceMiddle: Middle; let sourceMiddleLeaf: Leaf; ' +
        '((((false || ((source = source) === null)) || ((sourceMiddle = source.middle) === null)) ' +
        '|| ((sourceMiddleLeaf = sourceMiddle.leaf) === null)) ? default(Int32) : sourceMiddleLeaf.value) }'
    );
  });

  it('prints the same guard each time the chain is built', () => {
    expect(formatExpression(nullCheck(rootValuePath().path))).toBe(
      formatExpression(nullCheck(rootValuePath().path))
    );
  });

  it('tests value-type links with the constant false', () => {
    const outer = parameter(Outer, 'outer');
    const path = property(property(outer, 'inner'), 'x');

    expect(formatExpression(nullCheck(path))).toBe(
      '{ let outer: Outer; let outerInner: Inner; ' +
        '(((false || { (outer = outer); false }) || { (outerInner = outer.inner); false }) ' +
        '? default(Int32) : outerInner.x) }'
    );
  });

  it('returns the default when a link is null and the value otherwise', () => {
    const { source, path } = rootValuePath();
    const read = compileLambda(lambda([source], nullCheck(path)));

    expect(read(null)).toBe(0);
    expect(read({ middle: null })).toBe(0);
    expect(read({ middle: { leaf: null } })).toBe(0);
    expect(read({ middle: { leaf: { value: 7 } } })).toBe(7);
  });

  it('reads each link once and stops at the first null', () => {
    const { source, path } = rootValuePath();
    const read = compileLambda(lambda([source], nullCheck(path)));
    const reads: string[] = [];
    const middle = {
      get leaf() {
        reads.push('leaf');
        return null;
      }
    };
    const root = {
      get middle() {
        reads.push('middle');
        return middle;
      }
    };

    expect(read(root)).toBe(0);
    expect(reads).toEqual(['middle', 'leaf']);
  });

  it('widens the result to a nullable destination', () => {
    const { source, path } = rootValuePath();
    const guarded = nullCheck(path, nullableOf(Int32));
    const read = compileLambda(lambda([source], guarded));

    expect(guarded.type).toBe(nullableOf(Int32));
    expect(read({ middle: null })).toBeNull();
    expect(read({ middle: { leaf: { value: 7 } } })).toBe(7);
  });

  it('keeps the expression type for an unrelated destination', () => {
    const { path } = rootValuePath();
    expect(nullCheck(path, nullableOf(Outer)).type).toBe(Int32);
  });

  it('leaves an already guarded expression unchanged', () => {
    const { path } = rootValuePath();
    const guarded = nullCheck(path);
    expect(nullCheck(guarded)).toBe(guarded);
  });

  it('leaves expressions that are not parameter-rooted chains unchanged', () => {
    const sum = add(constant(1, Int32), constant(2, Int32));
    const fromConstant = property(constant({ middle: null }, Root), 'middle');

    expect(nullCheck(sum)).toBe(sum);
    expect(nullCheck(fromConstant)).toBe(fromConstant);
  });
});
