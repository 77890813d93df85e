import { describe, expect, it, test } from 'vitest';
import {
  ArrayListType,
  HashSetOf,
  ICollectionOf,
  IEnumerableOf,
  IReadOnlyCollectionOf,
  Int32,
  ListOf,
  ReadOnlyCollectionOf,
  arrayOf
} from '../../metadata/builtins';
import type { RuntimeType } from '../../metadata/runtime-type';
import { MissingConstructorError } from '../../errors';
import { defaultOf, parameter } from '../../ir/factory';
import type { Expression } from '../../ir/nodes';
import { formatExpression } from '../../ir/printer';
import { ArrayList, HashSet, List, ReadOnlyCollection } from '../../runtime/collections';
import { DEFAULT_PROFILE } from '../../types/configuration';
import { Mapper } from '../../mapper/mapper';
import { MapperConfiguration, type TypeMapDefinition } from '../../mapper/configuration';
import { mapCollectionExpression, mapReadOnlyCollection } from '../collection-mapper';
import { TreeNode, TreeNodeDto, defineHolder, expectList } from '../../tests/fixtures';
import { type TestScenario, resolveInput } from '../../tests/types';

const Int32Array = arrayOf(Int32);
const Int32List = ListOf.makeGenericType(Int32);

function createMapper(typeMaps: TypeMapDefinition[] = [], allowNullCollections = false): Mapper {
  return new Mapper(new MapperConfiguration({ profile: { allowNullCollections }, typeMaps }));
}

function toArray(value: unknown): unknown[] {
  if (value instanceof List || value instanceof HashSet || value instanceof ReadOnlyCollection) {
    return [...value];
  }
  throw new Error(`Expected a collection, got ${typeof value}.`);
}

/**
 * Test suite: populating destination collections.
 *
 * Coverage:
 * - Reusing or creating the destination.
 * - Destination contracts (typed, untyped, interface, read-only).
 * - Member-level reuse rules.
 */
describe('Collection Mapping', () => {
  describe('Destination Instance', () => {
    it('clears and refills an existing list', () => {
      const existing = new List([9, 8]);
      const result = createMapper().map([1, 2, 3], Int32Array, Int32List, existing);

      expect(result).toBe(existing);
      expect([...existing]).toEqual([1, 2, 3]);
    });

    it('creates a list when the destination is null', () => {
      const result = createMapper().map([1, 2, 3], Int32Array, Int32List);
      expect(expectList(result).toArray()).toEqual([1, 2, 3]);
    });

    it('maps a null source to an empty collection', () => {
      expect(expectList(createMapper().map(null, Int32Array, Int32List)).count).toBe(0);
    });

    it('maps a null source to null when null collections are allowed', () => {
      expect(createMapper([], true).map(null, Int32Array, Int32List)).toBeNull();
    });
  });

  describe('Destination Contracts', () => {
    type Contract = { destination: RuntimeType; instance: abstract new (...args: never[]) => unknown };

    const scenarios: TestScenario<Contract, unknown[]>[] = [
      {
        id: 'Untyped List',
        description: 'falls back to the untyped list contract',
        input: { destination: ArrayListType, instance: ArrayList },
        expected: [1, 2, 2]
      },
      {
        id: 'Sequence Interface',
        description: 'creates a list behind a sequence interface',
        input: { destination: IEnumerableOf.makeGenericType(Int32), instance: List },
        expected: [1, 2, 2]
      },
      {
        id: 'Set',
        description: 'adds through the typed collection contract',
        input: { destination: HashSetOf.makeGenericType(Int32), instance: HashSet },
        expected: [1, 2]
      },
      {
        id: 'Read-only Interface',
        description: 'wraps a populated list',
        input: { destination: IReadOnlyCollectionOf.makeGenericType(Int32), instance: ReadOnlyCollection },
        expected: [1, 2, 2]
      },
      {
        id: 'Read-only Class',
        description: 'wraps a populated list for the concrete wrapper type',
        input: { destination: ReadOnlyCollectionOf.makeGenericType(Int32), instance: ReadOnlyCollection },
        expected: [1, 2, 2]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const { destination, instance } = resolveInput(input);
      const result = createMapper().map([1, 2, 2], Int32Array, destination);

      expect(result).toBeInstanceOf(instance);
      expect(toArray(result)).toEqual(expected);
    });

    it('requires exactly one single-argument constructor on the wrapper', () => {
      const source = parameter(Int32Array, 'source');
      const destination = defaultOf(IReadOnlyCollectionOf.makeGenericType(Int32));
      const provider = { resolveTypeMap: () => undefined };

      expect(() =>
        mapReadOnlyCollection(ListOf, HashSetOf, provider, DEFAULT_PROFILE, undefined, source, destination)
      ).toThrow(MissingConstructorError);
      expect(() =>
        mapReadOnlyCollection(ListOf, HashSetOf, provider, DEFAULT_PROFILE, undefined, source, destination)
      ).toThrow('[mapping-plan] Expected exactly one single-argument constructor on "HashSet<Int32>": found 0.');
    });
  });

  describe('Member Collections', () => {
    const QuantitySource = defineHolder('QuantitySource', Int32Array);

    it('replaces a settable member that reports read-only', () => {
      const QuantityTarget = defineHolder('QuantityTarget', ICollectionOf.makeGenericType(Int32));
      const mapper = createMapper([{ source: QuantitySource, destination: QuantityTarget }]);
      const frozen = new ReadOnlyCollection(new List([9]));
      const target = { items: frozen };

      mapper.map({ items: [1, 2] }, QuantitySource, QuantityTarget, target);

      expect(target.items).not.toBe(frozen);
      expect(toArray(target.items)).toEqual([1, 2]);
      expect([...frozen]).toEqual([9]);
    });

    it('refills a read-only member in place', () => {
      const FixedTarget = defineHolder('FixedTarget', Int32List, true);
      const mapper = createMapper([
        {
          source: QuantitySource,
          destination: FixedTarget,
          members: { items: { useDestinationValue: true } }
        }
      ]);
      const items = new List([7]);
      const target = { items };

      mapper.map({ items: [3, 4] }, QuantitySource, FixedTarget, target);

      expect(target.items).toBe(items);
      expect([...items]).toEqual([3, 4]);
    });
  });

  describe('Element Context Check', () => {
    const TreeNodeList = ListOf.makeGenericType(TreeNode);
    const TreeNodeDtoList = ListOf.makeGenericType(TreeNodeDto);

    /**
     * `List<TreeNode> -> List<TreeNodeDto>` outside any member map.
     */
    function buildTreeCopy(maxDepth: number): Expression {
      const configuration = new MapperConfiguration({
        typeMaps: [{ source: TreeNode, destination: TreeNodeDto, maxDepth }]
      });
      return mapCollectionExpression(
        configuration,
        configuration.profile,
        undefined,
        parameter(TreeNodeList, 'nodes'),
        parameter(TreeNodeDtoList, 'dtos')
      );
    }

    function firstStep(expression: Expression): string | undefined {
      if (expression.nodeType !== 'block') throw new Error('Expected a block.');
      const [first] = expression.expressions;
      return first && formatExpression(first);
    }

    it('checks the context first when the element map tracks depth', () => {
      expect(firstStep(buildTreeCopy(2))).toBe('context.checkContext()');
    });

    it('starts with the destination when the element map has no depth limit', () => {
      expect(firstStep(buildTreeCopy(0))).toBe('(passedDestination = dtos)');
    });

    it('prints the same tree each time it is built', () => {
      expect(formatExpression(buildTreeCopy(2))).toBe(formatExpression(buildTreeCopy(2)));
    });
  });
});
