import { describe, expect, it, test } from 'vitest';
import {
  ArrayListType,
  HashSetOf,
  ICollectionOf,
  IEnumerable,
  IEnumerableOf,
  IList,
  IListOf,
  IReadOnlyCollectionOf,
  Int32,
  ListOf,
  ObjectType,
  StringType,
  Void,
  arrayOf,
  nullableOf
} from '../builtins';
import {
  getCollectionType,
  getElementType,
  getEnumerableType,
  isEnumerableType,
  isListType
} from '../collection-types';
import { findExtensionMethod } from '../extensions';
import { getMemberPath } from '../member-path';
import type { RuntimeType } from '../runtime-type';
import { NotSupportedError } from '../../errors';
import { List } from '../../runtime/collections';
import { Inner, Leaf, Middle, Outer, Root } from '../../tests/fixtures';
import { type TestScenario, resolveInput } from '../../tests/types';

const Int32List = ListOf.makeGenericType(Int32);

/**
 * Test suite: runtime type metadata.
 *
 * Coverage:
 * - Assignability and null admission.
 * - Interface closure and generic caching.
 * - Collection contract lookup.
 * - Sequence extension methods.
 * - Dotted member paths.
 */
describe('Runtime Types', () => {
  describe('isAssignableFrom', () => {
    const scenarios: TestScenario<[RuntimeType, RuntimeType], boolean>[] = [
      { id: 'Identity', description: 'a type accepts itself', input: [Int32, Int32], expected: true },
      { id: 'Root', description: 'Object accepts value types', input: [ObjectType, Int32], expected: true },
      {
        id: 'Interface',
        description: 'an interface accepts its implementations',
        input: () => [IEnumerableOf.makeGenericType(Int32), Int32List],
        expected: true
      },
      {
        id: 'Array',
        description: 'arrays implement the typed sequence contract',
        input: () => [IEnumerableOf.makeGenericType(Int32), arrayOf(Int32)],
        expected: true
      },
      {
        id: 'Unrelated',
        description: 'unrelated classes are not assignable',
        input: [Root, Middle],
        expected: false
      },
      {
        id: 'Implementation',
        description: 'an implementation does not accept its interface',
        input: () => [Int32List, IEnumerableOf.makeGenericType(Int32)],
        expected: false
      },
      { id: 'Void', description: 'Object does not accept Void', input: [ObjectType, Void], expected: false }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const [target, source] = resolveInput(input);
      expect(target.isAssignableFrom(source)).toBe(expected);
    });
  });

  describe('Null and Defaults', () => {
    it('admits null for references and nullable value types only', () => {
      expect(StringType.admitsNull).toBe(true);
      expect(Int32.admitsNull).toBe(false);
      expect(nullableOf(Int32).admitsNull).toBe(true);
      expect(nullableOf(Int32).underlyingType).toBe(Int32);
    });

    it('defaults value types to their zero value and others to null', () => {
      expect(Int32.defaultValue).toBe(0);
      expect(nullableOf(Int32).defaultValue).toBeNull();
      expect(Root.defaultValue).toBeNull();
    });

    it('creates struct defaults with every member at its default', () => {
      expect(Outer.defaultValue).toEqual({ inner: { x: 0 } });
      expect(Inner.isValueType).toBe(true);
    });
  });

  describe('Generic Types', () => {
    it('returns the same closed type for the same arguments', () => {
      expect(ListOf.makeGenericType(Int32)).toBe(Int32List);
      expect(Int32List.name).toBe('List<Int32>');
      expect(Int32List.typeArguments).toEqual([Int32]);
    });

    it('rejects the wrong number of type arguments', () => {
      expect(() => ListOf.makeGenericType(Int32, StringType)).toThrow(
        '[mapping-plan] Wrong number of type arguments for "List": expected 1, got 2.'
      );
    });

    it('lists implemented interfaces in declaration order without duplicates', () => {
      expect(Int32List.allInterfaces.map(String)).toEqual([
        'IList<Int32>',
        'ICollection<Int32>',
        'IEnumerable<Int32>',
        'IEnumerable',
        'IReadOnlyCollection<Int32>',
        'IList'
      ]);
    });

    it('finds members declared on implemented interfaces', () => {
      expect(Int32List.getInheritedProperty('count')?.declaringType).toBe(
        ICollectionOf.makeGenericType(Int32)
      );
      expect(Int32List.getInheritedMethod('clear')?.declaringType).toBe(
        ICollectionOf.makeGenericType(Int32)
      );
      expect(Int32List.getProperty('count')).toBeUndefined();
    });
  });

  describe('Collection Contracts', () => {
    it('finds the typed collection contract of a type', () => {
      expect(getCollectionType(Int32List)).toBe(ICollectionOf.makeGenericType(Int32));
      expect(getCollectionType(ICollectionOf.makeGenericType(Int32))).toBe(
        ICollectionOf.makeGenericType(Int32)
      );
      expect(getCollectionType(arrayOf(Int32))).toBeUndefined();
      expect(getCollectionType(ArrayListType)).toBeUndefined();
    });

    it('finds the typed sequence contract of a type', () => {
      expect(getEnumerableType(HashSetOf.makeGenericType(StringType))).toBe(
        IEnumerableOf.makeGenericType(StringType)
      );
    });

    it('reads element types from arrays, typed sequences and untyped lists', () => {
      expect(getElementType(arrayOf(StringType))).toBe(StringType);
      expect(getElementType(IReadOnlyCollectionOf.makeGenericType(Leaf))).toBe(Leaf);
      expect(getElementType(ArrayListType)).toBe(ObjectType);
    });

    it('distinguishes list contracts', () => {
      expect(isListType(Int32List)).toBe(true);
      expect(isListType(IList)).toBe(true);
      expect(isListType(IListOf.makeGenericType(Int32))).toBe(false);
      expect(isListType(HashSetOf.makeGenericType(Int32))).toBe(false);
    });

    it('recognizes enumerable types', () => {
      expect(isEnumerableType(IEnumerable)).toBe(true);
      expect(isEnumerableType(arrayOf(Int32))).toBe(true);
      expect(isEnumerableType(StringType)).toBe(false);
    });
  });

  describe('Extension Methods', () => {
    it('closes first and count over the element type', () => {
      const first = findExtensionMethod('first', arrayOf(StringType));

      expect(first?.returnType).toBe(StringType);
      expect(first?.parameterTypes).toEqual([IEnumerableOf.makeGenericType(StringType)]);
      expect(findExtensionMethod('first', arrayOf(StringType))).toBe(first);
    });

    it('counts and reads the first element of any sequence', () => {
      const count = findExtensionMethod('count', Int32List);
      const first = findExtensionMethod('first', Int32List);

      expect(count?.invoke(undefined, [new List([4, 5, 6])])).toBe(3);
      expect(count?.invoke(undefined, [[4, 5]])).toBe(2);
      expect(first?.invoke(undefined, [new List([4, 5, 6])])).toBe(4);
    });

    it('rejects first on an empty sequence', () => {
      const first = findExtensionMethod('first', Int32List);
      expect(() => first?.invoke(undefined, [[]])).toThrow(NotSupportedError);
    });

    it('is unavailable for unknown names and non-sequences', () => {
      expect(findExtensionMethod('sum', Int32List)).toBeUndefined();
      expect(findExtensionMethod('count', StringType)).toBeUndefined();
    });
  });

  describe('getMemberPath', () => {
    it('resolves each segment on the type reached so far', () => {
      const path = getMemberPath(Root, 'middle.leaf.value');

      expect(path.map(member => member.name)).toEqual(['middle', 'leaf', 'value']);
      expect(path.map(member => member.declaringType)).toEqual([Root, Middle, Leaf]);
    });

    it('names the failing segment and its type', () => {
      expect(() => getMemberPath(Root, 'middle.size')).toThrow(
        '[mapping-plan] Invalid member path for "path": "size" is not a member of Middle. Root.middle.size'
      );
    });
  });
});
