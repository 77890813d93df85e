import {
  ArrayList,
  HashSet,
  List,
  ReadOnlyCollection,
  isMutableCollection,
  requireCollection
} from '../runtime/collections';
import {
  getEnumerator,
  isDisposable,
  isEnumerator,
  requireDisposable,
  requireEnumerator
} from '../runtime/enumerator';
import { InvalidCastError } from '../errors';
import { isArray, isIterable, isNullish } from '../guards';
import { formatMessage } from '../report';
import { constructorOf, method, property } from './members';
import { GenericTypeDefinition, RuntimeType } from './runtime-type';

function rejectCast(value: unknown, typeName: string): never {
  throw new InvalidCastError(
    formatMessage('Cannot convert value to', typeName, `received ${typeof value}.`)
  );
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const Void = new RuntimeType({ name: 'Void', kind: 'void' });

export const ObjectType = new RuntimeType({
  name: 'Object',
  kind: 'reference',
  isRoot: true,
  isInstance: () => true
});

export const StringType = new RuntimeType({
  name: 'String',
  kind: 'reference',
  isInstance: value => typeof value === 'string',
  members: () => [
    property('length', Int32, { readOnly: true })
  ]
});

export const BooleanType = new RuntimeType({
  name: 'Boolean',
  kind: 'value',
  defaultValue: false,
  isInstance: value => typeof value === 'boolean',
  coerce: value =>
    typeof value === 'boolean' ? value : rejectCast(value, 'Boolean')
});

export const Int32: RuntimeType = new RuntimeType({
  name: 'Int32',
  kind: 'value',
  defaultValue: 0,
  isInstance: value => Number.isInteger(value),
  coerce: value =>
    typeof value === 'number' ? Math.trunc(value) : rejectCast(value, 'Int32')
});

export const Double = new RuntimeType({
  name: 'Double',
  kind: 'value',
  defaultValue: 0,
  isInstance: value => typeof value === 'number',
  coerce: value =>
    typeof value === 'number' ? value : rejectCast(value, 'Double')
});

/**
 * Type of IR lambdas used as values.
 */
export const Delegate = new RuntimeType({
  name: 'Delegate',
  kind: 'reference',
  isInstance: value => typeof value === 'function'
});

/**
 * `Nullable<T>`: a value type that also admits `null`.
 */
export const NullableOf = new GenericTypeDefinition('Nullable', 1, ([underlying]) => {
  const inner = underlying ?? ObjectType;
  return {
    kind: 'value',
    underlyingType: inner,
    isInstance: value => inner.isInstance(value),
    coerce: value => inner.coerce(value),
    members: () => [
      property('hasValue', BooleanType, {
        readOnly: true,
        get: target => !isNullish(target)
      }),
      property('value', inner, {
        readOnly: true,
        get: target => (isNullish(target) ? rejectCast(target, inner.name) : target)
      })
    ]
  };
});

export function nullableOf(type: RuntimeType): RuntimeType {
  return NullableOf.makeGenericType(type);
}

// ---------------------------------------------------------------------------
// Disposal and enumeration contracts
// ---------------------------------------------------------------------------

export const IDisposable = new RuntimeType({
  name: 'IDisposable',
  kind: 'interface',
  isInstance: isDisposable,
  members: () => [
    method('dispose', Void, { invoke: target => requireDisposable(target).dispose() })
  ]
});

/**
 * Untyped enumerator. Does not extend `IDisposable`: releasing it requires
 * a runtime capability probe.
 */
export const IEnumerator = new RuntimeType({
  name: 'IEnumerator',
  kind: 'interface',
  isInstance: isEnumerator,
  members: () => [
    method('moveNext', BooleanType, {
      invoke: target => requireEnumerator(target, 'moveNext').moveNext()
    }),
    property('current', ObjectType, {
      readOnly: true,
      get: target => requireEnumerator(target, 'current').current
    })
  ]
});

export const IEnumeratorOf = new GenericTypeDefinition('IEnumerator', 1, ([element]) => ({
  kind: 'interface',
  isInstance: isEnumerator,
  interfaces: () => [IEnumerator, IDisposable],
  members: () => [
    property('current', element ?? ObjectType, {
      readOnly: true,
      get: target => requireEnumerator(target, 'current').current
    })
  ]
}));

export const IEnumerable = new RuntimeType({
  name: 'IEnumerable',
  kind: 'interface',
  isInstance: isIterable,
  members: () => [
    method('getEnumerator', IEnumerator, { invoke: target => getEnumerator(target) })
  ]
});

export const IEnumerableOf = new GenericTypeDefinition('IEnumerable', 1, ([element]) => ({
  kind: 'interface',
  isInstance: isIterable,
  interfaces: () => [IEnumerable],
  members: () => [
    method('getEnumerator', IEnumeratorOf.makeGenericType(element ?? ObjectType), {
      invoke: target => getEnumerator(target)
    })
  ]
}));

// ---------------------------------------------------------------------------
// Collection contracts
// ---------------------------------------------------------------------------

export const ICollectionOf = new GenericTypeDefinition('ICollection', 1, ([element]) => {
  const item = element ?? ObjectType;
  return {
    kind: 'interface',
    isInstance: isMutableCollection,
    interfaces: () => [IEnumerableOf.makeGenericType(item)],
    members: () => [
      method('add', Void, {
        parameters: [item],
        invoke: (target, [value]) => requireCollection(target, 'add').add(value)
      }),
      method('clear', Void, {
        invoke: target => requireCollection(target, 'clear').clear()
      }),
      property('isReadOnly', BooleanType, {
        readOnly: true,
        get: target => requireCollection(target, 'isReadOnly').isReadOnly
      }),
      property('count', Int32, {
        readOnly: true,
        get: target => requireCollection(target, 'count').count
      })
    ]
  };
});

/**
 * Untyped list contract: the fallback shape when a destination exposes no
 * typed collection contract.
 */
export const IList = new RuntimeType({
  name: 'IList',
  kind: 'interface',
  isInstance: isMutableCollection,
  interfaces: () => [IEnumerable],
  members: () => [
    method('add', Void, {
      parameters: [ObjectType],
      invoke: (target, [value]) => requireCollection(target, 'add').add(value)
    }),
    method('clear', Void, {
      invoke: target => requireCollection(target, 'clear').clear()
    }),
    property('isReadOnly', BooleanType, {
      readOnly: true,
      get: target => requireCollection(target, 'isReadOnly').isReadOnly
    })
  ]
});

export const IListOf = new GenericTypeDefinition('IList', 1, ([element]) => ({
  kind: 'interface',
  isInstance: isMutableCollection,
  interfaces: () => [ICollectionOf.makeGenericType(element ?? ObjectType)]
}));

export const IReadOnlyCollectionOf = new GenericTypeDefinition(
  'IReadOnlyCollection',
  1,
  ([element]) => ({
    kind: 'interface',
    isInstance: isIterable,
    interfaces: () => [IEnumerableOf.makeGenericType(element ?? ObjectType)],
    members: () => [
      property('count', Int32, {
        readOnly: true,
        get: target => requireCollection(target, 'count').count
      })
    ]
  })
);

// ---------------------------------------------------------------------------
// Concrete collections
// ---------------------------------------------------------------------------

export const ListOf = new GenericTypeDefinition('List', 1, ([element]) => {
  const item = element ?? ObjectType;
  return {
    kind: 'reference',
    isInstance: value => value instanceof List,
    interfaces: () => [
      IListOf.makeGenericType(item),
      IReadOnlyCollectionOf.makeGenericType(item),
      IList
    ],
    members: () => [
      method('getEnumerator', IEnumeratorOf.makeGenericType(item), {
        invoke: target => getEnumerator(target)
      })
    ],
    constructors: () => [
      constructorOf([], () => new List()),
      constructorOf([IEnumerableOf.makeGenericType(item)], ([items]) =>
        isIterable(items) ? new List(items) : new List()
      )
    ]
  };
});

export const HashSetOf = new GenericTypeDefinition('HashSet', 1, ([element]) => ({
  kind: 'reference',
  isInstance: value => value instanceof HashSet,
  interfaces: () => [ICollectionOf.makeGenericType(element ?? ObjectType)],
  constructors: () => [constructorOf([], () => new HashSet())]
}));

export const ArrayListType = new RuntimeType({
  name: 'ArrayList',
  kind: 'reference',
  isInstance: value => value instanceof ArrayList,
  interfaces: () => [IList],
  constructors: () => [constructorOf([], () => new ArrayList())]
});

/**
 * Read-only wrapper. Its single constructor takes the list it wraps.
 */
export const ReadOnlyCollectionOf = new GenericTypeDefinition(
  'ReadOnlyCollection',
  1,
  ([element]) => {
    const item = element ?? ObjectType;
    return {
      kind: 'reference',
      isInstance: value => value instanceof ReadOnlyCollection,
      interfaces: () => [
        IListOf.makeGenericType(item),
        IReadOnlyCollectionOf.makeGenericType(item),
        IList
      ],
      constructors: () => [
        constructorOf([IListOf.makeGenericType(item)], ([list]) =>
          new ReadOnlyCollection(requireCollection(list, 'ReadOnlyCollection'))
        )
      ]
    };
  }
);

// ---------------------------------------------------------------------------
// Arrays
// ---------------------------------------------------------------------------

/**
 * Common base of all array types; declares `length`.
 */
export const ArrayBase = new RuntimeType({
  name: 'Array',
  kind: 'reference',
  isInstance: isArray,
  members: () => [
    property('length', Int32, {
      readOnly: true,
      get: target =>
        isArray(target) ? target.length : rejectCast(target, 'Array')
    })
  ]
});

const arrayTypes = new Map<RuntimeType, RuntimeType>();

/**
 * The array type `T[]` (cached per element type).
 */
export function arrayOf(elementType: RuntimeType): RuntimeType {
  const cached = arrayTypes.get(elementType);
  if (cached) return cached;

  const type = new RuntimeType({
    name: `${elementType.name}[]`,
    kind: 'reference',
    baseType: ArrayBase,
    elementType,
    isInstance: isArray,
    interfaces: () => [IEnumerableOf.makeGenericType(elementType)]
  });
  arrayTypes.set(elementType, type);
  return type;
}
