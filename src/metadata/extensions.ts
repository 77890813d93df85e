import { IEnumerableOf, Int32, ObjectType } from './builtins';
import { getEnumerableType } from './collection-types';
import { type MethodDescriptor, type MemberSpec, method } from './members';
import { RuntimeType } from './runtime-type';
import { isMutableCollection } from '../runtime/collections';
import { getEnumerator } from '../runtime/enumerator';
import { NotSupportedError } from '../errors';
import { formatMessage } from '../report';

type MethodSpec = Extract<MemberSpec, { kind: 'method' }>;

/**
 * Static holder of sequence extension methods.
 */
export const Enumerable = new RuntimeType({ name: 'Enumerable', kind: 'reference' });

/**
 * An extension method generic over the element type of its receiver.
 * Closing it over the same element type yields the same descriptor.
 */
export class GenericMethodDefinition {
  private readonly closedMethods = new Map<RuntimeType, MethodDescriptor>();

  constructor(
    readonly name: string,
    readonly declaringType: RuntimeType,
    private readonly factory: (elementType: RuntimeType) => MethodSpec
  ) {}

  makeGenericMethod(elementType: RuntimeType): MethodDescriptor {
    const cached = this.closedMethods.get(elementType);
    if (cached) return cached;

    const closed: MethodDescriptor = {
      ...this.factory(elementType),
      declaringType: this.declaringType
    };
    this.closedMethods.set(elementType, closed);
    return closed;
  }
}

function firstElement(source: unknown): unknown {
  const enumerator = getEnumerator(source);
  try {
    if (!enumerator.moveNext()) {
      throw new NotSupportedError(
        formatMessage('Sequence contains no elements', 'first')
      );
    }
    return enumerator.current;
  } finally {
    enumerator.dispose();
  }
}

function countElements(source: unknown): number {
  if (isMutableCollection(source)) return source.count;

  const enumerator = getEnumerator(source);
  let count = 0;
  try {
    while (enumerator.moveNext()) count++;
  } finally {
    enumerator.dispose();
  }
  return count;
}

const extensionMethods = new Map<string, GenericMethodDefinition>([
  [
    'first',
    new GenericMethodDefinition('first', Enumerable, element =>
      method('first', element, {
        isExtension: true,
        parameters: [IEnumerableOf.makeGenericType(element)],
        invoke: (_target, [source]) => firstElement(source)
      })
    )
  ],
  [
    'count',
    new GenericMethodDefinition('count', Enumerable, element =>
      method('count', Int32, {
        isExtension: true,
        parameters: [IEnumerableOf.makeGenericType(element)],
        invoke: (_target, [source]) => countElements(source)
      })
    )
  ]
]);

/**
 * Resolves an extension method callable on a receiver of the given type.
 *
 * @param name
 *   Method name (`first`, `count`).
 * @param receiverType
 *   Static type of the receiver; must implement `IEnumerable<T>`.
 * @returns
 *   The method closed over the receiver's element type, or `undefined`.
 */
export function findExtensionMethod(
  name: string,
  receiverType: RuntimeType
): MethodDescriptor | undefined {
  const definition = extensionMethods.get(name);
  if (!definition) return undefined;

  const enumerable = getEnumerableType(receiverType);
  if (!enumerable) return undefined;

  return definition.makeGenericMethod(enumerable.typeArguments[0] ?? ObjectType);
}
