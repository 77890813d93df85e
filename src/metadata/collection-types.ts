import {
  ICollectionOf,
  IEnumerable,
  IEnumerableOf,
  IList,
  ObjectType
} from './builtins';
import type { GenericTypeDefinition, RuntimeType } from './runtime-type';

function findClosedInterface(
  type: RuntimeType,
  definition: GenericTypeDefinition
): RuntimeType | undefined {
  if (definition.isDefinitionOf(type)) return type;
  return type.allInterfaces.find(implemented => definition.isDefinitionOf(implemented));
}

/**
 * The closed `ICollection<T>` a type is or implements.
 *
 * @returns `undefined` when the type exposes no typed collection contract.
 */
export function getCollectionType(type: RuntimeType): RuntimeType | undefined {
  return findClosedInterface(type, ICollectionOf);
}

/**
 * The closed `IEnumerable<T>` a type is or implements.
 */
export function getEnumerableType(type: RuntimeType): RuntimeType | undefined {
  return findClosedInterface(type, IEnumerableOf);
}

/**
 * Element type of a sequence type.
 *
 * 1. Arrays: their element type.
 * 2. Typed sequences: the argument of the `IEnumerable<T>` they implement.
 * 3. Anything else: `Object`.
 */
export function getElementType(type: RuntimeType): RuntimeType {
  if (type.elementType) return type.elementType;
  return getEnumerableType(type)?.typeArguments[0] ?? ObjectType;
}

/**
 * Whether the type is, or implements, the untyped `IList` contract.
 */
export function isListType(type: RuntimeType): boolean {
  return type === IList || type.allInterfaces.includes(IList);
}

/**
 * Whether values of the type can be enumerated.
 */
export function isEnumerableType(type: RuntimeType): boolean {
  return type === IEnumerable || type.allInterfaces.includes(IEnumerable);
}
