import {
  ICollectionOf,
  IEnumerableOf,
  IListOf,
  IReadOnlyCollectionOf,
  ListOf,
  ObjectType,
  ReadOnlyCollectionOf
} from '../metadata/builtins';
import type { RuntimeType } from '../metadata/runtime-type';
import { MissingConstructorError } from '../errors';
import { defaultOf, newObject } from '../ir/factory';
import type { Expression } from '../ir/nodes';
import { formatMessage } from '../report';

const LIST_INTERFACES = [IEnumerableOf, ICollectionOf, IListOf];

function parameterlessConstructor(type: RuntimeType) {
  return type.constructors.find(ctor => ctor.parameterTypes.length === 0);
}

/**
 * An expression creating a new instance of `type`.
 *
 * 1. Value types: their default.
 * 2. `IEnumerable<T>`, `ICollection<T>`, `IList<T>`: a new `List<T>`.
 * 3. `IReadOnlyCollection<T>` and `ReadOnlyCollection<T>`: a
 *    `ReadOnlyCollection<T>` over a new `List<T>`.
 * 4. Anything else: the parameterless constructor.
 *
 * The result type may be a concrete type assignable to `type`.
 *
 * @throws {MissingConstructorError}
 *   When `type` has no parameterless constructor.
 */
export function generateConstructorExpression(type: RuntimeType): Expression {
  if (type.isValueType) return defaultOf(type);

  const [element = ObjectType] = type.typeArguments;

  if (LIST_INTERFACES.some(definition => definition.isDefinitionOf(type))) {
    return generateConstructorExpression(ListOf.makeGenericType(element));
  }

  if (IReadOnlyCollectionOf.isDefinitionOf(type) || ReadOnlyCollectionOf.isDefinitionOf(type)) {
    const readOnlyType = ReadOnlyCollectionOf.makeGenericType(element);
    const [wrap] = readOnlyType.constructors;
    const list = generateConstructorExpression(ListOf.makeGenericType(element));
    if (wrap) return newObject(wrap, [list]);
  }

  const ctor = parameterlessConstructor(type);
  if (!ctor) {
    throw new MissingConstructorError(
      formatMessage('No parameterless constructor for', type.name)
    );
  }
  return newObject(ctor);
}
