import { ICollectionOf, IList, Void } from '../metadata/builtins';
import {
  getCollectionType,
  getElementType,
  isListType
} from '../metadata/collection-types';
import type { MethodDescriptor } from '../metadata/members';
import type { GenericTypeDefinition, RuntimeType } from '../metadata/runtime-type';
import type {
  ConfigurationProvider,
  MemberMap,
  ProfileMap
} from '../types/configuration';
import { IrConstructionError, MissingConstructorError } from '../errors';
import {
  EMPTY,
  NULL,
  assign,
  block,
  call,
  condition,
  defaultOf,
  newObject,
  orElse,
  parameter,
  property,
  referenceEqual,
  toType,
  variable
} from '../ir/factory';
import type { Expression } from '../ir/nodes';
import { formatMessage } from '../report';
import { checkContext, mapExpression, overMaxDepth } from '../execution/expression-builder';
import { forEach } from './loops';
import { generateConstructorExpression } from './object-factory';

/**
 * How a destination collection is populated.
 */
type DestinationShape = {
  /**
   * The collection contract `add` and `isReadOnly` are taken from.
   */
  readonly collectionType: RuntimeType;
  readonly elementType: RuntimeType;

  /**
   * The destination, converted to `collectionType` when it was an interface
   * without a typed collection contract.
   */
  readonly destination: Expression;
  readonly addMethod: MethodDescriptor;
  readonly clearMethod: MethodDescriptor;

  /**
   * Whether the untyped list contract applies.
   */
  readonly isList: boolean;
};

function requireMethod(type: RuntimeType, name: string): MethodDescriptor {
  const found = type.getMethod(name);
  if (!found) {
    throw new IrConstructionError(
      formatMessage('Collection contract has no method', `${type.name}.${name}`)
    );
  }
  return found;
}

/**
 * Picks the collection contract of the destination.
 *
 * 1. The `ICollection<T>` the destination type is or implements.
 * 2. For other interfaces (e.g. `IEnumerable<T>`): `ICollection<T>`, with
 *    the destination converted to it.
 * 3. Otherwise the untyped `IList`.
 */
function resolveDestinationShape(destExpression: Expression): DestinationShape {
  let destination = destExpression;
  let collectionType = getCollectionType(destination.type);
  const elementType = collectionType?.typeArguments[0] ?? getElementType(destination.type);

  if (!collectionType && destination.type.isInterface) {
    collectionType = ICollectionOf.makeGenericType(elementType);
    destination = toType(destination, collectionType);
  }

  if (!collectionType) {
    return {
      collectionType: IList,
      elementType,
      destination,
      addMethod: requireMethod(IList, 'add'),
      clearMethod: requireMethod(IList, 'clear'),
      isList: true
    };
  }

  const isList = isListType(destination.type);
  return {
    collectionType,
    elementType,
    destination,
    addMethod: requireMethod(collectionType, 'add'),
    clearMethod: requireMethod(isList ? IList : collectionType, 'clear'),
    isList
  };
}

/**
 * Builds the IR that fills a destination collection from a source sequence.
 *
 * The result is a block evaluating to the populated collection:
 *
 * 1. `passedDestination = destExpression`.
 * 2. Destination choice:
 *    - `memberMap.useDestinationValue`: the passed instance, as is.
 *    - otherwise a new instance when the passed one is null or (for a
 *      settable member) reports `isReadOnly`; else the passed instance.
 * 3. `clear()` on the chosen collection.
 * 4. One `add(map(item))` per source element; each element is mapped
 *    through the configuration provider. Skipped entirely while the owning
 *    type map is over its `maxDepth`.
 * 5. Without a member map, the element type map's context check (if any)
 *    runs first.
 *
 * @param configurationProvider
 *   Resolves element type maps.
 * @param profileMap
 *   Options passed to element mappings.
 * @param memberMap
 *   The member being mapped, if any.
 * @param sourceExpression
 *   Non-null source sequence; evaluated once (arrays: once per element).
 * @param destExpression
 *   The current destination value; may evaluate to null.
 */
export function mapCollectionExpression(
  configurationProvider: ConfigurationProvider,
  profileMap: ProfileMap,
  memberMap: MemberMap | undefined,
  sourceExpression: Expression,
  destExpression: Expression
): Expression {
  // 1. Shape and element types
  const shape = resolveDestinationShape(destExpression);
  const passedDestination = variable(shape.destination.type, 'passedDestination');
  const newDestination = variable(passedDestination.type, 'collectionDestination');

  const sourceElementType =
    getCollectionType(sourceExpression.type)?.typeArguments[0] ??
    getElementType(sourceExpression.type);
  const item = parameter(sourceElementType, 'item');
  const itemExpression = mapExpression(
    configurationProvider,
    profileMap,
    { sourceType: sourceElementType, destinationType: shape.elementType },
    item
  );

  // 2. Reuse or replace
  let destination: Expression;
  let assignDestination: Expression;

  if (memberMap?.useDestinationValue) {
    destination = passedDestination;
    assignDestination = EMPTY;
  } else {
    destination = newDestination;
    const createInstance = generateConstructorExpression(passedDestination.type);

    let shouldCreate: Expression = referenceEqual(passedDestination, NULL);
    if (memberMap?.canBeSet) {
      const contract = shape.isList ? IList : shape.collectionType;
      shouldCreate = orElse(
        shouldCreate,
        property(toType(passedDestination, contract), 'isReadOnly')
      );
    }

    assignDestination = assign(
      newDestination,
      condition(
        shouldCreate,
        toType(createInstance, passedDestination.type),
        passedDestination
      )
    );
  }

  // 3. Refill, unless over depth
  let addItems: Expression = forEach(
    sourceExpression,
    item,
    call(destination, shape.addMethod, [itemExpression])
  );

  const overDepth = overMaxDepth(memberMap?.typeMap);
  if (overDepth) {
    addItems = condition(overDepth, EMPTY, addItems, Void);
  }

  const populate = block(
    [newDestination, passedDestination],
    [
      assign(passedDestination, shape.destination),
      assignDestination,
      call(destination, shape.clearMethod),
      addItems,
      destination
    ]
  );

  if (memberMap) return populate;

  // 4. Element context check
  const elementTypeMap = configurationProvider.resolveTypeMap(sourceElementType, shape.elementType);
  const check = elementTypeMap && checkContext(elementTypeMap);

  return check ? block([], [check, populate]) : populate;
}

/**
 * Maps into a read-only collection type.
 *
 * Populates a new closed `genericCollectionType` (typically `List<T>`) with
 * {@link mapCollectionExpression}, then wraps it with the single-argument
 * constructor of the read-only type: the destination type itself, or the
 * closed `genericReadOnlyCollectionType` when the destination is an
 * interface.
 *
 * @throws {MissingConstructorError}
 *   When the read-only type does not have exactly one single-argument
 *   constructor.
 */
export function mapReadOnlyCollection(
  genericCollectionType: GenericTypeDefinition,
  genericReadOnlyCollectionType: GenericTypeDefinition,
  configurationProvider: ConfigurationProvider,
  profileMap: ProfileMap,
  memberMap: MemberMap | undefined,
  sourceExpression: Expression,
  destExpression: Expression
): Expression {
  const typeArguments = destExpression.type.typeArguments;
  const closedCollectionType = genericCollectionType.makeGenericType(...typeArguments);

  const collection = mapCollectionExpression(
    configurationProvider,
    profileMap,
    memberMap,
    sourceExpression,
    defaultOf(closedCollectionType)
  );

  const readOnlyType = destExpression.type.isInterface
    ? genericReadOnlyCollectionType.makeGenericType(...typeArguments)
    : destExpression.type;

  const wrappers = readOnlyType.constructors.filter(ctor => ctor.parameterTypes.length === 1);
  const [wrapper] = wrappers;
  if (!wrapper || wrappers.length > 1) {
    throw new MissingConstructorError(
      formatMessage(
        'Expected exactly one single-argument constructor on',
        readOnlyType.name,
        `found ${wrappers.length}.`
      )
    );
  }

  return newObject(wrapper, [collection]);
}
