import {
  IReadOnlyCollectionOf,
  ListOf,
  ReadOnlyCollectionOf
} from '../metadata/builtins';
import { isEnumerableType } from '../metadata/collection-types';
import type { RuntimeType } from '../metadata/runtime-type';
import {
  ResolutionContextType,
  TypeMapType
} from '../runtime/resolution-context';
import type {
  ConfigurationProvider,
  MemberMap,
  ProfileMap,
  TypeMap,
  TypePair
} from '../types/configuration';
import {
  NULL,
  callMethod,
  constant,
  defaultOf,
  ifNullElse,
  parameter,
  toObject,
  toType
} from '../ir/factory';
import type { Expression } from '../ir/nodes';
import {
  mapCollectionExpression,
  mapReadOnlyCollection
} from '../expressions/collection-mapper';
import { generateConstructorExpression } from '../expressions/object-factory';

/**
 * The resolution context every plan receives as its last parameter.
 */
export const CONTEXT_PARAMETER = parameter(ResolutionContextType, 'context');

/**
 * `context.checkContext()` for maps that track depth; otherwise `undefined`.
 */
export function checkContext(typeMap: TypeMap): Expression | undefined {
  return typeMap.maxDepth > 0 ? callMethod(CONTEXT_PARAMETER, 'checkContext') : undefined;
}

/**
 * `context.overTypeDepth(typeMap)` for maps with a `maxDepth`; otherwise
 * `undefined`.
 */
export function overMaxDepth(typeMap: TypeMap | undefined): Expression | undefined {
  if (!typeMap || typeMap.maxDepth <= 0) return undefined;
  return callMethod(CONTEXT_PARAMETER, 'overTypeDepth', [constant(typeMap, TypeMapType)]);
}

/**
 * `context.map(typeMap, source, destination)`, converted to the map's
 * destination type.
 */
export function contextMap(
  typeMap: TypeMap,
  source: Expression,
  destination?: Expression
): Expression {
  const mapped = callMethod(CONTEXT_PARAMETER, 'map', [
    constant(typeMap, TypeMapType),
    toObject(source),
    toObject(destination ?? NULL)
  ]);
  return toType(mapped, typeMap.types.destinationType);
}

/**
 * Whether a pair is mapped element by element. Array destinations are not.
 */
export function isCollectionPair(pair: TypePair): boolean {
  return (
    isEnumerableType(pair.sourceType) &&
    isEnumerableType(pair.destinationType) &&
    !pair.destinationType.isArray
  );
}

function isReadOnlyCollectionType(type: RuntimeType): boolean {
  return IReadOnlyCollectionOf.isDefinitionOf(type) || ReadOnlyCollectionOf.isDefinitionOf(type);
}

/**
 * Null-safe collection mapping.
 *
 * A null source yields `null` when the profile allows null collections,
 * else a new empty destination collection. Read-only destinations are
 * populated through a `List<T>` and wrapped.
 *
 * @param source
 *   Evaluated twice; pass a variable.
 */
export function mapCollection(
  configurationProvider: ConfigurationProvider,
  profileMap: ProfileMap,
  memberMap: MemberMap | undefined,
  source: Expression,
  destination: Expression
): Expression {
  const destinationType = destination.type;

  const populate = isReadOnlyCollectionType(destinationType)
    ? mapReadOnlyCollection(
        ListOf,
        ReadOnlyCollectionOf,
        configurationProvider,
        profileMap,
        memberMap,
        source,
        destination
      )
    : mapCollectionExpression(configurationProvider, profileMap, memberMap, source, destination);

  const nullCollection = profileMap.allowNullCollections
    ? defaultOf(destinationType)
    : toType(generateConstructorExpression(destinationType), destinationType);

  return ifNullElse(source, nullCollection, populate);
}

/**
 * Converts `source` to the pair's destination type.
 *
 * 1. A type map exists: delegate to its plan through the context.
 * 2. Both sides are sequences: map element by element.
 * 3. Otherwise: a conversion.
 *
 * @param destination
 *   The current destination value, when there is one.
 */
export function mapExpression(
  configurationProvider: ConfigurationProvider,
  profileMap: ProfileMap,
  typePair: TypePair,
  source: Expression,
  destination?: Expression
): Expression {
  const typeMap = configurationProvider.resolveTypeMap(
    typePair.sourceType,
    typePair.destinationType
  );
  if (typeMap) return contextMap(typeMap, source, destination);

  if (isCollectionPair(typePair)) {
    return mapCollection(
      configurationProvider,
      profileMap,
      undefined,
      source,
      destination ?? defaultOf(typePair.destinationType)
    );
  }

  return toType(source, typePair.destinationType);
}
