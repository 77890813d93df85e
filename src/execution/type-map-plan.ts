import type { RuntimeType } from '../metadata/runtime-type';
import { TypeMapType } from '../runtime/resolution-context';
import type {
  ConfigurationProvider,
  MemberMap,
  ProfileMap,
  TypeMap,
  TypePair
} from '../types/configuration';
import {
  assign,
  block,
  callMethod,
  condition,
  constant,
  defaultOf,
  ifNullElse,
  lambda,
  member,
  parameter,
  toType,
  tryFinally,
  variable
} from '../ir/factory';
import type { Expression, LambdaExpression, ParameterExpression } from '../ir/nodes';
import { nullCheck } from '../expressions/null-check';
import { generateConstructorExpression } from '../expressions/object-factory';
import { replaceParameters } from '../expressions/rewriters';
import {
  CONTEXT_PARAMETER,
  checkContext,
  isCollectionPair,
  mapCollection,
  mapExpression,
  overMaxDepth
} from './expression-builder';

function hasParameterlessConstructor(type: RuntimeType): boolean {
  return type.constructors.some(ctor => ctor.parameterTypes.length === 0);
}

/**
 * `new T()` converted to `T`.
 */
function createInstance(type: RuntimeType): Expression {
  return toType(generateConstructorExpression(type), type);
}

/**
 * IR for one destination member.
 *
 * 1. The source value is read with null propagation into `resolvedValue`.
 * 2. Collections are mapped into the current member value; other values go
 *    through {@link mapExpression}.
 * 3. With `allowNullDestinationValues` off, a null source value yields a
 *    new destination instance instead of `null`.
 * 4. Settable members are assigned; others are only mutated in place.
 */
function buildMemberMapping(
  configurationProvider: ConfigurationProvider,
  profileMap: ProfileMap,
  memberMap: MemberMap,
  source: ParameterExpression,
  destination: ParameterExpression
): Expression {
  const { destinationMember } = memberMap;
  const destinationType = destinationMember.type;

  // 1. Source value
  const sourceValue = nullCheck(
    replaceParameters(memberMap.sourceExpression, source),
    destinationType
  );
  const resolved = variable(sourceValue.type, 'resolvedValue');

  // 2. Mapped value
  const pair: TypePair = { sourceType: resolved.type, destinationType };
  const currentValue = member(destination, destinationMember);
  const isCollection =
    isCollectionPair(pair) &&
    !configurationProvider.resolveTypeMap(pair.sourceType, pair.destinationType);

  let mapped = isCollection
    ? mapCollection(configurationProvider, profileMap, memberMap, resolved, currentValue)
    : mapExpression(
        configurationProvider,
        profileMap,
        pair,
        resolved,
        memberMap.useDestinationValue ? currentValue : undefined
      );

  // 3. Null substitution
  if (
    !isCollection &&
    !profileMap.allowNullDestinationValues &&
    resolved.type.admitsNull &&
    !destinationType.isValueType &&
    hasParameterlessConstructor(destinationType)
  ) {
    mapped = ifNullElse(resolved, createInstance(destinationType), mapped);
  }

  // 4. Store
  const store = memberMap.canBeSet ? assign(member(destination, destinationMember), mapped) : mapped;

  return block([resolved], [assign(resolved, sourceValue), store]);
}

/**
 * Builds the plan of a type map:
 * `(source, destination, context) => destination`.
 *
 * 1. A null source yields the destination default (or a new instance when
 *    the profile disallows null destination values).
 * 2. A null destination is replaced by a new instance.
 * 3. Every member map is applied in declaration order.
 * 4. For maps with a `maxDepth`, the members are mapped only while the
 *    pair's depth is under the limit; the depth is incremented around them
 *    and restored even when a member throws.
 *
 * @param configurationProvider
 *   Resolves the type maps of nested members and elements.
 * @param typeMap
 *   The map to plan.
 * @returns
 *   The uncompiled plan.
 */
export function buildTypeMapPlan(
  configurationProvider: ConfigurationProvider,
  typeMap: TypeMap
): LambdaExpression {
  const { sourceType, destinationType } = typeMap.types;
  const profileMap = typeMap.profile;

  const source = parameter(sourceType, 'source');
  const destination = parameter(destinationType, 'destination');

  // 1. Destination instance
  const ensureDestination = assign(
    destination,
    ifNullElse(destination, createInstance(destinationType), destination)
  );

  // 2. Members
  const memberMappings = typeMap.memberMaps.map(memberMap =>
    buildMemberMapping(configurationProvider, profileMap, memberMap, source, destination)
  );
  const mapMembers = block([], [ensureDestination, ...memberMappings, destination]);

  // 3. Depth limit
  let body: Expression = mapMembers;
  const overDepth = overMaxDepth(typeMap);
  if (overDepth) {
    const typeMapConstant = constant(typeMap, TypeMapType);
    body = condition(
      overDepth,
      defaultOf(destinationType),
      block(
        [],
        [
          callMethod(CONTEXT_PARAMETER, 'incrementTypeDepth', [typeMapConstant]),
          tryFinally(
            mapMembers,
            callMethod(CONTEXT_PARAMETER, 'decrementTypeDepth', [typeMapConstant])
          )
        ]
      )
    );
  }

  const check = checkContext(typeMap);
  if (check) body = block([], [check, body]);

  // 4. Null source
  const nullSource = profileMap.allowNullDestinationValues
    ? defaultOf(destinationType)
    : createInstance(destinationType);

  return lambda(
    [source, destination, CONTEXT_PARAMETER],
    ifNullElse(source, nullSource, body)
  );
}

/**
 * Plan for a pair without a type map:
 * `(source, destination, context) => converted`.
 *
 * Sequences are mapped element by element; anything else is converted.
 */
export function buildConversionPlan(
  configurationProvider: ConfigurationProvider,
  profileMap: ProfileMap,
  typePair: TypePair
): LambdaExpression {
  const source = parameter(typePair.sourceType, 'source');
  const destination = parameter(typePair.destinationType, 'destination');

  return lambda(
    [source, destination, CONTEXT_PARAMETER],
    mapExpression(configurationProvider, profileMap, typePair, source, destination)
  );
}
