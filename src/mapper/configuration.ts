import { type DataMemberDescriptor, isDataMember } from '../metadata/members';
import type { RuntimeType } from '../metadata/runtime-type';
import { ConfigurationError } from '../errors';
import type { LambdaExpression } from '../ir/nodes';
import { memberAccessLambda } from '../expressions/member-chain';
import { parseLambda } from '../lambda/parse-lambda';
import { formatMessage, formatNameList } from '../report';
import {
  type ConfigurationProvider,
  DEFAULT_PROFILE,
  type MemberMap,
  type ProfileMap,
  TypeMap,
  typePairKey
} from '../types/configuration';

/**
 * Options for one destination member.
 */
export type MemberOptions = {
  /**
   * Where the value comes from, e.g. `(order) => order.customer.name`.
   * Parsed, not executed. Defaults to the source member of the same name.
   */
  mapFrom?: (source: never) => unknown;

  /**
   * Mutate the existing destination value (e.g. a collection) in place.
   *
   * @default false
   */
  useDestinationValue?: boolean;

  /**
   * Leave the member untouched.
   *
   * @default false
   */
  ignore?: boolean;
};

/**
 * Authoring shape of a type map.
 */
export type TypeMapDefinition = {
  source: RuntimeType;
  destination: RuntimeType;

  /**
   * Maximum nesting of this pair within one mapping call; `0` is unlimited.
   *
   * @default 0
   */
  maxDepth?: number;

  /**
   * Per-member options, keyed by destination member name.
   */
  members?: Record<string, MemberOptions>;
};

/**
 * Creates a type map definition with its literal type preserved.
 *
 * An identity function: the definition is checked against
 * {@link TypeMapDefinition} without being widened.
 */
export function defineTypeMap<T extends TypeMapDefinition>(definition: T): T {
  return definition;
}

function describePair(definition: TypeMapDefinition): string {
  return `${definition.source.name} -> ${definition.destination.name}`;
}

/**
 * Data members of `type` and its base types; a derived member hides a base
 * member of the same name.
 */
function getDataMembers(type: RuntimeType): DataMemberDescriptor[] {
  const found = new Map<string, DataMemberDescriptor>();

  for (let current: RuntimeType | undefined = type; current; current = current.baseType) {
    for (const descriptor of current.members) {
      if (isDataMember(descriptor) && !found.has(descriptor.name)) {
        found.set(descriptor.name, descriptor);
      }
    }
  }

  return [...found.values()];
}

/**
 * Validates a type map definition.
 *
 * @param definition - The definition to check.
 * @returns The same definition.
 * @throws {ConfigurationError}
 *   When `maxDepth` is not a non-negative integer, or `members` names a
 *   destination member that does not exist.
 */
export function validateTypeMapDefinition(definition: TypeMapDefinition): TypeMapDefinition {
  const pairName = describePair(definition);

  // 1. Validate depth
  const { maxDepth } = definition;
  if (maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
    throw new ConfigurationError(
      formatMessage('Invalid maxDepth for', pairName, `Expected a non-negative integer, got ${maxDepth}.`)
    );
  }

  // 2. Validate member names
  const known = new Set(getDataMembers(definition.destination).map(descriptor => descriptor.name));
  const unknown = Object.keys(definition.members ?? {}).filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      formatMessage('Unknown destination members for', pairName, formatNameList(unknown))
    );
  }

  return definition;
}

/**
 * The source lambda of a member: the configured `mapFrom`, else the source
 * member of the same name. `undefined` leaves the member unmapped.
 */
function resolveSourceExpression(
  sourceType: RuntimeType,
  name: string,
  options: MemberOptions
): LambdaExpression | undefined {
  if (options.mapFrom) return parseLambda(options.mapFrom, [sourceType]);
  if (!sourceType.getInheritedProperty(name)) return undefined;
  return memberAccessLambda(sourceType, name);
}

function buildMemberMaps(typeMap: TypeMap, definition: TypeMapDefinition): MemberMap[] {
  const memberMaps: MemberMap[] = [];

  for (const destinationMember of getDataMembers(definition.destination)) {
    const options = definition.members?.[destinationMember.name] ?? {};
    if (options.ignore) continue;

    const sourceExpression = resolveSourceExpression(
      definition.source,
      destinationMember.name,
      options
    );
    if (!sourceExpression) continue;

    memberMaps.push({
      destinationMember,
      sourceExpression,
      useDestinationValue: options.useDestinationValue ?? false,
      canBeSet: destinationMember.canWrite,
      typeMap
    });
  }

  return memberMaps;
}

export type MapperConfigurationOptions = {
  profile?: Partial<ProfileMap>;
  typeMaps: readonly TypeMapDefinition[];
};

/**
 * The validated set of type maps a {@link Mapper} plans from.
 *
 * Every definition is validated and its member maps resolved up front, so
 * configuration errors surface here rather than on the first `map` call.
 */
export class MapperConfiguration implements ConfigurationProvider {
  readonly profile: ProfileMap;
  private readonly typeMaps = new Map<string, TypeMap>();

  constructor(options: MapperConfigurationOptions) {
    this.profile = { ...DEFAULT_PROFILE, ...options.profile };

    for (const definition of options.typeMaps) {
      validateTypeMapDefinition(definition);

      const typeMap = new TypeMap(
        { sourceType: definition.source, destinationType: definition.destination },
        this.profile,
        definition.maxDepth ?? 0
      );
      if (this.typeMaps.has(typeMap.key)) {
        throw new ConfigurationError(
          formatMessage('Duplicate type map for', describePair(definition))
        );
      }

      typeMap.memberMaps.push(...buildMemberMaps(typeMap, definition));
      this.typeMaps.set(typeMap.key, typeMap);
    }
  }

  resolveTypeMap(sourceType: RuntimeType, destinationType: RuntimeType): TypeMap | undefined {
    return this.typeMaps.get(typePairKey({ sourceType, destinationType }));
  }

  getAllTypeMaps(): TypeMap[] {
    return [...this.typeMaps.values()];
  }
}
