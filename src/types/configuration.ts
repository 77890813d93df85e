import type { DataMemberDescriptor } from '../metadata/members';
import type { RuntimeType } from '../metadata/runtime-type';
import type { LambdaExpression } from '../ir/nodes';

/**
 * Identifies one conversion: the key under which type maps are resolved
 * and compiled plans are cached.
 */
export type TypePair = {
  readonly sourceType: RuntimeType;
  readonly destinationType: RuntimeType;
};

/**
 * Stable string key of a {@link TypePair}.
 */
export function typePairKey(pair: TypePair): string {
  return `${pair.sourceType.id}->${pair.destinationType.id}`;
}

/**
 * Cross-cutting mapping options. Read, never mutated, by plan builders.
 */
export type ProfileMap = {
  /**
   * A null source collection maps to `null` instead of an empty collection.
   *
   * @default false
   */
  readonly allowNullCollections: boolean;

  /**
   * A null source member maps to `null` instead of a new destination
   * instance.
   *
   * @default true
   */
  readonly allowNullDestinationValues: boolean;
};

export const DEFAULT_PROFILE: ProfileMap = {
  allowNullCollections: false,
  allowNullDestinationValues: true
};

/**
 * Per-destination-member configuration.
 */
export type MemberMap = {
  readonly destinationMember: DataMemberDescriptor;

  /**
   * `source => value`: where the member's value comes from.
   */
  readonly sourceExpression: LambdaExpression;

  /**
   * Mutate the existing destination value in place instead of replacing it.
   */
  readonly useDestinationValue: boolean;

  /**
   * Whether the destination member can be assigned.
   */
  readonly canBeSet: boolean;

  /**
   * The type map owning this member; consulted for recursion depth.
   */
  readonly typeMap: TypeMap | undefined;
};

/**
 * A resolved mapping configuration for one type pair.
 */
export class TypeMap {
  readonly memberMaps: MemberMap[] = [];

  /**
   * @param types - The pair this map converts.
   * @param profile - Options in effect for this map.
   * @param maxDepth - Nesting limit for this pair; `0` means unlimited.
   */
  constructor(
    readonly types: TypePair,
    readonly profile: ProfileMap,
    readonly maxDepth: number
  ) {}

  get key(): string {
    return typePairKey(this.types);
  }
}

/**
 * Resolver of nested type maps.
 */
export interface ConfigurationProvider {
  resolveTypeMap(sourceType: RuntimeType, destinationType: RuntimeType): TypeMap | undefined;
}
