import type { RuntimeType } from '../metadata/runtime-type';
import { ResolutionContext } from '../runtime/resolution-context';
import { ConfigurationError } from '../errors';
import { compileLambda } from '../compiler/compile';
import type { LambdaExpression } from '../ir/nodes';
import { formatMessage } from '../report';
import { isCollectionPair } from '../execution/expression-builder';
import { buildConversionPlan, buildTypeMapPlan } from '../execution/type-map-plan';
import { type TypePair, typePairKey } from '../types/configuration';
import type { MapperConfiguration } from './configuration';

/**
 * A compiled plan: maps `source` into `destination` (or a new instance).
 */
export type MappingPlan = (
  source: unknown,
  destination: unknown,
  context: ResolutionContext
) => unknown;

/**
 * Maps values between registered types with compiled plans.
 *
 * Plans are built and compiled on first use of a type pair and cached for
 * the lifetime of the mapper.
 */
export class Mapper {
  private readonly plans = new Map<string, MappingPlan>();

  constructor(readonly configuration: MapperConfiguration) {}

  /**
   * Maps `source` to `destinationType`.
   *
   * @param source - The value to map; `null` maps to the destination default.
   * @param sourceType - Runtime type of `source`.
   * @param destinationType - Runtime type to produce.
   * @param destination - Existing instance to map into, if any.
   * @returns The mapped value.
   * @throws {ConfigurationError}
   *   When no type map exists for the pair and it is neither a sequence
   *   pair nor an assignable conversion.
   */
  map(
    source: unknown,
    sourceType: RuntimeType,
    destinationType: RuntimeType,
    destination: unknown = null
  ): unknown {
    const context = new ResolutionContext((typeMap, nestedSource, nestedDestination, nestedContext) =>
      this.getPlan(typeMap.types)(nestedSource, nestedDestination, nestedContext)
    );
    return this.getPlan({ sourceType, destinationType })(source, destination, context);
  }

  /**
   * The uncompiled plan of a pair, for inspection with `formatExpression`.
   */
  getPlanExpression(sourceType: RuntimeType, destinationType: RuntimeType): LambdaExpression {
    return this.buildPlan({ sourceType, destinationType });
  }

  private buildPlan(typePair: TypePair): LambdaExpression {
    const { sourceType, destinationType } = typePair;

    const typeMap = this.configuration.resolveTypeMap(sourceType, destinationType);
    if (typeMap) return buildTypeMapPlan(this.configuration, typeMap);

    if (!isCollectionPair(typePair) && !destinationType.isAssignableFrom(sourceType)) {
      throw new ConfigurationError(
        formatMessage('No type map for', `${sourceType.name} -> ${destinationType.name}`)
      );
    }
    return buildConversionPlan(this.configuration, this.configuration.profile, typePair);
  }

  private getPlan(typePair: TypePair): MappingPlan {
    const key = typePairKey(typePair);
    const cached = this.plans.get(key);
    if (cached) return cached;

    const plan = compileLambda(this.buildPlan(typePair));
    this.plans.set(key, plan);
    return plan;
  }
}
