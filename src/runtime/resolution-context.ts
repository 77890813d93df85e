import { BooleanType, ObjectType, Void } from '../metadata/builtins';
import { method } from '../metadata/members';
import { RuntimeType } from '../metadata/runtime-type';
import { TypeMap } from '../types/configuration';
import { InvalidCastError } from '../errors';
import { formatMessage } from '../report';

/**
 * Executes the compiled plan of a type map.
 */
export type PlanRunner = (
  typeMap: TypeMap,
  source: unknown,
  destination: unknown,
  context: ResolutionContext
) => unknown;

/**
 * State of one top-level mapping call, threaded through every nested plan.
 *
 * Tracks how many mappings of each type pair are active so that maps with a
 * `maxDepth` stop recursing.
 */
export class ResolutionContext {
  private typeDepth: Map<string, number> | undefined;

  constructor(private readonly runner: PlanRunner) {}

  /**
   * Hook that plans call before mapping the items of a collection whose
   * element map tracks depth. Contexts that need preparing do it here; this
   * one only allocates its depth table, which the depth methods also do on
   * first use.
   */
  checkContext(): void {
    this.typeDepth ??= new Map();
  }

  /**
   * Number of active mappings of the map's type pair.
   */
  getTypeDepth(typeMap: TypeMap): number {
    return this.typeDepth?.get(typeMap.key) ?? 0;
  }

  /**
   * Whether another mapping of the pair would exceed `maxDepth`.
   */
  overTypeDepth(typeMap: TypeMap): boolean {
    return this.getTypeDepth(typeMap) >= typeMap.maxDepth;
  }

  incrementTypeDepth(typeMap: TypeMap): void {
    this.checkContext();
    this.typeDepth?.set(typeMap.key, this.getTypeDepth(typeMap) + 1);
  }

  decrementTypeDepth(typeMap: TypeMap): void {
    this.typeDepth?.set(typeMap.key, Math.max(0, this.getTypeDepth(typeMap) - 1));
  }

  /**
   * Maps `source` with the plan of `typeMap`, in this context.
   */
  map(typeMap: TypeMap, source: unknown, destination: unknown): unknown {
    return this.runner(typeMap, source, destination, this);
  }
}

function requireContext(target: unknown): ResolutionContext {
  if (!(target instanceof ResolutionContext)) {
    throw new InvalidCastError(
      formatMessage('Expected a resolution context', 'context', `received ${typeof target}.`)
    );
  }
  return target;
}

function requireTypeMap(value: unknown): TypeMap {
  if (!(value instanceof TypeMap)) {
    throw new InvalidCastError(
      formatMessage('Expected a type map', 'typeMap', `received ${typeof value}.`)
    );
  }
  return value;
}

/**
 * Runtime type of {@link TypeMap} values embedded in plans as constants.
 */
export const TypeMapType = new RuntimeType({
  name: 'TypeMap',
  kind: 'reference',
  isInstance: value => value instanceof TypeMap
});

/**
 * Runtime type of {@link ResolutionContext}: the methods plans call on it.
 */
export const ResolutionContextType = new RuntimeType({
  name: 'ResolutionContext',
  kind: 'reference',
  isInstance: value => value instanceof ResolutionContext,
  members: () => [
    method('checkContext', Void, {
      invoke: target => requireContext(target).checkContext()
    }),
    method('overTypeDepth', BooleanType, {
      parameters: [TypeMapType],
      invoke: (target, [typeMap]) =>
        requireContext(target).overTypeDepth(requireTypeMap(typeMap))
    }),
    method('incrementTypeDepth', Void, {
      parameters: [TypeMapType],
      invoke: (target, [typeMap]) =>
        requireContext(target).incrementTypeDepth(requireTypeMap(typeMap))
    }),
    method('decrementTypeDepth', Void, {
      parameters: [TypeMapType],
      invoke: (target, [typeMap]) =>
        requireContext(target).decrementTypeDepth(requireTypeMap(typeMap))
    }),
    method('map', ObjectType, {
      parameters: [TypeMapType, ObjectType, ObjectType],
      invoke: (target, [typeMap, source, destination]) =>
        requireContext(target).map(requireTypeMap(typeMap), source, destination)
    })
  ]
});
