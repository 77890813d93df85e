import { isRecord } from '../guards';
import { type MemberSpec, constructorOf } from './members';
import { RuntimeType } from './runtime-type';

export type ClassOptions = {
  name: string;
  baseType?: RuntimeType;
  interfaces?: (self: RuntimeType) => readonly RuntimeType[];
  members?: (self: RuntimeType) => readonly MemberSpec[];

  /**
   * Parameterless constructor. Types without one cannot be created by plans.
   */
  create?: () => object;

  /**
   * Runtime class backing the type; enables checked casts.
   */
  instanceOf?: new (...args: never[]) => object;
};

/**
 * Describes a user reference type.
 *
 * @example
 *   const Order = defineClass({
 *     name: 'Order',
 *     create: () => ({ lines: null }),
 *     members: () => [property('lines', ListOf.makeGenericType(Int32))]
 *   });
 */
export function defineClass(options: ClassOptions): RuntimeType {
  const { create, instanceOf, ...definition } = options;

  return new RuntimeType({
    ...definition,
    kind: 'reference',
    isInstance: instanceOf ? value => value instanceof instanceOf : undefined,
    constructors: create ? () => [constructorOf([], () => create())] : undefined
  });
}

export type StructOptions = {
  name: string;
  members?: (self: RuntimeType) => readonly MemberSpec[];

  /**
   * Produces the default value (every member at its own default).
   */
  create: () => object;
};

/**
 * Describes a user value type. Its default is a fresh object from `create`.
 */
export function defineStruct(options: StructOptions): RuntimeType {
  const { create, ...definition } = options;

  return new RuntimeType({
    ...definition,
    kind: 'value',
    createDefault: create,
    isInstance: isRecord,
    constructors: () => [constructorOf([], () => create())]
  });
}
