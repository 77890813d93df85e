import type { RuntimeType } from './runtime-type';
import { readMember, writeMember } from '../runtime/access';
import { NotSupportedError } from '../errors';
import { formatMessage } from '../report';

/**
 * Reflection descriptor of a readable (and possibly writable) property.
 */
export type PropertyDescriptor = {
  kind: 'property';
  name: string;
  declaringType: RuntimeType;
  type: RuntimeType;
  canWrite: boolean;
  get(target: unknown): unknown;
  set(target: unknown, value: unknown): void;
};

/**
 * Reflection descriptor of a field.
 *
 * Fields and properties read the same way at run time; the distinction is
 * kept because member-path validation and chain rebuilding dispatch on it.
 */
export type FieldDescriptor = {
  kind: 'field';
  name: string;
  declaringType: RuntimeType;
  type: RuntimeType;
  canWrite: boolean;
  get(target: unknown): unknown;
  set(target: unknown, value: unknown): void;
};

/**
 * Reflection descriptor of a method.
 *
 * Three call shapes share this descriptor:
 * 1. Instance: `isStatic: false`, receiver passed as `target`.
 * 2. Static: `isStatic: true`, `target` is `undefined`.
 * 3. Extension-style: `isStatic: true, isExtension: true`; the receiver is the
 *    first argument and member chains walk through it.
 */
export type MethodDescriptor = {
  kind: 'method';
  name: string;
  declaringType: RuntimeType;
  returnType: RuntimeType;
  parameterTypes: readonly RuntimeType[];
  isStatic: boolean;
  isExtension: boolean;
  invoke(target: unknown, args: readonly unknown[]): unknown;
};

/**
 * The closed set of member kinds a chain link can reference.
 */
export type MemberDescriptor =
  | PropertyDescriptor
  | FieldDescriptor
  | MethodDescriptor;

/**
 * Members that can be read through a `member` IR node.
 */
export type DataMemberDescriptor = PropertyDescriptor | FieldDescriptor;

export type ConstructorDescriptor = {
  declaringType: RuntimeType;
  parameterTypes: readonly RuntimeType[];
  invoke(args: readonly unknown[]): unknown;
};

/**
 * A member as authored in a type definition, before it is bound to the
 * type that declares it.
 */
export type MemberSpec =
  | Omit<PropertyDescriptor, 'declaringType'>
  | Omit<FieldDescriptor, 'declaringType'>
  | Omit<MethodDescriptor, 'declaringType'>;

export type ConstructorSpec = Omit<ConstructorDescriptor, 'declaringType'>;

export type DataMemberOptions = {
  /**
   * Custom reader. Defaults to reading the own or inherited JS property of
   * the same name.
   */
  get?: (target: unknown) => unknown;

  /**
   * Custom writer. Defaults to assigning the JS property of the same name.
   */
  set?: (target: unknown, value: unknown) => void;

  /**
   * Marks the member as not settable. Plans never assign it and mutate the
   * existing value instead.
   *
   * @default false
   */
  readOnly?: boolean;
};

function createDataMember<K extends 'property' | 'field'>(
  kind: K,
  name: string,
  type: RuntimeType,
  options: DataMemberOptions
) {
  const readOnly = options.readOnly ?? false;

  const rejectWrite = () => {
    throw new NotSupportedError(
      formatMessage('Cannot assign read-only member', name)
    );
  };

  return {
    kind,
    name,
    type,
    canWrite: !readOnly,
    get: options.get ?? ((target: unknown) => readMember(target, name)),
    set: readOnly
      ? rejectWrite
      : (options.set ??
        ((target: unknown, value: unknown) => writeMember(target, name, value)))
  };
}

/**
 * Declares a property.
 *
 * @param name - Member name (also the JS property name read by default).
 * @param type - Static type of the property.
 * @param options - Custom accessors and writability.
 */
export function property(
  name: string,
  type: RuntimeType,
  options: DataMemberOptions = {}
): Omit<PropertyDescriptor, 'declaringType'> {
  return createDataMember('property', name, type, options);
}

/**
 * Declares a field.
 *
 * @param name - Member name (also the JS property name read by default).
 * @param type - Static type of the field.
 * @param options - Custom accessors and writability.
 */
export function field(
  name: string,
  type: RuntimeType,
  options: DataMemberOptions = {}
): Omit<FieldDescriptor, 'declaringType'> {
  return createDataMember('field', name, type, options);
}

export type MethodOptions = {
  parameters?: readonly RuntimeType[];
  isStatic?: boolean;
  isExtension?: boolean;
  invoke: (target: unknown, args: readonly unknown[]) => unknown;
};

/**
 * Declares a method.
 *
 * Extension-style methods are always static; `isExtension: true` implies
 * `isStatic: true`.
 */
export function method(
  name: string,
  returnType: RuntimeType,
  options: MethodOptions
): Omit<MethodDescriptor, 'declaringType'> {
  const isExtension = options.isExtension ?? false;
  return {
    kind: 'method',
    name,
    returnType,
    parameterTypes: options.parameters ?? [],
    isStatic: isExtension || (options.isStatic ?? false),
    isExtension,
    invoke: options.invoke
  };
}

/**
 * Declares a constructor.
 */
export function constructorOf(
  parameterTypes: readonly RuntimeType[],
  invoke: (args: readonly unknown[]) => unknown
): ConstructorSpec {
  return { parameterTypes, invoke };
}

/**
 * Attaches the declaring type to an authored member.
 */
export function bindMember(
  spec: MemberSpec,
  declaringType: RuntimeType
): MemberDescriptor {
  return { ...spec, declaringType };
}

/**
 * Narrows a member descriptor to the kinds a `member` IR node can read.
 */
export function isDataMember(
  member: MemberDescriptor | undefined
): member is DataMemberDescriptor {
  return member?.kind === 'property' || member?.kind === 'field';
}
