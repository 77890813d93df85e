import {
  type ConstructorDescriptor,
  type ConstructorSpec,
  type DataMemberDescriptor,
  type MemberDescriptor,
  type MemberSpec,
  type MethodDescriptor,
  bindMember,
  isDataMember
} from './members';
import { IrConstructionError } from '../errors';
import { formatMessage } from '../report';

/**
 * Storage category of a type.
 *
 * - `value`: never null (unless nullable), copied by value, has a non-null default.
 * - `reference`: class-like, `null` by default.
 * - `interface`: capability contract; instances are reference values.
 * - `void`: the type of expressions that produce no value.
 */
export type TypeKind = 'value' | 'reference' | 'interface' | 'void';

/**
 * Authoring shape of a {@link RuntimeType}.
 *
 * Members, interfaces and constructors are supplied lazily (as functions of
 * the type being defined) so that self-referential and mutually recursive
 * type graphs can be described without forward declarations.
 */
export type TypeDefinition = {
  name: string;
  kind: TypeKind;
  baseType?: RuntimeType;
  interfaces?: (self: RuntimeType) => readonly RuntimeType[];
  members?: (self: RuntimeType) => readonly MemberSpec[];
  constructors?: (self: RuntimeType) => readonly ConstructorSpec[];

  /**
   * Default of a value type (e.g. `0`). Ignored for other kinds.
   */
  defaultValue?: unknown;

  /**
   * Produces a fresh default of a value type whose default is an object
   * (structs). Takes precedence over `defaultValue`.
   */
  createDefault?: () => unknown;

  /**
   * Runtime membership test. Reference types without one accept every
   * non-null value (an unchecked cast).
   */
  isInstance?: (value: unknown) => boolean;

  /**
   * Coercion of a non-null value into this type. Identity when absent.
   */
  coerce?: (value: unknown) => unknown;

  /**
   * Marks the root of the type hierarchy: every non-void type is assignable
   * to it.
   */
  isRoot?: boolean;

  elementType?: RuntimeType;
  genericDefinition?: GenericTypeDefinition;
  typeArguments?: readonly RuntimeType[];
  underlyingType?: RuntimeType;
};

let nextTypeId = 1;

/**
 * Runtime metadata for one type: the reflection layer plans are built from.
 *
 * Instances are identity-compared: two `RuntimeType` objects describe the
 * same type only if they are the same object. Closed generic types are
 * cached by their definition, so `ListOf.makeGenericType(Int32)` always
 * returns the same instance.
 */
export class RuntimeType {
  readonly id = nextTypeId++;
  readonly name: string;
  readonly kind: TypeKind;
  readonly baseType: RuntimeType | undefined;
  readonly elementType: RuntimeType | undefined;
  readonly genericDefinition: GenericTypeDefinition | undefined;
  readonly typeArguments: readonly RuntimeType[];
  readonly underlyingType: RuntimeType | undefined;

  private readonly definition: TypeDefinition;
  private declaredInterfaces: readonly RuntimeType[] | undefined;
  private interfaceClosure: readonly RuntimeType[] | undefined;
  private memberTable: ReadonlyMap<string, MemberDescriptor> | undefined;
  private constructorList: readonly ConstructorDescriptor[] | undefined;

  constructor(definition: TypeDefinition) {
    this.definition = definition;
    this.name = definition.name;
    this.kind = definition.kind;
    this.baseType = definition.baseType;
    this.elementType = definition.elementType;
    this.genericDefinition = definition.genericDefinition;
    this.typeArguments = definition.typeArguments ?? [];
    this.underlyingType = definition.underlyingType;
  }

  get isValueType(): boolean {
    return this.kind === 'value';
  }

  get isInterface(): boolean {
    return this.kind === 'interface';
  }

  get isVoid(): boolean {
    return this.kind === 'void';
  }

  get isArray(): boolean {
    return this.elementType !== undefined;
  }

  /**
   * `true` for `Nullable<T>`: a value type that also admits `null`.
   */
  get isNullable(): boolean {
    return this.underlyingType !== undefined;
  }

  /**
   * Whether a value of this type can be `null` at run time.
   */
  get admitsNull(): boolean {
    return !this.isValueType || this.isNullable;
  }

  /**
   * Interfaces declared directly on this type.
   */
  get interfaces(): readonly RuntimeType[] {
    this.declaredInterfaces ??= this.definition.interfaces?.(this) ?? [];
    return this.declaredInterfaces;
  }

  /**
   * Every interface this type implements: declared ones, the interfaces they
   * extend, and those of the base type chain. Declaration order, no duplicates.
   */
  get allInterfaces(): readonly RuntimeType[] {
    if (!this.interfaceClosure) {
      const seen = new Set<RuntimeType>();
      const visit = (type: RuntimeType) => {
        for (const implemented of type.interfaces) {
          if (seen.has(implemented)) continue;
          seen.add(implemented);
          visit(implemented);
        }
        if (type.baseType) visit(type.baseType);
      };
      visit(this);
      this.interfaceClosure = [...seen];
    }
    return this.interfaceClosure;
  }

  /**
   * Members declared directly on this type.
   */
  get members(): readonly MemberDescriptor[] {
    return [...this.getMemberTable().values()];
  }

  get constructors(): readonly ConstructorDescriptor[] {
    this.constructorList ??= (this.definition.constructors?.(this) ?? []).map(
      spec => ({ ...spec, declaringType: this })
    );
    return this.constructorList;
  }

  /**
   * The value a variable of this type holds before assignment.
   */
  get defaultValue(): unknown {
    if (this.kind === 'void') return undefined;
    if (this.kind !== 'value' || this.isNullable) return null;
    if (this.definition.createDefault) return this.definition.createDefault();
    return this.definition.defaultValue ?? null;
  }

  /**
   * Looks up a member by exact name on this type, then on its base types.
   */
  getMember(name: string): MemberDescriptor | undefined {
    return this.getMemberTable().get(name) ?? this.baseType?.getMember(name);
  }

  /**
   * Looks up a readable property or field by exact name.
   */
  getProperty(name: string): DataMemberDescriptor | undefined {
    const member = this.getMember(name);
    return isDataMember(member) ? member : undefined;
  }

  /**
   * Looks up a readable property on this type, its base types, then every
   * implemented interface.
   */
  getInheritedProperty(name: string): DataMemberDescriptor | undefined {
    const own = this.getProperty(name);
    if (own) return own;

    for (const implemented of this.allInterfaces) {
      const found = implemented.getProperty(name);
      if (found) return found;
    }
    return undefined;
  }

  /**
   * Looks up a method by exact name on this type and its base types.
   */
  getMethod(name: string): MethodDescriptor | undefined {
    const member = this.getMember(name);
    return member?.kind === 'method' ? member : undefined;
  }

  /**
   * Looks up a method on this type, its base types, then every implemented
   * interface (so interface types find methods of the interfaces they extend).
   */
  getInheritedMethod(name: string): MethodDescriptor | undefined {
    const own = this.getMethod(name);
    if (own) return own;

    for (const implemented of this.allInterfaces) {
      const found = implemented.getMethod(name);
      if (found) return found;
    }
    return undefined;
  }

  /**
   * Whether a value statically typed `other` may be stored in a location of
   * this type without a conversion.
   *
   * Rules:
   * 1. Identity.
   * 2. `Object` accepts every non-void type.
   * 3. A base class accepts its derived classes.
   * 4. An interface accepts every type implementing it.
   */
  isAssignableFrom(other: RuntimeType): boolean {
    if (this === other) return true;
    if (other.isVoid || this.isVoid) return false;
    if (this.definition.isRoot) return true;

    for (let base = other.baseType; base; base = base.baseType) {
      if (base === this) return true;
    }

    return this.isInterface && other.allInterfaces.includes(this);
  }

  /**
   * Whether a non-null runtime value belongs to this type.
   */
  isInstance(value: unknown): boolean {
    if (value === null || value === undefined) return false;
    if (this.definition.isInstance) return this.definition.isInstance(value);
    return this.kind === 'reference' || this.kind === 'interface';
  }

  /**
   * Coerces a non-null runtime value into this type.
   */
  coerce(value: unknown): unknown {
    return this.definition.coerce ? this.definition.coerce(value) : value;
  }

  toString(): string {
    return this.name;
  }

  private getMemberTable(): ReadonlyMap<string, MemberDescriptor> {
    if (!this.memberTable) {
      const table = new Map<string, MemberDescriptor>();
      for (const spec of this.definition.members?.(this) ?? []) {
        table.set(spec.name, bindMember(spec, this));
      }
      this.memberTable = table;
    }
    return this.memberTable;
  }
}

/**
 * Builds the non-identity parts of a closed generic type from its arguments.
 */
export type GenericTypeFactory = (
  typeArguments: readonly RuntimeType[]
) => Omit<TypeDefinition, 'name' | 'genericDefinition' | 'typeArguments'>;

/**
 * An open generic type such as `List<T>`.
 *
 * Closing it over the same arguments yields the same {@link RuntimeType}.
 */
export class GenericTypeDefinition {
  private readonly closedTypes = new Map<string, RuntimeType>();

  constructor(
    readonly name: string,
    readonly arity: number,
    private readonly factory: GenericTypeFactory
  ) {}

  makeGenericType(...typeArguments: RuntimeType[]): RuntimeType {
    if (typeArguments.length !== this.arity) {
      throw new IrConstructionError(
        formatMessage(
          'Wrong number of type arguments for',
          this.name,
          `expected ${this.arity}, got ${typeArguments.length}.`
        )
      );
    }

    const key = typeArguments.map(type => type.id).join(',');
    const cached = this.closedTypes.get(key);
    if (cached) return cached;

    const closed = new RuntimeType({
      ...this.factory(typeArguments),
      name: `${this.name}<${typeArguments.map(String).join(', ')}>`,
      genericDefinition: this,
      typeArguments
    });
    this.closedTypes.set(key, closed);
    return closed;
  }

  /**
   * Whether `type` is a closed form of this definition.
   */
  isDefinitionOf(type: RuntimeType): boolean {
    return type.genericDefinition === this;
  }
}
