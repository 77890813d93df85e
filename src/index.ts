export * as ir from './ir';

export {
  type ConstructorDescriptor,
  type DataMemberDescriptor,
  type DataMemberOptions,
  type FieldDescriptor,
  type MemberDescriptor,
  type MethodDescriptor,
  type PropertyDescriptor,
  constructorOf,
  field,
  isDataMember,
  method,
  property
} from './metadata/members';
export {
  GenericTypeDefinition,
  RuntimeType,
  type TypeDefinition,
  type TypeKind
} from './metadata/runtime-type';
export * from './metadata/builtins';
export { defineClass, defineStruct } from './metadata/define';
export { Enumerable, findExtensionMethod } from './metadata/extensions';
export { getMemberPath } from './metadata/member-path';
export {
  getCollectionType,
  getElementType,
  getEnumerableType,
  isEnumerableType,
  isListType
} from './metadata/collection-types';

export { ArrayList, HashSet, List, ReadOnlyCollection } from './runtime/collections';
export { ResolutionContext } from './runtime/resolution-context';

export * from './errors';

export * from './expressions/member-chain';
export { replace, replaceParameters, convertReplaceParameters } from './expressions/rewriters';
export { nullCheck } from './expressions/null-check';
export { forEach, forEachArrayItem } from './expressions/loops';
export { using } from './expressions/using';
export { generateConstructorExpression } from './expressions/object-factory';
export { mapCollectionExpression, mapReadOnlyCollection } from './expressions/collection-mapper';

export {
  CONTEXT_PARAMETER,
  checkContext,
  isCollectionPair,
  mapCollection,
  mapExpression,
  overMaxDepth
} from './execution/expression-builder';
export { buildConversionPlan, buildTypeMapPlan } from './execution/type-map-plan';

export { type CompiledLambda, compileLambda } from './compiler/compile';
export { parseLambda } from './lambda/parse-lambda';

export {
  type MemberOptions,
  type MapperConfigurationOptions,
  type TypeMapDefinition,
  MapperConfiguration,
  defineTypeMap,
  validateTypeMapDefinition
} from './mapper/configuration';
export { type MappingPlan, Mapper } from './mapper/mapper';
export {
  type ConfigurationProvider,
  type MemberMap,
  type ProfileMap,
  type TypePair,
  DEFAULT_PROFILE,
  TypeMap,
  typePairKey
} from './types/configuration';
