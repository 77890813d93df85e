export * from './nodes';
export * from './factory';
export * from './visitor';
export { formatExpression } from './printer';
