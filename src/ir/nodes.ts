import type {
  ConstructorDescriptor,
  DataMemberDescriptor,
  MethodDescriptor
} from '../metadata/members';
import type { RuntimeType } from '../metadata/runtime-type';

/**
 * Fields shared by every node.
 *
 * `id` is assigned once at construction and never reused; identity-based
 * operations (subtree replacement, variable binding) compare ids, not
 * object references.
 */
type NodeBase = {
  readonly id: number;
  readonly type: RuntimeType;
};

/**
 * Jump target of a loop. `break` nodes refer to it by id.
 */
export type LabelTarget = {
  readonly id: number;
  readonly name: string;
};

export type ConstantExpression = NodeBase & {
  readonly nodeType: 'constant';
  readonly value: unknown;
};

/**
 * A lambda parameter or a block-local variable.
 */
export type ParameterExpression = NodeBase & {
  readonly nodeType: 'parameter';
  readonly name: string;
};

export type MemberExpression = NodeBase & {
  readonly nodeType: 'member';
  readonly target: Expression;
  readonly member: DataMemberDescriptor;
};

/**
 * Method invocation. `target` is `null` for static and extension-style
 * calls; an extension call carries its receiver as `args[0]`.
 */
export type CallExpression = NodeBase & {
  readonly nodeType: 'call';
  readonly target: Expression | null;
  readonly method: MethodDescriptor;
  readonly args: readonly Expression[];
};

export type ConditionalExpression = NodeBase & {
  readonly nodeType: 'conditional';
  readonly test: Expression;
  readonly ifTrue: Expression;
  readonly ifFalse: Expression;
};

export type BlockExpression = NodeBase & {
  readonly nodeType: 'block';
  readonly variables: readonly ParameterExpression[];
  readonly expressions: readonly Expression[];
};

export type LoopExpression = NodeBase & {
  readonly nodeType: 'loop';
  readonly body: Expression;
  readonly breakLabel: LabelTarget;
};

export type BreakExpression = NodeBase & {
  readonly nodeType: 'break';
  readonly target: LabelTarget;
};

export type AssignExpression = NodeBase & {
  readonly nodeType: 'assign';
  readonly left: ParameterExpression | MemberExpression;
  readonly right: Expression;
};

export type BinaryOperator =
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'lessThan'
  | 'greaterThan'
  | 'equal'
  | 'notEqual'
  | 'referenceEqual'
  | 'orElse'
  | 'andAlso';

export type BinaryExpression = NodeBase & {
  readonly nodeType: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
};

export type UnaryOperator = 'not' | 'negate' | 'postIncrementAssign';

export type UnaryExpression = NodeBase & {
  readonly nodeType: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: Expression;
};

/**
 * Checked conversion to `type`.
 */
export type ConvertExpression = NodeBase & {
  readonly nodeType: 'convert';
  readonly operand: Expression;
};

/**
 * Probing cast to `type`: the value when it is an instance, else `null`.
 */
export type TypeAsExpression = NodeBase & {
  readonly nodeType: 'typeAs';
  readonly operand: Expression;
};

export type DefaultExpression = NodeBase & {
  readonly nodeType: 'default';
};

export type NewExpression = NodeBase & {
  readonly nodeType: 'new';
  readonly ctor: ConstructorDescriptor;
  readonly args: readonly Expression[];
};

export type TryFinallyExpression = NodeBase & {
  readonly nodeType: 'tryFinally';
  readonly body: Expression;
  readonly finalizer: Expression;
};

export type ArrayIndexExpression = NodeBase & {
  readonly nodeType: 'arrayIndex';
  readonly array: Expression;
  readonly index: Expression;
};

export type LambdaExpression = NodeBase & {
  readonly nodeType: 'lambda';
  readonly parameters: readonly ParameterExpression[];
  readonly body: Expression;
  readonly returnType: RuntimeType;
};

export type EmptyExpression = NodeBase & {
  readonly nodeType: 'empty';
};

/**
 * The closed set of IR nodes.
 */
export type Expression =
  | ConstantExpression
  | ParameterExpression
  | MemberExpression
  | CallExpression
  | ConditionalExpression
  | BlockExpression
  | LoopExpression
  | BreakExpression
  | AssignExpression
  | BinaryExpression
  | UnaryExpression
  | ConvertExpression
  | TypeAsExpression
  | DefaultExpression
  | NewExpression
  | TryFinallyExpression
  | ArrayIndexExpression
  | LambdaExpression
  | EmptyExpression;

export type NodeType = Expression['nodeType'];
