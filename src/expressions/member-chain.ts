import { Enumerable } from '../metadata/extensions';
import { getMemberPath } from '../metadata/member-path';
import type { RuntimeType } from '../metadata/runtime-type';
import type { MemberDescriptor } from '../metadata/members';
import { MemberPathError, UnexpectedMemberError } from '../errors';
import { call, lambda, member, parameter } from '../ir/factory';
import type { Expression, LambdaExpression, MemberExpression } from '../ir/nodes';
import { formatExpression } from '../ir/printer';
import { formatMessage } from '../report';
import { replace, replaceParameters } from './rewriters';

/**
 * One step of a member chain.
 */
export type MemberChainLink = {
  /**
   * The access node itself.
   */
  readonly expression: Expression;

  /**
   * The member it reads or invokes.
   */
  readonly member: MemberDescriptor;

  /**
   * The node it reads from (for extension methods: the first argument).
   */
  readonly target: Expression;
};

function toLink(expression: Expression): MemberChainLink | undefined {
  if (expression.nodeType === 'member') {
    return { expression, member: expression.member, target: expression.target };
  }
  if (expression.nodeType === 'call') {
    if (expression.target) {
      return { expression, member: expression.method, target: expression.target };
    }
    const [receiver] = expression.args;
    if (expression.method.isExtension && receiver) {
      return { expression, member: expression.method, target: receiver };
    }
  }
  return undefined;
}

/**
 * Decomposes an expression into its member chain, root first.
 *
 * Walks from the leaf towards the root while the current node is a member
 * access, an instance call or an extension-style call. The walk stops at
 * the first other node, so a non-path expression yields an empty or
 * truncated chain.
 *
 * @param expression
 *   Leaf of the chain.
 * @returns
 *   Links ordered root to leaf; each link's `target` is the previous
 *   link's `expression`.
 */
export function getChain(expression: Expression): MemberChainLink[] {
  const links: MemberChainLink[] = [];

  for (let link = toLink(expression); link; link = toLink(link.target)) {
    links.push(link);
  }

  return links.reverse();
}

/**
 * The members of the chain, root first.
 */
export function getMembersChain(expression: Expression | LambdaExpression): MemberDescriptor[] {
  const leaf = expression.nodeType === 'lambda' ? expression.body : expression;
  return getChain(leaf).map(link => link.member);
}

/**
 * The member a lambda reads directly from its first parameter
 * (`x => x.name`), else `undefined`.
 */
export function getMember(expression: LambdaExpression | undefined): MemberDescriptor | undefined {
  const body = expression?.body;
  const [first] = expression?.parameters ?? [];

  if (body?.nodeType !== 'member' || !first) return undefined;
  return body.target.nodeType === 'parameter' && body.target.id === first.id
    ? body.member
    : undefined;
}

/**
 * The member-access nodes of a chain, root first. Stops at the first link
 * that is a method call; empty when the expression is not a member access.
 */
export function getMemberExpressions(expression: Expression): MemberExpression[] {
  if (expression.nodeType !== 'member') return [];

  const accesses: MemberExpression[] = [];
  for (const link of getChain(expression)) {
    if (link.expression.nodeType !== 'member') break;
    accesses.push(link.expression);
  }
  return accesses;
}

/**
 * Whether the lambda body is a pure chain of property and field reads
 * rooted at the lambda's first parameter.
 */
export function isMemberPath(expression: LambdaExpression): boolean {
  const chain = getChain(expression.body);
  const [root] = chain;
  const [first] = expression.parameters;

  if (!root || !first) return false;
  if (root.target.nodeType !== 'parameter' || root.target.id !== first.id) return false;
  if (chain.some(link => link.expression.nodeType !== 'member')) return false;

  return chain.at(-1)?.expression.id === expression.body.id;
}

/**
 * Rejects a lambda that is not a member path.
 *
 * @param expression
 *   The lambda to check.
 * @param name
 *   Name of the caller's argument holding the lambda, used in the error.
 * @throws {MemberPathError}
 *   Naming `name` and the printed lambda.
 */
export function ensureMemberPath(expression: LambdaExpression, name: string): void {
  if (!isMemberPath(expression)) {
    throw new MemberPathError(name, formatExpression(expression));
  }
}

/**
 * Builds the access chain `target.m1.m2…` from member descriptors.
 *
 * 1. Properties and fields become member reads.
 * 2. Static methods are called with the current target as their argument.
 * 3. Instance methods are called on the current target without arguments.
 */
export function chainMembers(
  members: readonly MemberDescriptor[],
  target: Expression
): Expression {
  let current = target;

  for (const descriptor of members) {
    switch (descriptor.kind) {
      case 'property':
      case 'field':
        current = member(current, descriptor);
        break;
      case 'method':
        current = descriptor.isStatic
          ? call(null, descriptor, [current])
          : call(current, descriptor);
        break;
      default: {
        const unexpected: never = descriptor;
        throw new UnexpectedMemberError(
          formatMessage('Unexpected member', String(unexpected))
        );
      }
    }
  }

  return current;
}

/**
 * `source => source.m1.m2…`, with the parameter typed by the first member's
 * declaring type.
 */
export function memberLambda(members: readonly MemberDescriptor[]): LambdaExpression {
  const [first] = members;
  if (!first) {
    throw new MemberPathError('members', '(empty)', 'At least one member is required.');
  }

  const source = parameter(first.declaringType, 'source');
  return lambda([source], chainMembers(members, source));
}

/**
 * `source => source.a.b` for the dotted path `"a.b"` on `type`.
 *
 * @throws {MemberPathError} When a segment names no member.
 */
export function memberAccessLambda(type: RuntimeType, path: string): LambdaExpression {
  return memberLambda(getMemberPath(type, path));
}

/**
 * Splices expressions into one chain, starting from `start`.
 *
 * Each step receives the chain built so far: a lambda gets it as its
 * parameter, any other expression gets it in place of its chain root.
 */
export function chainExpressions(
  expressions: readonly Expression[],
  start: Expression
): Expression {
  return expressions.reduce<Expression>((left, right) => {
    if (right.nodeType === 'lambda') return replaceParameters(right, left);

    const [root] = getChain(right);
    return root ? replace(right, root.target, left) : right;
  }, start);
}

/**
 * Whether the expression is a sequence query (a static `Enumerable` call).
 */
export function isQuery(expression: Expression): boolean {
  return (
    expression.nodeType === 'call' &&
    expression.method.isStatic &&
    expression.method.declaringType === Enumerable
  );
}
