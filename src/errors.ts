import { formatMemberPathMessage } from './report';

/**
 * A lambda handed to member-path resolution is not a pure chain of member
 * accesses rooted at its parameter.
 *
 * This is a configuration-time error: it is raised synchronously to the code
 * that asked for the path and is never retried.
 */
export class MemberPathError extends RangeError {
  override name = 'MemberPathError';

  /**
   * @param parameterName - The caller's argument name holding the lambda.
   * @param expressionText - The offending lambda, printed.
   * @param detail - Why the path was rejected.
   */
  constructor(
    readonly parameterName: string,
    readonly expressionText: string,
    detail = 'Only member accesses are allowed.'
  ) {
    super(formatMemberPathMessage(parameterName, expressionText, detail));
  }
}

/**
 * Chain building met a member kind outside the closed set
 * {property, field, static method, instance method}.
 *
 * Typed callers cannot produce this; it signals a descriptor built outside
 * the metadata helpers and is not recoverable.
 */
export class UnexpectedMemberError extends Error {
  override name = 'UnexpectedMemberError';
}

/**
 * An IR factory was given operands whose static types do not fit together.
 */
export class IrConstructionError extends Error {
  override name = 'IrConstructionError';
}

/**
 * A destination type offers no constructor usable by the plan.
 */
export class MissingConstructorError extends Error {
  override name = 'MissingConstructorError';
}

/**
 * An arrow function could not be turned into an IR lambda.
 */
export class LambdaParseError extends Error {
  override name = 'LambdaParseError';
}

/**
 * The reducer met an IR tree it cannot turn into a closure.
 */
export class CompileError extends Error {
  override name = 'CompileError';
}

/**
 * A type map definition is malformed, or a mapping was requested for a type
 * pair with no map and no built-in conversion.
 */
export class ConfigurationError extends Error {
  override name = 'ConfigurationError';
}

/**
 * A compiled plan read a member of, or invoked a method on, `null`.
 */
export class NullReferenceError extends TypeError {
  override name = 'NullReferenceError';
}

/**
 * A compiled plan could not coerce a value to the required type.
 */
export class InvalidCastError extends TypeError {
  override name = 'InvalidCastError';
}

/**
 * An operation is not available on the runtime value (e.g. `add` on a
 * read-only collection).
 */
export class NotSupportedError extends Error {
  override name = 'NotSupportedError';
}
