/**
 * Message formatting for configuration-time and run-time failures.
 *
 * Every error raised by this package carries a message built here, so that
 * messages share one shape:
 *
 *   [mapping-plan] <headline> "<subject>": <detail>
 *
 * Subjects are always rendered text (a type name, a member name, or an
 * expression printed by `formatExpression`), never raw objects.
 */

const MESSAGE_PREFIX = '[mapping-plan]';

/**
 * Builds a single-line message in the shared format.
 *
 * @param headline - Short description of what failed (e.g. "Invalid member path").
 * @param subject - The thing the failure is attributed to.
 * @param detail - Optional explanation appended after the subject.
 * @returns The formatted message.
 */
export function formatMessage(
  headline: string,
  subject: string,
  detail?: string
): string {
  const base = `${MESSAGE_PREFIX} ${headline} "${subject}"`;
  return detail ? `${base}: ${detail}` : base;
}

/**
 * Message for a lambda that is not a pure member path.
 *
 * @param parameterName - Name of the caller's argument that held the lambda.
 * @param expressionText - The printed lambda.
 * @param detail - Reason the path was rejected.
 */
export function formatMemberPathMessage(
  parameterName: string,
  expressionText: string,
  detail: string
): string {
  return formatMessage(
    'Invalid member path for',
    parameterName,
    `${detail} ${expressionText}`
  );
}

/**
 * Formats a list of names for inclusion in a message, truncating long lists.
 *
 * @param names - Names to list.
 * @param limit - Maximum number of names to print before summarizing.
 * @returns e.g. `"a", "b", … (3 more)`; `(none)` for an empty list.
 */
export function formatNameList(
  names: readonly string[],
  limit = 5
): string {
  if (names.length === 0) return '(none)';

  const shown = names.slice(0, limit).map(name => `"${name}"`);
  const remaining = names.length - shown.length;

  return remaining > 0
    ? `${shown.join(', ')}, … (${remaining} more)`
    : shown.join(', ');
}
