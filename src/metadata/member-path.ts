import { MemberPathError } from '../errors';
import type { DataMemberDescriptor } from './members';
import type { RuntimeType } from './runtime-type';

/**
 * Resolves a dotted path (`"customer.address.city"`) to the descriptors it
 * walks through, starting at `type`.
 *
 * @param type
 *   Type the first segment is declared on.
 * @param path
 *   Member names separated by dots.
 * @returns
 *   One descriptor per segment, root first.
 * @throws {MemberPathError}
 *   When a segment names no readable member of the type reached so far.
 */
export function getMemberPath(
  type: RuntimeType,
  path: string
): DataMemberDescriptor[] {
  const members: DataMemberDescriptor[] = [];
  let current = type;

  for (const segment of path.split('.')) {
    const member = current.getProperty(segment);
    if (!member) {
      throw new MemberPathError(
        'path',
        `${type.name}.${path}`,
        `"${segment}" is not a member of ${current.name}.`
      );
    }
    members.push(member);
    current = member.type;
  }

  return members;
}
