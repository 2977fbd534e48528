import type { GroupId } from '../value-objects/GroupId';
import type { GroupKey } from '../value-objects/GroupKey';
import type { PrincipalId } from '../value-objects/PrincipalId';
import type { MembershipSet } from './MembershipSet';

export type Group = Readonly<{
  groupId: GroupId;
  owner: PrincipalId;
  members: MembershipSet;
  /** Null until the first `storeKey` or rotation. */
  key: GroupKey | null;
}>;
