import { PrincipalId } from '../value-objects/PrincipalId';

/**
 * Duplicate-free list of group members.
 *
 * Removal moves the last member into the vacated slot, so the relative order of
 * the remaining members is not preserved.
 */
export class MembershipSet {
  private constructor(private readonly members: ReadonlyArray<PrincipalId>) {}

  static empty(): MembershipSet {
    return new MembershipSet([]);
  }

  static of(members: ReadonlyArray<PrincipalId>): MembershipSet {
    return members.reduce((set, member) => set.add(member), MembershipSet.empty());
  }

  get size(): number {
    return this.members.length;
  }

  has(principal: PrincipalId): boolean {
    return this.indexOf(principal) !== -1;
  }

  add(principal: PrincipalId): MembershipSet {
    if (this.has(principal)) {
      throw new Error(`Duplicate member ${principal.unwrap()}`);
    }
    return new MembershipSet([...this.members, principal]);
  }

  remove(principal: PrincipalId): MembershipSet {
    const index = this.indexOf(principal);
    if (index === -1) {
      throw new Error(`Unknown member ${principal.unwrap()}`);
    }
    const next = [...this.members];
    const last = next.pop();
    if (last && index < next.length) {
      next[index] = last;
    }
    return new MembershipSet(next);
  }

  toArray(): PrincipalId[] {
    return [...this.members];
  }

  private indexOf(principal: PrincipalId): number {
    return this.members.findIndex((member) => member.equals(principal));
  }
}
