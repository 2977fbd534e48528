/**
 * Wrapper for group identifier.
 */
export class GroupId {
  private constructor(private readonly value: string) {}

  static from(value: string): GroupId {
    if (!value || value.trim().length === 0) {
      throw new Error('GroupId cannot be empty');
    }
    return new GroupId(value);
  }

  unwrap(): string {
    return this.value;
  }

  equals(other: GroupId): boolean {
    return this.value === other.value;
  }
}
