/**
 * Identity of an authenticated caller or a group member.
 */
export class PrincipalId {
  private constructor(private readonly value: string) {}

  static from(value: string): PrincipalId {
    if (!value || value.trim().length === 0) {
      throw new Error('PrincipalId cannot be empty');
    }
    return new PrincipalId(value);
  }

  unwrap(): string {
    return this.value;
  }

  equals(other: PrincipalId): boolean {
    return this.value === other.value;
  }
}
