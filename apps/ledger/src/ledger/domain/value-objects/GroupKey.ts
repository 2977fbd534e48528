import { GROUP_KEY_LENGTH, decodeBase64Strict, encodeBase64 } from '@groupvault/contract';
import { LedgerFault } from '../errors/LedgerFault';

/**
 * Symmetric group key: exactly 32 raw bytes, exchanged as standard base64.
 */
export class GroupKey {
  private constructor(private readonly encoded: string) {}

  static fromBase64(value: string): GroupKey {
    const bytes = decodeBase64Strict(value);
    if (!bytes || bytes.length !== GROUP_KEY_LENGTH) {
      throw LedgerFault.invalidKey();
    }
    return new GroupKey(value);
  }

  static fromBytes(bytes: Uint8Array): GroupKey {
    if (bytes.length !== GROUP_KEY_LENGTH) {
      throw LedgerFault.invalidKey();
    }
    return new GroupKey(encodeBase64(bytes));
  }

  toBase64(): string {
    return this.encoded;
  }

  equals(other: GroupKey): boolean {
    return this.encoded === other.encoded;
  }
}
