import { createHash } from 'node:crypto';

export const sha256Hex = (data: Uint8Array): string => createHash('sha256').update(data).digest('hex');

export const verifyFileHash = (data: Uint8Array, expectedHash: string): boolean =>
  sha256Hex(data) === expectedHash.toLowerCase();
