import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { GROUP_KEY_LENGTH, decodeBase64Strict, encodeBase64 } from '@groupvault/contract';
import { CryptoFault } from '../errors/CryptoFault';

const ALGORITHM = 'aes-256-cbc';
const IV_LENGTH = 16;
const BLOCK_SIZE = 16;

const decodeKey = (keyB64: string): Buffer => {
  const key = decodeBase64Strict(keyB64);
  if (!key || key.length !== GROUP_KEY_LENGTH) {
    throw new CryptoFault('InvalidKey', `Invalid key: expected ${GROUP_KEY_LENGTH} bytes of base64`);
  }
  return Buffer.from(key);
};

/**
 * AES-256-CBC with PKCS7 padding. The wire format is `base64(iv || ciphertext)`
 * with a fresh 16-byte IV per call.
 *
 * There is no authentication tag: integrity is checked by comparing the
 * plaintext's SHA-256 with the hash recorded on the ledger.
 */
export class AesCbcCodec {
  encrypt(plaintext: Uint8Array, keyB64: string): string {
    const key = decodeKey(keyB64);
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return encodeBase64(Buffer.concat([iv, ciphertext]));
  }

  decrypt(ciphertextB64: string, keyB64: string): Uint8Array {
    const key = decodeKey(keyB64);
    const payload = decodeBase64Strict(ciphertextB64);
    if (!payload || payload.length < IV_LENGTH) {
      throw new CryptoFault('InvalidKey', 'Encrypted payload is shorter than its IV');
    }

    const iv = payload.subarray(0, IV_LENGTH);
    const body = payload.subarray(IV_LENGTH);
    if (body.length === 0 || body.length % BLOCK_SIZE !== 0) {
      throw new CryptoFault('DecryptionFailed', `Ciphertext length ${body.length} is not a positive multiple of ${BLOCK_SIZE}`);
    }

    const decipher = createDecipheriv(ALGORITHM, key, iv);
    try {
      const plaintext = Buffer.concat([decipher.update(body), decipher.final()]);
      return new Uint8Array(plaintext);
    } catch (error) {
      throw new CryptoFault('DecryptionFailed', 'Decryption failed: malformed padding or wrong key', {
        cause: error,
      });
    }
  }
}
