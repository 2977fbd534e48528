import { VaultError } from './VaultError';

export type CryptoFaultKind = 'InvalidKey' | 'DecryptionFailed';

export class CryptoFault extends VaultError<CryptoFaultKind> {
  constructor(kind: CryptoFaultKind, message: string, options?: { cause?: unknown }) {
    super(message, kind, options);
    this.name = 'CryptoFault';
  }
}
