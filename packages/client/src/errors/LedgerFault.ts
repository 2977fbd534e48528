import type { LedgerErrorKind } from '@groupvault/contract';
import { VaultError } from './VaultError';

/**
 * A ledger rejection (permission or state violation). Terminal: never retried.
 */
export class LedgerFault extends VaultError<LedgerErrorKind> {
  constructor(kind: LedgerErrorKind, message: string) {
    super(message, kind);
    this.name = 'LedgerFault';
  }
}

/**
 * The ledger host could not be reached or answered outside the ledger contract.
 */
export class LedgerTransportError extends VaultError<'Transport'> {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'Transport', options);
    this.name = 'LedgerTransportError';
  }
}
