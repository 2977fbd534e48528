import { VaultError } from './VaultError';

export type ContentStoreErrorKind = 'Timeout' | 'Other';

/**
 * Transport failure against the content store. Only `Timeout` is retryable.
 */
export class ContentStoreError extends VaultError<ContentStoreErrorKind> {
  constructor(kind: ContentStoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, kind, options);
    this.name = 'ContentStoreError';
  }

  get isTimeout(): boolean {
    return this.kind === 'Timeout';
  }
}
