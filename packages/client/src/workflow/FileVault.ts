import { isContentId, type TransactionRecord } from '@groupvault/contract';
import type { AesCbcCodec } from '../codec/AesCbcCodec';
import { sha256Hex } from '../codec/fileHash';
import type { ContentStore, VaultLogger } from '../content-store/ContentStore';
import { LedgerTransportError } from '../errors/LedgerFault';
import { WorkflowError } from '../errors/WorkflowError';
import type { LedgerPort } from '../ledger/LedgerPort';

export type UploadResult = Readonly<{
  contentId: string;
  transactionId: string;
  fileHash: string;
}>;

export type RetrieveResult = Readonly<{
  plaintext: Uint8Array;
  fileHash: string;
}>;

export type FileVaultOptions = Readonly<{
  ledger: LedgerPort;
  contentStore: ContentStore;
  codec: AesCbcCodec;
  /** Uploads larger than this are rejected before the ledger is contacted. */
  maxUploadBytes?: number;
  logger?: VaultLogger;
}>;

/**
 * Encrypt/store/record and fetch/decrypt as single logical operations.
 *
 * Steps run strictly in order and a failure aborts the rest. Nothing is rolled
 * back: a blob pinned before a failed ledger write stays behind as an orphan,
 * and recording it again is left to the caller.
 */
export class FileVault {
  private readonly logger: VaultLogger;
  private principalId: string | null = null;

  constructor(private readonly options: FileVaultOptions) {
    this.logger = options.logger ?? console;
  }

  async upload(groupId: string, userId: string, plaintext: Uint8Array, name: string): Promise<UploadResult> {
    const { maxUploadBytes } = this.options;
    if (maxUploadBytes !== undefined && plaintext.byteLength > maxUploadBytes) {
      throw new WorkflowError(
        'PayloadTooLarge',
        `Payload of ${plaintext.byteLength} bytes exceeds the ${maxUploadBytes} byte limit`
      );
    }

    const key = await this.options.ledger.getKey(groupId);
    const ciphertextB64 = this.options.codec.encrypt(plaintext, key);
    const contentId = await this.options.contentStore.put(Buffer.from(ciphertextB64, 'base64'), name);
    const fileHash = sha256Hex(plaintext);
    const transactionId = await this.options.ledger.recordTransaction(groupId, userId, fileHash, contentId);

    this.logger.info(`[FileVault] Uploaded ${name} to group ${groupId}`, { contentId, transactionId });
    return { contentId, transactionId, fileHash };
  }

  /**
   * Returns the plaintext and its hash. The hash is not compared against any
   * ledger record here; use `verifyProvenance` for that.
   */
  async retrieve(groupId: string, contentId: string): Promise<RetrieveResult> {
    if (!isContentId(contentId)) {
      throw new WorkflowError('InvalidContentId', `Invalid content id: ${contentId}`);
    }
    const principalId = await this.actingPrincipal('retrieve');

    const key = await this.options.ledger.getKey(groupId);
    const ciphertext = await this.options.contentStore.get(contentId);
    const plaintext = this.options.codec.decrypt(Buffer.from(ciphertext).toString('base64'), key);

    this.logger.info(`[FileVault] ${principalId} retrieved ${contentId} from group ${groupId}`);
    return { plaintext, fileHash: sha256Hex(plaintext) };
  }

  async listFiles(groupId: string): Promise<TransactionRecord[]> {
    const principalId = await this.actingPrincipal('list files');
    return this.options.ledger.listTransactions(groupId, principalId);
  }

  /**
   * The principal the ledger session authenticates as, asked of the ledger
   * once and reused. A rejected session surfaces as MissingIdentity.
   */
  private async actingPrincipal(action: string): Promise<string> {
    if (this.principalId) {
      return this.principalId;
    }
    try {
      this.principalId = await this.options.ledger.whoAmI();
    } catch (error) {
      if (error instanceof LedgerTransportError && error.status === 401) {
        throw new WorkflowError('MissingIdentity', `An acting principal is required to ${action}`, { cause: error });
      }
      throw error;
    }
    return this.principalId;
  }
}
