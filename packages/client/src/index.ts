export * from './errors';
export { AesCbcCodec } from './codec/AesCbcCodec';
export { sha256Hex, verifyFileHash } from './codec/fileHash';
export type { ContentStore, Sleep, VaultLogger } from './content-store/ContentStore';
export {
  PinataContentStore,
  PRIMARY_ATTEMPTS,
  INITIAL_BACKOFF_MS,
  type PinataContentStoreOptions,
} from './content-store/PinataContentStore';
export type { LedgerPort } from './ledger/LedgerPort';
export { HttpLedgerClient, type HttpLedgerClientOptions } from './ledger/HttpLedgerClient';
export {
  FileVault,
  type FileVaultOptions,
  type RetrieveResult,
  type UploadResult,
} from './workflow/FileVault';
export { verifyProvenance } from './workflow/provenance';
export { loadVaultConfig, type VaultConfig } from './config/loadVaultConfig';
export { createFileVault, type FileVaultRuntime } from './createFileVault';
