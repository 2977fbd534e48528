import { AesCbcCodec } from './codec/AesCbcCodec';
import type { VaultConfig } from './config/loadVaultConfig';
import type { Sleep, VaultLogger } from './content-store/ContentStore';
import { PinataContentStore } from './content-store/PinataContentStore';
import { HttpLedgerClient } from './ledger/HttpLedgerClient';
import { FileVault } from './workflow/FileVault';

export type FileVaultRuntime = Readonly<{
  fetch?: typeof fetch;
  sleep?: Sleep;
  logger?: VaultLogger;
}>;

export const createFileVault = (config: VaultConfig, runtime: FileVaultRuntime = {}): FileVault =>
  new FileVault({
    ledger: new HttpLedgerClient({
      baseUrl: config.ledgerUrl,
      sessionToken: config.sessionToken,
      fetch: runtime.fetch,
    }),
    contentStore: new PinataContentStore({
      ...config.pinata,
      fetch: runtime.fetch,
      sleep: runtime.sleep,
      logger: runtime.logger,
    }),
    codec: new AesCbcCodec(),
    maxUploadBytes: config.maxUploadBytes,
    logger: runtime.logger,
  });
