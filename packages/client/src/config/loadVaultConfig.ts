import { z } from 'zod';
import {
  DEFAULT_FALLBACK_GATEWAY,
  DEFAULT_PINNING_ENDPOINT,
  DEFAULT_PRIMARY_GATEWAY,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../content-store/PinataContentStore';

const VaultEnvSchema = z.object({
  LEDGER_URL: z.string().url(),
  LEDGER_SESSION_TOKEN: z.string().min(1),
  PINATA_API_KEY: z.string().min(1),
  PINATA_SECRET_KEY: z.string().min(1),
  PINATA_PINNING_ENDPOINT: z.string().url().default(DEFAULT_PINNING_ENDPOINT),
  IPFS_PRIMARY_GATEWAY: z.string().url().default(DEFAULT_PRIMARY_GATEWAY),
  IPFS_FALLBACK_GATEWAY: z.string().url().default(DEFAULT_FALLBACK_GATEWAY),
  CONTENT_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  VAULT_MAX_UPLOAD_BYTES: z.coerce.number().int().positive().optional(),
});

export type VaultConfig = Readonly<{
  ledgerUrl: string;
  sessionToken: string;
  pinata: Readonly<{
    apiKey: string;
    secretKey: string;
    pinningEndpoint: string;
    primaryGateway: string;
    fallbackGateway: string;
    requestTimeoutMs: number;
  }>;
  maxUploadBytes?: number;
}>;

export const loadVaultConfig = (env: Record<string, string | undefined> = process.env): VaultConfig => {
  const parsed = VaultEnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid vault configuration: ${fields}`);
  }
  const values = parsed.data;
  return {
    ledgerUrl: values.LEDGER_URL,
    sessionToken: values.LEDGER_SESSION_TOKEN,
    pinata: {
      apiKey: values.PINATA_API_KEY,
      secretKey: values.PINATA_SECRET_KEY,
      pinningEndpoint: values.PINATA_PINNING_ENDPOINT,
      primaryGateway: values.IPFS_PRIMARY_GATEWAY,
      fallbackGateway: values.IPFS_FALLBACK_GATEWAY,
      requestTimeoutMs: values.CONTENT_REQUEST_TIMEOUT_MS,
    },
    maxUploadBytes: values.VAULT_MAX_UPLOAD_BYTES,
  };
};
