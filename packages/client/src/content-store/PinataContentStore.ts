import { z } from 'zod';
import { ContentStoreError } from '../errors/ContentStoreError';
import { type ContentStore, type Sleep, type VaultLogger, delay } from './ContentStore';
import { joinUrl } from '../http/joinUrl';
import { classifyFetchFailure, classifyStatus } from './transportErrors';

export const DEFAULT_PINNING_ENDPOINT = 'https://api.pinata.cloud/pinning/pinFileToIPFS';
export const DEFAULT_PRIMARY_GATEWAY = 'https://gateway.pinata.cloud';
export const DEFAULT_FALLBACK_GATEWAY = 'https://ipfs.io';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Timed-out primary attempts before the fallback gateway is tried. */
export const PRIMARY_ATTEMPTS = 3;
/** Backoff after the first timeout; doubles after each following one (2s, 4s, 8s). */
export const INITIAL_BACKOFF_MS = 2_000;

export type PinataContentStoreOptions = Readonly<{
  apiKey: string;
  secretKey: string;
  pinningEndpoint?: string;
  primaryGateway?: string;
  fallbackGateway?: string;
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
  logger?: VaultLogger;
}>;

const PinResponseSchema = z.object({
  IpfsHash: z.string().min(1),
});

const toArrayBuffer = (input: Uint8Array): ArrayBuffer => {
  const buffer = new ArrayBuffer(input.byteLength);
  new Uint8Array(buffer).set(input);
  return buffer;
};

/**
 * IPFS content store pinned through Pinata.
 *
 * Uploads are a single attempt. Retrieval retries timeouts only, against the
 * primary gateway, then tries the public fallback gateway exactly once.
 */
export class PinataContentStore implements ContentStore {
  private readonly pinningEndpoint: string;
  private readonly primaryGateway: string;
  private readonly fallbackGateway: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: Sleep;
  private readonly logger: VaultLogger;

  constructor(private readonly options: PinataContentStoreOptions) {
    this.pinningEndpoint = options.pinningEndpoint ?? DEFAULT_PINNING_ENDPOINT;
    this.primaryGateway = options.primaryGateway ?? DEFAULT_PRIMARY_GATEWAY;
    this.fallbackGateway = options.fallbackGateway ?? DEFAULT_FALLBACK_GATEWAY;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? delay;
    this.logger = options.logger ?? console;
  }

  async put(bytes: Uint8Array, name: string): Promise<string> {
    const form = new FormData();
    form.append('file', new Blob([toArrayBuffer(bytes)]), name);

    let response: Response;
    try {
      response = await this.fetchFn(this.pinningEndpoint, {
        method: 'POST',
        headers: {
          pinata_api_key: this.options.apiKey,
          pinata_secret_api_key: this.options.secretKey,
        },
        body: form,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw classifyFetchFailure(error, 'Content upload');
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw classifyStatus(response.status, 'Content upload');
    }

    const parsed = PinResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new ContentStoreError('Other', 'Pinning response is missing IpfsHash');
    }
    return parsed.data.IpfsHash;
  }

  async get(contentId: string): Promise<Uint8Array> {
    for (let attempt = 1; attempt <= PRIMARY_ATTEMPTS; attempt += 1) {
      try {
        return await this.fetchFromGateway(this.primaryGateway, contentId);
      } catch (error) {
        if (!(error instanceof ContentStoreError && error.isTimeout)) {
          throw error;
        }
        const backoffMs = INITIAL_BACKOFF_MS * 2 ** (attempt - 1);
        this.logger.warn(`[PinataContentStore] Attempt ${attempt}/${PRIMARY_ATTEMPTS} for ${contentId} timed out`, {
          backoffMs,
        });
        await this.sleep(backoffMs);
      }
    }

    this.logger.warn(`[PinataContentStore] Primary gateway exhausted for ${contentId}; trying fallback gateway`);
    return this.fetchFromGateway(this.fallbackGateway, contentId);
  }

  private async fetchFromGateway(gateway: string, contentId: string): Promise<Uint8Array> {
    const url = joinUrl(gateway, `ipfs/${encodeURIComponent(contentId)}`);
    const action = `Content retrieval from ${url.host}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw classifyFetchFailure(error, action);
    }

    if (!response.ok) {
      // Release the connection before a retry opens another one.
      await response.body?.cancel();
      throw classifyStatus(response.status, action);
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw classifyFetchFailure(error, action);
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
}
