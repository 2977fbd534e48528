import { z } from 'zod';
import { isLedgerErrorKind, type TransactionRecord } from '@groupvault/contract';
import { LedgerFault, LedgerTransportError } from '../errors/LedgerFault';
import { joinUrl } from '../http/joinUrl';
import type { LedgerPort } from './LedgerPort';

export type HttpLedgerClientOptions = Readonly<{
  baseUrl: string;
  sessionToken: string;
  fetch?: typeof fetch;
}>;

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

const OkSchema = z.object({ ok: z.literal(true) });

const TransactionRecordSchema = z.object({
  id: z.string(),
  groupId: z.string(),
  userId: z.string(),
  fileHash: z.string(),
  contentId: z.string(),
  ledgerTimestamp: z.string(),
});

const ErrorBodySchema = z.object({
  kind: z.string(),
  message: z.union([z.string(), z.array(z.string())]),
});

const segment = (value: string): string => encodeURIComponent(value);

/**
 * LedgerPort over the ledger host's HTTP surface, authenticated with a session
 * token. Ledger rejections come back as LedgerFault with their original kind.
 */
export class HttpLedgerClient implements LedgerPort {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: HttpLedgerClientOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async registerGroup(groupId: string): Promise<void> {
    await this.request('POST', '/groups', OkSchema, { groupId });
  }

  async groupExists(groupId: string): Promise<boolean> {
    const body = await this.request('GET', `/groups/${segment(groupId)}/exists`, z.object({ exists: z.boolean() }));
    return body.exists;
  }

  async addMember(groupId: string, userId: string): Promise<void> {
    await this.request('POST', `/groups/${segment(groupId)}/members`, OkSchema, { userId });
  }

  async revokeMember(groupId: string, userId: string): Promise<void> {
    await this.request('DELETE', `/groups/${segment(groupId)}/members/${segment(userId)}`, OkSchema);
  }

  async isAuthorized(groupId: string, userId: string): Promise<boolean> {
    const body = await this.request(
      'GET',
      `/groups/${segment(groupId)}/members/${segment(userId)}/authorized`,
      z.object({ authorized: z.boolean() })
    );
    return body.authorized;
  }

  async storeKey(groupId: string, keyB64: string): Promise<void> {
    await this.request('PUT', `/groups/${segment(groupId)}/key`, OkSchema, { key: keyB64 });
  }

  async getKey(groupId: string): Promise<string> {
    const body = await this.request('GET', `/groups/${segment(groupId)}/key`, z.object({ key: z.string() }));
    return body.key;
  }

  async recordTransaction(groupId: string, userId: string, fileHash: string, contentId: string): Promise<string> {
    const body = await this.request(
      'POST',
      `/groups/${segment(groupId)}/transactions`,
      z.object({ transactionId: z.string() }),
      { userId, fileHash, contentId }
    );
    return body.transactionId;
  }

  async whoAmI(): Promise<string> {
    const body = await this.request('GET', '/me', z.object({ principalId: z.string().min(1) }));
    return body.principalId;
  }

  async listTransactions(groupId: string, userId: string): Promise<TransactionRecord[]> {
    const body = await this.request(
      'GET',
      `/groups/${segment(groupId)}/transactions?userId=${segment(userId)}`,
      z.object({ transactions: z.array(TransactionRecordSchema) })
    );
    return body.transactions;
  }

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    body?: Record<string, string>
  ): Promise<z.infer<S>> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      'x-session-token': this.options.sessionToken,
    };
    if (body) {
      headers['content-type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchFn(joinUrl(this.options.baseUrl, path), {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new LedgerTransportError(`Ledger ${method} ${path} failed: ${detail}`, undefined, { cause: error });
    }

    const payload = await this.readJson(response);

    if (!response.ok) {
      throw this.toError(method, path, response.status, payload);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new LedgerTransportError(`Unexpected ledger response for ${method} ${path}`, response.status);
    }
    return parsed.data;
  }

  private toError(method: HttpMethod, path: string, status: number, payload: unknown): Error {
    const parsed = ErrorBodySchema.safeParse(payload);
    if (parsed.success && isLedgerErrorKind(parsed.data.kind)) {
      const message = Array.isArray(parsed.data.message) ? parsed.data.message.join('; ') : parsed.data.message;
      return new LedgerFault(parsed.data.kind, message);
    }
    return new LedgerTransportError(`Ledger ${method} ${path} failed (status ${status})`, status);
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
