import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuthenticatedIdentity } from './authenticated-identity';

const DEFAULT_TTL_MS = 30_000;

type CacheEntry = {
  value: AuthenticatedIdentity;
  expiresAt: number;
};

@Injectable()
export class SessionCache {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;

  constructor(@Inject(ConfigService) config: ConfigService) {
    const configured = Number(config.get<string>('SESSION_CACHE_TTL_MS') ?? DEFAULT_TTL_MS);
    this.ttlMs = Number.isFinite(configured) && configured >= 0 ? configured : DEFAULT_TTL_MS;
  }

  read(token: string, now = Date.now()): AuthenticatedIdentity | null {
    const entry = this.cache.get(token);
    if (!entry) return null;
    if (now > entry.expiresAt) {
      this.cache.delete(token);
      return null;
    }
    return entry.value;
  }

  write(token: string, value: AuthenticatedIdentity, now = Date.now()): void {
    this.cache.set(token, { value, expiresAt: now + this.ttlMs });
  }

  invalidate(token: string): void {
    this.cache.delete(token);
  }
}
