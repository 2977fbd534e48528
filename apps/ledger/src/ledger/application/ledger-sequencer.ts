import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';

export const LEDGER_SLOW_CALL_MS = Symbol('LEDGER_SLOW_CALL_MS');

const DEFAULT_SLOW_CALL_MS = 250;

/** Reads `LEDGER_SLOW_CALL_MS`; missing, negative or non-numeric values fall back to 250. */
export const resolveSlowCallThreshold = (config: ConfigService): number => {
  const configured = Number(config.get<string>('LEDGER_SLOW_CALL_MS') ?? DEFAULT_SLOW_CALL_MS);
  return Number.isFinite(configured) && configured >= 0 ? configured : DEFAULT_SLOW_CALL_MS;
};

/**
 * Runs ledger calls one at a time in arrival order. A call starts only after
 * the previous one has settled, whether it succeeded or failed.
 */
@Injectable()
export class LedgerSequencer {
  private readonly logger = new Logger(LedgerSequencer.name);
  private tail: Promise<void> = Promise.resolve();
  private readonly warnThresholdMs: number;

  constructor(@Optional() @Inject(LEDGER_SLOW_CALL_MS) warnThresholdMs?: number) {
    this.warnThresholdMs = warnThresholdMs ?? DEFAULT_SLOW_CALL_MS;
  }

  run<T>(label: string, task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(() => this.timed(label, task));
    // Failures reach the caller through `result`; the chain itself keeps going.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async timed<T>(label: string, task: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await task();
    } finally {
      const durationMs = performance.now() - start;
      if (durationMs > this.warnThresholdMs) {
        this.logger.warn(`${label} exceeded budget (${durationMs.toFixed(1)}ms > ${this.warnThresholdMs}ms)`);
      }
    }
  }
}
