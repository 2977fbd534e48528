import { Injectable } from '@nestjs/common';
import { LedgerClock } from '../application/ports/ledger-clock';

const NANOS_PER_MILLI = 1_000_000n;

/**
 * Wall clock in nanoseconds, nudged forward by 1ns whenever two calls land in
 * the same millisecond (or the wall clock steps back).
 */
@Injectable()
export class SystemLedgerClock extends LedgerClock {
  private last = 0n;

  constructor(private readonly readMillis: () => number = Date.now) {
    super();
  }

  now(): bigint {
    const candidate = BigInt(this.readMillis()) * NANOS_PER_MILLI;
    this.last = candidate > this.last ? candidate : this.last + 1n;
    return this.last;
  }
}
