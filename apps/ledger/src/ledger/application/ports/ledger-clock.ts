/**
 * Commit-time source for transactions. Values must strictly increase across
 * calls on one host so derived transaction ids never collide.
 */
export abstract class LedgerClock {
  abstract now(): bigint;
}
