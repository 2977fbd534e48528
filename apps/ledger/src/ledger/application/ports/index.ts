export { LedgerRepository } from './ledger-repository';
export { KeyGenerator } from './key-generator';
export { LedgerClock } from './ledger-clock';
