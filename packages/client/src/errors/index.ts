export * from './VaultError';
export * from './LedgerFault';
export * from './CryptoFault';
export * from './ContentStoreError';
export * from './WorkflowError';
