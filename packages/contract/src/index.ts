/** Raw length of a group key; keys travel as standard base64 of this many bytes. */
export const GROUP_KEY_LENGTH = 32;

export const LEDGER_ERROR_KINDS = [
  'NotFound',
  'AlreadyExists',
  'Unauthorized',
  'InvalidKey',
  'NotAMember',
  'AlreadyMember',
  'NoKeySet',
] as const;

export type LedgerErrorKind = (typeof LEDGER_ERROR_KINDS)[number];

const knownKinds: ReadonlySet<unknown> = new Set(LEDGER_ERROR_KINDS);

export const isLedgerErrorKind = (value: unknown): value is LedgerErrorKind => knownKinds.has(value);

export type LedgerErrorBody = Readonly<{
  kind: LedgerErrorKind;
  message: string;
}>;

export type RegisterGroupRequest = Readonly<{ groupId: string }>;

export type AddMemberRequest = Readonly<{ userId: string }>;

export type StoreKeyRequest = Readonly<{ key: string }>;

export type RecordTransactionRequest = Readonly<{
  userId: string;
  fileHash: string;
  contentId: string;
}>;

export type RecordTransactionResponse = Readonly<{ transactionId: string }>;

export type GroupExistsResponse = Readonly<{ exists: boolean }>;

export type AuthorizedResponse = Readonly<{ authorized: boolean }>;

export type GroupKeyResponse = Readonly<{ key: string }>;

/** Principal the presented session token authenticates as. */
export type WhoAmIResponse = Readonly<{ principalId: string }>;

/**
 * Wire form of a ledger transaction. `ledgerTimestamp` is the host commit time
 * in nanoseconds, serialized as a decimal string.
 */
export type TransactionRecord = Readonly<{
  id: string;
  groupId: string;
  userId: string;
  fileHash: string;
  contentId: string;
  ledgerTimestamp: string;
}>;

export type ListTransactionsResponse = Readonly<{ transactions: TransactionRecord[] }>;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decodes standard padded base64, returning null for anything that is not
 * well-formed instead of silently dropping characters.
 */
export const decodeBase64Strict = (value: string): Uint8Array | null => {
  if (!BASE64_PATTERN.test(value)) {
    return null;
  }
  return new Uint8Array(Buffer.from(value, 'base64'));
};

export const encodeBase64 = (bytes: Uint8Array): string => Buffer.from(bytes).toString('base64');

const CID_V0_PATTERN = /^Qm[1-9A-HJ-NP-Za-km-z]{44}$/;
const CID_V1_BASE32_PATTERN = /^b[a-z2-7]{58,}$/;

/** CIDv0 (base58btc, `Qm` prefix) or CIDv1 in its default base32 form. */
export const isContentId = (value: string): boolean =>
  CID_V0_PATTERN.test(value) || CID_V1_BASE32_PATTERN.test(value);
