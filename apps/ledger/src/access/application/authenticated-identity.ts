/**
 * Caller resolved from a Kratos session. `id` is the ledger principal id.
 */
export type AuthenticatedIdentity = Readonly<{
  id: string;
  traits: Record<string, unknown>;
}>;
