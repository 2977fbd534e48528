export class VaultError<TKind extends string = string> extends Error {
  constructor(
    message: string,
    readonly kind: TKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VaultError';
  }
}
