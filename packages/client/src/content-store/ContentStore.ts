/**
 * Content-addressed blob store: pin bytes for an id, fetch bytes by id.
 */
export interface ContentStore {
  put(bytes: Uint8Array, name: string): Promise<string>;
  get(contentId: string): Promise<Uint8Array>;
}

export type VaultLogger = Pick<Console, 'info' | 'warn'>;

export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
