import type { GroupKey } from '../../domain/value-objects/GroupKey';

/** Source of fresh group keys; must be a CSPRNG the caller cannot influence. */
export abstract class KeyGenerator {
  abstract generate(): GroupKey;
}
