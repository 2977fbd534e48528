import { IsString, MaxLength } from 'class-validator';
import type { StoreKeyRequest } from '@groupvault/contract';

export class StoreKeyDto implements StoreKeyRequest {
  // Shape and length are checked by the ledger so that bad keys fail as InvalidKey.
  @IsString()
  @MaxLength(1024)
  key!: string;
}
