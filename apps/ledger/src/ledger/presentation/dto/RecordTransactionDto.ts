import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import type { RecordTransactionRequest } from '@groupvault/contract';

export class RecordTransactionDto implements RecordTransactionRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  @Matches(/\S/, { message: '$property must not be blank' })
  userId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  fileHash!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  contentId!: string;
}
