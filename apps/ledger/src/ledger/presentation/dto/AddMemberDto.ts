import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import type { AddMemberRequest } from '@groupvault/contract';

export class AddMemberDto implements AddMemberRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  @Matches(/\S/, { message: '$property must not be blank' })
  userId!: string;
}
