import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import type { RegisterGroupRequest } from '@groupvault/contract';

export class RegisterGroupDto implements RegisterGroupRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  @Matches(/\S/, { message: '$property must not be blank' })
  groupId!: string;
}
