import { randomBytes } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { GROUP_KEY_LENGTH } from '@groupvault/contract';
import { KeyGenerator } from '../application/ports/key-generator';
import { GroupKey } from '../domain/value-objects/GroupKey';

@Injectable()
export class RandomKeyGenerator extends KeyGenerator {
  generate(): GroupKey {
    return GroupKey.fromBytes(randomBytes(GROUP_KEY_LENGTH));
  }
}
