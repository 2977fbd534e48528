import { BadRequestException, Injectable, type PipeTransform } from '@nestjs/common';
import { GroupId } from '../../domain/value-objects/GroupId';
import { PrincipalId } from '../../domain/value-objects/PrincipalId';

const isBlank = (value: string | undefined): boolean => !value || value.trim().length === 0;

@Injectable()
export class ParseGroupIdPipe implements PipeTransform<string, GroupId> {
  transform(value: string): GroupId {
    if (isBlank(value)) {
      throw new BadRequestException('groupId must not be blank');
    }
    return GroupId.from(value);
  }
}

@Injectable()
export class ParsePrincipalIdPipe implements PipeTransform<string, PrincipalId> {
  transform(value: string): PrincipalId {
    if (isBlank(value)) {
      throw new BadRequestException('userId must not be blank');
    }
    return PrincipalId.from(value);
  }
}
