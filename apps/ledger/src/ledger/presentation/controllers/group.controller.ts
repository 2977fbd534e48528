import { Body, Controller, Delete, Get, Inject, Param, Post, Put, UseFilters, UseGuards } from '@nestjs/common';
import type {
  AuthorizedResponse,
  GroupExistsResponse,
  GroupKeyResponse,
} from '@groupvault/contract';
import { AuthIdentity } from '@access/auth-identity.decorator';
import type { AuthenticatedIdentity } from '@access/application/authenticated-identity';
import { KratosSessionGuard } from '@access/presentation/guards/kratos-session.guard';
import { LedgerService } from '../../application/ledger.service';
import { GroupId } from '../../domain/value-objects/GroupId';
import { PrincipalId } from '../../domain/value-objects/PrincipalId';
import { requireCaller } from '../caller';
import { AddMemberDto } from '../dto/AddMemberDto';
import { RegisterGroupDto } from '../dto/RegisterGroupDto';
import { StoreKeyDto } from '../dto/StoreKeyDto';
import { LedgerFaultFilter } from '../filters/ledger-fault.filter';
import { ParseGroupIdPipe, ParsePrincipalIdPipe } from '../pipes/parse-id.pipes';
import { validated } from '../validation';

type Ok = { ok: true };

@Controller('groups')
@UseGuards(KratosSessionGuard)
@UseFilters(LedgerFaultFilter)
export class GroupController {
  constructor(@Inject(LedgerService) private readonly ledger: LedgerService) {}

  @Post()
  async register(
    @Body(validated(RegisterGroupDto)) dto: RegisterGroupDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<Ok> {
    await this.ledger.registerGroup(requireCaller(identity), GroupId.from(dto.groupId));
    return { ok: true };
  }

  @Get(':groupId/exists')
  async exists(@Param('groupId', ParseGroupIdPipe) groupId: GroupId): Promise<GroupExistsResponse> {
    return { exists: await this.ledger.groupExists(groupId) };
  }

  @Post(':groupId/members')
  async addMember(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @Body(validated(AddMemberDto)) dto: AddMemberDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<Ok> {
    await this.ledger.addMember(requireCaller(identity), groupId, PrincipalId.from(dto.userId));
    return { ok: true };
  }

  @Delete(':groupId/members/:userId')
  async revokeMember(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @Param('userId', ParsePrincipalIdPipe) userId: PrincipalId,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<Ok> {
    await this.ledger.revokeMember(requireCaller(identity), groupId, userId);
    return { ok: true };
  }

  @Get(':groupId/members/:userId/authorized')
  async isAuthorized(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @Param('userId', ParsePrincipalIdPipe) userId: PrincipalId
  ): Promise<AuthorizedResponse> {
    return { authorized: await this.ledger.isAuthorized(groupId, userId) };
  }

  @Put(':groupId/key')
  async storeKey(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @Body(validated(StoreKeyDto)) dto: StoreKeyDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<Ok> {
    await this.ledger.storeKey(requireCaller(identity), groupId, dto.key);
    return { ok: true };
  }

  @Get(':groupId/key')
  async getKey(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<GroupKeyResponse> {
    return { key: await this.ledger.getKey(requireCaller(identity), groupId) };
  }
}
