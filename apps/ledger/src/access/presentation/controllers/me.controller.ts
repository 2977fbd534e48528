import { Controller, Get, UnauthorizedException, UseGuards } from '@nestjs/common';
import type { WhoAmIResponse } from '@groupvault/contract';
import { AuthIdentity } from '../../auth-identity.decorator';
import type { AuthenticatedIdentity } from '../../application/authenticated-identity';
import { KratosSessionGuard } from '../guards/kratos-session.guard';

@Controller('me')
@UseGuards(KratosSessionGuard)
export class MeController {
  @Get()
  whoAmI(@AuthIdentity() identity: AuthenticatedIdentity | undefined): WhoAmIResponse {
    if (!identity) {
      throw new UnauthorizedException('Authenticated identity missing');
    }
    return { principalId: identity.id };
  }
}
