import { Inject, Injectable } from '@nestjs/common';
import { KratosClient } from '../infrastructure/kratos.client';
import type { AuthenticatedIdentity } from './authenticated-identity';

@Injectable()
export class AuthService {
  constructor(@Inject(KratosClient) private readonly kratosClient: KratosClient) {}

  async validateSession(sessionToken: string): Promise<AuthenticatedIdentity> {
    return this.kratosClient.whoAmI(sessionToken);
  }
}
