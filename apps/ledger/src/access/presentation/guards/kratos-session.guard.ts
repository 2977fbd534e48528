import { Inject, Injectable, UnauthorizedException, type CanActivate, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { AuthService } from '../../application/auth.service';
import { SessionCache } from '../../application/session-cache';
import { resolveSessionToken } from '../session-cookie';

@Injectable()
export class KratosSessionGuard implements CanActivate {
  constructor(
    @Inject(AuthService) private readonly authService: AuthService,
    @Inject(SessionCache) private readonly sessionCache: SessionCache
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const sessionToken = resolveSessionToken(request.headers['x-session-token'], request.headers.cookie);

    if (!sessionToken) {
      throw new UnauthorizedException('Session token is required');
    }

    const cached = this.sessionCache.read(sessionToken);
    const authIdentity = cached ?? (await this.authService.validateSession(sessionToken));

    if (!cached) {
      this.sessionCache.write(sessionToken, authIdentity);
    }

    request.authIdentity = authIdentity;
    return true;
  }
}
