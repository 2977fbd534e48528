import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { AuthenticatedIdentity } from './application/authenticated-identity';

export const AuthIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedIdentity | undefined => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return request.authIdentity;
  }
);
