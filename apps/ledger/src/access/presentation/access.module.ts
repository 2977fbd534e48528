import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MeController } from './controllers/me.controller';
import { KratosSessionGuard } from './guards/kratos-session.guard';
import { KratosClient } from '../infrastructure/kratos.client';
import { AuthService } from '../application/auth.service';
import { SessionCache } from '../application/session-cache';

@Module({
  imports: [ConfigModule],
  controllers: [MeController],
  providers: [KratosClient, KratosSessionGuard, AuthService, SessionCache],
  exports: [KratosClient, KratosSessionGuard, AuthService, SessionCache],
})
export class AccessModule {}
