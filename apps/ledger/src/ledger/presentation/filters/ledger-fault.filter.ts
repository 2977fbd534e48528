import { Catch, HttpStatus, type ArgumentsHost, type ExceptionFilter } from '@nestjs/common';
import type { LedgerErrorBody, LedgerErrorKind } from '@groupvault/contract';
import type { Response } from 'express';
import { LedgerFault } from '../../domain/errors/LedgerFault';

export const LEDGER_FAULT_STATUS: Readonly<Record<LedgerErrorKind, HttpStatus>> = {
  NotFound: HttpStatus.NOT_FOUND,
  AlreadyExists: HttpStatus.CONFLICT,
  AlreadyMember: HttpStatus.CONFLICT,
  Unauthorized: HttpStatus.FORBIDDEN,
  NotAMember: HttpStatus.UNPROCESSABLE_ENTITY,
  InvalidKey: HttpStatus.BAD_REQUEST,
  NoKeySet: HttpStatus.CONFLICT,
};

/**
 * Renders ledger faults as `{ kind, message }` so clients can rebuild them.
 */
@Catch(LedgerFault)
export class LedgerFaultFilter implements ExceptionFilter {
  catch(fault: LedgerFault, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body: LedgerErrorBody = { kind: fault.kind, message: fault.message };
    response.status(LEDGER_FAULT_STATUS[fault.kind]).json(body);
  }
}
