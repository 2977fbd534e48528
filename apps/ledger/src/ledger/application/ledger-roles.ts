import { ConfigService } from '@nestjs/config';
import { PrincipalId } from '../domain/value-objects/PrincipalId';

/**
 * Principals holding ledger-wide roles: the registrar creates groups, recorders
 * append transactions. Recorders default to the registrar alone.
 */
export class LedgerRoles {
  constructor(
    readonly registrar: PrincipalId,
    readonly recorders: ReadonlyArray<PrincipalId>
  ) {}

  static fromConfig(config: ConfigService): LedgerRoles {
    const registrarId = config.get<string>('LEDGER_REGISTRAR_ID');
    if (!registrarId) {
      throw new Error('LEDGER_REGISTRAR_ID is required to start the ledger');
    }
    const registrar = PrincipalId.from(registrarId);
    const recorderIds = (config.get<string>('LEDGER_RECORDER_IDS') ?? '')
      .split(',')
      .map((value) => value.trim())
      .filter((value) => value.length > 0);

    return new LedgerRoles(
      registrar,
      recorderIds.length > 0 ? recorderIds.map((value) => PrincipalId.from(value)) : [registrar]
    );
  }

  isRegistrar(principal: PrincipalId): boolean {
    return this.registrar.equals(principal);
  }

  isRecorder(principal: PrincipalId): boolean {
    return this.recorders.some((recorder) => recorder.equals(principal));
  }
}
