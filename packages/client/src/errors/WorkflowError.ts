import { VaultError } from './VaultError';

export type WorkflowErrorKind = 'InvalidContentId' | 'MissingIdentity' | 'PayloadTooLarge';

export class WorkflowError extends VaultError<WorkflowErrorKind> {
  constructor(kind: WorkflowErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, kind, options);
    this.name = 'WorkflowError';
  }
}
