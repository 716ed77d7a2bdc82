import type { Stage } from '../types/session';

export type ProvisioningErrorCode =
  | 'NoEligibleStorage'
  | 'SelectionCancelled'
  | 'TemplateNotFound'
  | 'TemplateDownloadFailed'
  | 'AllocationFailed'
  | 'FilesystemCreationFailed'
  | 'ContainerCreationFailed'
  | 'MountFailed'
  | 'TimezoneSyncFailed'
  | 'StartFailed'
  | 'SetupPushFailed'
  | 'SetupExecutionFailed'
  | 'CompletionFailed'
  | 'HostCapabilityUnavailable'
  | 'HostPreparationFailed'
  | 'InvalidConfiguration'
  | 'Interrupted';

/**
 * A failed local command. `exitCode` is the child's status, or 1 when it was
 * killed or could not be spawned.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr = ''
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Terminal failure of one provisioning run. Never retried.
 */
export class ProvisioningError extends Error {
  readonly exitCode: number;

  constructor(
    public readonly code: ProvisioningErrorCode,
    message: string,
    public readonly operation: string,
    public readonly stage?: Stage,
    options: { cause?: unknown; exitCode?: number } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ProvisioningError';
    this.exitCode = options.exitCode ?? exitCodeOf(options.cause);
  }

  static from(code: ProvisioningErrorCode, operation: string, err: unknown, stage?: Stage): ProvisioningError {
    if (err instanceof ProvisioningError) return err;
    return new ProvisioningError(code, errorMessage(err), operation, stage, { cause: err });
  }
}

/** Conventional status of a process stopped by SIGINT. */
export const INTERRUPTED_EXIT_CODE = 130;

export function interruptedError(operation: string, stage?: Stage): ProvisioningError {
  return new ProvisioningError('Interrupted', 'Provisioning interrupted.', operation, stage, {
    exitCode: INTERRUPTED_EXIT_CODE,
  });
}

export function exitCodeOf(err: unknown): number {
  if (err instanceof ProvisioningError) return err.exitCode;
  if (err instanceof CommandError && err.exitCode > 0) return err.exitCode;
  return 1;
}
