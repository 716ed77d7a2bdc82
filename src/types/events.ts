import type { ProvisioningErrorCode } from '../lib/errors';
import type { ProvisioningResult, Stage } from './session';

export type ProvisioningFailure = {
  code: ProvisioningErrorCode;
  message: string;
  operation: string;
  exitCode: number;
  stage?: Stage;
  containerId?: number;
};

export type ProvisioningEvent =
  | { ok: true; result: ProvisioningResult }
  | { ok: false; error: ProvisioningFailure };

/**
 * Somewhere to report the outcome of a run. Publishing never decides the
 * outcome itself.
 */
export interface ResultPublisher {
  publishResult(event: ProvisioningEvent): Promise<void>;
  close(): Promise<void>;
}
