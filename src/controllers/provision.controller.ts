import { ProvisioningError, errorMessage, interruptedError } from '../lib/errors';
import logger from '../lib/logger';
import type { ProvisioningEvent, ProvisioningFailure, ResultPublisher } from '../types/events';
import type { HostCapability, StoragePool } from '../types/host';
import type { ProvisioningResult } from '../types/session';
import { ProvisioningSession } from './provisioning-session';
import { RollbackController } from './rollback.controller';
import { StorageSelector } from './storage-selector';
import { TemplateResolver } from './template-resolver';

const log = logger.child('provision');

export type ProvisionRequest = {
  osFamily: string;
  osVersion: string;
  setupScriptPath: string;
  preferredStorage?: string;
};

export type ProvisionControllerOptions = {
  bridge: string;
  diskSizeBytes?: number;
  publisher?: ResultPublisher;
  /** Aborting stops the run at the next stage boundary and rolls it back. */
  signal?: AbortSignal;
};

/**
 * provision flow:
 * - Pick the storage pool (prompting only when several qualify)
 * - Resolve and cache the newest matching template
 * - Take a fresh container id and drive a ProvisioningSession to Complete
 * Any failure once a session exists triggers one rollback of that session.
 */
export class ProvisionController {
  constructor(
    private readonly host: HostCapability,
    private readonly selector: StorageSelector,
    private readonly resolver: TemplateResolver,
    private readonly rollback: RollbackController,
    private readonly options: ProvisionControllerOptions
  ) {}

  async provision(request: ProvisionRequest): Promise<ProvisioningResult> {
    let session: ProvisioningSession | undefined;

    try {
      this.checkInterrupted('storage.list');
      const pools = await this.listPools();
      const storage = await this.selector.select(pools, request.preferredStorage);
      const template = await this.resolver.resolve(request.osFamily, request.osVersion);
      this.checkInterrupted('cluster.nextid');
      const id = await this.nextId();
      log.info(`Container ID is ${id}.`);

      session = new ProvisioningSession(this.host, id, storage, template, {
        bridge: this.options.bridge,
        setupScriptPath: request.setupScriptPath,
        diskSizeBytes: this.options.diskSizeBytes,
        signal: this.options.signal,
      });
      const result = await session.run();

      log.info(`Successfully created LXC container ${id}.`, { ip: result.ip });
      await this.publish({ ok: true, result });
      return result;
    } catch (err) {
      const failure = ProvisioningError.from('HostCapabilityUnavailable', 'provision', err, session?.stage);
      log.error(`${failure.exitCode}@${failure.operation} ${failure.code}: ${failure.message}`);

      if (session) {
        await this.rollback.rollback(session.state());
      }
      await this.publish({ ok: false, error: toFailure(failure, session?.id) });
      throw failure;
    }
  }

  private checkInterrupted(operation: string): void {
    if (this.options.signal?.aborted) throw interruptedError(operation);
  }

  private async listPools(): Promise<StoragePool[]> {
    try {
      return await this.host.listStoragePools();
    } catch (err) {
      throw ProvisioningError.from('HostCapabilityUnavailable', 'storage.list', err);
    }
  }

  private async nextId(): Promise<number> {
    try {
      return await this.host.nextContainerIdentifier();
    } catch (err) {
      throw ProvisioningError.from('HostCapabilityUnavailable', 'cluster.nextid', err);
    }
  }

  private async publish(event: ProvisioningEvent): Promise<void> {
    if (!this.options.publisher) return;
    try {
      await this.options.publisher.publishResult(event);
    } catch (err) {
      log.warn(`Unable to publish provisioning result: ${errorMessage(err)}`);
    }
  }
}

function toFailure(err: ProvisioningError, containerId?: number): ProvisioningFailure {
  return {
    code: err.code,
    message: err.message,
    operation: err.operation,
    exitCode: err.exitCode,
    stage: err.stage,
    containerId,
  };
}
