import { errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import type { ContainerStatus, HostCapability } from '../types/host';
import type { SessionState } from '../types/session';

const log = logger.child('rollback');

/**
 * Undoes whatever a failed session left on the host. What gets undone is
 * decided from host-reported status, not from `stage`: the process may have
 * missed a side effect the host did perform.
 */
export class RollbackController {
  constructor(private readonly host: HostCapability) {}

  async rollback(session: SessionState): Promise<void> {
    const { id } = session;
    log.info(`Rolling back container ${id}.`, { stage: session.stage, mounted: session.mounted });

    if (session.mounted) {
      await this.attempt(`unmount container ${id}`, () => this.host.unmount(id));
    }

    const status = await this.queryStatus(id);
    if (status?.defined) {
      if (status.running) {
        await this.attempt(`stop container ${id}`, () => this.host.stop(id));
      }
      await this.attempt(`destroy container ${id}`, () => this.host.destroy(id));
      return;
    }

    await this.freeVolumes(session);
  }

  private async queryStatus(id: number): Promise<ContainerStatus | undefined> {
    try {
      return await this.host.status(id);
    } catch (err) {
      log.warn(`Unable to query status of container ${id}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async freeVolumes(session: SessionState): Promise<void> {
    const { id } = session;
    const storage = session.storage.tag;

    let volumes: string[] | undefined;
    try {
      volumes = await this.host.listDiskVolumes(storage, id);
    } catch (err) {
      log.warn(`Unable to list volumes of container ${id} on '${storage}': ${errorMessage(err)}`);
      return;
    }

    if (volumes === undefined) {
      log.warn(`Storage '${storage}' does not track volumes by container; nothing freed for ${id}.`);
      return;
    }

    for (const volumeId of volumes) {
      await this.attempt(`free volume ${volumeId}`, () => this.host.freeDisk(storage, volumeId));
    }
  }

  private async attempt(action: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
      log.debug(`rollback: ${action}`);
    } catch (err) {
      log.warn(`Rollback could not ${action}: ${errorMessage(err)}`);
    }
  }
}
