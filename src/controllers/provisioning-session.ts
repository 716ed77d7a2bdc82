import {
  DISK_SIZE_BYTES,
  HOSTNAME,
  MANAGEMENT_PORT,
  MEMORY_MB,
  NETWORK_INTERFACE,
  SETUP_MODE,
  SETUP_REMOTE_PATH,
  SWAP_MB,
} from '../config/constants';
import { ProvisioningError, interruptedError, type ProvisioningErrorCode } from '../lib/errors';
import logger from '../lib/logger';
import type { DiskSpec, HostCapability, StoragePool } from '../types/host';
import { STAGES } from '../types/session';
import type { ProvisioningResult, SessionState, Stage, TemplateReference } from '../types/session';

const log = logger.child('session');

export type SessionOptions = {
  bridge: string;
  setupScriptPath: string;
  diskSizeBytes?: number;
  /** Checked before every stage; once aborted the next stage fails with `Interrupted`. */
  signal?: AbortSignal;
};

/**
 * Disk name, volume and format for a container root on `storage`.
 */
export function planDisk(storage: StoragePool, id: number, sizeBytes = DISK_SIZE_BYTES): DiskSpec {
  const base = { storageTag: storage.tag, containerId: id, sizeBytes };
  switch (storage.kind) {
    case 'dir':
    case 'nfs': {
      const name = `vm-${id}-disk-0.raw`;
      return { ...base, name, volumeId: `${storage.tag}:${id}/${name}`, format: 'raw', needsFilesystem: true };
    }
    case 'zfspool': {
      const name = `subvol-${id}-disk-0`;
      return { ...base, name, volumeId: `${storage.tag}:${name}`, format: 'subvol', needsFilesystem: false };
    }
    default: {
      const name = `vm-${id}-disk-0`;
      return { ...base, name, volumeId: `${storage.tag}:${name}`, format: 'raw', needsFilesystem: true };
    }
  }
}

export function webUrl(host: string): string {
  return `https://${host}:${MANAGEMENT_PORT}`;
}

export function describeContainer(ip: string): string {
  return `Access web interface using the following URL.\n\n${webUrl(ip)}`;
}

/**
 * One container being created. Stages only move forward; a failed entry
 * action leaves `stage` where it was and surfaces as a ProvisioningError.
 */
export class ProvisioningSession {
  private currentStage: Stage = 'Init';
  private isMounted = false;
  private diskSpec?: DiskSpec;
  private readonly reached: Stage[] = ['Init'];

  constructor(
    private readonly host: HostCapability,
    readonly id: number,
    readonly storage: StoragePool,
    readonly template: TemplateReference,
    private readonly options: SessionOptions
  ) {}

  get stage(): Stage {
    return this.currentStage;
  }

  get mounted(): boolean {
    return this.isMounted;
  }

  get disk(): DiskSpec | undefined {
    return this.diskSpec;
  }

  /** Every stage this session actually reached, in order. */
  get history(): readonly Stage[] {
    return this.reached;
  }

  state(): SessionState {
    return {
      id: this.id,
      storage: this.storage,
      disk: this.diskSpec,
      stage: this.currentStage,
      mounted: this.isMounted,
    };
  }

  async run(): Promise<ProvisioningResult> {
    if (this.currentStage !== 'Init') {
      throw new Error(`Session for container ${this.id} already ran (stage ${this.currentStage})`);
    }

    const disk = await this.allocateDisk();
    await this.prepareFilesystem(disk);
    await this.createContainer(disk);
    await this.syncTimezone();
    await this.startContainer();
    await this.runSetup();
    return this.complete();
  }

  private async allocateDisk(): Promise<DiskSpec> {
    const planned = planDisk(this.storage, this.id, this.options.diskSizeBytes);
    log.info('Allocating container disk...', { storage: planned.storageTag, disk: planned.name });
    const disk = await this.enter('StorageAllocated', 'AllocationFailed', 'disk.allocate', async () => {
      const volumeId = await this.host.allocateDisk(
        planned.storageTag,
        this.id,
        planned.name,
        planned.sizeBytes,
        planned.format
      );
      return { ...planned, volumeId: volumeId || planned.volumeId };
    });
    this.diskSpec = disk;
    return disk;
  }

  private async prepareFilesystem(disk: DiskSpec): Promise<void> {
    if (!disk.needsFilesystem) {
      log.warn("Some containers may not work properly due to ZFS not supporting 'fallocate'.");
      return;
    }
    await this.enter('FilesystemReady', 'FilesystemCreationFailed', 'disk.mkfs', async () => {
      const diskPath = await this.host.resolveDiskPath(disk.volumeId);
      await this.host.makeFilesystem(diskPath);
    });
  }

  private async createContainer(disk: DiskSpec): Promise<void> {
    log.info('Creating LXC container...');
    await this.enter('ContainerCreated', 'ContainerCreationFailed', 'container.create', async () => {
      const arch = await this.host.detectArchitecture();
      await this.host.createContainer({
        id: this.id,
        template: this.template.volumeId,
        arch,
        features: { nesting: true },
        hostname: HOSTNAME,
        network: { name: NETWORK_INTERFACE, bridge: this.options.bridge, ip: 'dhcp' },
        disk,
        memoryMb: MEMORY_MB,
        swapMb: SWAP_MB,
        osType: this.template.osFamily,
        onBoot: true,
      });
    });
  }

  /**
   * Links the container's /etc/localtime to the host's zone while the root
   * filesystem is mounted.
   */
  private async syncTimezone(): Promise<void> {
    await this.enter('Mounted', 'MountFailed', 'rootfs.mount', async () => {
      const mountPath = await this.host.mount(this.id);
      this.isMounted = true;
      const target = await this.host.resolveHostLocaltime();
      await this.host.linkLocaltime(mountPath, target);
    });
    await this.enter('TimezoneSynced', 'TimezoneSyncFailed', 'rootfs.unmount', async () => {
      await this.host.unmount(this.id);
      this.isMounted = false;
    });
  }

  private async startContainer(): Promise<void> {
    log.info('Starting LXC container...');
    await this.enter('Started', 'StartFailed', 'container.start', () => this.host.start(this.id));
  }

  private async runSetup(): Promise<void> {
    await this.enter('SetupPushed', 'SetupPushFailed', 'setup.push', () =>
      this.host.pushFile(this.id, this.options.setupScriptPath, SETUP_REMOTE_PATH, SETUP_MODE)
    );
    const output = await this.enter('SetupExecuted', 'SetupExecutionFailed', 'setup.exec', () =>
      this.host.exec(this.id, [SETUP_REMOTE_PATH])
    );
    log.debug('setup finished', { output });
  }

  private async complete(): Promise<ProvisioningResult> {
    return this.enter<ProvisioningResult>('Complete', 'CompletionFailed', 'container.report', async () => {
      const ip = await this.host.queryInterfaceAddress(this.id, NETWORK_INTERFACE);
      const description = describeContainer(ip);
      await this.host.setDescription(this.id, description);
      return {
        id: this.id,
        ip,
        hostname: HOSTNAME,
        endpoints: [webUrl(ip), webUrl(HOSTNAME)],
        description,
        storage: this.storage.tag,
        template: this.template.fullName,
      };
    });
  }

  private async enter<T>(
    next: Stage,
    code: ProvisioningErrorCode,
    operation: string,
    action: () => Promise<T>
  ): Promise<T> {
    if (this.options.signal?.aborted) {
      throw interruptedError(operation, this.currentStage);
    }
    let value: T;
    try {
      value = await action();
    } catch (err) {
      throw ProvisioningError.from(code, operation, err, this.currentStage);
    }
    this.advance(next);
    return value;
  }

  private advance(next: Stage): void {
    if (STAGES.indexOf(next) <= STAGES.indexOf(this.currentStage)) {
      throw new Error(`Stage cannot move from ${this.currentStage} back to ${next}`);
    }
    log.debug('stage reached', { id: this.id, stage: next });
    this.currentStage = next;
    this.reached.push(next);
  }
}
