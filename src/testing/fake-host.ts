import type {
  ContainerStatus,
  CreateContainerParams,
  DiskFormat,
  HostCapability,
  StoragePool,
} from '../types/host';

export type HostOperation = keyof HostCapability;

type Injection = {
  error: Error;
  afterEffect: boolean;
};

type FakeContainer = {
  running: boolean;
  volumeId: string;
  params: CreateContainerParams;
  description?: string;
  files: Map<string, number>;
};

type FakeVolume = {
  storageTag: string;
  owner: number;
  format: DiskFormat;
  sizeBytes: number;
  formatted: boolean;
};

export type FakeHostOptions = {
  pools?: StoragePool[];
  available?: string[];
  cached?: string[];
  nextId?: number;
  arch?: string;
  ip?: string;
  localtime?: string;
  untrackedStorage?: string[];
};

export function pool(tag: string, type: string, freeBytes = 50_000_000_000, content = ['rootdir', 'images']): StoragePool {
  const kind = type === 'dir' || type === 'nfs' || type === 'zfspool' ? type : 'other';
  return { tag, type, kind, content, freeBytes };
}

/**
 * In-memory Proxmox node. Enforces the ordering rules the real node has
 * (no destroy while mounted or running, no free of an attached volume) and
 * fails a chosen operation once on request.
 */
export class FakeHost implements HostCapability {
  readonly calls: Array<{ op: HostOperation; args: unknown[] }> = [];
  readonly containers = new Map<number, FakeContainer>();
  readonly volumes = new Map<string, FakeVolume>();
  readonly mounts = new Set<number>();
  readonly links = new Map<string, string>();
  readonly downloaded: string[] = [];

  private readonly failures = new Map<HostOperation, Injection>();
  private readonly pools: StoragePool[];
  private readonly available: string[];
  private readonly cached: Set<string>;
  private readonly untracked: Set<string>;
  private nextId: number;

  constructor(private readonly options: FakeHostOptions = {}) {
    this.pools = options.pools ?? [pool('local', 'dir')];
    this.available = options.available ?? ['debian-10.0-std', 'debian-10.7-std', 'debian-10.2-std'];
    this.cached = new Set(options.cached ?? []);
    this.untracked = new Set(options.untrackedStorage ?? []);
    this.nextId = options.nextId ?? 100;
  }

  /**
   * Makes the next call of `op` reject. With `afterEffect` the host still
   * performs the operation before reporting the failure.
   */
  failOnce(op: HostOperation, error = new Error(`${op} failed`), options: { afterEffect?: boolean } = {}): void {
    this.failures.set(op, { error, afterEffect: options.afterEffect ?? false });
  }

  operations(): HostOperation[] {
    return this.calls.map((call) => call.op);
  }

  volumesOf(storageTag: string, id: number): string[] {
    return [...this.volumes.entries()]
      .filter(([, volume]) => volume.storageTag === storageTag && volume.owner === id)
      .map(([volumeId]) => volumeId);
  }

  private async call<T>(op: HostOperation, args: unknown[], effect: () => T): Promise<T> {
    this.calls.push({ op, args });
    const injected = this.failures.get(op);
    if (injected) {
      this.failures.delete(op);
      if (injected.afterEffect) effect();
      throw injected.error;
    }
    return effect();
  }

  private container(id: number): FakeContainer {
    const ct = this.containers.get(id);
    if (!ct) throw new Error(`CT ${id} does not exist`);
    return ct;
  }

  private runningContainer(id: number): FakeContainer {
    const ct = this.container(id);
    if (!ct.running) throw new Error(`CT ${id} not running`);
    return ct;
  }

  listStoragePools(): Promise<StoragePool[]> {
    return this.call('listStoragePools', [], () => this.pools.map((p) => ({ ...p })));
  }

  nextContainerIdentifier(): Promise<number> {
    return this.call('nextContainerIdentifier', [], () => {
      while (this.containers.has(this.nextId)) this.nextId++;
      return this.nextId++;
    });
  }

  refreshTemplateIndex(): Promise<void> {
    return this.call('refreshTemplateIndex', [], () => undefined);
  }

  listAvailableTemplates(osFamily: string): Promise<string[]> {
    return this.call('listAvailableTemplates', [osFamily], () =>
      this.available.filter((name) => name.includes(osFamily))
    );
  }

  listCachedTemplates(): Promise<string[]> {
    return this.call('listCachedTemplates', [], () => [...this.cached]);
  }

  downloadTemplate(name: string): Promise<void> {
    return this.call('downloadTemplate', [name], () => {
      this.cached.add(name);
      this.downloaded.push(name);
    });
  }

  allocateDisk(storageTag: string, id: number, name: string, sizeBytes: number, format: DiskFormat): Promise<string> {
    return this.call('allocateDisk', [storageTag, id, name, sizeBytes, format], () => {
      const target = this.pools.find((p) => p.tag === storageTag);
      if (!target) throw new Error(`storage '${storageTag}' does not exist`);
      const pathLike = target.kind === 'dir' || target.kind === 'nfs';
      const volumeId = pathLike ? `${storageTag}:${id}/${name}` : `${storageTag}:${name}`;
      if (this.volumes.has(volumeId)) throw new Error(`volume ${volumeId} already exists`);
      this.volumes.set(volumeId, { storageTag, owner: id, format, sizeBytes, formatted: false });
      return volumeId;
    });
  }

  resolveDiskPath(volumeId: string): Promise<string> {
    return this.call('resolveDiskPath', [volumeId], () => {
      if (!this.volumes.has(volumeId)) throw new Error(`no such volume ${volumeId}`);
      return `/dev/fake/${volumeId}`;
    });
  }

  makeFilesystem(diskPath: string): Promise<void> {
    return this.call('makeFilesystem', [diskPath], () => {
      const volume = this.volumes.get(diskPath.replace('/dev/fake/', ''));
      if (!volume) throw new Error(`no such device ${diskPath}`);
      volume.formatted = true;
    });
  }

  listDiskVolumes(storageTag: string, id: number): Promise<string[] | undefined> {
    return this.call('listDiskVolumes', [storageTag, id], () =>
      this.untracked.has(storageTag) ? undefined : this.volumesOf(storageTag, id)
    );
  }

  freeDisk(storageTag: string, volumeId: string): Promise<void> {
    return this.call('freeDisk', [storageTag, volumeId], () => {
      if (!this.volumes.has(volumeId)) throw new Error(`no such volume ${volumeId}`);
      for (const ct of this.containers.values()) {
        if (ct.volumeId === volumeId) throw new Error(`volume ${volumeId} is in use`);
      }
      this.volumes.delete(volumeId);
    });
  }

  detectArchitecture(): Promise<string> {
    return this.call('detectArchitecture', [], () => this.options.arch ?? 'amd64');
  }

  createContainer(params: CreateContainerParams): Promise<void> {
    return this.call('createContainer', [params], () => {
      if (this.containers.has(params.id)) throw new Error(`CT ${params.id} already exists`);
      const volume = this.volumes.get(params.disk.volumeId);
      if (!volume || volume.owner !== params.id) {
        throw new Error(`volume ${params.disk.volumeId} not allocated for CT ${params.id}`);
      }
      this.containers.set(params.id, { running: false, volumeId: params.disk.volumeId, params, files: new Map() });
    });
  }

  mount(id: number): Promise<string> {
    return this.call('mount', [id], () => {
      this.container(id);
      this.mounts.add(id);
      return `/var/lib/lxc/${id}/rootfs`;
    });
  }

  unmount(id: number): Promise<void> {
    return this.call('unmount', [id], () => {
      if (!this.mounts.delete(id)) throw new Error(`CT ${id} is not mounted`);
    });
  }

  resolveHostLocaltime(): Promise<string> {
    return this.call('resolveHostLocaltime', [], () => this.options.localtime ?? '/usr/share/zoneinfo/Etc/UTC');
  }

  linkLocaltime(mountPath: string, target: string): Promise<void> {
    return this.call('linkLocaltime', [mountPath, target], () => {
      this.links.set(`${mountPath}/etc/localtime`, target);
    });
  }

  start(id: number): Promise<void> {
    return this.call('start', [id], () => {
      const ct = this.container(id);
      if (this.mounts.has(id)) throw new Error(`CT ${id} is locked (mounted)`);
      ct.running = true;
    });
  }

  stop(id: number): Promise<void> {
    return this.call('stop', [id], () => {
      this.container(id).running = false;
    });
  }

  destroy(id: number): Promise<void> {
    return this.call('destroy', [id], () => {
      const ct = this.container(id);
      if (this.mounts.has(id)) throw new Error(`CT ${id} is locked (mounted)`);
      if (ct.running) throw new Error(`CT ${id} is running - destroy failed`);
      this.containers.delete(id);
      this.volumes.delete(ct.volumeId);
    });
  }

  pushFile(id: number, localPath: string, remotePath: string, mode: number): Promise<void> {
    return this.call('pushFile', [id, localPath, remotePath, mode], () => {
      this.runningContainer(id).files.set(remotePath, mode);
    });
  }

  exec(id: number, command: string[]): Promise<string> {
    return this.call('exec', [id, command], () => {
      const ct = this.runningContainer(id);
      if (!ct.files.has(command[0])) throw new Error(`${command[0]}: not found`);
      return '';
    });
  }

  queryInterfaceAddress(id: number, iface: string): Promise<string> {
    return this.call('queryInterfaceAddress', [id, iface], () => {
      this.runningContainer(id);
      return this.options.ip ?? '192.168.1.50';
    });
  }

  setDescription(id: number, text: string): Promise<void> {
    return this.call('setDescription', [id, text], () => {
      this.container(id).description = text;
    });
  }

  status(id: number): Promise<ContainerStatus> {
    return this.call('status', [id], () => {
      const ct = this.containers.get(id);
      return { defined: ct !== undefined, running: ct?.running ?? false };
    });
  }
}
