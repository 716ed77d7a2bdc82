export type StorageKind = 'dir' | 'nfs' | 'zfspool' | 'other';

export type StoragePool = {
  tag: string;
  /** Storage type as reported by the host, e.g. `lvmthin`. */
  type: string;
  kind: StorageKind;
  content: string[];
  freeBytes: number;
};

export type DiskFormat = 'raw' | 'subvol';

export type DiskSpec = {
  storageTag: string;
  containerId: number;
  name: string;
  volumeId: string;
  sizeBytes: number;
  format: DiskFormat;
  needsFilesystem: boolean;
};

export type ContainerStatus = {
  defined: boolean;
  running: boolean;
};

export type NetworkInterfaceSpec = {
  name: string;
  bridge: string;
  ip: 'dhcp';
};

export type CreateContainerParams = {
  id: number;
  template: string;
  arch: string;
  features: { nesting: boolean };
  hostname: string;
  network: NetworkInterfaceSpec;
  disk: DiskSpec;
  memoryMb: number;
  swapMb: number;
  osType: string;
  onBoot: boolean;
};

/**
 * Narrow view of the virtualization host. Every call either resolves once the
 * host has finished the operation or rejects.
 */
export interface HostCapability {
  listStoragePools(): Promise<StoragePool[]>;
  nextContainerIdentifier(): Promise<number>;

  refreshTemplateIndex(): Promise<void>;
  listAvailableTemplates(osFamily: string): Promise<string[]>;
  listCachedTemplates(): Promise<string[]>;
  downloadTemplate(name: string): Promise<void>;

  /** Resolves with the allocated volume id. */
  allocateDisk(storageTag: string, id: number, name: string, sizeBytes: number, format: DiskFormat): Promise<string>;
  resolveDiskPath(volumeId: string): Promise<string>;
  makeFilesystem(diskPath: string): Promise<void>;
  /** `undefined` when the storage does not track volumes by owner. */
  listDiskVolumes(storageTag: string, id: number): Promise<string[] | undefined>;
  freeDisk(storageTag: string, volumeId: string): Promise<void>;

  detectArchitecture(): Promise<string>;
  createContainer(params: CreateContainerParams): Promise<void>;
  mount(id: number): Promise<string>;
  unmount(id: number): Promise<void>;
  resolveHostLocaltime(): Promise<string>;
  linkLocaltime(mountPath: string, target: string): Promise<void>;

  start(id: number): Promise<void>;
  stop(id: number): Promise<void>;
  destroy(id: number): Promise<void>;

  pushFile(id: number, localPath: string, remotePath: string, mode: number): Promise<void>;
  exec(id: number, command: string[]): Promise<string>;
  queryInterfaceAddress(id: number, iface: string): Promise<string>;
  setDescription(id: number, text: string): Promise<void>;
  status(id: number): Promise<ContainerStatus>;
}
