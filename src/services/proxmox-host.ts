import { readlink, rm, symlink } from 'fs/promises';
import path from 'path';
import type {
  ContainerStatus,
  CreateContainerParams,
  DiskFormat,
  HostCapability,
  StorageKind,
  StoragePool,
} from '../types/host';
import type { CommandRunner } from './command-runner';
import { PveApi, PveLxcInterface, pveStatusOf } from './pve-api';
import logger from '../lib/logger';

const log = logger.child('host');

const KIB = 1024;
const MIB = KIB * 1024;
const GIB = MIB * 1024;

const VOLUME_CONTENT = new Set(['images', 'rootdir']);

export type PveClient = Pick<
  PveApi,
  | 'nextId'
  | 'getGuests'
  | 'getStorages'
  | 'getContent'
  | 'allocVolume'
  | 'deleteVolume'
  | 'getAplInfo'
  | 'downloadAppliance'
  | 'createLxc'
  | 'lxcStatusAction'
  | 'deleteLxc'
  | 'setLxcConfig'
  | 'getLxcInterfaces'
>;

export type ProxmoxHostOptions = {
  templateStorage: string;
  ipWaitTimeoutMs: number;
  ipPollIntervalMs?: number;
  localtimePath?: string;
};

export function toStorageKind(type: string): StorageKind {
  switch (type) {
    case 'dir':
    case 'nfs':
    case 'zfspool':
      return type;
    default:
      return 'other';
  }
}

/**
 * Sizes as PVE expects them: kibibytes, or whole M/G.
 */
export function formatPveSize(bytes: number): string {
  if (bytes % GIB === 0) return `${bytes / GIB}G`;
  if (bytes % MIB === 0) return `${bytes / MIB}M`;
  return String(Math.ceil(bytes / KIB));
}

/**
 * `pct mount` prints `mounted CT 100 in '/var/lib/lxc/100/rootfs'`.
 */
export function parseMountPath(output: string): string {
  const match = output.match(/'([^']+)'/);
  if (!match) {
    throw new Error(`Unable to read mount path from: ${output.trim()}`);
  }
  return match[1];
}

export function pickIpv4(interfaces: PveLxcInterface[], name: string): string | undefined {
  const iface = interfaces.find((i) => i.name === name);
  if (!iface) return undefined;

  const listed = iface['ip-addresses']?.find(
    (addr) => addr['ip-address-type'] === 'inet' && !addr['ip-address'].startsWith('127.')
  );
  if (listed) return listed['ip-address'];

  const inet = iface.inet?.split('/')[0];
  return inet && !inet.startsWith('127.') ? inet : undefined;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * HostCapability bound to a Proxmox VE node: REST API for cluster state and
 * tasks, local `pct`/`pvesm`/`pveam` for what the API does not expose.
 */
export class ProxmoxHost implements HostCapability {
  private readonly ipPollIntervalMs: number;
  private readonly localtimePath: string;

  constructor(
    private readonly api: PveClient,
    private readonly run: CommandRunner,
    private readonly options: ProxmoxHostOptions
  ) {
    this.ipPollIntervalMs = options.ipPollIntervalMs ?? 2000;
    this.localtimePath = options.localtimePath ?? '/etc/localtime';
  }

  async listStoragePools(): Promise<StoragePool[]> {
    const storages = await this.api.getStorages('rootdir');
    return storages.map((s) => ({
      tag: s.storage,
      type: s.type,
      kind: toStorageKind(s.type),
      content: (s.content ?? '').split(',').filter((c) => c.length > 0),
      freeBytes: s.avail ?? 0,
    }));
  }

  async nextContainerIdentifier(): Promise<number> {
    return this.api.nextId();
  }

  async refreshTemplateIndex(): Promise<void> {
    await this.run('pveam', ['update']);
  }

  async listAvailableTemplates(osFamily: string): Promise<string[]> {
    const entries = await this.api.getAplInfo();
    return entries
      .filter((e) => e.section === 'system' && e.template.includes(osFamily))
      .map((e) => e.template);
  }

  async listCachedTemplates(): Promise<string[]> {
    const prefix = `${this.options.templateStorage}:vztmpl/`;
    const entries = await this.api.getContent(this.options.templateStorage, { content: 'vztmpl' });
    return entries
      .filter((e) => e.volid.startsWith(prefix))
      .map((e) => e.volid.slice(prefix.length));
  }

  async downloadTemplate(name: string): Promise<void> {
    await this.api.downloadAppliance(this.options.templateStorage, name);
  }

  async allocateDisk(
    storageTag: string,
    id: number,
    name: string,
    sizeBytes: number,
    format: DiskFormat
  ): Promise<string> {
    return this.api.allocVolume(storageTag, {
      vmid: id,
      filename: name,
      size: formatPveSize(sizeBytes),
      format,
    });
  }

  async resolveDiskPath(volumeId: string): Promise<string> {
    const { stdout } = await this.run('pvesm', ['path', volumeId]);
    return stdout.trim();
  }

  async makeFilesystem(diskPath: string): Promise<void> {
    await this.run('mkfs.ext4', [diskPath]);
  }

  async listDiskVolumes(storageTag: string, id: number): Promise<string[] | undefined> {
    try {
      const entries = await this.api.getContent(storageTag, { vmid: id });
      return entries
        .filter((e) => e.content === undefined || VOLUME_CONTENT.has(e.content))
        .map((e) => e.volid);
    } catch (err) {
      if (pveStatusOf(err) === 501) {
        log.debug('storage does not list volumes by owner', { storage: storageTag });
        return undefined;
      }
      throw err;
    }
  }

  async freeDisk(storageTag: string, volumeId: string): Promise<void> {
    await this.api.deleteVolume(storageTag, volumeId);
  }

  async detectArchitecture(): Promise<string> {
    const { stdout } = await this.run('dpkg', ['--print-architecture']);
    return stdout.trim();
  }

  async createContainer(params: CreateContainerParams): Promise<void> {
    const net = params.network;
    await this.api.createLxc({
      vmid: params.id,
      ostemplate: params.template,
      arch: params.arch,
      features: `nesting=${params.features.nesting ? 1 : 0}`,
      hostname: params.hostname,
      net0: `name=${net.name},bridge=${net.bridge},ip=${net.ip}`,
      onboot: params.onBoot ? 1 : 0,
      ostype: params.osType,
      rootfs: `${params.disk.volumeId},size=${formatPveSize(params.disk.sizeBytes)}`,
      swap: params.swapMb,
      memory: params.memoryMb,
      storage: params.disk.storageTag,
    });
  }

  async mount(id: number): Promise<string> {
    const { stdout } = await this.run('pct', ['mount', String(id)]);
    return parseMountPath(stdout);
  }

  async unmount(id: number): Promise<void> {
    await this.run('pct', ['unmount', String(id)]);
  }

  async resolveHostLocaltime(): Promise<string> {
    return readlink(this.localtimePath);
  }

  async linkLocaltime(mountPath: string, target: string): Promise<void> {
    const link = path.join(mountPath, 'etc', 'localtime');
    await rm(link, { force: true });
    await symlink(target, link);
  }

  async start(id: number): Promise<void> {
    await this.api.lxcStatusAction(id, 'start');
  }

  async stop(id: number): Promise<void> {
    await this.api.lxcStatusAction(id, 'stop');
  }

  async destroy(id: number): Promise<void> {
    await this.api.deleteLxc(id);
  }

  async pushFile(id: number, localPath: string, remotePath: string, mode: number): Promise<void> {
    await this.run('pct', ['push', String(id), localPath, remotePath, '--perms', mode.toString(8)]);
  }

  async exec(id: number, command: string[]): Promise<string> {
    const { stdout } = await this.run('pct', ['exec', String(id), '--', ...command]);
    return stdout;
  }

  /**
   * Waits for DHCP: polls the container's interfaces until `iface` has an
   * IPv4 address or the wait times out.
   */
  async queryInterfaceAddress(id: number, iface: string): Promise<string> {
    const started = Date.now();
    for (;;) {
      const ip = pickIpv4(await this.api.getLxcInterfaces(id), iface);
      if (ip) return ip;
      if (Date.now() - started >= this.options.ipWaitTimeoutMs) {
        throw new Error(`No IPv4 address on ${iface} of container ${id} after ${this.options.ipWaitTimeoutMs}ms`);
      }
      await sleep(this.ipPollIntervalMs);
    }
  }

  async setDescription(id: number, text: string): Promise<void> {
    await this.api.setLxcConfig(id, { description: text });
  }

  async status(id: number): Promise<ContainerStatus> {
    const guests = await this.api.getGuests();
    const guest = guests.find((g) => g.vmid === id);
    return {
      defined: guest !== undefined,
      running: guest?.status === 'running',
    };
  }
}
