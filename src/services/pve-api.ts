import axios, { AxiosInstance, Method, isAxiosError } from 'axios';
import https from 'https';
import logger from '../lib/logger';

const log = logger.child('pve-api');

export type PveApiOptions = {
  baseUrl: string;
  node: string;
  tokenId: string;
  tokenSecret: string;
  allowInsecureTls?: boolean;
  /** 0 polls a task until it stops, however long that takes. */
  taskTimeoutMs?: number;
  taskPollIntervalMs?: number;
};

export type PveStorage = {
  storage: string;
  type: string;
  content?: string;
  avail?: number;
  active?: number;
  enabled?: number;
};

export type PveAplInfo = {
  template: string;
  section?: string;
  os?: string;
  version?: string;
};

export type PveContentEntry = {
  volid: string;
  content?: string;
  vmid?: number;
  format?: string;
  size?: number;
};

export type PveClusterResource = {
  type: string;
  vmid?: number;
  status?: string;
  node?: string;
};

export type PveLxcInterface = {
  name: string;
  hwaddr?: string;
  inet?: string;
  'ip-addresses'?: Array<{
    'ip-address': string;
    'ip-address-type': string;
    prefix?: number;
  }>;
};

export type PveTaskStatus = {
  status: string;
  exitstatus?: string;
  upid?: string;
};

export type PveParams = Record<string, string | number | undefined>;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function toForm(params?: PveParams): URLSearchParams | undefined {
  if (!params) return undefined;
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) form.set(key, String(value));
  }
  return form;
}

/**
 * Status code of a failed API call, if the node answered at all.
 */
export function pveStatusOf(err: unknown): number | undefined {
  if (isAxiosError(err)) return err.response?.status;
  if (err instanceof Error && err.cause !== undefined) return pveStatusOf(err.cause);
  return undefined;
}

export function isTaskId(value: unknown): value is string {
  return typeof value === 'string' && value.startsWith('UPID:');
}

/**
 * Thin wrapper around the Proxmox VE REST API: token auth, form bodies,
 * `data` envelope unwrapping and task polling.
 */
export class PveApi {
  private readonly client: AxiosInstance;
  readonly node: string;
  private readonly taskTimeoutMs: number;
  private readonly taskPollIntervalMs: number;

  constructor(options: PveApiOptions) {
    this.node = options.node;
    this.taskTimeoutMs = options.taskTimeoutMs ?? 0;
    this.taskPollIntervalMs = options.taskPollIntervalMs ?? 1000;

    const httpsAgent = options.allowInsecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.client = axios.create({
      baseURL: `${options.baseUrl.replace(/\/$/, '')}/api2/json`,
      httpsAgent,
      headers: {
        Authorization: `PVEAPIToken=${options.tokenId}=${options.tokenSecret}`,
        Accept: 'application/json',
      },
    });
  }

  async request<T>(method: Method, url: string, params?: PveParams): Promise<T> {
    const isQuery = method === 'GET' || method === 'DELETE';
    try {
      const res = await this.client.request<{ data: T }>({
        method,
        url,
        params: isQuery ? params : undefined,
        data: isQuery ? undefined : toForm(params),
      });
      return res.data.data;
    } catch (err) {
      if (isAxiosError(err) && err.response) {
        // PVE puts the reason in the status text and per-field errors in the body.
        const body: unknown = err.response.data;
        const detail =
          body && typeof body === 'object' && 'errors' in body ? ` ${JSON.stringify(body.errors)}` : '';
        const wrapped = new Error(
          `${method} ${url} failed (${err.response.status}): ${err.response.statusText}${detail}`,
          { cause: err }
        );
        throw wrapped;
      }
      throw err;
    }
  }

  /**
   * Runs a call that answers with a task id and waits for the task to stop.
   */
  async runTask(method: Method, url: string, params?: PveParams): Promise<void> {
    const upid = await this.request<unknown>(method, url, params);
    if (isTaskId(upid)) {
      await this.waitForTask(upid);
    }
  }

  async waitForTask(upid: string): Promise<void> {
    const started = Date.now();
    const path = `/nodes/${encodeURIComponent(this.node)}/tasks/${encodeURIComponent(upid)}/status`;

    for (;;) {
      const status = await this.request<PveTaskStatus>('GET', path);
      if (status.status === 'stopped') {
        const exitStatus = status.exitstatus ?? '';
        if (exitStatus === 'OK') return;
        // Finished, but the task log has warnings.
        if (/^WARNINGS: \d+$/.test(exitStatus)) {
          log.warn(`Proxmox task ${upid} finished with ${exitStatus}`);
          return;
        }
        throw new Error(`Proxmox task ${upid} failed: ${status.exitstatus || 'unknown error'}`);
      }
      if (this.taskTimeoutMs > 0 && Date.now() - started >= this.taskTimeoutMs) {
        throw new Error(`Proxmox task ${upid} still running after ${this.taskTimeoutMs}ms`);
      }
      log.trace('task running', { upid });
      await sleep(this.taskPollIntervalMs);
    }
  }

  private nodePath(suffix: string): string {
    return `/nodes/${encodeURIComponent(this.node)}${suffix}`;
  }

  // ---- Cluster ----

  async nextId(): Promise<number> {
    const raw = await this.request<string | number>('GET', '/cluster/nextid');
    const id = Number(raw);
    if (!Number.isInteger(id) || id <= 0) {
      throw new Error(`Unexpected next id from cluster: ${String(raw)}`);
    }
    return id;
  }

  async getGuests(): Promise<PveClusterResource[]> {
    return this.request('GET', '/cluster/resources', { type: 'vm' });
  }

  // ---- Storage ----

  async getStorages(content?: string): Promise<PveStorage[]> {
    return this.request('GET', this.nodePath('/storage'), { content, enabled: 1 });
  }

  async getContent(storage: string, params?: { content?: string; vmid?: number }): Promise<PveContentEntry[]> {
    return this.request('GET', this.nodePath(`/storage/${encodeURIComponent(storage)}/content`), params);
  }

  async allocVolume(
    storage: string,
    params: { vmid: number; filename: string; size: string; format: string }
  ): Promise<string> {
    return this.request('POST', this.nodePath(`/storage/${encodeURIComponent(storage)}/content`), params);
  }

  async deleteVolume(storage: string, volumeId: string): Promise<void> {
    const path = this.nodePath(
      `/storage/${encodeURIComponent(storage)}/content/${encodeURIComponent(volumeId)}`
    );
    await this.runTask('DELETE', path);
  }

  // ---- Appliance templates ----

  async getAplInfo(): Promise<PveAplInfo[]> {
    return this.request('GET', this.nodePath('/aplinfo'));
  }

  async downloadAppliance(storage: string, template: string): Promise<void> {
    await this.runTask('POST', this.nodePath('/aplinfo'), { storage, template });
  }

  // ---- LXC ----

  async createLxc(params: PveParams): Promise<void> {
    await this.runTask('POST', this.nodePath('/lxc'), params);
  }

  async lxcStatusAction(vmid: number, action: 'start' | 'stop'): Promise<void> {
    await this.runTask('POST', this.nodePath(`/lxc/${vmid}/status/${action}`));
  }

  async deleteLxc(vmid: number): Promise<void> {
    await this.runTask('DELETE', this.nodePath(`/lxc/${vmid}`));
  }

  async setLxcConfig(vmid: number, params: PveParams): Promise<void> {
    await this.request('PUT', this.nodePath(`/lxc/${vmid}/config`), params);
  }

  async getLxcInterfaces(vmid: number): Promise<PveLxcInterface[]> {
    return this.request('GET', this.nodePath(`/lxc/${vmid}/interfaces`));
  }
}
