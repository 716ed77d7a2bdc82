import { describe, expect, it, vi } from 'vitest';
import type { MenuPrompt } from '../services/menu-prompt';
import { FakeHost, pool, type HostOperation } from '../testing/fake-host';
import type { ProvisioningEvent, ResultPublisher } from '../types/events';
import { ProvisionController } from './provision.controller';
import { RollbackController } from './rollback.controller';
import { StorageSelector } from './storage-selector';
import { TemplateResolver } from './template-resolver';

const request = { osFamily: 'debian', osVersion: '10', setupScriptPath: '/tmp/setup.sh' };

class RecordingPublisher implements ResultPublisher {
  readonly events: ProvisioningEvent[] = [];

  async publishResult(event: ProvisioningEvent): Promise<void> {
    this.events.push(event);
  }

  async close(): Promise<void> {}
}

function controllerFor(
  host: FakeHost,
  options: { prompt?: MenuPrompt; publisher?: ResultPublisher; signal?: AbortSignal } = {}
): ProvisionController {
  const prompt = options.prompt ?? { select: vi.fn(async () => null) };
  return new ProvisionController(
    host,
    new StorageSelector(prompt),
    new TemplateResolver(host, 'local'),
    new RollbackController(host),
    { bridge: 'vmbr0', publisher: options.publisher, signal: options.signal }
  );
}

function expectClean(host: FakeHost): void {
  expect(host.containers.size).toBe(0);
  expect(host.volumes.size).toBe(0);
  expect(host.mounts.size).toBe(0);
}

describe('ProvisionController', () => {
  it('provisions a container on the only eligible pool', async () => {
    const host = new FakeHost({ pools: [pool('local', 'dir'), pool('iso', 'dir', 1, ['iso', 'vztmpl'])] });

    const result = await controllerFor(host).provision(request);

    expect(result.id).toBe(100);
    expect(result.storage).toBe('local');
    expect(result.template).toBe('debian-10.7-std');
    expect(result.endpoints).toEqual(['https://192.168.1.50:8443', 'https://UnifiNetworkController:8443']);
    expect(result.description).toBe('Access web interface using the following URL.\n\nhttps://192.168.1.50:8443');
    expect(host.containers.get(100)?.running).toBe(true);
    expect(host.volumesOf('local', 100)).toEqual(['local:100/vm-100-disk-0.raw']);
  });

  it('uses the pool picked from the menu', async () => {
    const host = new FakeHost({ pools: [pool('local', 'dir'), pool('tank', 'zfspool')], nextId: 230 });
    const prompt: MenuPrompt = { select: vi.fn(async () => 'tank') };

    const result = await controllerFor(host, { prompt }).provision(request);

    expect(result.storage).toBe('tank');
    expect(host.volumesOf('tank', 230)).toEqual(['tank:subvol-230-disk-0']);
  });

  it('does not roll back when selection is cancelled', async () => {
    const host = new FakeHost({ pools: [pool('local', 'dir'), pool('tank', 'zfspool')] });

    await expect(controllerFor(host).provision(request)).rejects.toMatchObject({ code: 'SelectionCancelled' });

    expect(host.operations()).toEqual(['listStoragePools']);
  });

  it('reports an unreachable host while listing pools', async () => {
    const host = new FakeHost();
    host.failOnce('listStoragePools', new Error('connect ECONNREFUSED'));

    await expect(controllerFor(host).provision(request)).rejects.toMatchObject({
      code: 'HostCapabilityUnavailable',
      operation: 'storage.list',
      message: 'connect ECONNREFUSED',
    });
  });

  it('takes no container id when the template is missing', async () => {
    const host = new FakeHost({ available: ['alpine-3.18-default'] });

    await expect(controllerFor(host).provision(request)).rejects.toMatchObject({ code: 'TemplateNotFound' });

    expect(host.operations()).not.toContain('nextContainerIdentifier');
    expect(host.operations()).not.toContain('status');
  });

  it('surfaces the session failure with its stage', async () => {
    const host = new FakeHost();
    host.failOnce('createContainer', new Error('unable to create CT 100'));

    await expect(controllerFor(host).provision(request)).rejects.toMatchObject({
      code: 'ContainerCreationFailed',
      operation: 'container.create',
      stage: 'FilesystemReady',
      exitCode: 1,
    });
  });

  const failingOps: HostOperation[] = [
    'allocateDisk',
    'resolveDiskPath',
    'makeFilesystem',
    'detectArchitecture',
    'createContainer',
    'mount',
    'resolveHostLocaltime',
    'linkLocaltime',
    'unmount',
    'start',
    'pushFile',
    'exec',
    'queryInterfaceAddress',
    'setDescription',
  ];

  it.each(failingOps)('leaves nothing behind when %s fails', async (op) => {
    const host = new FakeHost();
    host.failOnce(op);

    await expect(controllerFor(host).provision(request)).rejects.toThrow(`${op} failed`);

    expectClean(host);
  });

  const sideEffectOps: HostOperation[] = [
    'allocateDisk',
    'makeFilesystem',
    'createContainer',
    'linkLocaltime',
    'unmount',
    'start',
    'pushFile',
    'exec',
    'setDescription',
  ];

  it.each(sideEffectOps)('leaves nothing behind when %s fails after taking effect', async (op) => {
    const host = new FakeHost();
    host.failOnce(op, undefined, { afterEffect: true });

    await expect(controllerFor(host).provision(request)).rejects.toThrow(`${op} failed`);

    expectClean(host);
  });

  it('leaves nothing behind on zfs storage', async () => {
    const host = new FakeHost({ pools: [pool('local-zfs', 'zfspool')] });
    host.failOnce('start');

    await expect(controllerFor(host).provision(request)).rejects.toMatchObject({ code: 'StartFailed' });

    expectClean(host);
  });

  it('rolls back only once', async () => {
    const host = new FakeHost();
    host.failOnce('exec');

    await expect(controllerFor(host).provision(request)).rejects.toThrow();

    expect(host.operations().filter((op) => op === 'destroy')).toHaveLength(1);
    expect(host.operations().filter((op) => op === 'status')).toHaveLength(1);
  });

  it('publishes the result of a successful run', async () => {
    const publisher = new RecordingPublisher();

    const result = await controllerFor(new FakeHost(), { publisher }).provision(request);

    expect(publisher.events).toEqual([{ ok: true, result }]);
  });

  it('publishes failures after rolling back', async () => {
    const host = new FakeHost();
    const publisher = new RecordingPublisher();
    host.failOnce('start', new Error('startup for container 100 failed'));

    await expect(controllerFor(host, { publisher }).provision(request)).rejects.toThrow();

    expect(publisher.events).toEqual([
      {
        ok: false,
        error: {
          code: 'StartFailed',
          message: 'startup for container 100 failed',
          operation: 'container.start',
          exitCode: 1,
          stage: 'TimezoneSynced',
          containerId: 100,
        },
      },
    ]);
    expectClean(host);
  });

  it('ignores a publisher that fails', async () => {
    const publisher: ResultPublisher = {
      publishResult: vi.fn(async () => {
        throw new Error('channel closed');
      }),
      close: vi.fn(async () => undefined),
    };

    const result = await controllerFor(new FakeHost(), { publisher }).provision(request);

    expect(result.id).toBe(100);
    expect(publisher.publishResult).toHaveBeenCalledTimes(1);
  });

  describe('when interrupted', () => {
    it('touches nothing when aborted before the run', async () => {
      const host = new FakeHost();
      const abort = new AbortController();
      abort.abort();

      await expect(controllerFor(host, { signal: abort.signal }).provision(request)).rejects.toMatchObject({
        code: 'Interrupted',
        exitCode: 130,
      });
      expect(host.operations()).toEqual([]);
    });

    it('stops at the next stage boundary and rolls back', async () => {
      const host = new FakeHost();
      const abort = new AbortController();
      const createContainer = host.createContainer.bind(host);
      host.createContainer = async (params) => {
        await createContainer(params);
        abort.abort();
      };

      await expect(controllerFor(host, { signal: abort.signal }).provision(request)).rejects.toMatchObject({
        code: 'Interrupted',
        operation: 'rootfs.mount',
        stage: 'ContainerCreated',
        exitCode: 130,
      });
      expect(host.operations()).not.toContain('mount');
      expect(host.operations().slice(-2)).toEqual(['status', 'destroy']);
      expectClean(host);
    });

    it('unmounts and destroys when aborted while mounted', async () => {
      const host = new FakeHost();
      const abort = new AbortController();
      const linkLocaltime = host.linkLocaltime.bind(host);
      host.linkLocaltime = async (mountPath, target) => {
        await linkLocaltime(mountPath, target);
        abort.abort();
      };

      await expect(controllerFor(host, { signal: abort.signal }).provision(request)).rejects.toMatchObject({
        code: 'Interrupted',
        stage: 'Mounted',
      });
      expectClean(host);
    });

    it('frees the disk when aborted right after allocation', async () => {
      const host = new FakeHost();
      const abort = new AbortController();
      const allocateDisk = host.allocateDisk.bind(host);
      host.allocateDisk = async (...args) => {
        const volumeId = await allocateDisk(...args);
        abort.abort();
        return volumeId;
      };

      await expect(controllerFor(host, { signal: abort.signal }).provision(request)).rejects.toMatchObject({
        code: 'Interrupted',
        stage: 'StorageAllocated',
      });
      expect(host.operations()).not.toContain('resolveDiskPath');
      expectClean(host);
    });
  });
});
