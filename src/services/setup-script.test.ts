import { access, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { stageSetupScript } from './setup-script';

describe('stageSetupScript', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'setup-script-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses a readable local script as is', async () => {
    const script = path.join(dir, 'setup.sh');
    await writeFile(script, '#!/bin/sh\n');
    const download = vi.fn(async () => Buffer.from(''));

    const staged = await stageSetupScript({ path: script }, download);
    await staged.cleanup();

    expect(staged.path).toBe(script);
    expect(download).not.toHaveBeenCalled();
    await expect(access(script)).resolves.toBeUndefined();
  });

  it('rejects a missing local script', async () => {
    const script = path.join(dir, 'nope.sh');

    await expect(stageSetupScript({ path: script })).rejects.toMatchObject({
      code: 'InvalidConfiguration',
      operation: 'setup.locate',
      message: `Setup script '${script}' is not readable.`,
    });
  });

  it('downloads an executable copy and removes it on cleanup', async () => {
    const download = vi.fn(async () => Buffer.from('#!/bin/sh\necho ready\n'));

    const staged = await stageSetupScript({ path: './setup.sh', url: 'http://setup.invalid/setup.sh' }, download);

    expect(download).toHaveBeenCalledWith('http://setup.invalid/setup.sh');
    expect(path.basename(staged.path)).toBe('setup.sh');
    expect(await readFile(staged.path, 'utf8')).toBe('#!/bin/sh\necho ready\n');
    expect((await stat(staged.path)).mode & 0o777).toBe(0o755);

    await staged.cleanup();
    await expect(access(path.dirname(staged.path))).rejects.toThrow();
  });

  it('reports a failed download', async () => {
    const download = vi.fn(async (): Promise<Buffer> => {
      throw new Error('getaddrinfo ENOTFOUND setup.invalid');
    });

    await expect(
      stageSetupScript({ path: './setup.sh', url: 'http://setup.invalid/setup.sh' }, download)
    ).rejects.toMatchObject({
      code: 'InvalidConfiguration',
      operation: 'setup.download',
      message: 'Unable to download setup script from http://setup.invalid/setup.sh: getaddrinfo ENOTFOUND setup.invalid',
    });
  });
});
