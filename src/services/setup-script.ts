import axios from 'axios';
import { access, chmod, mkdtemp, rm, writeFile } from 'fs/promises';
import { constants } from 'fs';
import os from 'os';
import path from 'path';
import { ProvisioningError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child('setup-script');

export type StagedScript = {
  path: string;
  cleanup(): Promise<void>;
};

export type ScriptDownloader = (url: string) => Promise<Buffer>;

export const downloadScript: ScriptDownloader = async (url) => {
  const res = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: 30_000 });
  return Buffer.from(res.data);
};

/**
 * Makes the second-stage script available on the node before anything on
 * the host changes: either an existing local file or a download into a
 * temporary directory that `cleanup` removes.
 */
export async function stageSetupScript(
  source: { path: string; url?: string },
  download: ScriptDownloader = downloadScript
): Promise<StagedScript> {
  if (source.url) {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'lxc-setup-'));
    const cleanup = () => rm(dir, { recursive: true, force: true });
    const target = path.join(dir, 'setup.sh');
    try {
      await writeFile(target, await download(source.url));
      await chmod(target, 0o755);
    } catch (err) {
      await cleanup();
      throw new ProvisioningError(
        'InvalidConfiguration',
        `Unable to download setup script from ${source.url}: ${errorMessage(err)}`,
        'setup.download',
        undefined,
        { cause: err }
      );
    }
    log.debug('setup script downloaded', { url: source.url, path: target });
    return { path: target, cleanup };
  }

  const resolved = path.resolve(source.path);
  try {
    await access(resolved, constants.R_OK);
  } catch (err) {
    throw new ProvisioningError(
      'InvalidConfiguration',
      `Setup script '${resolved}' is not readable.`,
      'setup.locate',
      undefined,
      { cause: err }
    );
  }
  return { path: resolved, cleanup: async () => undefined };
}
