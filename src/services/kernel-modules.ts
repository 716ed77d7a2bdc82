import { appendFile, readFile } from 'fs/promises';
import { ProvisioningError } from '../lib/errors';
import logger from '../lib/logger';
import type { CommandRunner } from './command-runner';

const log = logger.child('modules');

/**
 * Module names listed by `lsmod` (first column, header skipped).
 */
export function parseLsmod(output: string): Set<string> {
  return new Set(
    output
      .split('\n')
      .slice(1)
      .map((line) => line.trim().split(/\s+/)[0])
      .filter((name) => name.length > 0)
  );
}

async function readIfExists(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
    throw err;
  }
}

/**
 * Loads the kernel modules containers rely on and registers them to load at
 * boot.
 */
export class KernelModules {
  constructor(
    private readonly run: CommandRunner,
    private readonly modulesFile = '/etc/modules'
  ) {}

  async ensure(names: string[]): Promise<void> {
    if (names.length === 0) return;

    let loaded: Set<string>;
    try {
      loaded = parseLsmod((await this.run('lsmod', [])).stdout);
    } catch (err) {
      throw ProvisioningError.from('HostPreparationFailed', 'modules.list', err);
    }

    for (const name of names) {
      if (!loaded.has(name)) {
        try {
          await this.run('modprobe', [name]);
          log.info(`Loaded '${name}' module.`);
        } catch (err) {
          throw new ProvisioningError('HostPreparationFailed', `Failed to load '${name}' module.`, 'modules.load', undefined, {
            cause: err,
          });
        }
      }
      await this.registerAtBoot(name);
    }
  }

  private async registerAtBoot(name: string): Promise<void> {
    try {
      const current = await readIfExists(this.modulesFile);
      const lines = current.split('\n').map((line) => line.trim());
      if (lines.includes(name)) return;
      const separator = current.length > 0 && !current.endsWith('\n') ? '\n' : '';
      await appendFile(this.modulesFile, `${separator}${name}\n`);
      log.debug('registered module at boot', { name, file: this.modulesFile });
    } catch (err) {
      throw new ProvisioningError(
        'HostPreparationFailed',
        `Failed to add '${name}' module to load at boot.`,
        'modules.register',
        undefined,
        { cause: err }
      );
    }
  }
}
