import { ProvisioningError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import type { HostCapability } from '../types/host';
import type { TemplateReference } from '../types/session';

const log = logger.child('template');

function tokenize(value: string): string[] {
  return value.match(/\d+|\D+/g) ?? [];
}

/**
 * Natural ordering: digit runs compare as numbers, everything else as text.
 */
export function compareVersions(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i];
    const y = right[i];
    const xNum = /^\d/.test(x);
    const yNum = /^\d/.test(y);
    if (xNum && yNum) {
      const diff = Number(x) - Number(y);
      if (diff !== 0) return diff < 0 ? -1 : 1;
    } else if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return left.length - right.length;
}

/**
 * Orders template names by everything after the first dash (`10.7-std` for
 * `debian-10.7-std`), version-aware; the full name breaks ties.
 */
export function compareTemplateNames(a: string, b: string): number {
  const key = (name: string) => name.slice(name.indexOf('-') + 1);
  const byVersion = compareVersions(key(a), key(b));
  if (byVersion !== 0) return byVersion;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function newestTemplate(names: string[], osFamily: string, osVersion: string): string | undefined {
  const prefix = `${osFamily}-${osVersion}`;
  const matching = names.filter((name) => name.includes(prefix)).sort(compareTemplateNames);
  return matching[matching.length - 1];
}

export class TemplateResolver {
  constructor(
    private readonly host: HostCapability,
    private readonly templateStorage: string
  ) {}

  async resolve(osFamily: string, osVersion: string): Promise<TemplateReference> {
    log.info('Updating LXC template list...');
    let available: string[];
    try {
      await this.host.refreshTemplateIndex();
      available = await this.host.listAvailableTemplates(osFamily);
    } catch (err) {
      throw ProvisioningError.from('HostCapabilityUnavailable', 'template.refresh', err);
    }

    const fullName = newestTemplate(available, osFamily, osVersion);
    if (!fullName) {
      throw new ProvisioningError(
        'TemplateNotFound',
        `No template matches '${osFamily}-${osVersion}'.`,
        'template.resolve'
      );
    }

    await this.ensureCached(fullName);

    return {
      osFamily,
      osVersion,
      fullName,
      volumeId: `${this.templateStorage}:vztmpl/${fullName}`,
    };
  }

  private async ensureCached(fullName: string): Promise<void> {
    try {
      const cached = await this.host.listCachedTemplates();
      if (cached.includes(fullName)) {
        log.info(`Template '${fullName}' already present.`);
        return;
      }
      log.info('Downloading LXC template...', { template: fullName });
      await this.host.downloadTemplate(fullName);
    } catch (err) {
      throw new ProvisioningError(
        'TemplateDownloadFailed',
        `A problem occurred while downloading the LXC template: ${errorMessage(err)}`,
        'template.download',
        undefined,
        { cause: err }
      );
    }
  }
}

