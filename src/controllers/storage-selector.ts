import { MENU_LABEL_OFFSET, ROOTDIR_CONTENT } from '../config/constants';
import { ProvisioningError } from '../lib/errors';
import logger from '../lib/logger';
import type { MenuItem, MenuPrompt } from '../services/menu-prompt';
import type { StoragePool } from '../types/host';

const log = logger.child('storage');

const IEC_UNITS = ['K', 'M', 'G', 'T', 'P', 'E'];

export type StorageMenu = {
  width: number;
  rows: MenuItem[];
};

/**
 * Binary-unit size with two decimals, rounded away from zero
 * (`46.57G` for 50 GB).
 */
export function formatIec(bytes: number): string {
  let value = bytes;
  let unit = '';
  for (const next of IEC_UNITS) {
    if (Math.abs(value) < 1024) break;
    value /= 1024;
    unit = next;
  }
  // Epsilon keeps exact hundredths from rounding up on float noise.
  const rounded = Math.ceil(value * 100 - 1e-9) / 100;
  return `${rounded.toFixed(2)}${unit}`;
}

export function formatStorageLabel(pool: StoragePool): string {
  return `  Type: ${pool.type.padEnd(10)} Free: ${formatIec(pool.freeBytes).padStart(9)}B `;
}

/**
 * Labels every candidate and sizes the label column so none is truncated.
 */
export function formatStorageMenu(pools: StoragePool[]): StorageMenu {
  const rows = pools.map((pool) => ({ key: pool.tag, label: formatStorageLabel(pool) }));
  const longest = rows.reduce((max, row) => Math.max(max, row.label.length), 0);
  return { width: longest + MENU_LABEL_OFFSET, rows };
}

export function eligiblePools(pools: StoragePool[]): StoragePool[] {
  return pools.filter((pool) => pool.content.includes(ROOTDIR_CONTENT));
}

export class StorageSelector {
  constructor(private readonly prompt: MenuPrompt) {}

  async select(pools: StoragePool[], preferredTag?: string): Promise<StoragePool> {
    const candidates = eligiblePools(pools);

    if (candidates.length === 0) {
      log.warn("'Container' needs to be selected for at least one storage location.");
      throw new ProvisioningError(
        'NoEligibleStorage',
        'Unable to detect valid storage location.',
        'storage.select'
      );
    }

    if (preferredTag !== undefined) {
      const preferred = candidates.find((pool) => pool.tag === preferredTag);
      if (!preferred) {
        throw new ProvisioningError(
          'NoEligibleStorage',
          `Storage '${preferredTag}' does not accept container root filesystems.`,
          'storage.select'
        );
      }
      return this.use(preferred);
    }

    if (candidates.length === 1) {
      return this.use(candidates[0]);
    }

    const menu = formatStorageMenu(candidates);
    for (;;) {
      const key = await this.prompt.select({
        title: 'Storage Pools',
        message: 'Which storage pool you would like to use for the container?',
        width: menu.width,
        items: menu.rows,
      });
      if (key === null) {
        throw new ProvisioningError('SelectionCancelled', 'Storage selection cancelled.', 'storage.select');
      }
      const chosen = candidates.find((pool) => pool.tag === key);
      if (chosen) {
        return this.use(chosen);
      }
    }
  }

  private use(pool: StoragePool): StoragePool {
    log.info(`Using '${pool.tag}' for storage location.`);
    return pool;
  }
}
