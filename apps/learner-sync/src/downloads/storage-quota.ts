/**
 * Disk space checks for downloads
 * @module downloads/storage-quota
 */

import * as fs from 'fs';
import * as path from 'path';
import { QuotaExceededError } from '../errors';

/**
 * Free bytes available to this process on the volume holding `target`.
 * Returns null when the platform cannot tell.
 */
export async function freeDiskBytes(target: string): Promise<number | null> {
  // statfs needs an existing path; walk up to the nearest one
  let dir = path.resolve(target);
  while (!fs.existsSync(dir)) {
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  try {
    const stats = await fs.promises.statfs(dir);
    return stats.bavail * stats.bsize;
  } catch (error) {
    console.warn(`[StorageQuota] Could not read free space for ${dir}:`, error);
    return null;
  }
}

export interface QuotaCheck {
  requiredBytes: number;
  /** Free disk space, null when unknown */
  freeBytes: number | null;
  /** Remaining download budget, null when unlimited */
  budgetBytes: number | null;
}

/**
 * @throws QuotaExceededError when either limit is too small
 */
export function assertQuota({ requiredBytes, freeBytes, budgetBytes }: QuotaCheck): void {
  const limits = [freeBytes, budgetBytes].filter((n): n is number => n !== null);
  if (limits.length === 0) return;

  const available = Math.max(0, Math.min(...limits));
  if (requiredBytes > available) {
    throw new QuotaExceededError(requiredBytes, available);
  }
}
