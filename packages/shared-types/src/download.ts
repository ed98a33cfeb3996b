/**
 * Download task types
 */

import type { AssetQuality } from './course';

export type DownloadStatus =
  | 'queued'
  | 'downloading'
  | 'paused'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type PauseReason = 'user' | 'network' | 'restart';

export interface DownloadTask {
  id: string;
  /** `collection/id` of the owning entity */
  resourceKey: string;
  sourceUrl: string;
  /** Final destination; bytes land in `${localPath}.part` until complete */
  localPath: string;
  totalBytes: number | null;
  transferredBytes: number;
  status: DownloadStatus;
  quality: AssetQuality;
  acceptsRanges: boolean;
  /** Expected sha256 (hex) of the complete file */
  checksum?: string;
  error?: string;
  pausedBy?: PauseReason;
  createdAt: number;
  updatedAt: number;
  completedAt?: number;
  lastAccessedAt: number;
}

export interface DownloadProgressSnapshot {
  taskId: string;
  transferredBytes: number;
  totalBytes: number | null;
  status: DownloadStatus;
}
