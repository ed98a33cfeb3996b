/**
 * Download task lifecycle
 * @module downloads/task-state
 */

import type { DownloadStatus } from '@courseline/shared-types';
import { InvalidTransitionError } from '../errors';

const TRANSITIONS: Record<DownloadStatus, readonly DownloadStatus[]> = {
  queued: ['downloading', 'cancelled'],
  downloading: ['completed', 'failed', 'cancelled', 'paused'],
  paused: ['downloading', 'cancelled'],
  // Explicit retry re-queues; cancelling a failed task discards its partial file
  failed: ['queued', 'cancelled'],
  cancelled: ['queued'],
  completed: [],
};

export const TERMINAL_STATUSES: ReadonlySet<DownloadStatus> = new Set([
  'completed',
  'failed',
  'cancelled',
]);

export function canTransition(from: DownloadStatus, to: DownloadStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * @throws InvalidTransitionError when `from → to` is not a lifecycle edge
 */
export function assertTransition(from: DownloadStatus, to: DownloadStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTerminal(status: DownloadStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
