/**
 * Download Manager
 *
 * Fetches lesson media and course packages to local files for offline
 * playback and records the result on the owning entity.
 *
 * Features:
 * - One transfer per resource key; repeated starts attach to it
 * - Bounded concurrency with a waiting queue
 * - Pause, resume and cancel, continuing from partial files via range requests
 * - Local retries of transient transfer errors
 * - Throttled progress stream per task
 * - Free space and download budget checks before writing
 * - Optional sha256 verification
 * - Retention cleanup of downloads nobody opened for a while
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  AssetQuality,
  DownloadProgressSnapshot,
  DownloadStatus,
  DownloadTask,
  EntityRecord,
  PauseReason,
} from '@courseline/shared-types';
import { SYSTEM_COLLECTIONS, type LocalStore, type StoreOp } from '../store/local-store';
import {
  IntegrityError,
  NotFoundError,
  TransientNetworkError,
  ValidationError,
  errorMessage,
  isNotFoundError,
  isTransientError,
} from '../errors';
import { TypedEventEmitter } from '../utils/typed-emitter';
import { delay, systemClock, type Clock } from '../utils/clock';
import { parseEntityKey } from '../utils/keys';
import { assertTransition, isTerminal } from './task-state';
import { assertQuota, freeDiskBytes } from './storage-quota';
import type { AssetTransport } from './asset-transport';

// ============================================================================
// Types
// ============================================================================

export interface StartOptions {
  /** Known size; lets `start` reject up front when space is short */
  totalBytes?: number;
  /** Hex sha256 of the complete file */
  expectedSha256?: string;
}

export interface DownloadEvents {
  start: { taskId: string; resourceKey: string };
  progress: DownloadProgressSnapshot;
  complete: { taskId: string; task: DownloadTask };
  pause: { taskId: string; reason: PauseReason };
  resume: { taskId: string };
  error: { taskId: string; error: string };
  cancel: { taskId: string };
}

export interface DownloadStorageInfo {
  /** Bytes held by completed and partial downloads */
  usedBytes: number;
  /** Remaining download budget; null when unlimited */
  budgetRemainingBytes: number | null;
  counts: Record<DownloadStatus, number>;
}

export interface DownloadManagerConfig {
  maxConcurrent: number;
  retryCount: number;
  retryDelayMs: number;
  progressStepPercent: number;
  progressIntervalMs: number;
  /** 0 = only free disk space counts */
  maxStorageBytes: number;
  now: Clock;
  /** Free bytes on the volume holding a directory */
  freeSpace: (dir: string) => Promise<number | null>;
}

export const DEFAULT_DOWNLOAD_CONFIG: DownloadManagerConfig = {
  maxConcurrent: 2,
  retryCount: 3,
  retryDelayMs: 1000,
  progressStepPercent: 1,
  progressIntervalMs: 250,
  maxStorageBytes: 0,
  now: systemClock,
  freeSpace: freeDiskBytes,
};

type StopRequest = { kind: 'pause'; by: PauseReason } | { kind: 'cancel' };

interface ActiveTransfer {
  controller: AbortController;
  stop: StopRequest | null;
  done: Promise<void>;
}

const COLLECTION = SYSTEM_COLLECTIONS.downloads;

const LIVE_STATUSES: ReadonlySet<DownloadStatus> = new Set(['queued', 'downloading', 'paused']);

// ============================================================================
// Download Manager
// ============================================================================

export class DownloadManager {
  private readonly config: DownloadManagerConfig;
  private readonly store: LocalStore;
  private readonly transport: AssetTransport;
  private readonly events = new TypedEventEmitter<DownloadEvents>('DownloadManager');

  private tasks: Map<string, DownloadTask> = new Map();
  private active: Map<string, ActiveTransfer> = new Map();
  /** Paused tasks waiting for a free slot */
  private resumeRequested: Set<string> = new Set();
  private lastReported: Map<string, { at: number; percent: number }> = new Map();
  private online = true;
  private shutDown = false;

  constructor(
    store: LocalStore,
    transport: AssetTransport,
    config: Partial<DownloadManagerConfig> = {}
  ) {
    this.store = store;
    this.transport = transport;
    this.config = { ...DEFAULT_DOWNLOAD_CONFIG, ...config };
    this.loadTasks();
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  /**
   * Transfers cut off by a previous shutdown come back paused
   */
  private loadTasks(): void {
    for (const stored of this.store.scan<DownloadTask>(COLLECTION)) {
      let task = stored;
      if (task.status === 'downloading') {
        task = { ...task, status: 'paused', pausedBy: 'restart' };
        this.store.put(COLLECTION, task.id, task);
      }
      this.tasks.set(task.id, task);
    }
  }

  /**
   * Begin scheduling tasks left queued by a previous run
   */
  init(): void {
    this.pump();
  }

  // ==========================================================================
  // Download Management
  // ==========================================================================

  /**
   * Queue a download of `sourceUrl` to `destination` for the entity named by
   * `resourceKey` (`collection/id`). A live or completed task for the same
   * key is returned as is; a failed or cancelled one is queued again.
   *
   * @throws QuotaExceededError when `options.totalBytes` does not fit
   */
  async start(
    resourceKey: string,
    sourceUrl: string,
    destination: string,
    quality: AssetQuality,
    options: StartOptions = {}
  ): Promise<string> {
    if (!parseEntityKey(resourceKey)) {
      throw new ValidationError(`Invalid resource key: ${resourceKey}`, [
        { path: ['resourceKey'], message: 'Expected collection/id', code: 'invalid_key' },
      ]);
    }

    const attached = this.attach(resourceKey, sourceUrl, destination, quality, options);
    if (attached) return attached;

    if (options.totalBytes !== undefined) {
      await this.checkQuota(destination, options.totalBytes, null);
      // Another start for the key may have landed while checking
      const raced = this.attach(resourceKey, sourceUrl, destination, quality, options);
      if (raced) return raced;
    }

    const now = this.config.now();
    const task: DownloadTask = {
      id: uuidv4(),
      resourceKey,
      sourceUrl,
      localPath: destination,
      totalBytes: options.totalBytes ?? null,
      transferredBytes: 0,
      status: 'queued',
      quality,
      acceptsRanges: false,
      checksum: options.expectedSha256?.toLowerCase(),
      createdAt: now,
      updatedAt: now,
      lastAccessedAt: now,
    };
    this.save(task);
    this.emitSnapshot(task);
    this.pump();

    return task.id;
  }

  /**
   * Stop an active transfer, keeping what has arrived so far. A user pause
   * of a task paused for another reason takes it over, so reconnecting no
   * longer resumes it.
   */
  async pause(taskId: string, reason: PauseReason = 'user'): Promise<void> {
    const task = this.requireTask(taskId);
    if (task.status === 'paused') {
      this.resumeRequested.delete(taskId);
      if (reason === 'user' && task.pausedBy !== 'user') {
        this.update(taskId, { pausedBy: 'user' });
        this.events.emit('pause', { taskId, reason });
      }
      return;
    }

    const transfer = this.active.get(taskId);
    if (!transfer) {
      assertTransition(task.status, 'paused');
      return;
    }

    transfer.stop = { kind: 'pause', by: reason };
    transfer.controller.abort();
    await transfer.done;
  }

  /**
   * Continue a paused task when a slot is free, or retry a failed or
   * cancelled one. A failed task keeps its partial file only when the
   * source accepts range requests.
   */
  async resume(taskId: string): Promise<void> {
    const task = this.requireTask(taskId);

    switch (task.status) {
      case 'paused':
        this.resumeRequested.add(taskId);
        break;
      case 'failed':
      case 'cancelled':
        await this.requeue(task);
        break;
      default:
        // queued, downloading and completed need nothing
        return;
    }

    this.pump();
  }

  /**
   * Stop and discard a task; its partial file is deleted
   */
  async cancel(taskId: string): Promise<void> {
    const task = this.requireTask(taskId);
    assertTransition(task.status, 'cancelled');

    const transfer = this.active.get(taskId);
    if (transfer) {
      transfer.stop = { kind: 'cancel' };
      transfer.controller.abort();
      await transfer.done;
      return;
    }

    this.resumeRequested.delete(taskId);
    await removeFile(partPathOf(task));
    const cancelled = this.update(taskId, { status: 'cancelled', transferredBytes: 0, pausedBy: undefined });
    this.emitSnapshot(cancelled);
    this.events.emit('cancel', { taskId });
  }

  /**
   * Progress of one task, starting from its current state and ending after
   * its terminal snapshot. Each call is an independent stream.
   */
  async *progressOf(taskId: string): AsyncGenerator<DownloadProgressSnapshot> {
    const pending: DownloadProgressSnapshot[] = [];
    let wake: (() => void) | null = null;

    const off = this.events.on('progress', (snapshot) => {
      if (snapshot.taskId !== taskId) return;
      pending.push(snapshot);
      if (wake) {
        wake();
        wake = null;
      }
    });

    try {
      let current = toSnapshot(this.requireTask(taskId));
      while (true) {
        yield current;
        if (isTerminal(current.status)) return;

        let next = pending.shift();
        while (!next) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          next = pending.shift();
        }
        current = next;
      }
    } finally {
      off();
    }
  }

  // ==========================================================================
  // Connectivity
  // ==========================================================================

  /**
   * Going offline pauses active transfers; coming back resumes exactly those
   */
  async setOnline(online: boolean): Promise<void> {
    if (online === this.online) return;
    this.online = online;

    if (!online) {
      const stopping = [...this.active.values()].map((transfer) => {
        transfer.stop = { kind: 'pause', by: 'network' };
        transfer.controller.abort();
        return transfer.done;
      });
      await Promise.all(stopping);
      return;
    }

    for (const task of this.tasks.values()) {
      if (task.status === 'paused' && task.pausedBy === 'network') {
        this.resumeRequested.add(task.id);
      }
    }
    this.pump();
  }

  // ==========================================================================
  // Offline Library
  // ==========================================================================

  get(taskId: string): DownloadTask | null {
    return this.tasks.get(taskId) ?? null;
  }

  list(): DownloadTask[] {
    return [...this.tasks.values()];
  }

  findByResourceKey(resourceKey: string): DownloadTask | null {
    for (const task of this.tasks.values()) {
      if (task.resourceKey === resourceKey) return task;
    }
    return null;
  }

  markAccessed(taskId: string): void {
    this.requireTask(taskId);
    this.update(taskId, { lastAccessedAt: this.config.now() });
  }

  /**
   * Remove completed downloads not accessed within `ageMs`
   * @returns Ids of the removed tasks
   */
  async cleanupOlderThan(ageMs: number): Promise<string[]> {
    const cutoff = this.config.now() - ageMs;
    const expired = this.list().filter(
      (task) => task.status === 'completed' && task.lastAccessedAt < cutoff
    );

    const removed: string[] = [];
    for (const task of expired) {
      await removeFile(task.localPath);

      const ops: StoreOp[] = [{ type: 'delete', collection: COLLECTION, id: task.id }];
      const key = parseEntityKey(task.resourceKey);
      const entity = key ? this.store.get<EntityRecord>(key.collection, key.id) : null;
      if (key && entity?.offline?.localPath === task.localPath) {
        const next: EntityRecord = { ...entity };
        delete next.offline;
        ops.push({ type: 'put', collection: key.collection, id: key.id, value: next });
      }

      this.store.transact(ops);
      this.tasks.delete(task.id);
      removed.push(task.id);
    }

    if (removed.length > 0) {
      console.info(`[DownloadManager] Removed ${removed.length} unused downloads`);
    }
    return removed;
  }

  storageInfo(): DownloadStorageInfo {
    const counts: Record<DownloadStatus, number> = {
      queued: 0,
      downloading: 0,
      paused: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const task of this.tasks.values()) {
      counts[task.status]++;
    }

    const usedBytes = this.usedBytes(null);
    return {
      usedBytes,
      budgetRemainingBytes:
        this.config.maxStorageBytes > 0 ? Math.max(0, this.config.maxStorageBytes - usedBytes) : null,
      counts,
    };
  }

  /**
   * Pause every active transfer so it can continue on the next run
   */
  async shutdown(): Promise<void> {
    this.shutDown = true;
    const stopping = [...this.active.values()].map((transfer) => {
      transfer.stop = { kind: 'pause', by: 'restart' };
      transfer.controller.abort();
      return transfer.done;
    });
    await Promise.all(stopping);
    this.events.removeAllListeners();
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  private pump(): void {
    if (this.shutDown || !this.online) return;

    const waiting = this.list()
      .filter(
        (task) =>
          task.status === 'queued' || (task.status === 'paused' && this.resumeRequested.has(task.id))
      )
      .sort((a, b) => a.createdAt - b.createdAt);

    for (const task of waiting) {
      if (this.active.size >= this.config.maxConcurrent) break;
      this.launch(task);
    }
  }

  private launch(task: DownloadTask): void {
    const resumed = task.status === 'paused';
    this.resumeRequested.delete(task.id);

    const transfer: ActiveTransfer = {
      controller: new AbortController(),
      stop: null,
      done: Promise.resolve(),
    };
    this.active.set(task.id, transfer);

    const running = this.update(task.id, { status: 'downloading', pausedBy: undefined, error: undefined });
    this.emitSnapshot(running);
    if (resumed) {
      this.events.emit('resume', { taskId: task.id });
    } else {
      this.events.emit('start', { taskId: task.id, resourceKey: task.resourceKey });
    }

    transfer.done = this.runTransfer(task.id, transfer)
      .catch((error) => {
        console.error(`[DownloadManager] Unexpected failure in transfer ${task.id}:`, error);
      })
      .finally(() => {
        this.active.delete(task.id);
        this.lastReported.delete(task.id);
        this.pump();
      });
  }

  /**
   * Drive one task to a resting state, retrying transient failures
   */
  private async runTransfer(taskId: string, transfer: ActiveTransfer): Promise<void> {
    const { signal } = transfer.controller;

    for (let attempt = 0; ; attempt++) {
      try {
        await this.transferOnce(taskId, signal);
        return;
      } catch (error) {
        if (signal.aborted) {
          await this.settleStopped(taskId, transfer.stop);
          return;
        }
        if (!isTransientError(error) || attempt >= this.config.retryCount) {
          await this.fail(taskId, error);
          return;
        }

        console.warn(
          `[DownloadManager] Transfer ${taskId} interrupted (retry ${attempt + 1}/${this.config.retryCount}): ${errorMessage(error)}`
        );
        try {
          await delay(this.config.retryDelayMs * (attempt + 1), signal);
        } catch (delayError) {
          if (!signal.aborted) throw delayError;
          await this.settleStopped(taskId, transfer.stop);
          return;
        }
      }
    }
  }

  private async transferOnce(taskId: string, signal: AbortSignal): Promise<void> {
    let task = this.requireTask(taskId);
    const partPath = partPathOf(task);
    const existing = task.acceptsRanges ? await fileSize(partPath) : 0;

    if (task.totalBytes === null) {
      const probe = await this.transport.probe(task.sourceUrl, signal);
      task = this.update(taskId, { totalBytes: probe.totalBytes, acceptsRanges: probe.acceptsRanges });
    }
    if (task.totalBytes !== null) {
      await this.checkQuota(task.localPath, task.totalBytes - existing, taskId);
    }

    const offset = task.acceptsRanges ? existing : 0;
    const stream = await this.transport.open(task.sourceUrl, { offset, signal });
    if (stream.startOffset !== 0 && stream.startOffset !== offset) {
      throw new TransientNetworkError(
        `Source continued at byte ${stream.startOffset}, expected ${offset}`
      );
    }

    const sizeWasKnown = task.totalBytes !== null;
    task = this.update(taskId, {
      totalBytes: stream.totalBytes ?? task.totalBytes,
      acceptsRanges: stream.acceptsRanges,
      transferredBytes: stream.startOffset,
    });
    if (!sizeWasKnown && task.totalBytes !== null) {
      await this.checkQuota(task.localPath, task.totalBytes - stream.startOffset, taskId);
    }

    await fs.promises.mkdir(path.dirname(partPath), { recursive: true });
    const handle = await fs.promises.open(partPath, stream.startOffset > 0 ? 'a' : 'w');
    let transferred = stream.startOffset;
    try {
      for await (const chunk of stream.chunks) {
        signal.throwIfAborted();
        await handle.write(chunk);
        transferred += chunk.byteLength;
        this.reportProgress(taskId, transferred);
      }
    } finally {
      await handle.close();
      this.update(taskId, { transferredBytes: transferred });
    }
    signal.throwIfAborted();

    if (task.totalBytes !== null && transferred !== task.totalBytes) {
      throw new TransientNetworkError(
        `Transfer ended at ${transferred} of ${task.totalBytes} bytes`
      );
    }

    if (task.checksum) {
      const actual = await sha256File(partPath);
      if (actual !== task.checksum) {
        throw new IntegrityError(task.checksum, actual);
      }
    }

    await fs.promises.rename(partPath, task.localPath);
    this.complete(taskId, transferred);
  }

  private complete(taskId: string, sizeBytes: number): void {
    const task = this.requireTask(taskId);
    assertTransition(task.status, 'completed');
    const now = this.config.now();
    const completed: DownloadTask = {
      ...task,
      status: 'completed',
      totalBytes: sizeBytes,
      transferredBytes: sizeBytes,
      completedAt: now,
      lastAccessedAt: now,
      updatedAt: now,
      pausedBy: undefined,
      error: undefined,
    };

    const ops: StoreOp[] = [{ type: 'put', collection: COLLECTION, id: taskId, value: completed }];
    const key = parseEntityKey(task.resourceKey);
    if (key) {
      const offline = { localPath: task.localPath, quality: task.quality, downloadedAt: now };
      const entity = this.store.get<EntityRecord>(key.collection, key.id);
      const record: EntityRecord = entity
        ? { ...entity, offline }
        : {
            collection: key.collection,
            id: key.id,
            data: {},
            updatedAt: 0,
            lastSyncedAt: null,
            dirty: false,
            deleted: false,
            groupUpdatedAt: {},
            offline,
          };
      ops.push({ type: 'put', collection: key.collection, id: key.id, value: record });
    }

    this.store.transact(ops);
    this.tasks.set(taskId, completed);
    this.emitSnapshot(completed);
    this.events.emit('complete', { taskId, task: completed });
  }

  private async fail(taskId: string, error: unknown): Promise<void> {
    const task = this.requireTask(taskId);
    const keepPartial = task.acceptsRanges && !(error instanceof IntegrityError);
    if (!keepPartial) {
      await removeFile(partPathOf(task));
    }

    const message = errorMessage(error);
    const failed = this.update(taskId, {
      status: 'failed',
      error: message,
      transferredBytes: keepPartial ? task.transferredBytes : 0,
    });
    console.error(`[DownloadManager] Download ${taskId} (${task.resourceKey}) failed: ${message}`);
    this.emitSnapshot(failed);
    this.events.emit('error', { taskId, error: message });
  }

  private async settleStopped(taskId: string, stop: StopRequest | null): Promise<void> {
    const task = this.requireTask(taskId);

    if (stop?.kind === 'cancel') {
      await removeFile(partPathOf(task));
      const cancelled = this.update(taskId, { status: 'cancelled', transferredBytes: 0 });
      this.emitSnapshot(cancelled);
      this.events.emit('cancel', { taskId });
      return;
    }

    const reason = stop?.by ?? 'user';
    const paused = this.update(taskId, { status: 'paused', pausedBy: reason });
    this.emitSnapshot(paused);
    this.events.emit('pause', { taskId, reason });
  }

  private async requeue(task: DownloadTask): Promise<void> {
    assertTransition(task.status, 'queued');
    if (!task.acceptsRanges) {
      await removeFile(partPathOf(task));
    }
    const queued = this.update(task.id, {
      status: 'queued',
      error: undefined,
      transferredBytes: task.acceptsRanges ? task.transferredBytes : 0,
    });
    this.emitSnapshot(queued);
  }

  /**
   * Id of the task a start for `resourceKey` should attach to, re-queueing a
   * failed or cancelled one with the new parameters
   */
  private attach(
    resourceKey: string,
    sourceUrl: string,
    destination: string,
    quality: AssetQuality,
    options: StartOptions
  ): string | null {
    const existing = this.findByResourceKey(resourceKey);
    if (!existing) return null;
    if (LIVE_STATUSES.has(existing.status) || existing.status === 'completed') {
      return existing.id;
    }

    assertTransition(existing.status, 'queued');
    const sameSource = existing.sourceUrl === sourceUrl && existing.localPath === destination;
    const queued = this.update(existing.id, {
      status: 'queued',
      sourceUrl,
      localPath: destination,
      quality,
      error: undefined,
      checksum: options.expectedSha256?.toLowerCase() ?? existing.checksum,
      totalBytes: sameSource ? existing.totalBytes : options.totalBytes ?? null,
      acceptsRanges: sameSource && existing.acceptsRanges,
      transferredBytes: sameSource && existing.acceptsRanges ? existing.transferredBytes : 0,
    });
    this.emitSnapshot(queued);
    this.pump();
    return queued.id;
  }

  // ==========================================================================
  // Storage
  // ==========================================================================

  private async checkQuota(destination: string, requiredBytes: number, taskId: string | null): Promise<void> {
    const freeBytes = await this.config.freeSpace(path.dirname(destination));
    const budgetBytes =
      this.config.maxStorageBytes > 0 ? this.config.maxStorageBytes - this.usedBytes(taskId) : null;
    assertQuota({ requiredBytes, freeBytes, budgetBytes });
  }

  private usedBytes(excludeTaskId: string | null): number {
    let used = 0;
    for (const task of this.tasks.values()) {
      if (task.id === excludeTaskId || task.status === 'cancelled') continue;
      used += task.transferredBytes;
    }
    return used;
  }

  // ==========================================================================
  // Progress
  // ==========================================================================

  private reportProgress(taskId: string, transferredBytes: number): void {
    const task = this.requireTask(taskId);
    const updated: DownloadTask = { ...task, transferredBytes };
    this.tasks.set(taskId, updated);

    const now = this.config.now();
    const percent = task.totalBytes ? (transferredBytes / task.totalBytes) * 100 : 0;
    const last = this.lastReported.get(taskId);
    const due =
      !last ||
      percent - last.percent >= this.config.progressStepPercent ||
      now - last.at >= this.config.progressIntervalMs;
    if (!due) return;

    this.lastReported.set(taskId, { at: now, percent });
    this.emitSnapshot(updated);
  }

  private emitSnapshot(task: DownloadTask): void {
    this.events.emit('progress', toSnapshot(task));
  }

  // ==========================================================================
  // Event System
  // ==========================================================================

  on<K extends keyof DownloadEvents>(
    event: K,
    listener: (data: DownloadEvents[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  private requireTask(taskId: string): DownloadTask {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError(`Download task ${taskId}`);
    }
    return task;
  }

  /**
   * Apply a patch, checking any status change against the lifecycle, and persist
   */
  private update(taskId: string, patch: Partial<DownloadTask>): DownloadTask {
    const task = this.requireTask(taskId);
    if (patch.status && patch.status !== task.status) {
      assertTransition(task.status, patch.status);
    }
    const updated: DownloadTask = { ...task, ...patch, updatedAt: this.config.now() };
    this.save(updated);
    return updated;
  }

  private save(task: DownloadTask): void {
    this.store.put(COLLECTION, task.id, task);
    this.tasks.set(task.id, task);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toSnapshot(task: DownloadTask): DownloadProgressSnapshot {
  return {
    taskId: task.id,
    transferredBytes: task.transferredBytes,
    totalBytes: task.totalBytes,
    status: task.status,
  };
}

export function partPathOf(task: DownloadTask): string {
  return `${task.localPath}.part`;
}

async function fileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.size;
  } catch (error) {
    if (isNotFoundError(error)) return 0;
    throw error;
  }
}

async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

// ============================================================================
// Factory
// ============================================================================

export function createDownloadManager(
  store: LocalStore,
  transport: AssetTransport,
  config?: Partial<DownloadManagerConfig>
): DownloadManager {
  return new DownloadManager(store, transport, config);
}
