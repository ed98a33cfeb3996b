/**
 * Shape checks for persisted records. Registered with the local store so a
 * record that no longer matches is quarantined instead of reaching callers.
 */

import type { RecordDecoder } from './local-store';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableNumber(value: unknown): boolean {
  return value === null || typeof value === 'number';
}

export const isEntityRecord: RecordDecoder = (value) =>
  isObject(value) &&
  typeof value.collection === 'string' &&
  typeof value.id === 'string' &&
  isObject(value.data) &&
  typeof value.updatedAt === 'number' &&
  isNullableNumber(value.lastSyncedAt) &&
  typeof value.dirty === 'boolean' &&
  typeof value.deleted === 'boolean' &&
  isObject(value.groupUpdatedAt);

export const isOfflineAction: RecordDecoder = (value) =>
  isObject(value) &&
  typeof value.id === 'string' &&
  (value.kind === 'create' || value.kind === 'update' || value.kind === 'delete') &&
  typeof value.targetKey === 'string' &&
  isObject(value.payload) &&
  typeof value.seq === 'number' &&
  typeof value.retryCount === 'number' &&
  (value.status === 'pending' || value.status === 'abandoned');

export const isDownloadTask: RecordDecoder = (value) =>
  isObject(value) &&
  typeof value.id === 'string' &&
  typeof value.resourceKey === 'string' &&
  typeof value.sourceUrl === 'string' &&
  typeof value.localPath === 'string' &&
  isNullableNumber(value.totalBytes) &&
  typeof value.transferredBytes === 'number' &&
  typeof value.status === 'string';

export const isCacheEntry: RecordDecoder = (value) =>
  isObject(value) &&
  typeof value.key === 'string' &&
  typeof value.payloadRef === 'string' &&
  typeof value.sizeBytes === 'number' &&
  typeof value.priority === 'number' &&
  typeof value.lastAccessedAt === 'number' &&
  isNullableNumber(value.expiresAt) &&
  typeof value.seq === 'number' &&
  isObject(value.dependsOn);

export const isSyncCursor: RecordDecoder = (value) =>
  isObject(value) &&
  typeof value.collection === 'string' &&
  (value.cursor === null || typeof value.cursor === 'string');
