/**
 * Settings validation
 * Simple validation without external dependencies
 * @module settings/validation
 */

import { ValidationError, type ValidationIssue } from '../errors';
import type { EngineSettings } from './settings';

// ============================================================================
// Validation Helpers
// ============================================================================

function createError(path: string[], message: string): ValidationIssue {
  return { path, message, code: 'invalid_setting' };
}

function checkNumber(
  errors: ValidationIssue[],
  path: string[],
  value: number,
  { min = 0, max = Number.POSITIVE_INFINITY, integer = false } = {}
): void {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    errors.push(createError(path, 'Must be a number'));
  } else if (integer && !Number.isInteger(value)) {
    errors.push(createError(path, 'Must be an integer'));
  } else if (value < min || value > max) {
    errors.push(createError(path, `Must be between ${min} and ${max}`));
  }
}

// ============================================================================
// Engine Settings Validation
// ============================================================================

/**
 * Throws a ValidationError listing every problem found
 */
export function validateSettings(settings: EngineSettings): void {
  const errors: ValidationIssue[] = [];
  const { store, cache, queue, downloads, sync, network } = settings;

  if (store.filePath !== null && (typeof store.filePath !== 'string' || store.filePath.length === 0)) {
    errors.push(createError(['store', 'filePath'], 'Must be a non-empty path or null'));
  }
  checkNumber(errors, ['store', 'persistDelayMs'], store.persistDelayMs);

  checkNumber(errors, ['cache', 'capacityBytes'], cache.capacityBytes, { min: 1 });
  if (!(cache.evictionTargetRatio > 0 && cache.evictionTargetRatio <= 1)) {
    errors.push(createError(['cache', 'evictionTargetRatio'], 'Must be in (0, 1]'));
  }
  checkNumber(errors, ['cache', 'defaultTtlMs'], cache.defaultTtlMs);
  checkNumber(errors, ['cache', 'sweepIntervalMs'], cache.sweepIntervalMs);

  checkNumber(errors, ['queue', 'maxRetries'], queue.maxRetries, { integer: true });
  checkNumber(errors, ['queue', 'concurrency'], queue.concurrency, { min: 1, integer: true });
  checkNumber(errors, ['queue', 'backoffBaseMs'], queue.backoffBaseMs);
  checkNumber(errors, ['queue', 'backoffMaxMs'], queue.backoffMaxMs, { min: queue.backoffBaseMs });
  checkNumber(errors, ['queue', 'maxActionAgeMs'], queue.maxActionAgeMs);

  checkNumber(errors, ['downloads', 'maxConcurrent'], downloads.maxConcurrent, { min: 1, integer: true });
  checkNumber(errors, ['downloads', 'retryCount'], downloads.retryCount, { integer: true });
  checkNumber(errors, ['downloads', 'retryDelayMs'], downloads.retryDelayMs);
  checkNumber(errors, ['downloads', 'progressStepPercent'], downloads.progressStepPercent, { max: 100 });
  checkNumber(errors, ['downloads', 'progressIntervalMs'], downloads.progressIntervalMs);
  checkNumber(errors, ['downloads', 'maxStorageBytes'], downloads.maxStorageBytes);
  checkNumber(errors, ['downloads', 'retentionMs'], downloads.retentionMs);

  if (!Array.isArray(sync.collections)) {
    errors.push(createError(['sync', 'collections'], 'Must be a list of collection names'));
  } else {
    sync.collections.forEach((name, index) => {
      if (typeof name !== 'string' || !/^[A-Za-z0-9][\w-]*$/.test(name)) {
        errors.push(
          createError(['sync', 'collections', String(index)], 'Collection names are alphanumeric and may not start with "_"')
        );
      }
    });
    if (new Set(sync.collections).size !== sync.collections.length) {
      errors.push(createError(['sync', 'collections'], 'Duplicate collection name'));
    }
  }
  checkNumber(errors, ['sync', 'syncIntervalMs'], sync.syncIntervalMs);
  checkNumber(errors, ['sync', 'staleAfterMs'], sync.staleAfterMs);
  for (const [collection, groups] of Object.entries(sync.fieldGroups)) {
    const seen = new Set<string>();
    for (const [group, fields] of Object.entries(groups)) {
      if (!Array.isArray(fields) || fields.length === 0) {
        errors.push(createError(['sync', 'fieldGroups', collection, group], 'Must list at least one field'));
        continue;
      }
      for (const field of fields) {
        if (seen.has(field)) {
          errors.push(createError(['sync', 'fieldGroups', collection, group], `Field "${field}" is in more than one group`));
        }
        seen.add(field);
      }
    }
  }

  checkNumber(errors, ['network', 'debounceMs'], network.debounceMs);

  if (errors.length > 0) {
    throw new ValidationError(
      `Invalid engine settings: ${errors.map((e) => `${e.path.join('.')} ${e.message}`).join('; ')}`,
      errors
    );
  }
}
