/**
 * Error types raised by the sync engine
 * @module errors
 */

// ============================================================================
// Network
// ============================================================================

/**
 * A network failure worth retrying: dropped connection, timeout, 5xx
 */
export class TransientNetworkError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TransientNetworkError';
  }
}

/**
 * The remote store refused a request; retrying the same request cannot help
 */
export class RemoteRejectedError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'RemoteRejectedError';
  }
}

/**
 * The remote copy changed since the client last saw it
 */
export class ConflictError extends Error {
  constructor(
    message: string,
    public readonly serverUpdatedAt: number
  ) {
    super(message);
    this.name = 'ConflictError';
  }
}

// ============================================================================
// Local state
// ============================================================================

export class QuotaExceededError extends Error {
  constructor(
    public readonly requiredBytes: number,
    public readonly availableBytes: number
  ) {
    super(
      `Insufficient storage: ${requiredBytes} bytes required, ${availableBytes} available`
    );
    this.name = 'QuotaExceededError';
  }
}

/**
 * A downloaded file does not match its expected checksum
 */
export class IntegrityError extends Error {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Checksum mismatch: expected ${expected}, got ${actual}`);
    this.name = 'IntegrityError';
  }
}

/**
 * A persisted record could not be decoded. Fatal to that record only.
 */
export class CorruptLocalStateError extends Error {
  constructor(
    public readonly collection: string,
    public readonly id: string,
    public readonly reason: string
  ) {
    super(`Corrupt record ${collection}/${id}: ${reason}`);
    this.name = 'CorruptLocalStateError';
  }
}

/**
 * An action that exhausted its retries
 */
export class AbandonedActionError extends Error {
  constructor(
    public readonly actionId: string,
    public readonly targetKey: string,
    public readonly lastError: string
  ) {
    super(`Action ${actionId} on ${targetKey} abandoned: ${lastError}`);
    this.name = 'AbandonedActionError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class NotFoundError extends Error {
  constructor(what: string) {
    super(`${what} not found`);
    this.name = 'NotFoundError';
  }
}

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationIssue[]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ============================================================================
// Classification
// ============================================================================

const TRANSIENT_ERRNO_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Whether an error is worth retrying locally
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientNetworkError) return true;
  if (!(error instanceof Error)) return false;

  // fetch() rejects with a bare TypeError when the connection fails
  if (error.name === 'TypeError' && error.message === 'fetch failed') return true;

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_ERRNO_CODES.has(code)) return true;

  const cause = 'cause' in error ? error.cause : undefined;
  return cause !== undefined && cause !== error && isTransientError(cause);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
