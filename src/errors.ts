/**
 * @fileoverview Error types and remote-failure classification.
 *
 * Every failure the sync pass sees is mapped onto an {@link ErrorCategory}.
 * The category decides whether the operation stays in the outbox
 * (retryable) or is dropped on the spot.
 *
 * Classification looks at, in order: the PostgreSQL / PostgREST error code,
 * the HTTP status, then the message text. Anything unrecognized is treated
 * as retryable.
 */

import { isRecord } from './utils';

// =============================================================================
// Error Classes
// =============================================================================

/** Base class for errors raised by the engine. */
export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
  }
}

/** Details carried by a failed remote request. */
export interface RemoteErrorDetails {
  code?: string;
  status?: number;
  details?: string;
  hint?: string;
  cause?: unknown;
}

/** A request to the remote store failed. */
export class RemoteError extends SyncError {
  readonly code?: string;
  readonly status?: number;
  readonly details?: string;
  readonly hint?: string;

  constructor(message: string, info: RemoteErrorDetails = {}) {
    super(message, { cause: info.cause });
    this.name = 'RemoteError';
    this.code = info.code;
    this.status = info.status;
    this.details = info.details;
    this.hint = info.hint;
  }
}

/** An operation was enqueued without the fields its kind requires. */
export class InvalidOperationError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

/** A configuration value is out of range. */
export class ConfigError extends SyncError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid config "${field}": ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

// =============================================================================
// Classification
// =============================================================================

export type ErrorCategory =
  | 'network'
  | 'timeout'
  | 'server'
  | 'rate_limited'
  | 'conflict'
  | 'validation'
  | 'auth'
  | 'unknown';

export interface ClassifiedError {
  category: ErrorCategory;
  retryable: boolean;
  message: string;
  code?: string;
  status?: number;
}

const RETRYABLE: Record<ErrorCategory, boolean> = {
  network: true,
  timeout: true,
  server: true,
  rate_limited: true,
  conflict: false,
  validation: false,
  auth: false,
  unknown: true
};

// PostgreSQL SQLSTATE and PostgREST codes
const CONFLICT_CODES = new Set(['23505', 'PGRST409']);
const VALIDATION_CODES = new Set(['23502', '23503', '23514', '22001', '22P02', 'PGRST102', 'PGRST204']);
const AUTH_CODES = new Set(['42501', 'PGRST301', 'PGRST302']);

function readCode(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  const code = error.code;
  if (typeof code === 'string' && code) return code;
  if (typeof code === 'number') return String(code);
  return undefined;
}

function readStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const status = error.status ?? error.statusCode;
  return typeof status === 'number' && status > 0 ? status : undefined;
}

function categoryFromCode(code: string | undefined): ErrorCategory | null {
  if (!code) return null;
  if (CONFLICT_CODES.has(code)) return 'conflict';
  if (VALIDATION_CODES.has(code)) return 'validation';
  if (AUTH_CODES.has(code)) return 'auth';
  return null;
}

function categoryFromStatus(status: number | undefined): ErrorCategory | null {
  if (status === undefined) return null;
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status === 409) return 'conflict';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server';
  if (status === 400 || status === 422) return 'validation';
  return null;
}

function categoryFromMessage(message: string): ErrorCategory | null {
  const msg = message.toLowerCase();

  if (msg.includes('timeout') || msg.includes('timed out')) return 'timeout';
  if (
    msg.includes('fetch') ||
    msg.includes('network') ||
    msg.includes('connection') ||
    msg.includes('offline') ||
    msg.includes('econnrefused') ||
    msg.includes('econnreset') ||
    msg.includes('enotfound')
  ) {
    return 'network';
  }
  if (msg.includes('rate limit') || msg.includes('too many requests')) return 'rate_limited';
  if (msg.includes('jwt') || msg.includes('unauthorized') || msg.includes('permission denied')) {
    return 'auth';
  }
  if (msg.includes('duplicate') || msg.includes('already exists')) return 'conflict';
  if (msg.includes('service unavailable') || msg.includes('bad gateway')) return 'server';
  return null;
}

/**
 * Map an arbitrary failure onto the engine's error taxonomy.
 *
 * @example
 * classifySyncError({ code: '23505', message: 'duplicate key' });
 * // => { category: 'conflict', retryable: false, ... }
 */
export function classifySyncError(error: unknown): ClassifiedError {
  const message = extractErrorMessage(error);
  const code = readCode(error);
  const status = readStatus(error);

  const category =
    categoryFromCode(code) ??
    categoryFromStatus(status) ??
    categoryFromMessage(message) ??
    'unknown';

  return { category, retryable: RETRYABLE[category], message, code, status };
}

// =============================================================================
// Messages
// =============================================================================

/**
 * Extract a readable message from any thrown value.
 *
 * Handles `Error` instances, Supabase / PostgREST error objects
 * (`{ message, details, hint, code }`) and primitives.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (isRecord(error)) {
    if (typeof error.message === 'string' && error.message) {
      let msg = error.message;
      if (typeof error.details === 'string' && error.details) {
        msg += ` - ${error.details}`;
      }
      if (typeof error.hint === 'string' && error.hint) {
        msg += ` (${error.hint})`;
      }
      return msg;
    }

    if (typeof error.error === 'string' && error.error) {
      return error.error;
    }

    try {
      return JSON.stringify(error);
    } catch {
      return '[Unable to parse error]';
    }
  }

  return String(error);
}

/** Short user-facing sentence for a classified failure. */
export function friendlyErrorMessage(classified: ClassifiedError): string {
  switch (classified.category) {
    case 'network':
      return 'Network connection lost. Changes saved locally.';
    case 'timeout':
      return 'Server took too long to respond. Will retry.';
    case 'server':
      return 'Server is temporarily unavailable. Will retry.';
    case 'rate_limited':
      return 'Too many requests. Will retry shortly.';
    case 'conflict':
      return 'This change conflicts with data on the server.';
    case 'validation':
      return 'The server rejected this change as invalid.';
    case 'auth':
      return 'Session expired. Please sign in again.';
    case 'unknown':
      return 'Sync failed. Will retry.';
  }
}
