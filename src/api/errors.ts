/**
 * Store API errors
 */

import type { StatusCause, StatusDetails, StoreStatus } from './types.js';

export const NOT_FOUND_STATUS = 404;

/**
 * Error for a failed store request, carrying the HTTP status and the parsed
 * `Status` body when the store sent one
 */
export class StoreApiError extends Error {
  public readonly status: number;
  public readonly body?: StoreStatus;

  constructor(message: string, status: number, options?: { body?: StoreStatus; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'StoreApiError';
    this.status = status;
    this.body = options?.body;
  }

  /**
   * Reason from the status body, e.g. "NotFound" or "Invalid"
   */
  get reason(): string | undefined {
    return this.body?.reason;
  }

  isNotFound(): boolean {
    return this.status === NOT_FOUND_STATUS || this.body?.reason === 'NotFound';
  }
}

/**
 * True when `error` is a store "not found" response
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof StoreApiError && error.isNotFound();
}

// =============================================================================
// Status parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseCause(value: unknown): StatusCause | undefined {
  if (!isRecord(value)) return undefined;
  return {
    reason: optionalString(value.reason),
    message: optionalString(value.message),
    field: optionalString(value.field),
  };
}

function parseDetails(value: unknown): StatusDetails | undefined {
  if (!isRecord(value)) return undefined;
  const causes = Array.isArray(value.causes)
    ? value.causes.flatMap((c: unknown) => parseCause(c) ?? [])
    : undefined;
  return {
    name: optionalString(value.name),
    group: optionalString(value.group),
    kind: optionalString(value.kind),
    causes,
  };
}

/**
 * Read a `Status` document from a parsed error body. Returns undefined when
 * the body is not a Status object.
 */
export function parseStatus(body: unknown): StoreStatus | undefined {
  if (!isRecord(body) || body.kind !== 'Status') return undefined;
  return {
    status: optionalString(body.status),
    message: optionalString(body.message),
    reason: optionalString(body.reason),
    code: typeof body.code === 'number' ? body.code : undefined,
    details: parseDetails(body.details),
  };
}
