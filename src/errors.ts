/**
 * Error taxonomy for manifest reconciliation
 *
 * Validation and conflict conditions are detected before any mutating store
 * I/O and are reported as diagnostics. Wait, internal and cancellation errors
 * are thrown to the caller.
 */

import type { AttributePath } from './values/path.js';

/**
 * Error codes for programmatic handling
 */
export type ReconcileErrorCode =
  | 'VALIDATION'
  | 'PATH_PARSE'
  | 'CONVERSION'
  | 'CONFLICT'
  | 'WAIT_FAILED'
  | 'INTERNAL'
  | 'CANCELLED'
  | 'CONFIG';

/**
 * Base error class for reconciliation errors
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReconcileError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Malformed state, path or type. Detected locally, never after a write.
 */
export class ValidationError extends ReconcileError {
  constructor(
    message: string,
    code: ReconcileErrorCode = 'VALIDATION',
    suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, code, suggestion, options);
    this.name = 'ValidationError';
  }
}

/**
 * A field path string could not be parsed
 */
export class PathParseError extends ValidationError {
  constructor(
    public readonly input: string,
    public readonly position: number,
    reason: string
  ) {
    super(
      `Cannot parse field path "${input}" at offset ${position}: ${reason}`,
      'PATH_PARSE',
      'Use dotted attribute names with ["key"] or [index] selectors, e.g. metadata.labels["app"]'
    );
    this.name = 'PathParseError';
  }
}

/**
 * A value could not be converted to (or coerced into) the target type
 */
export class ConversionError extends ValidationError {
  constructor(
    public readonly path: AttributePath,
    reason: string
  ) {
    super(`${path.isRoot() ? '(root)' : path.toString()}: ${reason}`, 'CONVERSION');
    this.name = 'ConversionError';
  }
}

/**
 * Create requested for a resource that already exists in the store
 */
export class ConflictError extends ReconcileError {
  constructor(public readonly resourceName: string) {
    super(
      `resource "${resourceName}" already exists`,
      'CONFLICT',
      'Import the existing resource into state or delete it before creating it again'
    );
    this.name = 'ConflictError';
  }
}

/**
 * Completion condition not met after the write landed
 */
export class WaitError extends ReconcileError {
  constructor(
    public readonly resourceName: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      `resource "${resourceName}" was applied to the store, but waiting for completion failed: ${reason}`,
      'WAIT_FAILED',
      'The resource exists in the store; the next apply will reconcile it',
      options
    );
    this.name = 'WaitError';
  }
}

/**
 * Schema or identity resolution failure upstream of any write
 */
export class InternalError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INTERNAL', undefined, options);
    this.name = 'InternalError';
  }
}

/**
 * The caller's abort signal fired while an apply was in flight
 */
export class ApplyCancelledError extends ReconcileError {
  constructor(options?: { cause?: unknown }) {
    super(
      'apply was cancelled; changes that already reached the store are kept',
      'CANCELLED',
      undefined,
      options
    );
    this.name = 'ApplyCancelledError';
  }
}

/**
 * Configuration file could not be read
 */
export class ConfigError extends ReconcileError {
  constructor(
    public readonly configPath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Invalid configuration in ${configPath}: ${reason}`,
      'CONFIG',
      'Expected a YAML mapping with optional string keys server, token, namespace and fieldManager',
      options
    );
    this.name = 'ConfigError';
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
