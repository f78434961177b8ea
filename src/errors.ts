/**
 * Error hierarchy for cluster bootstrap.
 *
 *   BootstrapError (base)
 *   ├── ConfigError
 *   │   ├── ConfigNotFoundError
 *   │   └── InvalidConfigError
 *   ├── StoreError (resource store operations)
 *   │   ├── ResourceNotFoundError
 *   │   ├── ResourceAlreadyExistsError
 *   │   ├── ResourceConflictError
 *   │   └── StoreOperationError
 *   ├── MalformedInputError
 *   ├── UnsupportedKeyTypeError
 *   ├── ReadinessTimeoutError
 *   ├── OperationCancelledError
 *   ├── RegistrationError
 *   └── StageFailedError
 */

import type { ResourceRef } from './types';

export class BootstrapError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Suggestion for how to fix the error */
  readonly suggestion?: string;

  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      suggestion?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'BootstrapError';
    this.code = code;
    this.suggestion = options?.suggestion;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`${this.code}: ${this.message}`];
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigError extends BootstrapError {
  constructor(message: string, code = 'CONFIG_ERROR', options?: { suggestion?: string; cause?: unknown }) {
    super(message, code, options);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration file not found: ${path}`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Run "cluster-bootstrap init" to create a configuration file'
    });
    this.name = 'ConfigNotFoundError';
  }
}

export class InvalidConfigError extends ConfigError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
    this.errors = errors;
  }
}

// ============================================================================
// Resource store
// ============================================================================

export function describeRef(ref: ResourceRef): string {
  return ref.namespace ? `${ref.kind} ${ref.namespace}/${ref.name}` : `${ref.kind} ${ref.name}`;
}

export class StoreError extends BootstrapError {
  readonly ref: ResourceRef;

  constructor(message: string, code: string, ref: ResourceRef, cause?: unknown) {
    super(message, code, { cause, context: { ...ref } });
    this.name = 'StoreError';
    this.ref = ref;
  }
}

export class ResourceNotFoundError extends StoreError {
  constructor(ref: ResourceRef) {
    super(`${describeRef(ref)} not found`, 'NOT_FOUND', ref);
    this.name = 'ResourceNotFoundError';
  }
}

export class ResourceAlreadyExistsError extends StoreError {
  constructor(ref: ResourceRef) {
    super(`${describeRef(ref)} already exists`, 'ALREADY_EXISTS', ref);
    this.name = 'ResourceAlreadyExistsError';
  }
}

export class ResourceConflictError extends StoreError {
  constructor(ref: ResourceRef) {
    super(`${describeRef(ref)} was modified concurrently`, 'CONFLICT', ref);
    this.name = 'ResourceConflictError';
  }
}

export type StoreOperation = 'get' | 'create' | 'update' | 'list';

/**
 * Any store failure other than the expected not-found / already-exists /
 * conflict conditions. Fatal to the current stage.
 */
export class StoreOperationError extends StoreError {
  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, ref: ResourceRef, cause?: unknown, reason?: string) {
    reason ??= cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${describeRef(ref)}: ${reason}`, 'STORE_ERROR', ref, cause);
    this.name = 'StoreOperationError';
    this.operation = operation;
  }
}

// ============================================================================
// Credentials
// ============================================================================

export class MalformedInputError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MALFORMED_INPUT', {
      cause,
      suggestion: 'Check the certificate issued upstream; retrying will not help until it is replaced'
    });
    this.name = 'MalformedInputError';
  }
}

export class UnsupportedKeyTypeError extends BootstrapError {
  readonly keyType: string;

  constructor(keyType: string) {
    super(`Certificate does not contain an RSA public key (found ${keyType})`, 'UNSUPPORTED_KEY_TYPE', {
      suggestion: 'Issue the signing certificate with an RSA private key'
    });
    this.name = 'UnsupportedKeyTypeError';
    this.keyType = keyType;
  }
}

// ============================================================================
// Waiting
// ============================================================================

export class ReadinessTimeoutError extends BootstrapError {
  readonly unmet: string[];
  readonly timeoutMs: number;

  constructor(unmet: string[], timeoutMs: number) {
    super(
      `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for: ${unmet.join(', ')}`,
      'READINESS_TIMEOUT',
      { context: { unmet, timeoutMs } }
    );
    this.name = 'ReadinessTimeoutError';
    this.unmet = unmet;
    this.timeoutMs = timeoutMs;
  }
}

export class OperationCancelledError extends BootstrapError {
  constructor(what: string, cause?: unknown) {
    super(`${what} was cancelled`, 'CANCELLED', { cause });
    this.name = 'OperationCancelledError';
  }
}

// ============================================================================
// External services and stages
// ============================================================================

export class RegistrationError extends BootstrapError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, 'REGISTRATION_FAILED', { cause: options?.cause });
    this.name = 'RegistrationError';
    this.status = options?.status;
  }
}

export class StageFailedError extends BootstrapError {
  readonly pipeline: string;
  readonly stage: string;

  constructor(pipeline: string, stage: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${pipeline}/${stage}: ${reason}`, 'STAGE_FAILED', {
      cause,
      context: { pipeline, stage },
      suggestion: cause instanceof BootstrapError ? cause.suggestion : 'Retry provisioning once the cause is resolved'
    });
    this.name = 'StageFailedError';
    this.pipeline = pipeline;
    this.stage = stage;
  }
}

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError;
}
