/**
 * Base class for every error lodkeep raises on purpose.
 * `code` is stable and safe to branch on; `context` carries the values that
 * identify what failed.
 */
export class LodkeepError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code = 'LODKEEP_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = 'LodkeepError';
    this.code = code;
    this.context = context;
  }
}

/** Reading or writing the hash index failed at the storage layer. Callers may retry. */
export class StorageError extends LodkeepError {
  readonly retryable = true;

  constructor(operation: string, cause: unknown, context?: Record<string, unknown>) {
    super(`Hash index ${operation} failed: ${describeCause(cause)}`, 'STORAGE_ERROR', { operation, ...context });
    this.name = 'StorageError';
    this.cause = cause;
  }
}

export class ConfigError extends LodkeepError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

export class NotInitializedError extends LodkeepError {
  constructor(startPath: string) {
    super(`No .lodkeep directory found from ${startPath}. Run \`lodkeep init\` first.`, 'NOT_INITIALIZED', { startPath });
    this.name = 'NotInitializedError';
  }
}

/**
 * A record was invalidated while a description for it was being generated.
 * Raised by `recordGenerated` only when the caller passed `expectedRevision`.
 */
export class ConcurrentInvalidationError extends LodkeepError {
  constructor(fingerprint: string, invalidatedAt: string) {
    super(`${fingerprint} was invalidated at ${invalidatedAt}, while its description was being generated`, 'CONCURRENT_INVALIDATION', {
      fingerprint,
      invalidatedAt,
    });
    this.name = 'ConcurrentInvalidationError';
  }
}

export class GenerationError extends LodkeepError {
  constructor(entityName: string, cause: unknown) {
    super(`Description generation failed for ${entityName}: ${describeCause(cause)}`, 'GENERATION_ERROR', { entityName });
    this.name = 'GenerationError';
    this.cause = cause;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
