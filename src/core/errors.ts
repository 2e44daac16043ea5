import type { PlatformId, SKU } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

/**
 * Extract a readable reason from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

// A raw record that could not produce a catalog item
export class NormalizationError extends DomainError {
  readonly code = 'NORMALIZATION_ERROR';
  readonly statusCode = 422;

  constructor(
    message: string,
    public readonly platform: PlatformId,
    public readonly nativeId: string,
    details?: Record<string, unknown>
  ) {
    super(message, { platform, nativeId, ...details });
  }

  static missingKey(platform: PlatformId, nativeId: string): NormalizationError {
    return new NormalizationError(
      `Record ${nativeId} from platform ${platform} has no SKU`,
      platform,
      nativeId
    );
  }

  static notAnObject(platform: PlatformId, index: number): NormalizationError {
    return new NormalizationError(
      `Record at index ${index} from platform ${platform} is not an object`,
      platform,
      `#${index}`
    );
  }
}

// A platform snapshot could not be fetched this cycle
export class FetchError extends DomainError {
  readonly code = 'FETCH_ERROR';
  readonly statusCode = 502;

  constructor(
    message: string,
    public readonly platform: PlatformId,
    details?: Record<string, unknown>
  ) {
    super(message, { platform, ...details });
  }

  static fromCause(platform: PlatformId, cause: unknown): FetchError {
    return new FetchError(
      `Fetch from platform ${platform} failed: ${describeError(cause)}`,
      platform
    );
  }

  static invalidPayload(platform: PlatformId): FetchError {
    return new FetchError(`Platform ${platform} returned a non-list snapshot`, platform);
  }
}

// One item could not be pushed to one platform
export class PushError extends DomainError {
  readonly code = 'PUSH_ERROR';
  readonly statusCode = 502;

  constructor(
    message: string,
    public readonly platform: PlatformId,
    public readonly sku: SKU,
    details?: Record<string, unknown>
  ) {
    super(message, { platform, sku, ...details });
  }

  static fromCause(platform: PlatformId, sku: SKU, cause: unknown): PushError {
    return new PushError(
      `Push of ${sku} to platform ${platform} failed: ${describeError(cause)}`,
      platform,
      sku
    );
  }
}

// The durable catalog could not be read or written
export class StorageError extends DomainError {
  readonly code = 'STORAGE_ERROR';
  readonly statusCode = 500;

  constructor(
    message: string,
    public readonly operation: 'load' | 'save',
    public readonly filePath: string,
    details?: Record<string, unknown>
  ) {
    super(message, { operation, filePath, ...details });
  }

  static saveFailed(filePath: string, cause: unknown): StorageError {
    return new StorageError(
      `Failed to save catalog to ${filePath}: ${describeError(cause)}`,
      'save',
      filePath
    );
  }

  static loadFailed(filePath: string, cause: unknown): StorageError {
    return new StorageError(
      `Failed to load catalog from ${filePath}: ${describeError(cause)}`,
      'load',
      filePath
    );
  }
}

// A manual trigger arrived while a cycle was running (409)
export class SyncInProgressError extends DomainError {
  readonly code = 'SYNC_IN_PROGRESS';
  readonly statusCode = 409;

  constructor(message = 'A reconciliation cycle is already running') {
    super(message);
  }
}

// A cycle threw outside the per-platform and per-item error paths
export class SyncCycleError extends DomainError {
  readonly code = 'SYNC_CYCLE_FAILED';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`Reconciliation cycle failed: ${reason}`, { reason });
  }
}

// Validation error for invalid input (400)
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }
}

// Not found error for missing resources (404)
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND_ERROR';
  readonly statusCode = 404;

  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly identifier: string,
    details?: Record<string, unknown>
  ) {
    super(message, { resourceType, identifier, ...details });
  }

  static catalogItem(sku: SKU): NotFoundError {
    return new NotFoundError(
      `Catalog item not found for SKU ${sku}`,
      'CatalogItem',
      sku,
      { sku }
    );
  }
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError) {
    return {
      success: false as const,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
