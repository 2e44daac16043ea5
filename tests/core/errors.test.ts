import { describe, it, expect } from 'vitest';
import {
  ErrorFactory,
  FetchError,
  NormalizationError,
  NotFoundError,
  PushError,
  StorageError,
  SyncCycleError,
  SyncInProgressError,
  ValidationError,
  describeError,
} from '../../src/core/errors';

describe('Domain Errors', () => {
  describe('NormalizationError', () => {
    it('should describe a record without SKU', () => {
      const error = NormalizationError.missingKey('A', 'a-7');

      expect(error.message).toBe('Record a-7 from platform A has no SKU');
      expect(error.code).toBe('NORMALIZATION_ERROR');
      expect(error.statusCode).toBe(422);
      expect(error.name).toBe('NormalizationError');
      expect(error.details).toEqual({ platform: 'A', nativeId: 'a-7' });
    });

    it('should use the index as native id for non-object records', () => {
      const error = NormalizationError.notAnObject('B', 3);

      expect(error.nativeId).toBe('#3');
      expect(error.message).toBe('Record at index 3 from platform B is not an object');
    });
  });

  describe('platform errors', () => {
    it('should wrap fetch causes', () => {
      const error = FetchError.fromCause('A', 'connection reset');
      expect(error.message).toBe('Fetch from platform A failed: connection reset');
      expect(error.statusCode).toBe(502);
    });

    it('should wrap push causes', () => {
      const error = PushError.fromCause('B', 'SKU-1', new Error('timeout'));
      expect(error.message).toBe('Push of SKU-1 to platform B failed: timeout');
      expect(error.details).toEqual({ platform: 'B', sku: 'SKU-1' });
    });
  });

  describe('StorageError', () => {
    it('should record the operation and path', () => {
      const error = StorageError.saveFailed('/tmp/catalog.json', new Error('EACCES'));

      expect(error.message).toBe('Failed to save catalog to /tmp/catalog.json: EACCES');
      expect(error.operation).toBe('save');
      expect(error.statusCode).toBe(500);
    });
  });

  describe('HTTP-facing errors', () => {
    it('should map to their status codes', () => {
      expect(new SyncInProgressError().statusCode).toBe(409);
      expect(new ValidationError('bad').statusCode).toBe(400);
      expect(new SyncCycleError('boom').message).toBe('Reconciliation cycle failed: boom');
    });

    it('should build the standard error response', () => {
      const response = ErrorFactory.createErrorResponse(NotFoundError.catalogItem('SKU-9'));

      expect(response.success).toBe(false);
      expect(response.error.code).toBe('NOT_FOUND_ERROR');
      expect(response.error.statusCode).toBe(404);
      expect(response.error.message).toBe('Catalog item not found for SKU SKU-9');
      expect(response.error.details).toEqual({ resourceType: 'CatalogItem', identifier: 'SKU-9', sku: 'SKU-9' });
    });
  });

  describe('describeError', () => {
    it('should extract a reason from anything thrown', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
      expect(describeError(new Error(''))).toBe('Error');
      expect(describeError('plain')).toBe('plain');
      expect(describeError({ status: 503 })).toBe('{"status":503}');
    });
  });
});
