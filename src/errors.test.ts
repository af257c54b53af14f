/**
 * Tests for the error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  PipelineStepError,
  RequestTimeoutError,
  SetupStepError,
  describeError,
} from './errors.js';

describe('ApiError', () => {
  it('should flag a 409 as a concurrent modification', () => {
    expect(new ApiError('conflict', 409, 'POST', '/carts/cart-1').isConcurrentModification).toBe(true);
  });

  it('should flag a ConcurrentModification error code', () => {
    const error = new ApiError('conflict', 400, 'POST', '/carts/cart-1', [
      { code: 'ConcurrentModification', message: 'stale version', currentVersion: 4 },
    ]);

    expect(error.isConcurrentModification).toBe(true);
  });

  it('should not flag other failures', () => {
    const error = new ApiError('bad request', 400, 'POST', '/carts/cart-1', [
      { code: 'InvalidOperation', message: 'no such line item' },
    ]);

    expect(error.isConcurrentModification).toBe(false);
  });
});

describe('describeError', () => {
  it('should name the failing step and the HTTP status', () => {
    const cause = new ApiError('API request failed: stale', 409, 'POST', '/carts/cart-1');
    const error = new PipelineStepError('set line item shipping details', 2, cause);

    expect(describeError(error)).toBe(
      'Step 2 "set line item shipping details" failed: API request failed: stale (HTTP 409 on POST /carts/cart-1, version conflict)'
    );
  });

  it('should name the failing setup step and the HTTP status', () => {
    const cause = new ApiError('API request failed: Internal error', 500, 'POST', '/product-types');

    expect(describeError(new SetupStepError('create catalog', cause))).toBe(
      'Setup "create catalog" failed: API request failed: Internal error (HTTP 500 on POST /product-types)'
    );
  });

  it('should describe a plain API error', () => {
    const error = new ApiError('API request failed: Internal Server Error', 500, 'GET', '');

    expect(describeError(error)).toBe('API request failed: Internal Server Error (HTTP 500 on GET /)');
  });

  it('should include the status of an authentication failure', () => {
    expect(describeError(new AuthenticationError('Token request failed: invalid_client', 401))).toBe(
      'Token request failed: invalid_client (HTTP 401)'
    );
  });

  it('should describe errors without a status', () => {
    expect(describeError(new ConfigurationError('Invalid configuration: CTP_API_URL is required'))).toBe(
      'Invalid configuration: CTP_API_URL is required'
    );
    expect(describeError(new RequestTimeoutError('POST', '/carts', 500))).toBe('POST /carts timed out after 500ms');
  });

  it('should stringify values that are not errors', () => {
    expect(describeError('boom')).toBe('boom');
  });
});
