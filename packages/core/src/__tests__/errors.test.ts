import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  InvalidArgumentError,
  ExternalServiceError,
  RemoteRequestError,
  NotFoundError,
  MalformedResponseError,
  NotImplementedError,
  isOperationalError,
  toSafeErrorResponse,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE', 400);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
  });

  it('should default to 500 status code', () => {
    const error = new AppError('Test', 'CODE');
    expect(error.statusCode).toBe(500);
  });

  it('should produce safe error details', () => {
    const safe = new AppError('Something failed', 'CODE', 400).toSafeError();

    expect(safe).toEqual({ code: 'CODE', message: 'Something failed', statusCode: 400 });
  });
});

describe('ValidationError', () => {
  it('should have 400 status code', () => {
    const error = new ValidationError('Invalid input');
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('VALIDATION_ERROR');
  });

  it('should store validation details', () => {
    const details = { domain: ['Domain is required'] };
    const error = new ValidationError('Invalid', details);
    expect(error.details).toBe(details);
  });
});

describe('InvalidArgumentError', () => {
  it('should name the offending argument', () => {
    const error = new InvalidArgumentError('path', 'must start with "/"');

    expect(error.message).toBe('Invalid path: must start with "/"');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.argument).toBe('path');
    expect(error.statusCode).toBe(400);
  });
});

describe('ExternalServiceError', () => {
  it('should prefix the message with the service name', () => {
    const cause = new Error('socket hang up');
    const error = new ExternalServiceError('Freshsales', 'request failed', cause);

    expect(error.message).toBe('Freshsales error: request failed');
    expect(error.code).toBe('EXTERNAL_SERVICE_ERROR');
    expect(error.statusCode).toBe(502);
    expect(error.service).toBe('Freshsales');
    expect(error.originalError).toBe(cause);
  });
});

describe('RemoteRequestError', () => {
  it('should carry the remote status and body', () => {
    const error = new RemoteRequestError('Freshsales', 500, '{"errors":"boom"}', {
      method: 'GET',
      path: '/contacts/view/1',
    });

    expect(error.message).toBe('Freshsales error: GET /contacts/view/1 failed with status 500');
    expect(error.code).toBe('REMOTE_REQUEST_ERROR');
    expect(error.status).toBe(500);
    expect(error.body).toBe('{"errors":"boom"}');
    expect(error.method).toBe('GET');
    expect(error.path).toBe('/contacts/view/1');
    expect(error).toBeInstanceOf(ExternalServiceError);
  });
});

describe('NotFoundError', () => {
  it('should be a RemoteRequestError with status 404', () => {
    const error = new NotFoundError('Freshsales', '', { method: 'GET', path: '/contacts/9' });

    expect(error).toBeInstanceOf(RemoteRequestError);
    expect(error.name).toBe('NotFoundError');
    expect(error.status).toBe(404);
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('NOT_FOUND');
  });
});

describe('MalformedResponseError', () => {
  it('should describe the malformed payload', () => {
    const error = new MalformedResponseError('Freshsales', 'missing key "contact"');

    expect(error.message).toBe('Freshsales returned a malformed response: missing key "contact"');
    expect(error.code).toBe('MALFORMED_RESPONSE');
  });
});

describe('NotImplementedError', () => {
  it('should name the unsupported operation', () => {
    const error = new NotImplementedError('forget', 'tasks');

    expect(error.message).toBe('forget is not supported for tasks');
    expect(error.code).toBe('NOT_IMPLEMENTED');
    expect(error.operation).toBe('forget');
    expect(error.statusCode).toBe(501);
  });
});

describe('isOperationalError', () => {
  it('should return true for AppError subclasses', () => {
    expect(isOperationalError(new NotImplementedError('forget', 'notes'))).toBe(true);
  });

  it('should return false for plain errors', () => {
    expect(isOperationalError(new Error('boom'))).toBe(false);
    expect(isOperationalError('boom')).toBe(false);
  });
});

describe('toSafeErrorResponse', () => {
  it('should return safe details for operational errors', () => {
    const error = new MalformedResponseError('Freshsales', 'not JSON');

    expect(toSafeErrorResponse(error)).toEqual({
      code: 'MALFORMED_RESPONSE',
      message: 'Freshsales returned a malformed response: not JSON',
      statusCode: 502,
    });
  });

  it('should hide unexpected errors', () => {
    expect(toSafeErrorResponse(new TypeError('x is undefined'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
});
