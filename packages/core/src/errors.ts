/**
 * Custom error classes for the client
 * These errors carry safe, credential-free messages
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid configuration
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Malformed call input (bad path, empty id, negative limit)
 */
export class InvalidArgumentError extends AppError {
  public readonly argument: string;

  constructor(argument: string, message: string) {
    super(`Invalid ${argument}: ${message}`, 'INVALID_ARGUMENT', 400);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * External service error (transport failure, timeout)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(
    service: string,
    message: string,
    originalError?: Error,
    code = 'EXTERNAL_SERVICE_ERROR',
    statusCode = 502
  ) {
    super(`${service} error: ${message}`, code, statusCode);
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

export interface RemoteRequestInfo {
  method: string;
  path: string;
}

/**
 * Non-2xx response from a remote API.
 * `status` is the remote HTTP status, `body` the raw response text.
 */
export class RemoteRequestError extends ExternalServiceError {
  public readonly status: number;
  public readonly body: string;
  public readonly method: string;
  public readonly path: string;

  constructor(
    service: string,
    status: number,
    body: string,
    request: RemoteRequestInfo,
    code = 'REMOTE_REQUEST_ERROR',
    statusCode = 502
  ) {
    super(
      service,
      `${request.method} ${request.path} failed with status ${status}`,
      undefined,
      code,
      statusCode
    );
    this.name = 'RemoteRequestError';
    this.status = status;
    this.body = body;
    this.method = request.method;
    this.path = request.path;
  }
}

/**
 * Remote API reported 404
 */
export class NotFoundError extends RemoteRequestError {
  constructor(service: string, body: string, request: RemoteRequestInfo) {
    super(service, 404, body, request, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Response body is not valid JSON or lacks an expected key
 */
export class MalformedResponseError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string) {
    super(`${service} returned a malformed response: ${message}`, 'MALFORMED_RESPONSE', 502);
    this.name = 'MalformedResponseError';
    this.service = service;
  }
}

/**
 * Operation not supported for this resource kind
 */
export class NotImplementedError extends AppError {
  public readonly operation: string;

  constructor(operation: string, resource: string) {
    super(`${operation} is not supported for ${resource}`, 'NOT_IMPLEMENTED', 501);
    this.name = 'NotImplementedError';
    this.operation = operation;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
