import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { DocumentParseError } from '../document/errors.js';
import { OrderIdMissingError, OrderNotFoundError, OrdersFileError } from '../orders/errors.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'NOT_FOUND' | 'UNPROCESSABLE' | 'RATE_LIMITED' | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Strip file paths and email addresses from a message bound for a client
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

function readStatusCode(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function readErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Convert any error to ErrorV1 (never leaks stack or paths)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request?.id;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof DocumentParseError) {
    return buildErrorV1(
      'UNPROCESSABLE',
      error.message,
      { line: error.line, column: error.column },
      requestId
    );
  }

  if (error instanceof OrderNotFoundError) {
    return buildErrorV1('NOT_FOUND', error.message, { order_id: error.orderId }, requestId);
  }

  if (error instanceof OrderIdMissingError) {
    return buildErrorV1('UNPROCESSABLE', error.message, undefined, requestId);
  }

  if (error instanceof OrdersFileError) {
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(error.message), { reason: error.reason }, requestId);
  }

  if (error instanceof Error) {
    const statusCode = readStatusCode(error);

    if (statusCode === 429) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
    }

    if (readErrorCode(error) === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
    }

    // Fastify validation and content-type errors carry a 4xx status
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeErrorMessage(error.message), undefined, requestId);
    }

    const message = sanitizeErrorMessage(error.message || 'An unexpected error occurred');
    return buildErrorV1('INTERNAL', message, undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'UNPROCESSABLE':
      return 422;
    case 'RATE_LIMITED':
      return 429;
    case 'INTERNAL':
    default:
      return 500;
  }
}
