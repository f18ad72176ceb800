// ============================================================================
// RESPONSE UTILITIES
// ============================================================================

import { AppError, MethodNotAllowedError } from './errors.ts';

/**
 * Standard JSON response
 */
export function jsonResponse<T>(
  data: T,
  status: number = 200,
  headers: Headers = new Headers()
): Response {
  headers.set('Content-Type', 'application/json');

  return new Response(JSON.stringify(data), {
    status,
    headers,
  });
}

/**
 * No content response (204)
 */
export function noContentResponse(headers: Headers = new Headers()): Response {
  return new Response(null, { status: 204, headers });
}

/**
 * Error response from AppError
 */
export function errorResponse(
  error: AppError,
  requestId: string,
  headers: Headers = new Headers()
): Response {
  if (error instanceof MethodNotAllowedError) {
    const allowed = error.details?.allowed;
    if (Array.isArray(allowed)) {
      headers.set('Allow', allowed.join(', '));
    }
  }

  const details = error.details ?? {};

  return jsonResponse({
    error: {
      code: error.code,
      message: error.message,
      ...details,
    },
    request_id: requestId,
    timestamp: new Date().toISOString(),
  }, error.statusCode, headers);
}

/**
 * Internal error response (500) - hides implementation details
 */
export function internalErrorResponse(requestId: string, headers: Headers = new Headers()): Response {
  return jsonResponse({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again or contact support.',
      details: {
        support_reference: 'Contact support with request_id',
      },
    },
    request_id: requestId,
    timestamp: new Date().toISOString(),
  }, 500, headers);
}
