// ============================================================================
// APPLICATION ERRORS
// ============================================================================

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'UNPROCESSABLE_TASK'
  | 'INTERNAL_ERROR';

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly errors: Array<{ field: string; message: string; code: string }>
  ) {
    super('VALIDATION_ERROR', message, 400, { errors });
    this.name = 'ValidationError';
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string, allowed: string[]) {
    super('METHOD_NOT_ALLOWED', `Method ${method} not allowed`, 405, { allowed });
    this.name = 'MethodNotAllowedError';
  }
}

/**
 * Task definition cannot be run as loaded (schema or formula problem)
 */
export class UnprocessableTaskError extends AppError {
  constructor(message: string, task?: string | null, metric?: string | null) {
    super('UNPROCESSABLE_TASK', message, 422, {
      ...(task ? { task } : {}),
      ...(metric ? { metric } : {}),
    });
    this.name = 'UnprocessableTaskError';
  }
}
