import { v4 as uuidv4 } from 'uuid';

export type ErrorCode =
  | 'invalid_request'
  | 'rate_limited'
  | 'not_found'
  | 'internal_error';

export interface ApiError {
  error: {
    code: ErrorCode;
    message: string;
    trace_id: string;
    retry_after?: number;
    issues?: string[];
  };
}

export function createApiError(
  code: ErrorCode,
  message: string,
  retryAfter?: number,
  issues?: string[]
): ApiError {
  const error: ApiError = {
    error: {
      code,
      message,
      trace_id: uuidv4(),
    },
  };
  if (retryAfter !== undefined) {
    error.error.retry_after = retryAfter;
  }
  if (issues && issues.length > 0) {
    error.error.issues = issues;
  }
  return error;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly traceId: string;
  public readonly retryAfter?: number;
  public readonly issues?: string[];

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number,
    retryAfter?: number,
    issues?: string[]
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.traceId = uuidv4();
    this.retryAfter = retryAfter;
    this.issues = issues;
  }

  toJSON(): ApiError {
    const body = createApiError(this.code, this.message, this.retryAfter, this.issues);
    body.error.trace_id = this.traceId;
    return body;
  }
}

// Predefined errors
export function invalidRequest(message: string, issues?: string[]): AppError {
  return new AppError('invalid_request', message, 400, undefined, issues);
}

export function rateLimited(retryAfter: number): AppError {
  return new AppError(
    'rate_limited',
    'Too many requests. Please try again later.',
    429,
    retryAfter
  );
}

export function notFound(path: string): AppError {
  return new AppError('not_found', `No route for ${path}`, 404);
}

export function internalError(message = 'An internal error occurred.'): AppError {
  return new AppError('internal_error', message, 500);
}
