export default class ApiError extends Error {
  public statusCode: number;

  public details?: unknown;

  public code?: string;

  constructor(statusCode: number, message: string, details?: unknown, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }

  /** The one domain error: `<resource> not found`, rendered as 404. */
  static notFound(resource: string): ApiError {
    return new ApiError(404, `${resource} not found`, undefined, 'NOT_FOUND');
  }

  static validation(details: unknown): ApiError {
    return new ApiError(422, 'Request validation failed', details, 'VALIDATION_FAILED');
  }
}
