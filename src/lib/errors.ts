/**
 * RFC 7807 Problem Details for HTTP APIs
 * https://datatracker.ietf.org/doc/html/rfc7807
 */

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  traceId?: string;
  errors?: FieldError[];
}

export interface FieldError {
  field: string;
  code: string;
  message: string;
}

export const ERROR_BASE_URL = '/errors';

export interface ApiErrorOptions {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  errors?: FieldError[];
}

/**
 * Base class for RFC 7807 compliant errors
 */
export class ApiError extends Error {
  public readonly type: string;
  public readonly title: string;
  public readonly status: number;
  public readonly detail?: string;
  public readonly instance?: string;
  public readonly errors?: FieldError[];

  constructor(options: ApiErrorOptions) {
    super(options.detail || options.title);
    this.type = `${ERROR_BASE_URL}/${options.type}`;
    this.title = options.title;
    this.status = options.status;
    this.detail = options.detail;
    this.instance = options.instance;
    this.errors = options.errors;
    this.name = 'ApiError';
    Error.captureStackTrace(this, this.constructor);
  }

  toProblemDetails(traceId?: string): ProblemDetails {
    const problem: ProblemDetails = {
      type: this.type,
      title: this.title,
      status: this.status,
    };

    if (this.detail) problem.detail = this.detail;
    if (this.instance) problem.instance = this.instance;
    if (traceId) problem.traceId = traceId;
    if (this.errors?.length) problem.errors = this.errors;

    return problem;
  }
}

/**
 * 400 - Validation Error (with field-level errors)
 */
export class ValidationError extends ApiError {
  constructor(detail: string, errors: FieldError[]) {
    super({
      type: 'validation-error',
      title: 'Validation Error',
      status: 400,
      detail,
      errors,
    });
    this.name = 'ValidationError';
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors: FieldError[] = zodError.errors.map((e) => ({
      field: e.path.join('.'),
      code: 'invalid',
      message: e.message,
    }));
    return new ValidationError('Invalid request data', errors);
  }
}

/**
 * 401 - Unauthorized
 */
export class UnauthorizedError extends ApiError {
  constructor(detail = 'Authentication required') {
    super({
      type: 'unauthorized',
      title: 'Unauthorized',
      status: 401,
      detail,
    });
    this.name = 'UnauthorizedError';
  }
}

/**
 * 404 - Not Found
 */
export class NotFoundError extends ApiError {
  constructor(detail = 'The requested resource was not found') {
    super({
      type: 'not-found',
      title: 'Not Found',
      status: 404,
      detail,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * 500 - Internal Server Error
 */
export class InternalError extends ApiError {
  constructor(detail = 'An unexpected error occurred') {
    super({
      type: 'internal-error',
      title: 'Internal Server Error',
      status: 500,
      detail,
    });
    this.name = 'InternalError';
  }
}
