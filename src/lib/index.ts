// RFC 7807 Errors
export {
  ApiError,
  ValidationError,
  UnauthorizedError,
  NotFoundError,
  InternalError,
  type ProblemDetails,
  type FieldError,
} from './errors';

// Response helpers
export {
  sendData,
  sendPaginatedData,
  type ApiResponse,
  type ResponseMeta,
} from './response';

// Pagination
export {
  PAGINATION_DEFAULTS,
  PaginationQuerySchema,
  parsePagination,
  buildPaginationMeta,
  paginate,
  type PaginationQuery,
  type PaginationMeta,
} from './pagination';
