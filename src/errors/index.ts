export {
  ApiError,
  ErrorCodes,
  RateLimitError,
  InternalError,
  PolicyNotFoundError,
  ConfigurationError,
  ServiceUnavailableError,
  StoreUnavailableError,
} from './ApiError';
export type { ApiErrorResponse, ErrorCode } from './ApiError';
