/**
 * API Response Types
 *
 * Success and error bodies share `meta` and differ on the `success`
 * literal.
 */

/**
 * Response metadata included in all API responses.
 * request_id echoes X-Request-Id so callers can correlate logs.
 */
export interface ResponseMeta {
  timestamp: string;
  request_id: string;
  [key: string]: unknown;
}

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  meta: ResponseMeta;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
  meta: ResponseMeta;
}
