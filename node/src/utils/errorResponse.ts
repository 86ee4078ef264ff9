/**
 * Standard response envelopes for the JSON API.
 */

export interface ErrorResponse<T = never> {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
  code?: string;
  /** Partial result that still carries timing / metrics for a failed run. */
  data?: T;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse<T = never>(
  message: string,
  options: { errors?: Array<{ path: string; message: string }>; code?: string; data?: T } = {},
): ErrorResponse<T> {
  const { errors, code, data } = options;
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 ? { errors } : {}),
    ...(code ? { code } : {}),
    ...(data !== undefined ? { data } : {}),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}
