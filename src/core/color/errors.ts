/**
 * Gradient Errors
 * Typed failures raised synchronously by the gradient core
 */

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes
 */
export enum GradientErrorCode {
  INVALID_PARAMETER = "INVALID_PARAMETER",
  UNSUPPORTED_COLOR_FORMAT = "UNSUPPORTED_COLOR_FORMAT",
}

/**
 * Gradient computation errors
 */
export class GradientError extends Error {
  constructor(
    message: string,
    public code: GradientErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = "GradientError";
  }
}

/**
 * Check whether a value is a GradientError, optionally with a given code
 */
export function isGradientError(value: unknown, code?: GradientErrorCode): value is GradientError {
  return value instanceof GradientError && (code === undefined || value.code === code);
}

export function invalidParameter(message: string, details?: unknown): GradientError {
  return new GradientError(message, GradientErrorCode.INVALID_PARAMETER, details);
}

export function unsupportedColorFormat(message: string, details?: unknown): GradientError {
  return new GradientError(message, GradientErrorCode.UNSUPPORTED_COLOR_FORMAT, details);
}
