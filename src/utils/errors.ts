/**
 * Error taxonomy shared by the three services.
 *
 * Categories:
 * - replay/forgery (INVALID_TOKEN; a replayed login state is the state_mismatch reason code)
 * - expiry (reported to callers as INVALID_TOKEN; distinguished in logs only)
 * - upstream failure (UPSTREAM_FAILURE)
 * - malformed input (MISSING_PARAMETER, MISSING_TOKEN)
 * - configuration fatal (CONFIGURATION_ERROR), the only one that aborts startup
 */

export interface SecurityErrorShape {
  code: string;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

export class SecurityError extends Error implements SecurityErrorShape {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SecurityError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SecurityError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createSecurityError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): SecurityError {
  return new SecurityError(code, message, statusCode, details);
}

export const SecurityErrors = {
  MISSING_TOKEN: () =>
    createSecurityError('MISSING_TOKEN', 'Missing or invalid token', 401),

  INVALID_TOKEN: () =>
    createSecurityError('INVALID_TOKEN', 'Invalid or expired token', 401),

  INSUFFICIENT_ROLE: (requiredRole: string) =>
    createSecurityError('INSUFFICIENT_ROLE', `${capitalize(requiredRole)} access required`, 403),

  MISSING_PARAMETER: (name: string) =>
    createSecurityError('MISSING_PARAMETER', `${capitalize(name)} required`, 400),

  UPSTREAM_FAILURE: (service: string, details?: Record<string, unknown>) =>
    createSecurityError('UPSTREAM_FAILURE', `${service} unavailable`, 503, details),

  CONFIGURATION_ERROR: (message: string) =>
    createSecurityError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof SecurityError) {
    return {
      type: 'SecurityError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: SecurityErrorShape): {
  statusCode: number;
  body: { error: string; code: string };
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: error.message,
      code: error.code,
    },
  };
}
