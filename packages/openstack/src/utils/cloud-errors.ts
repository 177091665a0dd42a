/**
 * Shared error handling for cloud client implementations.
 */

/**
 * Standard error types that all cloud clients report
 */
export enum CloudErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  CONFLICT = "CONFLICT",
  QUOTA_EXCEEDED = "QUOTA_EXCEEDED",
  NETWORK = "NETWORK",
  UNKNOWN = "UNKNOWN",
}

/**
 * Structured error for cloud API operations
 */
export class CloudApiError extends Error {
  constructor(
    message: string,
    public readonly type: CloudErrorType,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "CloudApiError";
  }
}

/**
 * Map an HTTP status code onto an error type
 */
export function errorTypeForStatus(statusCode: number): CloudErrorType {
  switch (statusCode) {
    case 401:
      return CloudErrorType.AUTHENTICATION;
    case 403:
      return CloudErrorType.AUTHORIZATION;
    case 404:
      return CloudErrorType.NOT_FOUND;
    case 409:
      return CloudErrorType.CONFLICT;
    case 413:
    case 429:
      return CloudErrorType.QUOTA_EXCEEDED;
    default:
      return CloudErrorType.UNKNOWN;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof CloudApiError && error.type === CloudErrorType.NOT_FOUND;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
