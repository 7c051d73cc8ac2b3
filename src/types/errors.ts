/**
 * Error taxonomy for MCP operations.
 *
 * Provides machine-readable error codes that help LLMs
 * understand failures and take appropriate action.
 */

/** Enumeration of all error types in the system. */
export enum ErrorCode {
  /** Malformed identifier or missing/invalid argument. */
  INVALID_INPUT = 'INVALID_INPUT',
  /** Server, channel, user or message is absent or inaccessible. */
  NOT_FOUND = 'NOT_FOUND',
  /** Several entities match equally well; the caller must be more specific. */
  AMBIGUOUS = 'AMBIGUOUS',
  /** Discord refused the action for lack of permission. */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** Rate limited by Discord. */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Discord rejected the operation. */
  API_ERROR = 'API_ERROR',
  /** Network or connection error. */
  NETWORK_ERROR = 'NETWORK_ERROR',
  /** Operation timed out. */
  TIMEOUT = 'TIMEOUT',
  /** The gateway connection is not ready yet. */
  NOT_READY = 'NOT_READY',
  /** An internal invariant was violated. */
  INTERNAL = 'INTERNAL',
  /** Unknown or unexpected error. */
  UNKNOWN = 'UNKNOWN',
}

/** Structured error with machine-readable information. */
export interface McpError {
  /** Machine-readable error code. */
  code: ErrorCode;
  /** Human-readable error message. */
  message: string;
  /** Whether this error is potentially transient and retryable. */
  retryable: boolean;
  /** Suggestions for resolving the error (for LLMs). */
  suggestions: string[];
  /** Every matching entity, for AMBIGUOUS errors. */
  candidates?: string[];
}

/**
 * Creates a standardised MCP error.
 */
export function createError(
  code: ErrorCode,
  message: string,
  options: {
    retryable?: boolean;
    suggestions?: string[];
    candidates?: string[];
  } = {}
): McpError {
  const error: McpError = {
    code,
    message,
    retryable: options.retryable ?? isRetryableByDefault(code),
    suggestions: options.suggestions ?? getDefaultSuggestions(code),
  };
  if (options.candidates) {
    error.candidates = options.candidates;
  }
  return error;
}

/**
 * Returns default suggestions for each error code.
 */
function getDefaultSuggestions(code: ErrorCode): string[] {
  switch (code) {
    case ErrorCode.INVALID_INPUT:
      return ['Check the input parameters', 'Review the tool documentation'];
    case ErrorCode.NOT_FOUND:
      return [
        'Use the exact name, or the ID',
        'Use list_servers or list_channels to see what is available',
      ];
    case ErrorCode.AMBIGUOUS:
      return [
        'Resupply the request as ServerName/channel',
        'Or use the channel ID from list_channels',
      ];
    case ErrorCode.PERMISSION_DENIED:
      return ['Check that the bot has permission for this action in the channel'];
    case ErrorCode.RATE_LIMITED:
      return ['Wait before retrying', 'Reduce request frequency'];
    case ErrorCode.API_ERROR:
      return ['Check the Discord error text', 'Retry the request'];
    case ErrorCode.NETWORK_ERROR:
      return ['Check network connectivity', 'Retry the request'];
    case ErrorCode.TIMEOUT:
      return ['Retry the request', 'Use a smaller limit'];
    case ErrorCode.NOT_READY:
      return ['Wait for the bot to finish connecting, then retry'];
    case ErrorCode.INTERNAL:
      return ['Use the ID instead of the name'];
    case ErrorCode.UNKNOWN:
      return ['Retry the request', 'Use IDs instead of names'];
  }
}

/**
 * Determines if an error code is retryable by default.
 */
function isRetryableByDefault(code: ErrorCode): boolean {
  switch (code) {
    case ErrorCode.RATE_LIMITED:
    case ErrorCode.NETWORK_ERROR:
    case ErrorCode.TIMEOUT:
    case ErrorCode.API_ERROR:
    case ErrorCode.NOT_READY:
      return true;
    default:
      return false;
  }
}

/**
 * Classifies an HTTP status code into an error code.
 */
export function classifyHttpError(status: number, message?: string): ErrorCode {
  switch (status) {
    case 401:
    case 403:
      return ErrorCode.PERMISSION_DENIED;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 429:
      return ErrorCode.RATE_LIMITED;
    case 400:
    case 422:
      return ErrorCode.INVALID_INPUT;
    default:
      if (status >= 500) return ErrorCode.API_ERROR;
      if (message?.includes('timeout')) return ErrorCode.TIMEOUT;
      if (message?.includes('network') || message?.includes('ECONNRESET')) {
        return ErrorCode.NETWORK_ERROR;
      }
      return ErrorCode.UNKNOWN;
  }
}
