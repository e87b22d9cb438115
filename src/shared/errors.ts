/**
 * Error handling module - error envelope, error codes and AWS error translation
 */

/**
 * Error codes surfaced to the MCP host
 */
export enum ErrorCode {
  // Configuration errors
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Request errors
  UNKNOWN_TOOL = 'UNKNOWN_TOOL',
  INVALID_PARAMETER = 'INVALID_PARAMETER',

  // Lookup errors raised by handlers
  SERVICE_NOT_FOUND = 'SERVICE_NOT_FOUND',
  METRIC_NOT_FOUND = 'METRIC_NOT_FOUND',
  SLO_NOT_FOUND = 'SLO_NOT_FOUND',

  // AWS service errors
  AWS_RESOURCE_NOT_FOUND = 'AWS_RESOURCE_NOT_FOUND',
  AWS_THROTTLED = 'AWS_THROTTLED',
  AWS_ACCESS_DENIED = 'AWS_ACCESS_DENIED',
  AWS_SERVICE_ERROR = 'AWS_SERVICE_ERROR',

  // Everything else
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error details - additional context for the error
 */
export type ErrorDetails = Record<string, unknown>;

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
  };
}

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Result type - either success with data or error envelope
 */
export type Result<T> = SuccessResult<T> | ErrorEnvelope;

export function isError<T>(result: Result<T>): result is ErrorEnvelope {
  return 'error' in result;
}

export function isSuccess<T>(result: Result<T>): result is SuccessResult<T> {
  return 'success' in result && result.success === true;
}

/**
 * Custom error class that carries error code and details
 */
export class McpError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, McpError);
    }
  }

  toEnvelope(): ErrorEnvelope {
    return createErrorEnvelope(this.code, this.message, this.details);
  }
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: ErrorDetails
): ErrorEnvelope {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
    },
  };

  if (details && Object.keys(details).length > 0) {
    envelope.error.details = details;
  }

  return envelope;
}

export function createSuccess<T>(data: T): SuccessResult<T> {
  return {
    success: true,
    data,
  };
}

/**
 * Shape of the exceptions thrown by AWS SDK v3 clients.
 * Every service exception carries `$fault` and `$metadata` next to the usual `name` / `message`.
 */
export interface AwsServiceErrorLike extends Error {
  $fault: 'client' | 'server';
  $metadata: {
    httpStatusCode?: number;
    requestId?: string;
  };
}

export function isAwsServiceError(error: unknown): error is AwsServiceErrorLike {
  if (!(error instanceof Error)) return false;
  if (!('$fault' in error) || !('$metadata' in error)) return false;
  return typeof error.$metadata === 'object' && error.$metadata !== null;
}

const THROTTLING_CODES = new Set([
  'ThrottlingException',
  'ThrottledException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'LimitExceededException',
]);

const ACCESS_DENIED_CODES = new Set([
  'AccessDeniedException',
  'AccessDenied',
  'UnauthorizedOperation',
  'UnrecognizedClientException',
  'ExpiredTokenException',
]);

/**
 * Map an AWS error name onto the error code surfaced to the host
 */
export function classifyAwsErrorCode(awsErrorCode: string): ErrorCode {
  if (awsErrorCode === 'ResourceNotFoundException') return ErrorCode.AWS_RESOURCE_NOT_FOUND;
  if (THROTTLING_CODES.has(awsErrorCode)) return ErrorCode.AWS_THROTTLED;
  if (ACCESS_DENIED_CODES.has(awsErrorCode)) return ErrorCode.AWS_ACCESS_DENIED;
  return ErrorCode.AWS_SERVICE_ERROR;
}

/**
 * Wrap a function to catch errors and convert to error envelope.
 * Anything that is not an McpError is reported generically; callers log the original.
 */
export async function wrapWithErrorHandling<T>(
  fn: () => Promise<T>,
  context = 'request'
): Promise<Result<T>> {
  try {
    const data = await fn();
    return createSuccess(data);
  } catch (error) {
    return toErrorEnvelope(error, context);
  }
}

export function toErrorEnvelope(error: unknown, context = 'request'): ErrorEnvelope {
  if (error instanceof McpError) {
    return error.toEnvelope();
  }
  return Errors.internal(context).toEnvelope();
}

/**
 * Helper to throw common errors
 */
export const Errors = {
  configNotFound: (path?: string) =>
    new McpError(ErrorCode.CONFIG_NOT_FOUND, 'Configuration file not found', { path }),

  configInvalid: (reason: string, path?: string) =>
    new McpError(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${reason}`, path ? { path } : undefined),

  unknownTool: (toolName: string, availableTools: string[]) =>
    new McpError(ErrorCode.UNKNOWN_TOOL, `Unknown tool "${toolName}"`, {
      tool: toolName,
      availableTools,
    }),

  serviceNotFound: (serviceName: string) =>
    new McpError(
      ErrorCode.SERVICE_NOT_FOUND,
      `Service "${serviceName}" not found in Application Signals`,
      { serviceName }
    ),

  metricNotFound: (serviceName: string, metricName: string, available: string[]) =>
    new McpError(
      ErrorCode.METRIC_NOT_FOUND,
      `Metric "${metricName}" not found for service "${serviceName}". Available: ${available.join(', ')}`,
      { serviceName, metricName, available }
    ),

  sloNotFound: (sloId: string) =>
    new McpError(ErrorCode.SLO_NOT_FOUND, `No SLO found with ID "${sloId}"`, { sloId }),

  awsServiceError: (operation: string, error: AwsServiceErrorLike, resource?: string) => {
    const awsErrorCode = error.name;
    const target = resource ? ` for "${resource}"` : '';
    return new McpError(
      classifyAwsErrorCode(awsErrorCode),
      `AWS ${operation} failed${target}: ${awsErrorCode} - ${error.message}`,
      {
        awsErrorCode,
        operation,
        resource,
        httpStatusCode: error.$metadata.httpStatusCode,
        requestId: error.$metadata.requestId,
      }
    );
  },

  internal: (context: string) =>
    new McpError(ErrorCode.INTERNAL_ERROR, `Internal error while handling ${context}`),

  parameterMissing: (paramName: string, expectedType: string, examples?: string[]) =>
    new McpError(
      ErrorCode.INVALID_PARAMETER,
      `Missing required parameter "${paramName}". Expected: ${expectedType}`,
      {
        parameter: paramName,
        expectedType,
        examples: examples ?? [],
        hint: `Provide ${paramName} as a ${expectedType}`,
      }
    ),

  parameterInvalid: (
    paramName: string,
    receivedValue: unknown,
    expectedFormat: string,
    examples?: string[]
  ) =>
    new McpError(
      ErrorCode.INVALID_PARAMETER,
      `Invalid value for parameter "${paramName}": expected ${expectedFormat}`,
      {
        parameter: paramName,
        received: typeof receivedValue,
        receivedValue: receivedValue === undefined ? 'undefined' : String(receivedValue).slice(0, 100),
        expectedFormat,
        examples: examples ?? [],
      }
    ),
};
