import { Errors, isAwsServiceError } from '../shared/errors.js';
import { logger as baseLogger, type Logger } from '../observability/index.js';

/**
 * Run one AWS call and translate SDK service exceptions into McpErrors.
 * The AWS error code and message are logged here; the tool-level error log adds the tool name.
 */
export async function callAws<T>(
  operation: string,
  resource: string | undefined,
  fn: () => Promise<T>,
  log: Logger = baseLogger,
): Promise<T> {
  log.debug({ operation, resource, event: 'aws_call' }, `Calling ${operation}`);
  try {
    return await fn();
  } catch (error) {
    if (!isAwsServiceError(error)) {
      throw error;
    }
    log.error(
      {
        operation,
        resource,
        awsErrorCode: error.name,
        awsErrorMessage: error.message,
        httpStatusCode: error.$metadata.httpStatusCode,
        requestId: error.$metadata.requestId,
        event: 'aws_error',
      },
      `AWS ${operation} failed: ${error.name} - ${error.message}`,
    );
    throw Errors.awsServiceError(operation, error, resource);
  }
}
