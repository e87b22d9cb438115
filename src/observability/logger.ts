/**
 * Logger module - structured logging using pino
 */

import pino from 'pino';

/**
 * IMPORTANT: the MCP stdio transport owns stdout, so every log line goes to stderr (fd 2).
 */
const STDERR_FD = 2;

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LEVELS)[number];

/**
 * Normalize DEBUG / Info / "warning" style values to a pino level, falling back to info
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  if (!value) return 'info';
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  const match = LEVELS.find((level) => level === normalized);
  return match ?? 'info';
}

function createLogger(): pino.Logger {
  const level = resolveLogLevel(process.env.MCP_APPSIGNALS_LOG_LEVEL ?? process.env.LOG_LEVEL);

  if (process.env.PRETTY_LOGS === 'true') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino({ level }, pino.destination({ dest: STDERR_FD, sync: false }));
}

export const logger = createLogger();

/**
 * Create a child logger for a specific tool
 */
export function getToolLogger(toolName: string, base: pino.Logger = logger): pino.Logger {
  return base.child({ tool: toolName });
}

export function logToolStart(
  toolName: string,
  params?: unknown,
  base: pino.Logger = logger
): void {
  getToolLogger(toolName, base).info({ params, event: 'tool_start' }, `Starting ${toolName}`);
}

export function logToolEnd(
  toolName: string,
  durationMs: number,
  success: boolean,
  base: pino.Logger = logger
): void {
  getToolLogger(toolName, base).info(
    { durationMs, success, event: 'tool_end' },
    `Completed ${toolName} in ${durationMs}ms`
  );
}

/**
 * Log tool execution error. Errors carrying a code (McpError) log it, AWS details included.
 */
export function logToolError(
  toolName: string,
  error: unknown,
  durationMs?: number,
  base: pino.Logger = logger
): void {
  const toolLogger = getToolLogger(toolName, base);
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorCode = readStringField(error, 'code');
  const awsErrorCode = readAwsErrorCode(error);

  if (errorCode === undefined) {
    // Unexpected failure: keep the stack for whoever reads the logs
    toolLogger.error(
      { err: error, durationMs, event: 'tool_error' },
      `Unexpected error in ${toolName}: ${errorMessage}`
    );
    return;
  }

  toolLogger.error(
    { error: errorMessage, errorCode, awsErrorCode, durationMs, event: 'tool_error' },
    `Error in ${toolName}: ${errorMessage}`
  );
}

function readStringField(value: unknown, field: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(field in value)) return undefined;
  const fieldValue: unknown = Reflect.get(value, field);
  return typeof fieldValue === 'string' ? fieldValue : undefined;
}

function readAwsErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('details' in error)) return undefined;
  return readStringField(error.details, 'awsErrorCode');
}

export type { Logger } from 'pino';
