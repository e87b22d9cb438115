/**
 * Observability module - exports logging, metrics and tool instrumentation
 */

export {
  logger,
  getToolLogger,
  logToolStart,
  logToolEnd,
  logToolError,
  resolveLogLevel,
} from './logger.js';

export type { Logger, LogLevel } from './logger.js';

export {
  metrics,
  instrumentTool,
} from './metrics.js';

export type { ToolMetrics, ErrorMetrics } from './metrics.js';
