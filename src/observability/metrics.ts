/**
 * Metrics module - in-memory counters and timers per tool
 */

import { logger, logToolEnd, logToolError, logToolStart } from './logger.js';
import type { Logger } from './logger.js';

export interface ToolMetrics {
  callCount: number;
  errorCount: number;
  totalDurationMs: number;
  lastCallTimestamp?: number;
  minDurationMs?: number;
  maxDurationMs?: number;
}

export interface ErrorMetrics {
  count: number;
  lastOccurrence?: number;
}

class MetricsStore {
  private toolMetrics: Map<string, ToolMetrics> = new Map();
  private errorMetrics: Map<string, ErrorMetrics> = new Map();

  recordToolCall(toolName: string, durationMs: number, success: boolean): void {
    const existing = this.toolMetrics.get(toolName) ?? {
      callCount: 0,
      errorCount: 0,
      totalDurationMs: 0,
    };

    existing.callCount++;
    existing.totalDurationMs += durationMs;
    existing.lastCallTimestamp = Date.now();

    if (existing.minDurationMs === undefined || durationMs < existing.minDurationMs) {
      existing.minDurationMs = durationMs;
    }
    if (existing.maxDurationMs === undefined || durationMs > existing.maxDurationMs) {
      existing.maxDurationMs = durationMs;
    }

    if (!success) {
      existing.errorCount++;
    }

    this.toolMetrics.set(toolName, existing);
  }

  /**
   * Record an error by error code
   */
  recordError(errorCode: string): void {
    const existing = this.errorMetrics.get(errorCode) ?? { count: 0 };
    existing.count++;
    existing.lastOccurrence = Date.now();
    this.errorMetrics.set(errorCode, existing);
  }

  getToolMetrics(toolName: string): ToolMetrics | undefined {
    return this.toolMetrics.get(toolName);
  }

  getAllToolMetrics(): Map<string, ToolMetrics> {
    return new Map(this.toolMetrics);
  }

  getErrorMetrics(errorCode: string): ErrorMetrics | undefined {
    return this.errorMetrics.get(errorCode);
  }

  getAllErrorMetrics(): Map<string, ErrorMetrics> {
    return new Map(this.errorMetrics);
  }

  getSummary(): {
    totalCalls: number;
    totalErrors: number;
    toolCount: number;
    avgDurationMs: number;
  } {
    let totalCalls = 0;
    let totalErrors = 0;
    let totalDuration = 0;

    for (const toolMetrics of this.toolMetrics.values()) {
      totalCalls += toolMetrics.callCount;
      totalErrors += toolMetrics.errorCount;
      totalDuration += toolMetrics.totalDurationMs;
    }

    return {
      totalCalls,
      totalErrors,
      toolCount: this.toolMetrics.size,
      avgDurationMs: totalCalls > 0 ? totalDuration / totalCalls : 0,
    };
  }

  reset(): void {
    this.toolMetrics.clear();
    this.errorMetrics.clear();
  }

  /**
   * Log current metrics summary (debug level)
   */
  logSummary(): void {
    logger.debug({ event: 'metrics_summary', ...this.getSummary() }, 'Metrics summary');

    for (const [tool, toolMetrics] of this.toolMetrics) {
      const avgDuration =
        toolMetrics.callCount > 0 ? toolMetrics.totalDurationMs / toolMetrics.callCount : 0;
      logger.debug(
        {
          event: 'tool_metrics',
          tool,
          calls: toolMetrics.callCount,
          errors: toolMetrics.errorCount,
          avgDurationMs: avgDuration.toFixed(2),
          minDurationMs: toolMetrics.minDurationMs,
          maxDurationMs: toolMetrics.maxDurationMs,
        },
        `Tool metrics: ${tool}`
      );
    }
  }
}

export const metrics = new MetricsStore();

function elapsedSince(startTime: number): number {
  return Math.max(0, Math.round(performance.now() - startTime));
}

function errorCodeOf(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Run one tool invocation with start/end logging, error logging and metrics.
 * The duration is taken in `finally`, so failed calls are timed too.
 */
export async function instrumentTool<TResult>(
  toolName: string,
  params: unknown,
  run: () => Promise<TResult>,
  base: Logger = logger
): Promise<TResult> {
  const startTime = performance.now();
  let success = true;
  logToolStart(toolName, params, base);

  try {
    return await run();
  } catch (error) {
    success = false;
    const code = errorCodeOf(error);
    metrics.recordError(code ?? 'UNEXPECTED');
    logToolError(toolName, error, elapsedSince(startTime), base);
    throw error;
  } finally {
    const durationMs = elapsedSince(startTime);
    metrics.recordToolCall(toolName, durationMs, success);
    logToolEnd(toolName, durationMs, success, base);
  }
}
