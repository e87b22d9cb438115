/**
 * Trace service - X-Ray trace summaries and Transaction Search (CloudWatch Logs spans)
 */

import { callAws } from '../aws/aws-call.js';
import type { QueryResultsView, TraceSummaryView } from '../aws/monitoring-api.js';
import { Errors, toErrorEnvelope } from '../shared/errors.js';
import {
  parseIsoTimestamp,
  windowHours,
  type TimeWindow,
} from '../shared/time-range.js';
import type { ToolContext } from '../shared/tool-definition.js';

const HOUR_MS = 60 * 60 * 1000;
const ROOT_CAUSE_LIMIT = 3;
const USER_LIMIT = 2;
const KEPT_ANNOTATIONS = ['aws.local.operation', 'aws.remote.operation'] as const;
const TERMINAL_QUERY_STATUSES = new Set(['Complete', 'Failed', 'Cancelled']);

export interface TraceCollection {
  traces: TraceSummaryView[];
  /** More traces matched than were collected */
  truncated: boolean;
  /** A later page failed; `traces` holds what was collected before it */
  partial: boolean;
}

export interface TransactionSearchStatus {
  enabled: boolean;
  destination: string;
  status: string;
}

export interface SimplifiedTrace {
  Id?: string;
  Duration?: number;
  ResponseTime?: number;
  HasError?: boolean;
  HasFault?: boolean;
  HasThrottle?: boolean;
  Http: NonNullable<TraceSummaryView['Http']>;
  ErrorRootCauses?: unknown[];
  FaultRootCauses?: unknown[];
  ResponseTimeRootCauses?: unknown[];
  Annotations?: Record<string, unknown[]>;
  Users?: unknown[];
}

/**
 * Resolve optional ISO bounds into a window: end defaults to now, start to end minus the default window.
 * Windows longer than `maxTraceWindowHours` or ending before they start are rejected.
 */
export function resolveTraceWindow(
  context: ToolContext,
  startTime: string | undefined,
  endTime: string | undefined,
): TimeWindow {
  const end = endTime ? parseIsoTimestamp(endTime, 'end_time') : context.now();
  const start = startTime
    ? parseIsoTimestamp(startTime, 'start_time')
    : new Date(end.getTime() - context.config.defaultTraceWindowHours * HOUR_MS);

  const window = { startTime: start, endTime: end };
  const hours = windowHours(window);
  if (hours <= 0) {
    throw Errors.parameterInvalid('start_time', startTime, 'a timestamp earlier than end_time');
  }
  if (hours > context.config.maxTraceWindowHours) {
    context.logger.warn({ requestedHours: hours }, 'Trace time window too large');
    throw Errors.parameterInvalid(
      'start_time',
      startTime,
      `a time window of at most ${context.config.maxTraceWindowHours} hours (requested ${hours.toFixed(1)} hours)`,
    );
  }
  return window;
}

/**
 * Page through GetTraceSummaries until `limit` traces are collected.
 */
export async function collectTraceSummaries(
  context: ToolContext,
  window: TimeWindow,
  filterExpression: string | undefined,
  limit: number = context.config.maxTraces,
): Promise<TraceCollection> {
  const traces: TraceSummaryView[] = [];
  let nextToken: string | undefined;
  let partial = false;
  let pages = 0;

  do {
    try {
      const page = await callAws(
        'GetTraceSummaries',
        filterExpression,
        () =>
          context.api.getTraceSummaries({
            startTime: window.startTime,
            endTime: window.endTime,
            filterExpression,
            nextToken,
          }),
        context.logger,
      );
      pages += 1;
      traces.push(...page.items);
      nextToken = page.nextToken;
      context.logger.debug(
        { pageSize: page.items.length, total: traces.length },
        'Retrieved GetTraceSummaries page',
      );
    } catch (error) {
      if (pages === 0) {
        throw error;
      }
      context.logger.warn(
        { collected: traces.length, errorCode: toErrorEnvelope(error).error.code },
        'Trace pagination failed; returning traces collected so far',
      );
      partial = true;
      nextToken = undefined;
    }
  } while (nextToken && traces.length < limit);

  return {
    traces: traces.slice(0, limit),
    truncated: traces.length > limit || Boolean(nextToken),
    partial,
  };
}

export function simplifyTrace(trace: TraceSummaryView): SimplifiedTrace {
  const simplified: SimplifiedTrace = {
    Id: trace.Id,
    Duration: trace.Duration,
    ResponseTime: trace.ResponseTime,
    HasError: trace.HasError,
    HasFault: trace.HasFault,
    HasThrottle: trace.HasThrottle,
    Http: trace.Http ?? {},
  };

  if (trace.ErrorRootCauses?.length) {
    simplified.ErrorRootCauses = trace.ErrorRootCauses.slice(0, ROOT_CAUSE_LIMIT);
  }
  if (trace.FaultRootCauses?.length) {
    simplified.FaultRootCauses = trace.FaultRootCauses.slice(0, ROOT_CAUSE_LIMIT);
  }
  if (trace.ResponseTimeRootCauses?.length) {
    simplified.ResponseTimeRootCauses = trace.ResponseTimeRootCauses.slice(0, ROOT_CAUSE_LIMIT);
  }

  const annotations: Record<string, unknown[]> = {};
  for (const key of KEPT_ANNOTATIONS) {
    const value = trace.Annotations?.[key];
    if (value) annotations[key] = value;
  }
  if (Object.keys(annotations).length > 0) {
    simplified.Annotations = annotations;
  }

  if (trace.Users?.length) {
    simplified.Users = trace.Users.slice(0, USER_LIMIT);
  }

  return simplified;
}

/**
 * Transaction Search is on when segments go to CloudWatch Logs and the destination is ACTIVE.
 * Lookup failures are logged and reported as disabled.
 */
export async function checkTransactionSearch(context: ToolContext): Promise<TransactionSearchStatus> {
  try {
    const response = await callAws(
      'GetTraceSegmentDestination',
      undefined,
      () => context.api.getTraceSegmentDestination(),
      context.logger,
    );
    const destination = response.destination ?? 'Unknown';
    const status = response.status ?? 'Unknown';
    return {
      enabled: destination === 'CloudWatchLogs' && status === 'ACTIVE',
      destination,
      status,
    };
  } catch (error) {
    context.logger.warn(
      { errorCode: toErrorEnvelope(error).error.code },
      'Could not determine Transaction Search status',
    );
    return { enabled: false, destination: 'Unknown', status: 'Error' };
  }
}

export function formatTransactionSearchLines(status: TransactionSearchStatus): string[] {
  if (status.enabled) {
    return ['Transaction Search: ENABLED (100% trace visibility available)'];
  }
  return [
    'Transaction Search: NOT ENABLED (only sampled traces available)',
    `   Current config: Destination=${status.destination}, Status=${status.status}`,
    '   Enable Transaction Search for accurate root cause analysis',
  ];
}

export interface SpanQueryRequest {
  logGroupName: string;
  window: TimeWindow;
  queryString: string;
  limit?: number;
  timeoutMs: number;
}

export type SpanQueryOutcome =
  | { kind: 'finished'; queryId: string; results: QueryResultsView }
  | { kind: 'timeout'; queryId: string };

/**
 * Start a Logs Insights query and poll it until it reaches a terminal status or the timeout elapses.
 */
export async function runSpanQuery(
  context: ToolContext,
  request: SpanQueryRequest,
): Promise<SpanQueryOutcome> {
  const queryId = await callAws(
    'StartQuery',
    request.logGroupName,
    () =>
      context.api.startQuery({
        logGroupNames: [request.logGroupName],
        startTime: request.window.startTime,
        endTime: request.window.endTime,
        queryString: request.queryString,
        limit: request.limit,
      }),
    context.logger,
  );
  if (!queryId) {
    throw Errors.internal(`StartQuery on ${request.logGroupName}`);
  }
  context.logger.info({ queryId, logGroup: request.logGroupName }, 'Started CloudWatch Logs query');

  const interval = context.config.queryPollIntervalMs;
  let waited = 0;
  while (waited < request.timeoutMs) {
    const results = await callAws(
      'GetQueryResults',
      queryId,
      () => context.api.getQueryResults(queryId),
      context.logger,
    );
    if (results.status && TERMINAL_QUERY_STATUSES.has(results.status)) {
      context.logger.info({ queryId, status: results.status }, 'CloudWatch Logs query finished');
      return { kind: 'finished', queryId, results };
    }
    await context.sleep(interval);
    waited += interval;
  }

  context.logger.warn({ queryId, timeoutMs: request.timeoutMs }, 'CloudWatch Logs query polling timed out');
  return { kind: 'timeout', queryId };
}

export function toResultRows(results: QueryResultsView['results']): Record<string, string>[] {
  return (results ?? []).map((row) => {
    const record: Record<string, string> = {};
    for (const cell of row) {
      if (cell.field !== undefined) {
        record[cell.field] = cell.value ?? '';
      }
    }
    return record;
  });
}
