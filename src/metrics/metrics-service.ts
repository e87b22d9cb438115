/**
 * Metrics service - CloudWatch queries over the metric references Application Signals reports
 */

import { callAws } from '../aws/aws-call.js';
import type {
  MetricDataResultView,
  MetricQuery,
  MetricReferenceView,
  ServiceView,
} from '../aws/monitoring-api.js';
import { formatNumber } from '../shared/format.js';
import {
  formatShortTimestamp,
  selectMetricPeriod,
  type TimeWindow,
} from '../shared/time-range.js';
import type { ToolContext } from '../shared/tool-definition.js';

export const RECENT_VALUE_COUNT = 10;

/** Metric names Application Signals emits for every service */
export const KEY_METRIC_NAMES = ['Latency', 'Fault', 'Error'] as const;

export interface Datapoint {
  timestamp: Date;
  standard?: number;
  extended?: number;
}

export interface ValueSummary {
  latest: number;
  average: number;
  maximum: number;
  minimum: number;
}

export interface KeyMetricAverage {
  metricName: string;
  average?: number;
  dataPoints: number;
}

/**
 * Build a GetMetricData query for a metric reference.
 * The account id comes from the reference itself, or from the service for cross-account services.
 */
export function buildMetricQuery(
  id: string,
  reference: MetricReferenceView,
  stat: string,
  period: number,
  serviceAccountId?: string,
): MetricQuery | undefined {
  if (!reference.Namespace || !reference.MetricName) {
    return undefined;
  }

  const dimensions: MetricQuery['dimensions'] = [];
  for (const dimension of reference.Dimensions ?? []) {
    if (dimension.Name && dimension.Value !== undefined) {
      dimensions.push({ name: dimension.Name, value: dimension.Value });
    }
  }

  const accountId = reference.AccountId ?? serviceAccountId;
  return {
    id,
    namespace: reference.Namespace,
    metricName: reference.MetricName,
    dimensions,
    period,
    stat,
    ...(accountId ? { accountId } : {}),
  };
}

/**
 * Join the standard and extended series on timestamp, oldest first.
 */
export function mergeDatapoints(
  results: MetricDataResultView[],
  standardId: string,
  extendedId: string,
): Datapoint[] {
  const byTimestamp = new Map<number, Datapoint>();

  const collect = (result: MetricDataResultView | undefined, key: 'standard' | 'extended') => {
    if (!result) return;
    const timestamps = result.Timestamps ?? [];
    const values = result.Values ?? [];
    timestamps.forEach((timestamp, index) => {
      const value = values[index];
      if (value === undefined) return;
      const time = timestamp.getTime();
      const point = byTimestamp.get(time) ?? { timestamp };
      point[key] = value;
      byTimestamp.set(time, point);
    });
  };

  collect(results.find((r) => r.Id === standardId), 'standard');
  collect(results.find((r) => r.Id === extendedId), 'extended');

  return [...byTimestamp.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Latest, mean, max and min of a series. `latest` is the last element.
 */
export function summarizeValues(values: number[]): ValueSummary | undefined {
  const latest = values[values.length - 1];
  if (latest === undefined) return undefined;

  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    latest,
    average: total / values.length,
    maximum: Math.max(...values),
    minimum: Math.min(...values),
  };
}

export interface ServiceMetricsRequest {
  serviceName: string;
  service: ServiceView;
  metricName?: string;
  statistic: string;
  extendedStatistic: string;
  hours: number;
  window: TimeWindow;
}

export function listAvailableMetrics(serviceName: string, references: MetricReferenceView[]): string {
  const lines = [`Available metrics for service '${serviceName}':`, ''];
  for (const metric of references) {
    lines.push(`• ${metric.MetricName ?? 'Unknown'}`);
    lines.push(`  Namespace: ${metric.Namespace ?? 'Unknown'}`);
    lines.push(`  Type: ${metric.MetricType ?? 'Unknown'}`);
    lines.push('');
  }
  return lines.join('\n');
}

export async function fetchMetricSeries(
  context: ToolContext,
  request: ServiceMetricsRequest,
  reference: MetricReferenceView,
): Promise<Datapoint[]> {
  const period = selectMetricPeriod(request.hours);
  const accountId = request.service.KeyAttributes?.AwsAccountId;
  const queries = [
    buildMetricQuery('m1', reference, request.statistic, period, accountId),
    buildMetricQuery('m2', reference, request.extendedStatistic, period, accountId),
  ].filter((query): query is MetricQuery => query !== undefined);

  if (queries.length === 0) {
    return [];
  }

  const results = await callAws(
    'GetMetricData',
    `${request.serviceName}/${reference.MetricName ?? ''}`,
    () =>
      context.api.getMetricData({
        queries,
        startTime: request.window.startTime,
        endTime: request.window.endTime,
      }),
    context.logger,
  );

  return mergeDatapoints(results, 'm1', 'm2');
}

export function formatMetricReport(request: ServiceMetricsRequest, datapoints: Datapoint[]): string {
  const { serviceName, metricName = '', statistic, extendedStatistic, hours } = request;
  const period = selectMetricPeriod(hours);

  const lines: string[] = [
    `Metrics for ${serviceName} - ${metricName}`,
    `Time Range: Last ${hours} hour(s)`,
    `Period: ${period} seconds`,
    '',
    'Summary:',
  ];

  const sections: Array<[string, number[]]> = [
    [statistic, datapoints.flatMap((dp) => (dp.standard === undefined ? [] : [dp.standard]))],
    [extendedStatistic, datapoints.flatMap((dp) => (dp.extended === undefined ? [] : [dp.extended]))],
  ];

  for (const [label, values] of sections) {
    const summary = summarizeValues(values);
    if (!summary) continue;
    lines.push(
      `${label} Statistics:`,
      `• Latest: ${formatNumber(summary.latest)}`,
      `• Average: ${formatNumber(summary.average)}`,
      `• Maximum: ${formatNumber(summary.maximum)}`,
      `• Minimum: ${formatNumber(summary.minimum)}`,
      '',
    );
  }

  lines.push(`• Data Points: ${datapoints.length}`, '', 'Recent Values:');

  for (const dp of datapoints.slice(-RECENT_VALUE_COUNT)) {
    const parts: string[] = [];
    if (dp.standard !== undefined) parts.push(`${statistic}: ${formatNumber(dp.standard)}`);
    if (dp.extended !== undefined) parts.push(`${extendedStatistic}: ${formatNumber(dp.extended)}`);
    lines.push(`• ${formatShortTimestamp(dp.timestamp)}: ${parts.join(', ')}`);
  }

  return lines.join('\n');
}

/**
 * Average of Latency, Fault and Error over the window, one GetMetricData call for all three.
 * Metrics the service does not report are omitted.
 */
export async function fetchKeyMetricAverages(
  context: ToolContext,
  service: ServiceView,
  window: TimeWindow,
  hours: number,
): Promise<KeyMetricAverage[]> {
  const references = service.MetricReferences ?? [];
  const accountId = service.KeyAttributes?.AwsAccountId;
  const period = selectMetricPeriod(hours);

  const queries: Array<{ metricName: string; query: MetricQuery }> = [];
  KEY_METRIC_NAMES.forEach((metricName, index) => {
    const reference = references.find(
      (ref) => ref.MetricName?.toLowerCase() === metricName.toLowerCase(),
    );
    if (!reference) return;
    const query = buildMetricQuery(`k${index}`, reference, 'Average', period, accountId);
    if (query) queries.push({ metricName, query });
  });

  if (queries.length === 0) {
    return [];
  }

  const results = await callAws(
    'GetMetricData',
    service.KeyAttributes?.Name,
    () =>
      context.api.getMetricData({
        queries: queries.map((entry) => entry.query),
        startTime: window.startTime,
        endTime: window.endTime,
      }),
    context.logger,
  );

  return queries.map(({ metricName, query }) => {
    const values = results.find((result) => result.Id === query.id)?.Values ?? [];
    const summary = summarizeValues(values);
    return { metricName, average: summary?.average, dataPoints: values.length };
  });
}

export function formatKeyMetricLines(averages: KeyMetricAverage[], indent = ''): string[] {
  if (averages.length === 0) {
    return [`${indent}Key metrics: none reported`];
  }
  return averages.map(({ metricName, average, dataPoints }) =>
    average === undefined
      ? `${indent}${metricName} (Average): no data`
      : `${indent}${metricName} (Average): ${formatNumber(average)} over ${dataPoints} data points`,
  );
}
