/**
 * SLO service - SLO listing, breach evaluation and SLO configuration reports
 */

import { callAws } from '../aws/aws-call.js';
import type {
  KeyAttributes,
  MetricDataResultView,
  MetricQuery,
  ServiceSummaryView,
  SliMetricDataQueryView,
  SliMetricView,
  SloSummaryView,
  SloView,
} from '../aws/monitoring-api.js';
import { toErrorEnvelope } from '../shared/errors.js';
import { serviceLabel } from '../shared/format.js';
import { formatUtcMinute, type TimeWindow } from '../shared/time-range.js';
import type { ToolContext } from '../shared/tool-definition.js';

/** ListServiceLevelObjectives page size */
const SLO_PAGE_SIZE = 50;

/** SLO breach evaluation never looks back further than a day */
export const MAX_SLI_EVALUATION_HOURS = 24;

const SLO_METRIC_NAMESPACE = 'AWS/ApplicationSignals';
const SLO_BREACH_METRIC = 'BreachedCount';

export type SliStatus = 'OK' | 'BREACHED' | 'INSUFFICIENT_DATA';

export interface SliReport {
  keyAttributes: KeyAttributes;
  status: SliStatus;
  totalSloCount: number;
  okSloCount: number;
  breachedSloCount: number;
  breachedSloNames: string[];
  /** Error message when the service could not be evaluated */
  error?: string;
}

export async function listServiceSlos(
  context: ToolContext,
  keyAttributes: KeyAttributes,
  includeLinkedAccounts: boolean,
): Promise<SloSummaryView[]> {
  const limit = context.config.maxSlosPerService;
  const slos: SloSummaryView[] = [];
  let nextToken: string | undefined;

  do {
    const page = await callAws(
      'ListServiceLevelObjectives',
      keyAttributes.Name,
      () =>
        context.api.listServiceLevelObjectives({
          keyAttributes,
          includeLinkedAccounts,
          maxResults: Math.min(SLO_PAGE_SIZE, limit - slos.length),
          nextToken,
        }),
      context.logger,
    );
    slos.push(...page.items);
    nextToken = page.nextToken;
  } while (nextToken && slos.length < limit);

  return slos.slice(0, limit);
}

/**
 * Value of the most recent period in a GetMetricData series.
 * Timestamps decide the order when present; otherwise the series is taken as oldest first.
 */
export function latestValue(result: MetricDataResultView | undefined): number | undefined {
  const values = result?.Values ?? [];
  const timestamps = result?.Timestamps ?? [];
  if (timestamps.length !== values.length) {
    return values[values.length - 1];
  }

  let latestTime = Number.NEGATIVE_INFINITY;
  let latest: number | undefined;
  for (let index = 0; index < values.length; index += 1) {
    const time = timestamps[index]?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (latest === undefined || time > latestTime) {
      latestTime = time;
      latest = values[index];
    }
  }
  return latest;
}

/**
 * An SLO counts as breached when BreachedCount for the most recent period is positive.
 * SLOs without a name cannot be addressed by the SloName dimension and are left out.
 */
export async function evaluateServiceSli(
  context: ToolContext,
  keyAttributes: KeyAttributes,
  window: TimeWindow,
  hours: number,
  includeLinkedAccounts: boolean,
): Promise<SliReport> {
  const listed = await listServiceSlos(context, keyAttributes, includeLinkedAccounts);
  const sloNames = listed.flatMap((slo) => (slo.Name ? [slo.Name] : []));
  if (sloNames.length < listed.length) {
    context.logger.warn(
      { serviceName: keyAttributes.Name, skipped: listed.length - sloNames.length },
      'Skipping SLOs without a name',
    );
  }
  if (sloNames.length === 0) {
    return {
      keyAttributes,
      status: 'OK',
      totalSloCount: 0,
      okSloCount: 0,
      breachedSloCount: 0,
      breachedSloNames: [],
    };
  }

  const period = Math.min(hours, MAX_SLI_EVALUATION_HOURS) * 3600;
  const queries: MetricQuery[] = sloNames.map((name, index) => ({
    id: `slo${index}`,
    namespace: SLO_METRIC_NAMESPACE,
    metricName: SLO_BREACH_METRIC,
    dimensions: [{ name: 'SloName', value: name }],
    period,
    stat: 'Maximum',
  }));

  const results = await callAws(
    'GetMetricData',
    keyAttributes.Name,
    () =>
      context.api.getMetricData({
        queries,
        startTime: window.startTime,
        endTime: window.endTime,
      }),
    context.logger,
  );

  const breachedSloNames = sloNames.filter((_, index) => {
    const value = latestValue(results.find((r) => r.Id === `slo${index}`));
    return value !== undefined && value > 0;
  });

  return {
    keyAttributes,
    status: breachedSloNames.length > 0 ? 'BREACHED' : 'OK',
    totalSloCount: sloNames.length,
    okSloCount: sloNames.length - breachedSloNames.length,
    breachedSloCount: breachedSloNames.length,
    breachedSloNames,
  };
}

/**
 * Evaluate every service, one at a time. A failing service is reported as INSUFFICIENT_DATA.
 */
export async function evaluateServices(
  context: ToolContext,
  services: ServiceSummaryView[],
  window: TimeWindow,
  hours: number,
  includeLinkedAccounts: boolean,
): Promise<SliReport[]> {
  const reports: SliReport[] = [];
  for (const service of services) {
    const keyAttributes = service.KeyAttributes ?? {};
    try {
      reports.push(
        await evaluateServiceSli(context, keyAttributes, window, hours, includeLinkedAccounts),
      );
    } catch (error) {
      reports.push(insufficientData(context, keyAttributes, error));
    }
  }
  return reports;
}

export function insufficientData(
  context: ToolContext,
  keyAttributes: KeyAttributes,
  error: unknown,
): SliReport {
  const envelope = toErrorEnvelope(error, `service ${keyAttributes.Name ?? 'Unknown'}`);
  context.logger.error(
    { serviceName: keyAttributes.Name, errorCode: envelope.error.code, err: error },
    `Failed to evaluate service ${keyAttributes.Name ?? 'Unknown'}`,
  );
  return {
    keyAttributes,
    status: 'INSUFFICIENT_DATA',
    totalSloCount: 0,
    okSloCount: 0,
    breachedSloCount: 0,
    breachedSloNames: [],
    error: envelope.error.message,
  };
}

export interface SliStatusReportInput {
  hours: number;
  window: TimeWindow;
  reports: SliReport[];
  transactionSearchLines: string[];
}

export function formatSliStatusReport(input: SliStatusReportInput): string {
  const { hours, window, reports } = input;
  const byStatus = (status: SliStatus) => reports.filter((report) => report.status === status);
  const breached = byStatus('BREACHED');
  const healthy = byStatus('OK');
  const insufficient = byStatus('INSUFFICIENT_DATA');

  const lines: string[] = [
    `SLI Status Report - Last ${hours} hours`,
    `Time Range: ${formatUtcMinute(window.startTime)} - ${formatUtcMinute(window.endTime)}`,
    '',
    ...input.transactionSearchLines,
    '',
    'Summary:',
    `• Total Services: ${reports.length}`,
    `• Healthy (OK): ${healthy.length}`,
    `• Breached: ${breached.length}`,
    `• Insufficient Data: ${insufficient.length}`,
  ];

  if (breached.length > 0) {
    lines.push('', 'BREACHED SERVICES:');
    for (const report of breached) {
      lines.push(
        `• ${serviceLabel(report.keyAttributes)}`,
        `  SLOs: ${report.breachedSloCount}/${report.totalSloCount} breached`,
      );
      if (report.breachedSloNames.length > 0) {
        lines.push('  Breached SLOs:', ...report.breachedSloNames.map((name) => `    - ${name}`));
      }
    }
  }

  if (healthy.length > 0) {
    lines.push('', 'HEALTHY SERVICES:');
    for (const report of healthy) {
      lines.push(`• ${serviceLabel(report.keyAttributes)} - ${report.okSloCount} SLO(s) healthy`);
    }
  }

  if (insufficient.length > 0) {
    lines.push('', 'INSUFFICIENT DATA:');
    for (const report of insufficient) {
      const suffix = report.error ? ` - ${report.error}` : '';
      lines.push(`• ${serviceLabel(report.keyAttributes)}${suffix}`);
    }
  }

  return lines.join('\n');
}

export function formatSloDetail(slo: SloView): string {
  const lines: string[] = ['Service Level Objective Details', '='.repeat(50), ''];

  lines.push(`Name: ${slo.Name ?? 'Unknown'}`);
  if (slo.Description) {
    lines.push(`Description: ${slo.Description}`);
  }
  lines.push(
    `Evaluation Type: ${slo.EvaluationType ?? 'Unknown'}`,
    `Created: ${formatOptionalDate(slo.CreatedTime)}`,
    `Last Updated: ${formatOptionalDate(slo.LastUpdatedTime)}`,
    '',
  );

  const goal = slo.Goal;
  if (goal) {
    lines.push(
      'Goal Configuration:',
      `• Attainment Goal: ${goal.AttainmentGoal ?? 99}%`,
      `• Warning Threshold: ${goal.WarningThreshold ?? 50}%`,
    );
    const rolling = goal.Interval?.RollingInterval;
    const calendar = goal.Interval?.CalendarInterval;
    if (rolling) {
      lines.push(`• Interval: Rolling ${rolling.Duration ?? ''} ${rolling.DurationUnit ?? ''}`);
    } else if (calendar) {
      lines.push(
        `• Interval: Calendar ${calendar.Duration ?? ''} ${calendar.DurationUnit ?? ''} starting ${formatOptionalDate(calendar.StartTime)}`,
      );
    }
    lines.push('');
  }

  if (slo.Sli) {
    lines.push('Period-Based SLI Configuration:');
    if (slo.Sli.SliMetric) {
      lines.push(...formatSliMetric(slo.Sli.SliMetric));
    }
    lines.push(
      `• Threshold: ${slo.Sli.MetricThreshold ?? 'Unknown'}`,
      `• Comparison: ${slo.Sli.ComparisonOperator ?? 'Unknown'}`,
      '',
    );
  }

  if (slo.RequestBasedSli) {
    lines.push('Request-Based SLI Configuration:');
    if (slo.RequestBasedSli.RequestBasedSliMetric) {
      lines.push(...formatSliMetric(slo.RequestBasedSli.RequestBasedSliMetric));
    }
    lines.push(
      `• Threshold: ${slo.RequestBasedSli.MetricThreshold ?? 'Unknown'}`,
      `• Comparison: ${slo.RequestBasedSli.ComparisonOperator ?? 'Unknown'}`,
      '',
    );
  }

  const burnRates = slo.BurnRateConfigurations ?? [];
  if (burnRates.length > 0) {
    lines.push('Burn Rate Configurations:');
    for (const burnRate of burnRates) {
      lines.push(`• Look-back window: ${burnRate.LookBackWindowMinutes ?? 'Unknown'} minutes`);
    }
  }

  return lines.join('\n');
}

function formatSliMetric(metric: SliMetricView): string[] {
  const lines: string[] = [];

  const keyAttributes = Object.entries(metric.KeyAttributes ?? {});
  if (keyAttributes.length > 0) {
    lines.push('• Key Attributes:', ...keyAttributes.map(([key, value]) => `  - ${key}: ${value}`));
  }

  if (metric.OperationName) {
    lines.push(
      `• Operation Name: ${metric.OperationName}`,
      `  (Use this in trace queries: annotation[aws.local.operation]="${metric.OperationName}")`,
    );
  }

  lines.push(`• Metric Type: ${metric.MetricType ?? 'Unknown'}`);

  // Request-based SLIs carry their queries under TotalRequestCountMetric
  const queries = metric.MetricDataQueries ?? metric.TotalRequestCountMetric ?? [];
  if (queries.length > 0) {
    lines.push('• Metric Data Queries:');
    for (const query of queries) {
      lines.push(...formatMetricDataQuery(query));
    }
  }

  const dependency = metric.DependencyConfig;
  if (dependency) {
    lines.push('• Dependency Configuration:');
    const dependencyAttributes = Object.entries(dependency.DependencyKeyAttributes ?? {});
    if (dependencyAttributes.length > 0) {
      lines.push(
        '  Key Attributes:',
        ...dependencyAttributes.map(([key, value]) => `    - ${key}: ${value}`),
      );
    }
    if (dependency.DependencyOperationName) {
      lines.push(
        `  - Dependency Operation: ${dependency.DependencyOperationName}`,
        `    (Use in traces: annotation[aws.remote.operation]="${dependency.DependencyOperationName}")`,
      );
    }
  }

  return lines;
}

function formatMetricDataQuery(query: SliMetricDataQueryView): string[] {
  const lines = [`  Query ID: ${query.Id ?? 'Unknown'}`];

  const stat = query.MetricStat;
  if (stat) {
    if (stat.Metric) {
      lines.push(
        `    Namespace: ${stat.Metric.Namespace ?? 'Unknown'}`,
        `    MetricName: ${stat.Metric.MetricName ?? 'Unknown'}`,
      );
      const dimensions = stat.Metric.Dimensions ?? [];
      if (dimensions.length > 0) {
        lines.push(
          '    Dimensions:',
          ...dimensions.map((d) => `      - ${d.Name ?? 'Unknown'}: ${d.Value ?? 'Unknown'}`),
        );
      }
    }
    lines.push(`    Period: ${stat.Period ?? 'Unknown'} seconds`, `    Stat: ${stat.Stat ?? 'Unknown'}`);
    if (stat.Unit) {
      lines.push(`    Unit: ${stat.Unit}`);
    }
  }

  if (query.Expression) {
    lines.push(`    Expression: ${query.Expression}`);
  }
  lines.push(`    ReturnData: ${query.ReturnData ?? true}`);
  return lines;
}

function formatOptionalDate(date: Date | undefined): string {
  return date ? date.toISOString() : 'Unknown';
}
