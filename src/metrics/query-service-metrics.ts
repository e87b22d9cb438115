import { z } from 'zod';
import { describeService } from '../services/catalog-service.js';
import { Errors } from '../shared/errors.js';
import { lookbackWindow } from '../shared/time-range.js';
import {
  defineTool,
  includeLinkedAccountsParam,
  requiredText,
} from '../shared/tool-definition.js';
import {
  fetchMetricSeries,
  formatMetricReport,
  listAvailableMetrics,
} from './metrics-service.js';

export const queryServiceMetrics = defineTool({
  name: 'query_service_metrics',
  title: 'Query service metrics',
  description:
    'Get CloudWatch metrics for an Application Signals service (Latency, Error, Fault, ...). ' +
    'Returns summary statistics and the most recent values. Omit metric_name to list the metrics the service reports.',
  inputSchema: {
    service_name: requiredText('Name of the service (case-sensitive)'),
    metric_name: z
      .string()
      .trim()
      .optional()
      .describe('Metric to query, e.g. Latency, Error, Fault. Empty lists the available metrics'),
    statistic: z
      .string()
      .trim()
      .min(1)
      .default('Average')
      .describe('Standard statistic: Average, Sum, Maximum, Minimum, SampleCount (default: Average)'),
    extended_statistic: z
      .string()
      .trim()
      .min(1)
      .default('p99')
      .describe('Extended statistic such as p99, p95, p90, p50 (default: p99)'),
    hours: z
      .number()
      .int()
      .min(1)
      .max(168)
      .default(1)
      .describe('Hours to look back, 1 to 168 (default: 1)'),
    include_linked_accounts: includeLinkedAccountsParam,
  },
  run: async (params, context) => {
    const now = context.now();
    const service = await describeService(context, params.service_name, {
      window: lookbackWindow(now, context.config.serviceLookbackHours),
      includeLinkedAccounts: params.include_linked_accounts,
    });

    const references = service.MetricReferences ?? [];
    if (!params.metric_name) {
      if (references.length === 0) {
        return `No metrics found for service '${params.service_name}'.`;
      }
      return listAvailableMetrics(params.service_name, references);
    }

    const wanted = params.metric_name;
    const reference = references.find((ref) => ref.MetricName === wanted);
    if (!reference) {
      throw Errors.metricNotFound(
        params.service_name,
        wanted,
        references.map((ref) => ref.MetricName ?? 'Unknown'),
      );
    }

    const request = {
      serviceName: params.service_name,
      service,
      metricName: wanted,
      statistic: params.statistic,
      extendedStatistic: params.extended_statistic,
      hours: params.hours,
      window: lookbackWindow(now, params.hours),
    };

    const datapoints = await fetchMetricSeries(context, request, reference);
    if (datapoints.length === 0) {
      return `No data points found for metric '${wanted}' on service '${params.service_name}' in the last ${params.hours} hour(s).`;
    }
    return formatMetricReport(request, datapoints);
  },
});
