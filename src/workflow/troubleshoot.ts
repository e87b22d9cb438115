import { z } from 'zod';
import { formatKeyMetricLines } from '../metrics/metrics-service.js';
import { describeService } from '../services/catalog-service.js';
import { formatKeyValueLines } from '../shared/format.js';
import { formatUtcMinute, lookbackWindow } from '../shared/time-range.js';
import {
  defineTool,
  includeLinkedAccountsParam,
  requiredText,
} from '../shared/tool-definition.js';
import {
  assessServiceHealth,
  faultFilterExpression,
  formatSloStatusLines,
  formatTraceSampleLines,
  type ServiceHealth,
} from './service-health.js';

export const troubleshootService = defineTool({
  name: 'troubleshoot_service',
  title: 'Troubleshoot service',
  description:
    'Investigate one service: SLO status, key metrics and a sample of recent fault traces, ' +
    'followed by suggested next steps.',
  inputSchema: {
    service_name: requiredText('Name of the service (case-sensitive)'),
    hours: z
      .number()
      .int()
      .min(1)
      .max(168)
      .default(3)
      .describe('Hours to look back (default: 3; traces cover at most the last 6)'),
    include_linked_accounts: includeLinkedAccountsParam,
  },
  run: async (params, context) => {
    const window = lookbackWindow(context.now(), params.hours);
    const service = await describeService(context, params.service_name, {
      window,
      includeLinkedAccounts: params.include_linked_accounts,
    });

    const health = await assessServiceHealth(context, service, {
      window,
      hours: params.hours,
      includeLinkedAccounts: params.include_linked_accounts,
      faultTracesWhenBreachedOnly: false,
      traceSampleSize: context.config.healthCheckTraceSample,
    });

    const lines = [
      `Troubleshooting ${params.service_name} - Last ${params.hours} hours`,
      `Time Range: ${formatUtcMinute(window.startTime)} - ${formatUtcMinute(window.endTime)}`,
      '',
      'Service:',
      ...formatKeyValueLines(health.keyAttributes, '  '),
      '',
      `SLO Status: ${health.sli.status}`,
      ...formatSloStatusLines(health.sli, '  '),
      '',
      'Key Metrics:',
      ...formatKeyMetricLines(health.keyMetrics, '  '),
      '',
      ...formatTraceSampleLines(health.faultTraces ?? []),
      '',
      'Next Steps:',
      ...nextSteps(params.service_name, health),
    ];
    return lines.join('\n');
  },
});

function nextSteps(name: string, health: ServiceHealth): string[] {
  const steps: string[] = [];
  for (const sloName of health.sli.breachedSloNames) {
    steps.push(`• Run get_slo with slo_id "${sloName}" to find the operation behind the breach`);
  }
  if ((health.faultTraces ?? []).length > 0) {
    steps.push(
      `• Run query_xray_traces with filter_expression '${faultFilterExpression(name)}' to inspect fault root causes`,
    );
  }
  steps.push(`• Run query_service_metrics for ${name} with metric_name Latency to see the p99 trend`);
  return steps;
}
