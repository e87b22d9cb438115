import { z } from 'zod';
import type { ServiceSummaryView } from '../aws/monitoring-api.js';
import { listAllServices } from '../services/catalog-service.js';
import { toErrorEnvelope } from '../shared/errors.js';
import { serviceLabel } from '../shared/format.js';
import { formatUtcMinute, lookbackWindow, type TimeWindow } from '../shared/time-range.js';
import {
  defineTool,
  includeLinkedAccountsParam,
  type ToolContext,
} from '../shared/tool-definition.js';
import { assessServiceHealth, fetchService, formatHealthBlock } from './service-health.js';

export const dailyHealthCheck = defineTool({
  name: 'daily_health_check',
  title: 'Daily health check',
  description:
    'Check every monitored service in one pass: SLO breaches, average latency, fault and error rates, ' +
    'and a sample of fault traces for services with breached SLOs.',
  inputSchema: {
    hours: z
      .number()
      .int()
      .min(1)
      .max(168)
      .default(24)
      .describe('Hours to look back (default: 24)'),
    include_linked_accounts: includeLinkedAccountsParam,
  },
  run: async (params, context) => {
    const window = lookbackWindow(context.now(), params.hours);
    const listing = await listAllServices(context, {
      window,
      includeLinkedAccounts: params.include_linked_accounts,
    });

    const lines = [
      `Daily Health Check - Last ${params.hours} hours`,
      `Time Range: ${formatUtcMinute(window.startTime)} - ${formatUtcMinute(window.endTime)}`,
      `Services checked: ${listing.services.length}`,
      '',
    ];
    if (listing.services.length === 0) {
      lines.push('No services found in Application Signals.');
      return lines.join('\n');
    }

    let index = 0;
    for (const summary of listing.services) {
      index += 1;
      const block = await checkService(context, summary, index, window, params);
      lines.push(...block, '');
    }

    if (listing.truncated) {
      lines.push(`Note: only the first ${context.config.maxServices} services were checked.`);
    }
    return lines.join('\n').trimEnd();
  },
});

async function checkService(
  context: ToolContext,
  summary: ServiceSummaryView,
  index: number,
  window: TimeWindow,
  params: { hours: number; include_linked_accounts: boolean },
): Promise<string[]> {
  const keyAttributes = summary.KeyAttributes ?? {};
  try {
    const service = await fetchService(context, keyAttributes, window);
    const health = await assessServiceHealth(context, service, {
      window,
      hours: params.hours,
      includeLinkedAccounts: params.include_linked_accounts,
      faultTracesWhenBreachedOnly: true,
      traceSampleSize: context.config.healthCheckTraceSample,
    });
    return formatHealthBlock(index, health);
  } catch (error) {
    const envelope = toErrorEnvelope(error, `service ${keyAttributes.Name ?? 'Unknown'}`);
    context.logger.error(
      { serviceName: keyAttributes.Name, errorCode: envelope.error.code, err: error },
      'Health check failed for service',
    );
    return [
      `[${index}] ${serviceLabel(keyAttributes)} - INSUFFICIENT_DATA`,
      `  Error: ${envelope.error.message}`,
    ];
  }
}
