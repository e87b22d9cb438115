/**
 * Service health assessment shared by the composite tools
 */

import { callAws } from '../aws/aws-call.js';
import type { KeyAttributes, ServiceView, TraceSummaryView } from '../aws/monitoring-api.js';
import {
  fetchKeyMetricAverages,
  formatKeyMetricLines,
  type KeyMetricAverage,
} from '../metrics/metrics-service.js';
import { evaluateServiceSli, type SliReport } from '../slo/slo-service.js';
import { serviceLabel, serviceName } from '../shared/format.js';
import { lookbackWindow, type TimeWindow } from '../shared/time-range.js';
import type { ToolContext } from '../shared/tool-definition.js';
import { collectTraceSummaries } from '../traces/trace-service.js';

export interface ServiceHealth {
  keyAttributes: KeyAttributes;
  sli: SliReport;
  keyMetrics: KeyMetricAverage[];
  /** Sampled fault traces, only collected when asked for */
  faultTraces?: TraceSummaryView[];
}

export interface AssessOptions {
  window: TimeWindow;
  hours: number;
  includeLinkedAccounts: boolean;
  /** Collect the fault trace sample only for services with a breached SLO */
  faultTracesWhenBreachedOnly: boolean;
  traceSampleSize: number;
}

export function faultFilterExpression(name: string): string {
  return `service("${name.replace(/"/g, '\\"')}"){fault = true}`;
}

export async function fetchService(
  context: ToolContext,
  keyAttributes: KeyAttributes,
  window: TimeWindow,
): Promise<ServiceView> {
  const service = await callAws(
    'GetService',
    keyAttributes.Name,
    () =>
      context.api.getService({
        startTime: window.startTime,
        endTime: window.endTime,
        keyAttributes,
      }),
    context.logger,
  );
  return service ?? { KeyAttributes: keyAttributes };
}

export async function assessServiceHealth(
  context: ToolContext,
  service: ServiceView,
  options: AssessOptions,
): Promise<ServiceHealth> {
  const keyAttributes = service.KeyAttributes ?? {};

  const sli = await evaluateServiceSli(
    context,
    keyAttributes,
    options.window,
    options.hours,
    options.includeLinkedAccounts,
  );
  const keyMetrics = await fetchKeyMetricAverages(context, service, options.window, options.hours);

  const health: ServiceHealth = { keyAttributes, sli, keyMetrics };
  if (options.faultTracesWhenBreachedOnly && sli.status !== 'BREACHED') {
    return health;
  }

  // X-Ray rejects long windows, so the trace sample covers the most recent part only
  const traceHours = Math.min(options.hours, context.config.maxTraceWindowHours);
  const { traces } = await collectTraceSummaries(
    context,
    lookbackWindow(options.window.endTime, traceHours),
    faultFilterExpression(serviceName(keyAttributes)),
    options.traceSampleSize,
  );
  health.faultTraces = traces;
  return health;
}

export function formatSloStatusLines(sli: SliReport, indent = ''): string[] {
  if (sli.totalSloCount === 0) {
    return [`${indent}SLOs: none configured`];
  }
  const lines = [`${indent}SLOs: ${sli.breachedSloCount}/${sli.totalSloCount} breached`];
  for (const name of sli.breachedSloNames) {
    lines.push(`${indent}  - ${name}`);
  }
  return lines;
}

export function formatTraceSampleLines(traces: TraceSummaryView[], indent = ''): string[] {
  if (traces.length === 0) {
    return [`${indent}Fault traces: none found in the sampled window`];
  }
  const lines = [`${indent}Fault traces (sampled, ${traces.length}):`];
  for (const trace of traces) {
    const http = trace.Http;
    const request = http ? ` ${http.HttpMethod ?? ''} ${http.HttpURL ?? ''} -> ${http.HttpStatus ?? '?'}` : '';
    const duration = trace.Duration === undefined ? '' : ` (${trace.Duration.toFixed(3)}s)`;
    lines.push(`${indent}  - ${trace.Id ?? 'Unknown'}${request}${duration}`);
  }
  return lines;
}

export function formatHealthBlock(index: number, health: ServiceHealth): string[] {
  const lines = [`[${index}] ${serviceLabel(health.keyAttributes)} - ${health.sli.status}`];
  lines.push(...formatSloStatusLines(health.sli, '  '));
  lines.push(...formatKeyMetricLines(health.keyMetrics, '  '));
  if (health.faultTraces) {
    lines.push(...formatTraceSampleLines(health.faultTraces, '  '));
  }
  return lines;
}
