/**
 * Application Signals MCP server - tool router
 *
 * Static table of every tool this server exposes and the dispatch path shared by
 * the stdio server and the tests.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { queryServiceMetrics } from './metrics/query-service-metrics.js';
import { instrumentTool } from './observability/index.js';
import { getServiceDetail } from './services/get-service-detail.js';
import { listMonitoredServices } from './services/list-monitored-services.js';
import { Errors, isError, wrapWithErrorHandling, type Result } from './shared/errors.js';
import type { RegisteredTool, ToolContext, ToolOutput } from './shared/tool-definition.js';
import { getSliStatus } from './slo/get-sli-status.js';
import { getSlo } from './slo/get-slo.js';
import { queryXrayTraces } from './traces/query-xray-traces.js';
import { searchTransactionSpans } from './traces/search-transaction-spans.js';
import { dailyHealthCheck } from './workflow/health-check.js';
import { troubleshootService } from './workflow/troubleshoot.js';

export const TOOL_NAMES = [
  'list_monitored_services',
  'get_service_detail',
  'query_service_metrics',
  'get_sli_status',
  'get_slo',
  'query_xray_traces',
  'search_transaction_spans',
  'daily_health_check',
  'troubleshoot_service',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const toolRegistry: Record<ToolName, RegisteredTool> = {
  list_monitored_services: listMonitoredServices,
  get_service_detail: getServiceDetail,
  query_service_metrics: queryServiceMetrics,
  get_sli_status: getSliStatus,
  get_slo: getSlo,
  query_xray_traces: queryXrayTraces,
  search_transaction_spans: searchTransactionSpans,
  daily_health_check: dailyHealthCheck,
  troubleshoot_service: troubleshootService,
};

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

export function getRegisteredTools(): Array<{ name: ToolName; title: string; description: string }> {
  return TOOL_NAMES.map((name) => ({
    name,
    title: toolRegistry[name].title,
    description: toolRegistry[name].description,
  }));
}

export function getTool(name: string): RegisteredTool | undefined {
  return isToolName(name) ? toolRegistry[name] : undefined;
}

/**
 * Run one tool call. Failures come back as error envelopes; nothing here throws.
 */
export async function dispatchTool(
  name: string,
  params: unknown,
  context: ToolContext,
): Promise<Result<ToolOutput>> {
  const tool = getTool(name);
  if (!tool) {
    context.logger.warn({ tool: name }, `Unknown tool "${name}"`);
    return Errors.unknownTool(name, [...TOOL_NAMES]).toEnvelope();
  }

  return wrapWithErrorHandling(
    () => instrumentTool(tool.name, params, () => tool.invoke(params, context), context.logger),
    `tool ${tool.name}`,
  );
}

/**
 * MCP content for a dispatch result: text reports verbatim, objects and error envelopes as JSON.
 */
export function toCallToolResult(result: Result<ToolOutput>): CallToolResult {
  if (isError(result)) {
    return {
      isError: true,
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  }
  const text = typeof result.data === 'string' ? result.data : JSON.stringify(result.data, null, 2);
  return { content: [{ type: 'text', text }] };
}
