import { z } from 'zod';
import { defineTool } from '../shared/tool-definition.js';
import {
  checkTransactionSearch,
  collectTraceSummaries,
  resolveTraceWindow,
  simplifyTrace,
} from './trace-service.js';

export const queryXrayTraces = defineTool({
  name: 'query_xray_traces',
  title: 'Query X-Ray traces',
  description:
    'Query sampled X-Ray trace summaries to find root causes of errors, faults and latency. ' +
    'Filter examples: service("checkout"){fault = true}, duration > 5, ' +
    'annotation[aws.local.operation]="GET /owners". The window may not exceed 6 hours.',
  inputSchema: {
    start_time: z
      .string()
      .optional()
      .describe('Start time in ISO 8601, e.g. 2024-01-01T00:00:00Z (default: 3 hours before end_time)'),
    end_time: z
      .string()
      .optional()
      .describe('End time in ISO 8601 (default: now)'),
    filter_expression: z
      .string()
      .optional()
      .describe('X-Ray filter expression'),
  },
  run: async (params, context) => {
    const window = resolveTraceWindow(context, params.start_time, params.end_time);
    const filterExpression = params.filter_expression?.trim() || undefined;

    const collection = await collectTraceSummaries(context, window, filterExpression);
    const transactionSearch = await checkTransactionSearch(context);
    const summaries = collection.traces.map(simplifyTrace);

    return {
      TraceSummaries: summaries,
      TraceCount: summaries.length,
      Truncated: collection.truncated,
      ...(collection.partial ? { Partial: true } : {}),
      Message: `Retrieved ${summaries.length} traces (limited to ${context.config.maxTraces})`,
      SamplingNote: 'This data comes from X-Ray sampling. Results may not show all errors or issues.',
      TransactionSearchStatus: {
        enabled: transactionSearch.enabled,
        recommendation: transactionSearch.enabled
          ? 'Transaction Search is available. Use search_transaction_spans for 100% trace visibility.'
          : 'Enable Transaction Search for 100% trace visibility instead of sampled traces.',
      },
    };
  },
});
