import { z } from 'zod';
import { parseIsoTimestamp } from '../shared/time-range.js';
import { Errors } from '../shared/errors.js';
import { defineTool, requiredText } from '../shared/tool-definition.js';
import { checkTransactionSearch, runSpanQuery, toResultRows } from './trace-service.js';

export const searchTransactionSpans = defineTool({
  name: 'search_transaction_spans',
  title: 'Search transaction spans',
  description:
    'Run a CloudWatch Logs Insights query over Transaction Search spans (100% of traces). ' +
    'Always bound the output with "| limit 50" or the limit parameter. Example: ' +
    'FILTER attributes.aws.local.service = "checkout" | STATS count(*) by attributes.aws.remote.operation',
  inputSchema: {
    query_string: requiredText('CloudWatch Logs Insights query'),
    start_time: requiredText('Start time in ISO 8601, e.g. 2024-01-01T00:00:00Z'),
    end_time: requiredText('End time in ISO 8601, e.g. 2024-01-01T01:00:00Z'),
    log_group_name: z
      .string()
      .trim()
      .optional()
      .describe('Log group holding the spans (default: aws/spans)'),
    limit: z.number().int().positive().max(10_000).optional().describe('Maximum rows returned'),
    max_timeout: z
      .number()
      .int()
      .positive()
      .max(300)
      .default(30)
      .describe('Seconds to wait for the query to finish (default: 30)'),
  },
  run: async (params, context) => {
    const startTime = parseIsoTimestamp(params.start_time, 'start_time');
    const endTime = parseIsoTimestamp(params.end_time, 'end_time');
    if (endTime.getTime() <= startTime.getTime()) {
      throw Errors.parameterInvalid('end_time', params.end_time, 'a timestamp later than start_time');
    }

    const transactionSearch = await checkTransactionSearch(context);
    if (!transactionSearch.enabled) {
      context.logger.warn(
        { destination: transactionSearch.destination, status: transactionSearch.status },
        'Transaction Search not enabled',
      );
      return {
        status: 'Transaction Search Not Available',
        transaction_search_status: transactionSearch,
        message:
          'Transaction Search is not enabled for this account. ' +
          `Current configuration: Destination=${transactionSearch.destination}, Status=${transactionSearch.status}. ` +
          "Transaction Search requires destination 'CloudWatchLogs' with status 'ACTIVE'.",
        fallback_recommendation:
          'Use query_xray_traces with X-Ray filter expressions for sampled trace data.',
      };
    }

    const outcome = await runSpanQuery(context, {
      logGroupName: params.log_group_name || context.config.transactionSpansLogGroup,
      window: { startTime, endTime },
      queryString: params.query_string,
      limit: params.limit,
      timeoutMs: params.max_timeout * 1000,
    });

    if (outcome.kind === 'timeout') {
      return {
        queryId: outcome.queryId,
        status: 'Polling Timeout',
        message:
          `Query ${outcome.queryId} did not complete within ${params.max_timeout} seconds. ` +
          'Run the search again with a narrower time range or a larger max_timeout.',
      };
    }

    return {
      queryId: outcome.queryId,
      status: outcome.results.status ?? 'Unknown',
      statistics: outcome.results.statistics ?? {},
      results: toResultRows(outcome.results.results),
      transaction_search_status: transactionSearch,
    };
  },
});
