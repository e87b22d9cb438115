import { z } from 'zod';
import { listAllServices } from '../services/catalog-service.js';
import { lookbackWindow } from '../shared/time-range.js';
import { defineTool, includeLinkedAccountsParam } from '../shared/tool-definition.js';
import { checkTransactionSearch, formatTransactionSearchLines } from '../traces/trace-service.js';
import {
  MAX_SLI_EVALUATION_HOURS,
  evaluateServices,
  formatSliStatusReport,
} from './slo-service.js';

export const getSliStatus = defineTool({
  name: 'get_sli_status',
  title: 'Get SLI status',
  description:
    'Report SLO compliance for every monitored service: which services have breached SLOs, ' +
    'which are healthy and which could not be evaluated.',
  inputSchema: {
    hours: z
      .number()
      .int()
      .positive()
      .default(24)
      .describe('Hours to look back (default: 24, evaluated over at most 24)'),
    include_linked_accounts: includeLinkedAccountsParam,
  },
  run: async (params, context) => {
    const hours = Math.min(params.hours, MAX_SLI_EVALUATION_HOURS);
    const window = lookbackWindow(context.now(), hours);

    const { services } = await listAllServices(context, {
      window,
      includeLinkedAccounts: params.include_linked_accounts,
    });
    if (services.length === 0) {
      return 'No services found in Application Signals.';
    }

    const reports = await evaluateServices(
      context,
      services,
      window,
      hours,
      params.include_linked_accounts,
    );
    const transactionSearch = await checkTransactionSearch(context);

    const breached = reports.filter((report) => report.status === 'BREACHED').length;
    context.logger.info(
      { total: reports.length, breached },
      'SLI status evaluated',
    );

    return formatSliStatusReport({
      hours,
      window,
      reports,
      transactionSearchLines: formatTransactionSearchLines(transactionSearch),
    });
  },
});
