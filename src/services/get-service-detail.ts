import { lookbackWindow } from '../shared/time-range.js';
import { defineTool, includeLinkedAccountsParam, requiredText } from '../shared/tool-definition.js';
import { describeService, formatServiceDetail } from './catalog-service.js';

export const getServiceDetail = defineTool({
  name: 'get_service_detail',
  title: 'Get service detail',
  description:
    'Get detailed information about one Application Signals service: key attributes, where it runs ' +
    '(EKS, Lambda, ...), available CloudWatch metrics with dimensions and associated log groups. ' +
    'Call this before querying metrics to see which metrics exist.',
  inputSchema: {
    service_name: requiredText('Name of the service (case-sensitive)'),
    include_linked_accounts: includeLinkedAccountsParam,
  },
  run: async (params, context) => {
    const window = lookbackWindow(context.now(), context.config.serviceLookbackHours);
    const service = await describeService(context, params.service_name, {
      window,
      includeLinkedAccounts: params.include_linked_accounts,
    });
    return formatServiceDetail(params.service_name, service);
  },
});
