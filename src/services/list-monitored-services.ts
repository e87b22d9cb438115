import { lookbackWindow } from '../shared/time-range.js';
import { defineTool, includeLinkedAccountsParam } from '../shared/tool-definition.js';
import { formatServiceList, listAllServices } from './catalog-service.js';

/**
 * MCP tool listing every service Application Signals discovered in the lookback window.
 */
export const listMonitoredServices = defineTool({
  name: 'list_monitored_services',
  title: 'List monitored services',
  description:
    'List all services monitored by AWS Application Signals in the last 24 hours: name, type and key ' +
    'attributes (Environment, Platform, AwsAccountId). Usually the first tool to call when starting an investigation.',
  inputSchema: {
    include_linked_accounts: includeLinkedAccountsParam,
  },
  run: async (params, context) => {
    const window = lookbackWindow(context.now(), context.config.serviceLookbackHours);
    const listing = await listAllServices(context, {
      window,
      includeLinkedAccounts: params.include_linked_accounts,
    });

    if (listing.services.length === 0) {
      context.logger.warn('No services found in Application Signals');
    }
    return formatServiceList(listing, context.config.maxServices);
  },
});
