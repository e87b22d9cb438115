import { callAws } from '../aws/aws-call.js';
import { Errors } from '../shared/errors.js';
import { defineTool, requiredText } from '../shared/tool-definition.js';
import { formatSloDetail } from './slo-service.js';

export const getSlo = defineTool({
  name: 'get_slo',
  title: 'Get SLO',
  description:
    'Get the configuration of a Service Level Objective: goal, SLI metric and threshold, operation names ' +
    'to use in trace filters, dependency configuration and burn rate windows.',
  inputSchema: {
    slo_id: requiredText('ARN or name of the SLO'),
  },
  run: async (params, context) => {
    const slo = await callAws(
      'GetServiceLevelObjective',
      params.slo_id,
      () => context.api.getServiceLevelObjective(params.slo_id),
      context.logger,
    );
    if (!slo) {
      context.logger.warn({ sloId: params.slo_id }, 'No SLO found');
      throw Errors.sloNotFound(params.slo_id);
    }
    return formatSloDetail(slo);
  },
});
