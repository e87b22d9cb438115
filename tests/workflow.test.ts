import { describe, it, expect } from 'vitest';
import type { ServiceView } from '../src/aws/monitoring-api.js';
import { dispatchTool } from '../src/index.js';
import { ErrorCode, isSuccess, type Result } from '../src/shared/errors.js';
import type { ToolOutput } from '../src/shared/tool-definition.js';
import { faultFilterExpression } from '../src/workflow/service-health.js';
import { NOW, awsError, createTestContext, service } from './helpers/fake-monitoring-api.js';

function textOf(result: Result<ToolOutput>): string {
  if (!isSuccess(result) || typeof result.data !== 'string') {
    throw new Error(`expected a text report, got ${JSON.stringify(result)}`);
  }
  return result.data;
}

const cartKeyAttributes = { Type: 'Service', Name: 'cart', Environment: 'eks:prod/default' };

const cartWithMetrics: ServiceView = {
  KeyAttributes: cartKeyAttributes,
  MetricReferences: ['Latency', 'Fault', 'Error'].map((metricName) => ({
    Namespace: 'ApplicationSignals',
    MetricName: metricName,
    Dimensions: [{ Name: 'Service', Value: 'cart' }],
  })),
};

describe('faultFilterExpression', () => {
  it('builds an X-Ray fault filter for the service', () => {
    expect(faultFilterExpression('cart')).toBe('service("cart"){fault = true}');
    expect(faultFilterExpression('odd"name')).toBe('service("odd\\"name"){fault = true}');
  });
});

describe('daily_health_check', () => {
  it('produces one block per service in listing order', async () => {
    const { api, context } = createTestContext();
    api.listServices.mockResolvedValueOnce({
      items: [service('cart'), service('payments'), service('search')],
    });
    api.getService.mockImplementation(async (input) => {
      if (input.keyAttributes.Name === 'search') {
        throw awsError('AccessDeniedException', 'denied', 403);
      }
      if (input.keyAttributes.Name === 'cart') {
        return { KeyAttributes: input.keyAttributes, MetricReferences: cartWithMetrics.MetricReferences?.slice(0, 1) };
      }
      return { KeyAttributes: input.keyAttributes };
    });
    api.listServiceLevelObjectives.mockImplementation(async (input) =>
      input.keyAttributes.Name === 'cart' ? { items: [{ Name: 'cart-latency' }] } : { items: [] },
    );
    api.getMetricData
      .mockResolvedValueOnce([{ Id: 'slo0', Values: [1] }])
      .mockResolvedValueOnce([{ Id: 'k0', Values: [120] }]);
    api.getTraceSummaries.mockResolvedValueOnce({
      items: [
        {
          Id: '1-abc',
          Duration: 1.5,
          HasFault: true,
          Http: { HttpMethod: 'POST', HttpURL: '/checkout', HttpStatus: 500 },
        },
      ],
    });

    const text = textOf(await dispatchTool('daily_health_check', {}, context));

    expect(text).toBe(
      [
        'Daily Health Check - Last 24 hours',
        'Time Range: 2024-04-30 12:00 - 2024-05-01 12:00',
        'Services checked: 3',
        '',
        '[1] cart (eks:prod/default) - BREACHED',
        '  SLOs: 1/1 breached',
        '    - cart-latency',
        '  Latency (Average): 120.00 over 1 data points',
        '  Fault traces (sampled, 1):',
        '    - 1-abc POST /checkout -> 500 (1.500s)',
        '',
        '[2] payments (eks:prod/default) - OK',
        '  SLOs: none configured',
        '  Key metrics: none reported',
        '',
        '[3] search (eks:prod/default) - INSUFFICIENT_DATA',
        '  Error: AWS GetService failed for "search": AccessDeniedException - denied',
      ].join('\n'),
    );

    // Fault traces are sampled only for the breached service, over the last 6 hours
    expect(api.getTraceSummaries).toHaveBeenCalledTimes(1);
    expect(api.getTraceSummaries).toHaveBeenCalledWith({
      startTime: new Date('2024-05-01T06:00:00.000Z'),
      endTime: NOW,
      filterExpression: 'service("cart"){fault = true}',
      nextToken: undefined,
    });
  });

  it('checks K services as K numbered blocks', async () => {
    const { api, context } = createTestContext();
    const names = ['a', 'b', 'c', 'd', 'e'];
    api.listServices.mockResolvedValueOnce({ items: names.map((name) => service(name)) });

    const text = textOf(await dispatchTool('daily_health_check', { hours: 6 }, context));

    const headers = text.split('\n').filter((line) => line.startsWith('['));
    expect(headers).toEqual(names.map((name, i) => `[${i + 1}] ${name} (eks:prod/default) - OK`));
  });

  it('reports an empty account', async () => {
    const { context } = createTestContext();

    const text = textOf(await dispatchTool('daily_health_check', {}, context));

    expect(text.split('\n').slice(2)).toEqual([
      'Services checked: 0',
      '',
      'No services found in Application Signals.',
    ]);
  });

  describe('over a multi-day window', () => {
    const dailyTimestamps = [
      new Date('2024-04-28T12:00:00.000Z'),
      new Date('2024-04-29T12:00:00.000Z'),
      new Date('2024-04-30T12:00:00.000Z'),
    ];

    async function checkCart(values: number[], timestamps: Date[]): Promise<string[]> {
      const { api, context } = createTestContext();
      api.listServices.mockResolvedValueOnce({ items: [service('cart')] });
      api.listServiceLevelObjectives.mockResolvedValueOnce({ items: [{ Name: 'cart-latency' }] });
      api.getMetricData.mockResolvedValueOnce([{ Id: 'slo0', Timestamps: timestamps, Values: values }]);

      const text = textOf(await dispatchTool('daily_health_check', { hours: 72 }, context));
      return text.split('\n').slice(4, 6);
    }

    it('ignores a breach from an earlier day', async () => {
      expect(await checkCart([1, 0, 0], dailyTimestamps)).toEqual([
        '[1] cart (eks:prod/default) - OK',
        '  SLOs: 0/1 breached',
      ]);
    });

    it('reports a breach in the most recent day', async () => {
      expect(await checkCart([0, 0, 1], dailyTimestamps)).toEqual([
        '[1] cart (eks:prod/default) - BREACHED',
        '  SLOs: 1/1 breached',
      ]);
    });

    it('orders datapoints by timestamp rather than position', async () => {
      expect(await checkCart([1, 0, 0], [...dailyTimestamps].reverse())).toEqual([
        '[1] cart (eks:prod/default) - BREACHED',
        '  SLOs: 1/1 breached',
      ]);
    });
  });

  it('fails as a whole only when the listing fails', async () => {
    const { api, context } = createTestContext();
    api.listServices.mockRejectedValueOnce(awsError('ThrottlingException', 'Rate exceeded', 429));

    const result = await dispatchTool('daily_health_check', {}, context);

    expect(result).toMatchObject({ error: { code: ErrorCode.AWS_THROTTLED } });
  });
});

describe('troubleshoot_service', () => {
  it('combines SLO status, key metrics and fault traces', async () => {
    const { api, context } = createTestContext();
    api.listServices.mockResolvedValueOnce({ items: [service('cart')] });
    api.getService.mockResolvedValueOnce(cartWithMetrics);
    api.getMetricData.mockResolvedValueOnce([
      { Id: 'k0', Values: [200] },
      { Id: 'k1', Values: [0, 2] },
      { Id: 'k2', Values: [] },
    ]);

    const text = textOf(
      await dispatchTool('troubleshoot_service', { service_name: 'cart' }, context),
    );

    expect(text).toBe(
      [
        'Troubleshooting cart - Last 3 hours',
        'Time Range: 2024-05-01 09:00 - 2024-05-01 12:00',
        '',
        'Service:',
        '  Type: Service',
        '  Name: cart',
        '  Environment: eks:prod/default',
        '',
        'SLO Status: OK',
        '  SLOs: none configured',
        '',
        'Key Metrics:',
        '  Latency (Average): 200.00 over 1 data points',
        '  Fault (Average): 1.00 over 2 data points',
        '  Error (Average): no data',
        '',
        'Fault traces: none found in the sampled window',
        '',
        'Next Steps:',
        '• Run query_service_metrics for cart with metric_name Latency to see the p99 trend',
      ].join('\n'),
    );
    expect(api.getTraceSummaries.mock.calls[0]?.[0]).toMatchObject({
      startTime: new Date('2024-05-01T09:00:00.000Z'),
      filterExpression: 'service("cart"){fault = true}',
    });
  });

  it('suggests follow-up tools for breached SLOs and fault traces', async () => {
    const { api, context } = createTestContext();
    api.listServices.mockResolvedValueOnce({ items: [service('cart')] });
    api.getService.mockResolvedValueOnce({ KeyAttributes: cartKeyAttributes });
    api.listServiceLevelObjectives.mockResolvedValueOnce({ items: [{ Name: 'cart-latency' }] });
    api.getMetricData.mockResolvedValueOnce([{ Id: 'slo0', Values: [2] }]);
    api.getTraceSummaries.mockResolvedValueOnce({ items: [{ Id: '1-abc' }] });

    const text = textOf(
      await dispatchTool('troubleshoot_service', { service_name: 'cart', hours: 12 }, context),
    );

    expect(text.split('\n').slice(-4)).toEqual([
      'Next Steps:',
      '• Run get_slo with slo_id "cart-latency" to find the operation behind the breach',
      '• Run query_xray_traces with filter_expression \'service("cart"){fault = true}\' to inspect fault root causes',
      '• Run query_service_metrics for cart with metric_name Latency to see the p99 trend',
    ]);
    expect(text).toContain('SLO Status: BREACHED');
    expect(text.split('\n')).toContain('  - 1-abc');
    // 12 hours requested, traces limited to the last 6
    expect(api.getTraceSummaries.mock.calls[0]?.[0].startTime).toEqual(
      new Date('2024-05-01T06:00:00.000Z'),
    );
  });

  it('returns SERVICE_NOT_FOUND for unknown services', async () => {
    const { api, context } = createTestContext();
    api.listServices.mockResolvedValueOnce({ items: [service('cart')] });

    const result = await dispatchTool('troubleshoot_service', { service_name: 'carts' }, context);

    expect(result).toMatchObject({ error: { code: ErrorCode.SERVICE_NOT_FOUND } });
    expect(api.getTraceSummaries).not.toHaveBeenCalled();
  });
});
