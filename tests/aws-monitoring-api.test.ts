import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ApplicationSignalsClient,
  GetServiceCommand,
  GetServiceLevelObjectiveCommand,
  ListServiceLevelObjectivesCommand,
  ListServicesCommand,
} from '@aws-sdk/client-application-signals';
import { CloudWatchClient, GetMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import {
  CloudWatchLogsClient,
  GetQueryResultsCommand,
  StartQueryCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import {
  GetTraceSegmentDestinationCommand,
  GetTraceSummariesCommand,
  XRayClient,
} from '@aws-sdk/client-xray';
import { AwsMonitoringApi } from '../src/aws/aws-monitoring-api.js';
import { NOW } from './helpers/fake-monitoring-api.js';

const START = new Date('2024-05-01T09:00:00.000Z');
const cartKeyAttributes = { Type: 'Service', Name: 'cart', Environment: 'eks:prod/default' };

function createApi(): AwsMonitoringApi {
  return new AwsMonitoringApi({ region: 'us-east-1', maxAttempts: 1 });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('AwsMonitoringApi - Application Signals', () => {
  it('passes listing options through to ListServices', async () => {
    const send = vi
      .spyOn(ApplicationSignalsClient.prototype, 'send')
      .mockImplementation(async (command: unknown) => {
        if (!(command instanceof ListServicesCommand)) throw new Error('unexpected command');
        return { ServiceSummaries: [{ KeyAttributes: cartKeyAttributes }], NextToken: 'page-2' };
      });

    const page = await createApi().listServices({
      startTime: START,
      endTime: NOW,
      maxResults: 25,
      includeLinkedAccounts: true,
      nextToken: 'page-1',
    });

    expect(page).toEqual({ items: [{ KeyAttributes: cartKeyAttributes }], nextToken: 'page-2' });
    const [command] = send.mock.calls[0] ?? [];
    expect(command).toBeInstanceOf(ListServicesCommand);
    expect(command?.input).toEqual({
      StartTime: START,
      EndTime: NOW,
      MaxResults: 25,
      NextToken: 'page-1',
      IncludeLinkedAccounts: true,
    });
  });

  it('passes key attributes and paging to ListServiceLevelObjectives', async () => {
    const send = vi
      .spyOn(ApplicationSignalsClient.prototype, 'send')
      .mockImplementation(async (command: unknown) => {
        if (!(command instanceof ListServiceLevelObjectivesCommand)) throw new Error('unexpected command');
        return { SloSummaries: [{ Name: 'cart-latency' }] };
      });

    const page = await createApi().listServiceLevelObjectives({
      keyAttributes: cartKeyAttributes,
      includeLinkedAccounts: false,
      maxResults: 50,
    });

    expect(page).toEqual({ items: [{ Name: 'cart-latency' }], nextToken: undefined });
    expect(send.mock.calls[0]?.[0].input).toEqual({
      KeyAttributes: cartKeyAttributes,
      IncludeLinkedAccounts: false,
      MaxResults: 50,
    });
  });

  it('unwraps GetService and GetServiceLevelObjective responses', async () => {
    vi.spyOn(ApplicationSignalsClient.prototype, 'send').mockImplementation(async (command: unknown) => {
      if (command instanceof GetServiceCommand) {
        return { Service: { KeyAttributes: command.input.KeyAttributes } };
      }
      if (command instanceof GetServiceLevelObjectiveCommand) {
        return { Slo: { Name: command.input.Id } };
      }
      throw new Error('unexpected command');
    });
    const api = createApi();

    await expect(
      api.getService({ startTime: START, endTime: NOW, keyAttributes: cartKeyAttributes }),
    ).resolves.toEqual({ KeyAttributes: cartKeyAttributes });
    await expect(api.getServiceLevelObjective('cart-latency')).resolves.toEqual({
      Name: 'cart-latency',
    });
  });
});

describe('AwsMonitoringApi - CloudWatch metrics', () => {
  it('builds metric stat queries in ascending timestamp order', async () => {
    const send = vi
      .spyOn(CloudWatchClient.prototype, 'send')
      .mockImplementation(async (command: unknown) => {
        if (!(command instanceof GetMetricDataCommand)) throw new Error('unexpected command');
        return { MetricDataResults: [] };
      });

    await createApi().getMetricData({
      startTime: START,
      endTime: NOW,
      queries: [
        {
          id: 'm1',
          namespace: 'ApplicationSignals',
          metricName: 'Latency',
          dimensions: [{ name: 'Service', value: 'cart' }],
          period: 60,
          stat: 'p99',
          accountId: '111122223333',
        },
      ],
    });

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0].input).toMatchObject({
      StartTime: START,
      EndTime: NOW,
      ScanBy: 'TimestampAscending',
      MetricDataQueries: [
        {
          Id: 'm1',
          AccountId: '111122223333',
          ReturnData: true,
          MetricStat: {
            Metric: {
              Namespace: 'ApplicationSignals',
              MetricName: 'Latency',
              Dimensions: [{ Name: 'Service', Value: 'cart' }],
            },
            Period: 60,
            Stat: 'p99',
          },
        },
      ],
    });
  });

  it('merges paginated results into one series per query id', async () => {
    const t1 = new Date('2024-05-01T11:00:00.000Z');
    const t2 = new Date('2024-05-01T11:05:00.000Z');
    const t3 = new Date('2024-05-01T11:10:00.000Z');
    const tokens: Array<string | undefined> = [];
    vi.spyOn(CloudWatchClient.prototype, 'send').mockImplementation(async (command: unknown) => {
      if (!(command instanceof GetMetricDataCommand)) throw new Error('unexpected command');
      tokens.push(command.input.NextToken);
      if (!command.input.NextToken) {
        return {
          MetricDataResults: [
            { Id: 'm1', Timestamps: [t1, t2], Values: [10, 20], StatusCode: 'PartialData' },
            { Id: 'm2', Timestamps: [t1], Values: [90] },
          ],
          NextToken: 'more',
        };
      }
      return {
        MetricDataResults: [{ Id: 'm1', Timestamps: [t3], Values: [30], StatusCode: 'Complete' }],
      };
    });

    const results = await createApi().getMetricData({ startTime: START, endTime: NOW, queries: [] });

    expect(tokens).toEqual([undefined, 'more']);
    expect(results).toEqual([
      { Id: 'm1', Timestamps: [t1, t2, t3], Values: [10, 20, 30], StatusCode: 'Complete' },
      { Id: 'm2', Timestamps: [t1], Values: [90] },
    ]);
  });
});

describe('AwsMonitoringApi - X-Ray', () => {
  it('requests sampled summaries by service time and drops an empty filter', async () => {
    const send = vi.spyOn(XRayClient.prototype, 'send').mockImplementation(async (command: unknown) => {
      if (!(command instanceof GetTraceSummariesCommand)) throw new Error('unexpected command');
      return { TraceSummaries: [{ Id: '1-abc' }], NextToken: 'next' };
    });

    const page = await createApi().getTraceSummaries({
      startTime: START,
      endTime: NOW,
      filterExpression: '',
      nextToken: 'prev',
    });

    expect(page).toEqual({ items: [{ Id: '1-abc' }], nextToken: 'next' });
    expect(send.mock.calls[0]?.[0].input).toEqual({
      StartTime: START,
      EndTime: NOW,
      TimeRangeType: 'Service',
      Sampling: true,
      NextToken: 'prev',
    });
  });

  it('maps the trace segment destination', async () => {
    vi.spyOn(XRayClient.prototype, 'send').mockImplementation(async (command: unknown) => {
      if (!(command instanceof GetTraceSegmentDestinationCommand)) throw new Error('unexpected command');
      return { Destination: 'CloudWatchLogs', Status: 'ACTIVE' };
    });

    await expect(createApi().getTraceSegmentDestination()).resolves.toEqual({
      destination: 'CloudWatchLogs',
      status: 'ACTIVE',
    });
  });
});

describe('AwsMonitoringApi - CloudWatch Logs', () => {
  it('sends StartQuery times as epoch seconds', async () => {
    const send = vi
      .spyOn(CloudWatchLogsClient.prototype, 'send')
      .mockImplementation(async (command: unknown) => {
        if (!(command instanceof StartQueryCommand)) throw new Error('unexpected command');
        return { queryId: 'query-7' };
      });

    const queryId = await createApi().startQuery({
      logGroupNames: ['aws/spans'],
      startTime: new Date('2024-05-01T11:00:00.750Z'),
      endTime: NOW,
      queryString: 'fields @timestamp',
      limit: 20,
    });

    expect(queryId).toBe('query-7');
    expect(send.mock.calls[0]?.[0].input).toEqual({
      logGroupNames: ['aws/spans'],
      startTime: 1714561200,
      endTime: 1714564800,
      queryString: 'fields @timestamp',
      limit: 20,
    });
  });

  it('maps GetQueryResults', async () => {
    vi.spyOn(CloudWatchLogsClient.prototype, 'send').mockImplementation(async (command: unknown) => {
      if (!(command instanceof GetQueryResultsCommand)) throw new Error('unexpected command');
      return {
        status: 'Complete',
        results: [[{ field: 'traceId', value: '1-abc' }]],
        statistics: { recordsMatched: 1 },
      };
    });

    await expect(createApi().getQueryResults('query-7')).resolves.toEqual({
      status: 'Complete',
      results: [[{ field: 'traceId', value: '1-abc' }]],
      statistics: { recordsMatched: 1 },
    });
  });
});
