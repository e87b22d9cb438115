/**
 * AWS SDK v3 implementation of the monitoring gateway.
 * Credentials come from the SDK default provider chain (env keys, session token, profile).
 * Retries and backoff are left to the SDK (`maxAttempts`).
 */

import {
  ApplicationSignalsClient,
  GetServiceCommand,
  GetServiceLevelObjectiveCommand,
  ListServiceLevelObjectivesCommand,
  ListServicesCommand,
} from '@aws-sdk/client-application-signals';
import { CloudWatchClient, paginateGetMetricData } from '@aws-sdk/client-cloudwatch';
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
import type { AppConfig } from '../config/config-loader.js';
import { logger } from '../observability/index.js';
import type {
  GetMetricDataInput,
  GetServiceInput,
  GetTraceSummariesInput,
  ListServiceLevelObjectivesInput,
  ListServicesInput,
  MetricDataResultView,
  MonitoringApi,
  Page,
  QueryResultsView,
  ServiceSummaryView,
  ServiceView,
  SloSummaryView,
  SloView,
  StartQueryInput,
  TraceSegmentDestination,
  TraceSummaryView,
} from './monitoring-api.js';

type ClientSettings = Pick<AppConfig, 'region' | 'profile' | 'maxAttempts'>;

export class AwsMonitoringApi implements MonitoringApi {
  private readonly appSignals: ApplicationSignalsClient;
  private readonly cloudWatch: CloudWatchClient;
  private readonly xray: XRayClient;
  private readonly logs: CloudWatchLogsClient;

  constructor(settings: ClientSettings) {
    const clientConfig = {
      region: settings.region,
      maxAttempts: settings.maxAttempts,
      ...(settings.profile ? { profile: settings.profile } : {}),
    };

    this.appSignals = new ApplicationSignalsClient(clientConfig);
    this.cloudWatch = new CloudWatchClient(clientConfig);
    this.xray = new XRayClient(clientConfig);
    this.logs = new CloudWatchLogsClient(clientConfig);

    logger.debug(
      { region: settings.region, profile: settings.profile, event: 'aws_clients_ready' },
      `AWS clients initialized for region ${settings.region}`,
    );
  }

  async listServices(input: ListServicesInput): Promise<Page<ServiceSummaryView>> {
    const response = await this.appSignals.send(
      new ListServicesCommand({
        StartTime: input.startTime,
        EndTime: input.endTime,
        MaxResults: input.maxResults,
        NextToken: input.nextToken,
        IncludeLinkedAccounts: input.includeLinkedAccounts,
      }),
    );
    return { items: response.ServiceSummaries ?? [], nextToken: response.NextToken };
  }

  async getService(input: GetServiceInput): Promise<ServiceView | undefined> {
    const response = await this.appSignals.send(
      new GetServiceCommand({
        StartTime: input.startTime,
        EndTime: input.endTime,
        KeyAttributes: input.keyAttributes,
      }),
    );
    return response.Service;
  }

  async listServiceLevelObjectives(
    input: ListServiceLevelObjectivesInput,
  ): Promise<Page<SloSummaryView>> {
    const response = await this.appSignals.send(
      new ListServiceLevelObjectivesCommand({
        KeyAttributes: input.keyAttributes,
        IncludeLinkedAccounts: input.includeLinkedAccounts,
        MaxResults: input.maxResults,
        NextToken: input.nextToken,
      }),
    );
    return { items: response.SloSummaries ?? [], nextToken: response.NextToken };
  }

  async getServiceLevelObjective(id: string): Promise<SloView | undefined> {
    const response = await this.appSignals.send(new GetServiceLevelObjectiveCommand({ Id: id }));
    return response.Slo;
  }

  /**
   * GetMetricData pages are merged per query id so callers see one series per query.
   */
  async getMetricData(input: GetMetricDataInput): Promise<MetricDataResultView[]> {
    const merged = new Map<string, MetricDataResultView>();

    const pages = paginateGetMetricData(
      { client: this.cloudWatch },
      {
        StartTime: input.startTime,
        EndTime: input.endTime,
        ScanBy: 'TimestampAscending',
        MetricDataQueries: input.queries.map((query) => ({
          Id: query.id,
          AccountId: query.accountId,
          ReturnData: true,
          MetricStat: {
            Metric: {
              Namespace: query.namespace,
              MetricName: query.metricName,
              Dimensions: query.dimensions.map((dimension) => ({
                Name: dimension.name,
                Value: dimension.value,
              })),
            },
            Period: query.period,
            Stat: query.stat,
          },
        })),
      },
    );

    for await (const page of pages) {
      for (const result of page.MetricDataResults ?? []) {
        const id = result.Id ?? '';
        const existing = merged.get(id);
        if (!existing) {
          merged.set(id, {
            Id: result.Id,
            Label: result.Label,
            StatusCode: result.StatusCode,
            Timestamps: [...(result.Timestamps ?? [])],
            Values: [...(result.Values ?? [])],
          });
          continue;
        }
        existing.Timestamps = [...(existing.Timestamps ?? []), ...(result.Timestamps ?? [])];
        existing.Values = [...(existing.Values ?? []), ...(result.Values ?? [])];
        existing.StatusCode = result.StatusCode ?? existing.StatusCode;
      }
    }

    return [...merged.values()];
  }

  async getTraceSummaries(input: GetTraceSummariesInput): Promise<Page<TraceSummaryView>> {
    const response = await this.xray.send(
      new GetTraceSummariesCommand({
        StartTime: input.startTime,
        EndTime: input.endTime,
        FilterExpression: input.filterExpression || undefined,
        TimeRangeType: 'Service',
        Sampling: true,
        NextToken: input.nextToken,
      }),
    );
    return { items: response.TraceSummaries ?? [], nextToken: response.NextToken };
  }

  async getTraceSegmentDestination(): Promise<TraceSegmentDestination> {
    const response = await this.xray.send(new GetTraceSegmentDestinationCommand({}));
    return { destination: response.Destination, status: response.Status };
  }

  async startQuery(input: StartQueryInput): Promise<string | undefined> {
    const response = await this.logs.send(
      new StartQueryCommand({
        logGroupNames: input.logGroupNames,
        startTime: Math.floor(input.startTime.getTime() / 1000),
        endTime: Math.floor(input.endTime.getTime() / 1000),
        queryString: input.queryString,
        limit: input.limit,
      }),
    );
    return response.queryId;
  }

  async getQueryResults(queryId: string): Promise<QueryResultsView> {
    const response = await this.logs.send(new GetQueryResultsCommand({ queryId }));
    return {
      status: response.status,
      results: response.results,
      statistics: response.statistics,
    };
  }
}
