/**
 * Read-only view of the AWS monitoring APIs used by the tools.
 *
 * The shapes below keep the AWS field names so formatted output matches what the
 * console and the API reference show. Every field is optional: handlers must cope
 * with partially populated responses.
 */

export type KeyAttributes = Record<string, string>;

export interface DimensionView {
  Name?: string;
  Value?: string;
}

export interface MetricReferenceView {
  Namespace?: string;
  MetricName?: string;
  MetricType?: string;
  Dimensions?: DimensionView[];
  AccountId?: string;
}

export interface ServiceSummaryView {
  KeyAttributes?: KeyAttributes;
  AttributeMaps?: Record<string, string>[];
  MetricReferences?: MetricReferenceView[];
}

export interface ServiceView extends ServiceSummaryView {
  LogGroupReferences?: Record<string, string>[];
}

export interface SloSummaryView {
  Arn?: string;
  Name?: string;
  KeyAttributes?: KeyAttributes;
  OperationName?: string;
  CreatedTime?: Date;
}

export interface SliMetricStatView {
  Metric?: {
    Namespace?: string;
    MetricName?: string;
    Dimensions?: DimensionView[];
  };
  Period?: number;
  Stat?: string;
  Unit?: string;
}

export interface SliMetricDataQueryView {
  Id?: string;
  MetricStat?: SliMetricStatView;
  Expression?: string;
  ReturnData?: boolean;
}

export interface DependencyConfigView {
  DependencyKeyAttributes?: KeyAttributes;
  DependencyOperationName?: string;
}

export interface SliMetricView {
  KeyAttributes?: KeyAttributes;
  OperationName?: string;
  MetricType?: string;
  MetricDataQueries?: SliMetricDataQueryView[];
  TotalRequestCountMetric?: SliMetricDataQueryView[];
  DependencyConfig?: DependencyConfigView;
}

export interface SloView {
  Arn?: string;
  Name?: string;
  Description?: string;
  EvaluationType?: string;
  CreatedTime?: Date;
  LastUpdatedTime?: Date;
  Goal?: {
    AttainmentGoal?: number;
    WarningThreshold?: number;
    Interval?: {
      RollingInterval?: { Duration?: number; DurationUnit?: string };
      CalendarInterval?: { Duration?: number; DurationUnit?: string; StartTime?: Date };
    };
  };
  Sli?: {
    SliMetric?: SliMetricView;
    MetricThreshold?: number;
    ComparisonOperator?: string;
  };
  RequestBasedSli?: {
    RequestBasedSliMetric?: SliMetricView;
    MetricThreshold?: number;
    ComparisonOperator?: string;
  };
  BurnRateConfigurations?: { LookBackWindowMinutes?: number }[];
}

/**
 * One CloudWatch GetMetricData query built by this server
 */
export interface MetricQuery {
  id: string;
  namespace: string;
  metricName: string;
  dimensions: { name: string; value: string }[];
  period: number;
  stat: string;
  accountId?: string;
}

export interface MetricDataResultView {
  Id?: string;
  Label?: string;
  Timestamps?: Date[];
  Values?: number[];
  StatusCode?: string;
}

export interface TraceSummaryView {
  Id?: string;
  Duration?: number;
  ResponseTime?: number;
  HasError?: boolean;
  HasFault?: boolean;
  HasThrottle?: boolean;
  Http?: {
    HttpURL?: string;
    HttpStatus?: number;
    HttpMethod?: string;
    UserAgent?: string;
    ClientIp?: string;
  };
  ErrorRootCauses?: unknown[];
  FaultRootCauses?: unknown[];
  ResponseTimeRootCauses?: unknown[];
  Annotations?: Record<string, unknown[]>;
  Users?: unknown[];
}

export interface QueryResultsView {
  status?: string;
  results?: { field?: string; value?: string }[][];
  statistics?: {
    recordsMatched?: number;
    recordsScanned?: number;
    bytesScanned?: number;
  };
}

export interface Page<T> {
  items: T[];
  nextToken?: string;
}

export interface ListServicesInput {
  startTime: Date;
  endTime: Date;
  maxResults: number;
  includeLinkedAccounts: boolean;
  nextToken?: string;
}

export interface GetServiceInput {
  startTime: Date;
  endTime: Date;
  keyAttributes: KeyAttributes;
}

export interface ListServiceLevelObjectivesInput {
  keyAttributes: KeyAttributes;
  includeLinkedAccounts: boolean;
  maxResults: number;
  nextToken?: string;
}

export interface GetMetricDataInput {
  queries: MetricQuery[];
  startTime: Date;
  endTime: Date;
}

export interface GetTraceSummariesInput {
  startTime: Date;
  endTime: Date;
  filterExpression?: string;
  nextToken?: string;
}

export interface TraceSegmentDestination {
  destination?: string;
  status?: string;
}

export interface StartQueryInput {
  logGroupNames: string[];
  startTime: Date;
  endTime: Date;
  queryString: string;
  limit?: number;
}

/**
 * Gateway to the AWS read APIs. One method per AWS operation, no composition.
 */
export interface MonitoringApi {
  listServices(input: ListServicesInput): Promise<Page<ServiceSummaryView>>;
  getService(input: GetServiceInput): Promise<ServiceView | undefined>;
  listServiceLevelObjectives(input: ListServiceLevelObjectivesInput): Promise<Page<SloSummaryView>>;
  getServiceLevelObjective(id: string): Promise<SloView | undefined>;
  getMetricData(input: GetMetricDataInput): Promise<MetricDataResultView[]>;
  getTraceSummaries(input: GetTraceSummariesInput): Promise<Page<TraceSummaryView>>;
  getTraceSegmentDestination(): Promise<TraceSegmentDestination>;
  startQuery(input: StartQueryInput): Promise<string | undefined>;
  getQueryResults(queryId: string): Promise<QueryResultsView>;
}
