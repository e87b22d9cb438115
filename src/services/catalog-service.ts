/**
 * Service catalog - Application Signals service discovery and detail formatting
 */

import { callAws } from '../aws/aws-call.js';
import type { ServiceSummaryView, ServiceView } from '../aws/monitoring-api.js';
import { Errors } from '../shared/errors.js';
import { formatKeyValueLines, serviceName } from '../shared/format.js';
import type { TimeWindow } from '../shared/time-range.js';
import type { ToolContext } from '../shared/tool-definition.js';

/** ListServices accepts at most 100 results per page */
const LIST_SERVICES_PAGE_SIZE = 100;

export interface ServiceListing {
  services: ServiceSummaryView[];
  /** True when more services existed past the configured cut-off */
  truncated: boolean;
}

export interface ListServicesOptions {
  window: TimeWindow;
  includeLinkedAccounts: boolean;
}

/**
 * Follow ListServices pages until `maxServices` summaries are collected or the listing ends.
 */
export async function listAllServices(
  context: ToolContext,
  options: ListServicesOptions,
): Promise<ServiceListing> {
  const limit = context.config.maxServices;
  const services: ServiceSummaryView[] = [];
  let nextToken: string | undefined;

  do {
    const page = await callAws(
      'ListServices',
      undefined,
      () =>
        context.api.listServices({
          startTime: options.window.startTime,
          endTime: options.window.endTime,
          maxResults: Math.min(LIST_SERVICES_PAGE_SIZE, limit - services.length),
          includeLinkedAccounts: options.includeLinkedAccounts,
          nextToken,
        }),
      context.logger,
    );
    services.push(...page.items);
    nextToken = page.nextToken;
    context.logger.debug(
      { pageSize: page.items.length, total: services.length, hasMore: Boolean(nextToken) },
      'Retrieved ListServices page',
    );
  } while (nextToken && services.length < limit);

  return {
    services: services.slice(0, limit),
    truncated: services.length > limit || Boolean(nextToken),
  };
}

export async function findServiceByName(
  context: ToolContext,
  name: string,
  options: ListServicesOptions,
): Promise<ServiceSummaryView> {
  const { services } = await listAllServices(context, options);
  const match = services.find((service) => service.KeyAttributes?.Name === name);
  if (!match) {
    context.logger.warn({ serviceName: name }, `Service "${name}" not found in Application Signals`);
    throw Errors.serviceNotFound(name);
  }
  return match;
}

/**
 * Resolve a service by name and fetch its full description (metric and log group references).
 */
export async function describeService(
  context: ToolContext,
  name: string,
  options: ListServicesOptions,
): Promise<ServiceView> {
  const summary = await findServiceByName(context, name, options);
  const keyAttributes = summary.KeyAttributes ?? {};

  const service = await callAws(
    'GetService',
    name,
    () =>
      context.api.getService({
        startTime: options.window.startTime,
        endTime: options.window.endTime,
        keyAttributes,
      }),
    context.logger,
  );

  if (!service) {
    throw Errors.serviceNotFound(name);
  }
  return service;
}

export function formatServiceList(listing: ServiceListing, maxServices: number): string {
  const { services } = listing;
  if (services.length === 0) {
    return 'No services found in Application Signals.';
  }

  const lines: string[] = [`Application Signals Services (${services.length} total):`, ''];

  for (const service of services) {
    const attributes = service.KeyAttributes;
    lines.push(`• Service: ${serviceName(attributes)}`);
    lines.push(`  Type: ${attributes?.Type ?? 'Unknown'}`);
    const attributeLines = formatKeyValueLines(attributes, '    ');
    if (attributeLines.length > 0) {
      lines.push('  Key Attributes:', ...attributeLines);
    }
    lines.push('');
  }

  if (listing.truncated) {
    lines.push(`Note: listing stopped at ${maxServices} services; more services exist.`);
  }

  return lines.join('\n');
}

export function formatServiceDetail(name: string, service: ServiceView): string {
  const lines: string[] = [`Service Details: ${name}`, ''];

  const keyLines = formatKeyValueLines(service.KeyAttributes, '  ');
  if (keyLines.length > 0) {
    lines.push('Key Attributes:', ...keyLines, '');
  }

  const attributeMaps = service.AttributeMaps ?? [];
  if (attributeMaps.length > 0) {
    lines.push('Additional Attributes:');
    for (const attributeMap of attributeMaps) {
      lines.push(...formatKeyValueLines(attributeMap, '  '));
    }
    lines.push('');
  }

  const metricRefs = service.MetricReferences ?? [];
  if (metricRefs.length > 0) {
    lines.push(`Metric References (${metricRefs.length} total):`);
    for (const metric of metricRefs) {
      lines.push(`  • ${metric.Namespace ?? ''}/${metric.MetricName ?? ''}`);
      lines.push(`    Type: ${metric.MetricType ?? ''}`);
      const dimensions = metric.Dimensions ?? [];
      if (dimensions.length > 0) {
        const rendered = dimensions.map((d) => `${d.Name ?? ''}=${d.Value ?? ''}`).join(', ');
        lines.push(`    Dimensions: ${rendered}`);
      }
      lines.push('');
    }
  }

  const logRefs = service.LogGroupReferences ?? [];
  if (logRefs.length > 0) {
    lines.push(`Log Group References (${logRefs.length} total):`);
    for (const logRef of logRefs) {
      lines.push(`  • ${logRef.Identifier ?? 'Unknown'}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
