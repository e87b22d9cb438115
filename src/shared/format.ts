import type { KeyAttributes } from '../aws/monitoring-api.js';

export function formatNumber(value: number): string {
  return value.toFixed(2);
}

export function formatKeyValueLines(
  values: Record<string, string> | undefined,
  indent: string,
  bullet = '',
): string[] {
  if (!values) return [];
  return Object.entries(values).map(([key, value]) => `${indent}${bullet}${key}: ${value}`);
}

export function serviceName(attributes: KeyAttributes | undefined): string {
  return attributes?.Name ?? 'Unknown';
}

/**
 * checkout-service (eks:prod/default)
 */
export function serviceLabel(attributes: KeyAttributes | undefined): string {
  return `${serviceName(attributes)} (${attributes?.Environment ?? 'Unknown'})`;
}
