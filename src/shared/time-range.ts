import { z } from 'zod';
import { Errors } from './errors.js';

export interface TimeWindow {
  startTime: Date;
  endTime: Date;
}

const HOUR_MS = 60 * 60 * 1000;

export function lookbackWindow(now: Date, hours: number): TimeWindow {
  return {
    startTime: new Date(now.getTime() - hours * HOUR_MS),
    endTime: now,
  };
}

export function windowHours(window: TimeWindow): number {
  return (window.endTime.getTime() - window.startTime.getTime()) / HOUR_MS;
}

const isoTimestamp = z.string().trim().datetime({ offset: true, local: true });
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Parse an ISO 8601 timestamp such as 2024-01-01T00:00:00Z. Timestamps without a zone are read as UTC.
 */
export function parseIsoTimestamp(value: string, paramName: string): Date {
  const checked = isoTimestamp.safeParse(value);
  if (!checked.success) {
    throw Errors.parameterInvalid(paramName, value, 'an ISO 8601 timestamp', [
      '2024-01-01T00:00:00Z',
    ]);
  }
  const text = checked.data;
  return new Date(ZONE_SUFFIX.test(text) ? text : `${text}Z`);
}

/**
 * CloudWatch period for a lookback: 1 minute up to 3h, 5 minutes up to 24h, hourly beyond
 */
export function selectMetricPeriod(hours: number): number {
  if (hours <= 3) return 60;
  if (hours <= 24) return 300;
  return 3600;
}

/** 2024-05-01 13:45 (UTC) */
export function formatUtcMinute(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/** 05/01 13:45 (UTC) */
export function formatShortTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(5, 7)}/${iso.slice(8, 10)} ${iso.slice(11, 16)}`;
}
