import type { TimeWindow } from '../types';

export const SECONDS_PER_DAY = 86_400;
export const DEFAULT_RETENTION_DAYS = 90;

export function getTimeWindow(daysBack: number, now: Date = new Date()): TimeWindow {
  const start = new Date(now.getTime() - daysBack * SECONDS_PER_DAY * 1000);
  return { start: start.toISOString(), end: now.toISOString() };
}

/** Expiry marker in Unix seconds, as read by bucket lifecycle rules and table TTL. */
export function computeExpiry(now: Date, retentionDays: number = DEFAULT_RETENTION_DAYS): number {
  return Math.floor(now.getTime() / 1000) + retentionDays * SECONDS_PER_DAY;
}
