import { randomBytes } from 'crypto';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Review ids sort by creation time (UTC, second precision) and carry 64 random
 * bits so ids minted within the same second never collide in practice.
 *
 * Example: `20260119-061502-9f1c2a7e5b3d4c11`
 */
export function generateReviewId(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}-${time}-${randomBytes(8).toString('hex')}`;
}

export const REVIEW_ID_PATTERN = /^\d{8}-\d{6}-[0-9a-f]{16}$/;
