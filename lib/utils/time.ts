import type { TimestampStyle } from '../core/types';

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Renders a timestamp for a log entry.
 * - 'iso': `2024-03-01T09:05:07.042Z`
 * - 'asctime': `2024-03-01 09:05:07,042` in local time
 */
export const getTimestamp = (style: TimestampStyle = 'iso', now: Date = new Date()): string => {
  if (style === 'asctime') {
    const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
    return `${date} ${time},${pad(now.getMilliseconds(), 3)}`;
  }
  return now.toISOString();
};
