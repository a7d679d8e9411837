import { ConfigError } from '../models/errors';

const INTERVAL_PATTERN = /^(\d+)\s*([smh])$/;

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600
};

/**
 * Parses an interval string such as '30s', '5m' or '1h' into seconds
 */
export function parseInterval(interval: string): number {
  const match = interval.trim().match(INTERVAL_PATTERN);
  if (!match) {
    throw new ConfigError(`Invalid time interval "${interval}". Use a number followed by 's', 'm', or 'h'.`);
  }

  const value = parseInt(match[1], 10);
  if (value <= 0) {
    throw new ConfigError(`Time interval "${interval}" must be positive`);
  }

  return value * UNIT_SECONDS[match[2]];
}

export function intervalToMs(interval: string): number {
  return parseInterval(interval) * 1000;
}

/**
 * Converts an interval string into a six-field node-cron expression.
 * Only step values that cron can express are accepted.
 */
export function intervalToCron(interval: string): string {
  parseInterval(interval);
  const match = interval.trim().match(INTERVAL_PATTERN);
  if (!match) {
    throw new ConfigError(`Invalid time interval "${interval}"`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  if (unit === 's' && value < 60) return `*/${value} * * * * *`;
  if (unit === 'm' && value < 60) return `0 */${value} * * * *`;
  if (unit === 'h' && value < 24) return `0 0 */${value} * * *`;

  throw new ConfigError(
    `Interval "${interval}" cannot be scheduled. Use 1-59s, 1-59m or 1-23h.`
  );
}
