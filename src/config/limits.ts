/**
 * Accepted ranges for user supplied settings
 */

export const LIMITS = {
  name: { min: 1, max: 25 },
  serverName: { min: 1, max: 100 },
  address: { min: 1, max: 45 },
  intervalSeconds: { min: 1, max: 86400 },
  timeoutSeconds: { min: 1, max: 60 },
  attempts: { min: 1, max: 30 },
  message: { min: 1, max: 300 },
  maxServers: { min: 1, max: 100 },
  tickIntervalSeconds: { min: 1, max: 3600 },
  queueCapacity: { min: 1, max: 10000 }
} as const;

export interface Range {
  readonly min: number;
  readonly max: number;
}

export function isIntegerInRange(value: unknown, range: Range): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= range.min && value <= range.max;
}

export function isStringInRange(value: unknown, range: Range): value is string {
  return typeof value === 'string' && value.trim().length >= range.min && value.length <= range.max;
}
