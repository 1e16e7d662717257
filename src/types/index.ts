/**
 * Main types export file for the watchdog
 */

export * from './tenant';
export * from './probe';
export * from './notifier';
export * from './store';
export * from './config';

// Common utility types
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export interface ComponentHealth {
  component: string;
  status: 'healthy' | 'degraded' | 'failed';
  last_success: Date;
  consecutive_failures: number;
}
