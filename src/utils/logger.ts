/**
 * Logger utility for the watchdog
 */

import { Logger as LoggerInterface } from '../types';

export class Logger implements LoggerInterface {
  private component: string;

  constructor(component: string) {
    this.component = component;
  }

  private formatMessage(level: string, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ' ' + args.map(arg => this.formatArg(arg)).join(' ') : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}${formattedArgs}`;
  }

  private formatArg(arg: unknown): string {
    if (arg instanceof Error) {
      return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    return typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg);
  }

  info(message: string, ...args: unknown[]): void {
    console.log(this.formatMessage('info', message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.formatMessage('warn', message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.formatMessage('error', message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' || process.env.DEBUG === 'true') {
      console.debug(this.formatMessage('debug', message, ...args));
    }
  }

  /** Logger for a sub-component, e.g. `Watchdog:Registry`. */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`);
  }
}

// Default logger instance
export const logger = new Logger('Watchdog');
