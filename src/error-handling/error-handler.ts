/**
 * Error handler that records failures reported by the watchdog components,
 * logs them by severity and tracks per-component health
 */

import { EventEmitter } from 'events';
import { Logger } from '../utils/logger';
import { ComponentHealth } from '../types';
import {
  ErrorCategory,
  ErrorSeverity,
  WatchdogError,
  WatchdogErrorRecord
} from './error-types';

export interface SystemHealth {
  overall_status: 'healthy' | 'degraded' | 'critical';
  component_health: ComponentHealth[];
  active_errors: WatchdogErrorRecord[];
  last_health_check: Date;
}

export interface ErrorStatistics {
  total_errors: number;
  active_errors: number;
  errors_by_category: Record<ErrorCategory, number>;
  errors_by_severity: Record<ErrorSeverity, number>;
}

export interface ErrorContext {
  component?: string;
  target?: string;
  [key: string]: unknown;
}

const DEFAULT_MAX_RECORDS = 500;
const ACTIVE_WINDOW_MS = 60 * 60 * 1000;
const HEALTH_CHECK_INTERVAL_MS = 60 * 1000;

const COMPONENT_CATEGORIES: Record<string, ErrorCategory | undefined> = {
  DispatchSink: ErrorCategory.DELIVERY,
  Notifier: ErrorCategory.DELIVERY,
  Prober: ErrorCategory.PROBE,
  ConfigStore: ErrorCategory.PERSISTENCE,
  Persister: ErrorCategory.PERSISTENCE,
  ConfigManager: ErrorCategory.VALIDATION
};

export class ErrorHandler extends EventEmitter {
  private logger: Logger;
  private errors: WatchdogErrorRecord[] = [];
  private componentHealth: Map<string, ComponentHealth> = new Map();
  private readonly maxRecords: number;
  private healthCheckInterval: NodeJS.Timeout | undefined;

  constructor(maxRecords: number = DEFAULT_MAX_RECORDS) {
    super();
    this.logger = new Logger('ErrorHandler');
    this.maxRecords = maxRecords;
  }

  /**
   * Record an error. Plain errors are wrapped with the context's component.
   */
  report(error: unknown, context: ErrorContext = {}): WatchdogErrorRecord {
    const record = error instanceof WatchdogError ? error.toJSON() : this.toRecord(error, context);

    this.errors.push(record);
    if (this.errors.length > this.maxRecords) {
      this.errors.splice(0, this.errors.length - this.maxRecords);
    }

    this.logError(record);
    this.updateComponentHealth(record);

    // 'error' would throw without a listener
    this.emit('errorReported', record);

    const systemHealth = this.getSystemHealth();
    if (systemHealth.overall_status === 'critical') {
      this.emit('criticalError', systemHealth);
    }

    return record;
  }

  /**
   * Mark a component as working again after a successful operation
   */
  recordSuccess(component: string): void {
    const health = this.componentHealth.get(component);
    if (!health) {
      this.componentHealth.set(component, {
        component,
        status: 'healthy',
        last_success: new Date(),
        consecutive_failures: 0
      });
      return;
    }

    if (health.status !== 'healthy') {
      this.logger.info(`Component ${component} recovered after ${health.consecutive_failures} failures`);
      this.emit('componentRecovered', component);
    }
    health.consecutive_failures = 0;
    health.last_success = new Date();
    health.status = 'healthy';
  }

  getComponentHealth(component: string): ComponentHealth | undefined {
    const health = this.componentHealth.get(component);
    return health ? { ...health } : undefined;
  }

  getSystemHealth(): SystemHealth {
    const cutoff = Date.now() - ACTIVE_WINDOW_MS;
    const componentHealthArray = Array.from(this.componentHealth.values(), health => ({ ...health }));
    const activeErrors = this.errors.filter(error => {
      const health = this.componentHealth.get(error.component);
      return error.timestamp.getTime() >= cutoff && health !== undefined && health.status !== 'healthy';
    });

    let overallStatus: SystemHealth['overall_status'] = 'healthy';
    const failedComponents = componentHealthArray.filter(c => c.status === 'failed');
    const degradedComponents = componentHealthArray.filter(c => c.status === 'degraded');

    if (
      activeErrors.some(e => e.severity === ErrorSeverity.CRITICAL) ||
      failedComponents.length > componentHealthArray.length * 0.5
    ) {
      overallStatus = 'critical';
    } else if (failedComponents.length > 0 || degradedComponents.length > 0) {
      overallStatus = 'degraded';
    }

    return {
      overall_status: overallStatus,
      component_health: componentHealthArray,
      active_errors: activeErrors,
      last_health_check: new Date()
    };
  }

  getErrorStatistics(): ErrorStatistics {
    const errorsByCategory: Record<ErrorCategory, number> = {
      [ErrorCategory.PROBE]: 0,
      [ErrorCategory.CAPACITY]: 0,
      [ErrorCategory.CONFLICT]: 0,
      [ErrorCategory.NOT_FOUND]: 0,
      [ErrorCategory.PERMISSION]: 0,
      [ErrorCategory.VALIDATION]: 0,
      [ErrorCategory.PERSISTENCE]: 0,
      [ErrorCategory.DELIVERY]: 0,
      [ErrorCategory.INTERNAL]: 0
    };
    const errorsBySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0
    };

    this.errors.forEach(error => {
      errorsByCategory[error.category]++;
      errorsBySeverity[error.severity]++;
    });

    return {
      total_errors: this.errors.length,
      active_errors: this.getSystemHealth().active_errors.length,
      errors_by_category: errorsByCategory,
      errors_by_severity: errorsBySeverity
    };
  }

  /**
   * Emit `healthCheck` and drop old error records every interval
   */
  startHealthMonitoring(intervalMs: number = HEALTH_CHECK_INTERVAL_MS): void {
    if (this.healthCheckInterval) {
      return;
    }
    this.healthCheckInterval = setInterval(() => {
      this.performHealthCheck();
    }, intervalMs);
    this.healthCheckInterval.unref();
  }

  stopHealthMonitoring(): void {
    if (this.healthCheckInterval) {
      clearInterval(this.healthCheckInterval);
      this.healthCheckInterval = undefined;
    }
  }

  /**
   * Drop error records older than maxAge
   */
  clearOldErrors(maxAge: number = 24 * 60 * 60 * 1000): number {
    const cutoff = Date.now() - maxAge;
    const before = this.errors.length;
    this.errors = this.errors.filter(error => error.timestamp.getTime() >= cutoff);
    const cleared = before - this.errors.length;

    if (cleared > 0) {
      this.logger.info(`Cleared ${cleared} old error records`);
    }
    return cleared;
  }

  private performHealthCheck(): void {
    const systemHealth = this.getSystemHealth();
    this.emit('healthCheck', systemHealth);

    this.clearOldErrors();

    this.logger.debug(
      `Health check completed. Status: ${systemHealth.overall_status}, Active errors: ${systemHealth.active_errors.length}`
    );
  }

  private toRecord(error: unknown, context: ErrorContext): WatchdogErrorRecord {
    const err = error instanceof Error ? error : new Error(String(error));
    const { component, target, ...details } = context;

    return {
      id: `error-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp: new Date(),
      category: this.categorizeError(err, component),
      severity: ErrorSeverity.MEDIUM,
      component: component ?? 'unknown',
      message: err.message,
      ...(target !== undefined && { target }),
      details: { ...details, originalError: err.name },
      ...(err.stack !== undefined && { stack_trace: err.stack })
    };
  }

  /**
   * Categorize a foreign error by the reporting component, then by its message
   */
  private categorizeError(error: Error, component: string | undefined): ErrorCategory {
    const byComponent = component !== undefined ? COMPONENT_CATEGORIES[component] : undefined;
    if (byComponent) {
      return byComponent;
    }

    const message = error.message.toLowerCase();

    if (message.includes('sqlite') || message.includes('database') || message.includes('persist')) {
      return ErrorCategory.PERSISTENCE;
    }
    if (message.includes('ping') || message.includes('resolve') || message.includes('lookup')) {
      return ErrorCategory.PROBE;
    }
    if (message.includes('config') || message.includes('validation')) {
      return ErrorCategory.VALIDATION;
    }

    return ErrorCategory.INTERNAL;
  }

  private logError(error: WatchdogErrorRecord): void {
    const logMessage = `[${error.category}] ${error.component}: ${error.message}`;

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.logger.error(`CRITICAL ERROR - ${logMessage}`, error.details ?? '');
        break;
      case ErrorSeverity.HIGH:
        this.logger.error(`HIGH SEVERITY - ${logMessage}`, error.details ?? '');
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(`MEDIUM SEVERITY - ${logMessage}`, error.details ?? '');
        break;
      case ErrorSeverity.LOW:
        this.logger.info(`LOW SEVERITY - ${logMessage}`, error.details ?? '');
        break;
    }
  }

  private updateComponentHealth(error: WatchdogErrorRecord): void {
    const component = error.component;
    let health = this.componentHealth.get(component);

    if (!health) {
      health = {
        component,
        status: 'healthy',
        last_success: new Date(0),
        consecutive_failures: 0
      };
      this.componentHealth.set(component, health);
    }

    health.consecutive_failures++;

    if (error.severity === ErrorSeverity.CRITICAL || health.consecutive_failures > 5) {
      health.status = 'failed';
    } else if (error.severity === ErrorSeverity.HIGH || health.consecutive_failures > 2) {
      health.status = 'degraded';
    }
  }
}
