/**
 * Error types and classifications for the watchdog
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  PROBE = 'probe',
  CAPACITY = 'capacity',
  CONFLICT = 'conflict',
  NOT_FOUND = 'not_found',
  PERMISSION = 'permission',
  VALIDATION = 'validation',
  PERSISTENCE = 'persistence',
  DELIVERY = 'delivery',
  INTERNAL = 'internal'
}

export interface WatchdogErrorRecord {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  component: string;
  target?: string;
  message: string;
  details?: Record<string, unknown>;
  stack_trace?: string;
}

export class WatchdogError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly component: string;
  public readonly target?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    component: string,
    target?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WatchdogError';
    this.category = category;
    this.severity = severity;
    this.component = component;
    if (target !== undefined) {
      this.target = target;
    }
    if (details !== undefined) {
      this.details = details;
    }
    this.timestamp = new Date();

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): WatchdogErrorRecord {
    return {
      id: this.generateId(),
      timestamp: this.timestamp,
      category: this.category,
      severity: this.severity,
      component: this.component,
      ...(this.target !== undefined && { target: this.target }),
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
      ...(this.stack !== undefined && { stack_trace: this.stack })
    };
  }

  private generateId(): string {
    return `${this.component}-${this.category}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}

export class ProbeError extends WatchdogError {
  constructor(message: string, address: string, details?: Record<string, unknown>) {
    super(message, ErrorCategory.PROBE, ErrorSeverity.MEDIUM, 'Prober', address, details);
    this.name = 'ProbeError';
  }
}

export class CapacityExceededError extends WatchdogError {
  constructor(public readonly registered: number, public readonly limit: number) {
    super(
      `There are already ${registered} servers registered and only ${limit} registrations are allowed`,
      ErrorCategory.CAPACITY,
      ErrorSeverity.LOW,
      'TenantRegistry',
      undefined,
      { registered, limit }
    );
    this.name = 'CapacityExceededError';
  }
}

export class AlreadyRegisteredError extends WatchdogError {
  constructor(tenantId: string) {
    super(`Server ${tenantId} is already registered`, ErrorCategory.CONFLICT, ErrorSeverity.LOW, 'TenantRegistry', tenantId);
    this.name = 'AlreadyRegisteredError';
  }
}

export class NotFoundError extends WatchdogError {
  constructor(tenantId: string) {
    super(`Server ${tenantId} is not registered`, ErrorCategory.NOT_FOUND, ErrorSeverity.LOW, 'TenantRegistry', tenantId);
    this.name = 'NotFoundError';
  }
}

export class PermissionDeniedError extends WatchdogError {
  constructor(message: string, tenantId?: string) {
    super(message, ErrorCategory.PERMISSION, ErrorSeverity.LOW, 'CommandService', tenantId);
    this.name = 'PermissionDeniedError';
  }
}

export interface FieldError {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends WatchdogError {
  public readonly fields: FieldError[];

  constructor(message: string, fields: FieldError[] = [], component = 'CommandService') {
    super(message, ErrorCategory.VALIDATION, ErrorSeverity.LOW, component, undefined, { fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export class PersistError extends WatchdogError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCategory.PERSISTENCE, ErrorSeverity.HIGH, 'ConfigStore', undefined, {
      originalError: cause instanceof Error ? cause.message : String(cause)
    });
    this.name = 'PersistError';
  }
}

export class DeliveryError extends WatchdogError {
  constructor(message: string, channel: string, public readonly status?: number) {
    super(message, ErrorCategory.DELIVERY, ErrorSeverity.MEDIUM, 'Notifier', channel, status !== undefined ? { status } : undefined);
    this.name = 'DeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
