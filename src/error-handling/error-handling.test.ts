/**
 * Tests for error types and ErrorHandler
 */

import {
  CapacityExceededError,
  DeliveryError,
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  NotFoundError,
  PersistError,
  ValidationError,
  WatchdogError,
  errorMessage
} from './index';

describe('error types', () => {
  it('should describe capacity errors', () => {
    const error = new CapacityExceededError(10, 10);

    expect(error).toBeInstanceOf(WatchdogError);
    expect(error.message).toBe('There are already 10 servers registered and only 10 registrations are allowed');
    expect(error.category).toBe(ErrorCategory.CAPACITY);
  });

  it('should name the missing server', () => {
    expect(new NotFoundError('guild-1').message).toBe('Server guild-1 is not registered');
  });

  it('should carry field errors on validation errors', () => {
    const error = new ValidationError('bad input', [{ field: 'interval', message: 'must be positive', value: 0 }]);

    expect(error.fields).toEqual([{ field: 'interval', message: 'must be positive', value: 0 }]);
    expect(error.toJSON()).toMatchObject({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      component: 'CommandService',
      message: 'bad input'
    });
  });

  it('should keep the message of foreign errors', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('ErrorHandler', () => {
  let handler: ErrorHandler;

  beforeEach(() => {
    handler = new ErrorHandler();
  });

  it('should record watchdog errors as they are', () => {
    const listener = jest.fn();
    handler.on('errorReported', listener);

    const record = handler.report(new DeliveryError('send failed', 'chan-1', 500));

    expect(record).toMatchObject({
      category: ErrorCategory.DELIVERY,
      severity: ErrorSeverity.MEDIUM,
      component: 'Notifier',
      target: 'chan-1',
      message: 'send failed'
    });
    expect(listener).toHaveBeenCalledWith(record);
  });

  it('should wrap foreign errors with the reported context', () => {
    const record = handler.report(new Error('sqlite busy'), { component: 'Persister', target: 'guild-1' });

    expect(record).toMatchObject({
      category: ErrorCategory.PERSISTENCE,
      severity: ErrorSeverity.MEDIUM,
      component: 'Persister',
      target: 'guild-1',
      message: 'sqlite busy'
    });
  });

  it('should degrade a component after repeated failures and recover it on success', () => {
    const recovered = jest.fn();
    handler.on('componentRecovered', recovered);

    for (let i = 0; i < 3; i++) {
      handler.report(new Error('send failed'), { component: 'DispatchSink' });
    }
    expect(handler.getComponentHealth('DispatchSink')).toMatchObject({ status: 'degraded', consecutive_failures: 3 });
    expect(handler.getSystemHealth().overall_status).toBe('degraded');

    handler.recordSuccess('DispatchSink');

    expect(handler.getComponentHealth('DispatchSink')).toMatchObject({ status: 'healthy', consecutive_failures: 0 });
    expect(recovered).toHaveBeenCalledWith('DispatchSink');
    expect(handler.getSystemHealth().overall_status).toBe('healthy');
  });

  it('should degrade immediately on high severity errors', () => {
    handler.report(new PersistError('disk full'));

    expect(handler.getComponentHealth('ConfigStore')?.status).toBe('degraded');
  });

  it('should report critical health when most components failed', () => {
    const critical = jest.fn();
    handler.on('criticalError', critical);

    for (let i = 0; i < 6; i++) {
      handler.report(new Error('send failed'), { component: 'DispatchSink' });
    }

    expect(handler.getComponentHealth('DispatchSink')?.status).toBe('failed');
    expect(handler.getSystemHealth().overall_status).toBe('critical');
    expect(critical).toHaveBeenCalledTimes(1);
  });

  it('should count errors by category and severity', () => {
    handler.report(new NotFoundError('guild-1'));
    handler.report(new DeliveryError('send failed', 'chan-1'));

    const stats = handler.getErrorStatistics();

    expect(stats.total_errors).toBe(2);
    expect(stats.errors_by_category[ErrorCategory.NOT_FOUND]).toBe(1);
    expect(stats.errors_by_category[ErrorCategory.DELIVERY]).toBe(1);
  });

  it('should file foreign errors under the reporting component', () => {
    expect(handler.report(new Error('boom'), { component: 'DispatchSink' }).category).toBe(ErrorCategory.DELIVERY);
    expect(handler.report(new Error('boom'), { component: 'Prober' }).category).toBe(ErrorCategory.PROBE);
    expect(handler.report(new Error('boom'), { component: 'ScheduleLoop' }).category).toBe(ErrorCategory.INTERNAL);
    expect(handler.report(new Error('boom'), { component: 'ApiServer' }).category).toBe(ErrorCategory.INTERNAL);
    expect(handler.report(new Error('boom')).category).toBe(ErrorCategory.INTERNAL);
  });

  it('should fall back to the message when the component says nothing', () => {
    const record = handler.report(new Error('Failed to resolve nowhere.test'), { component: 'CommandService' });

    expect(record.category).toBe(ErrorCategory.PROBE);
  });

  describe('health monitoring', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      handler.stopHealthMonitoring();
      jest.useRealTimers();
    });

    it('should emit health checks and drop day old records', () => {
      const healthCheck = jest.fn();
      handler.on('healthCheck', healthCheck);
      handler.report(new Error('old'), { component: 'ScheduleLoop' });

      handler.startHealthMonitoring(60000);
      jest.advanceTimersByTime(60000);

      expect(healthCheck).toHaveBeenCalledTimes(1);
      expect(handler.getErrorStatistics().total_errors).toBe(1);

      jest.setSystemTime(Date.now() + 25 * 60 * 60 * 1000);
      jest.advanceTimersByTime(60000);

      expect(healthCheck).toHaveBeenCalledTimes(2);
      expect(handler.getErrorStatistics().total_errors).toBe(0);
    });

    it('should stop checking once stopped', () => {
      const healthCheck = jest.fn();
      handler.on('healthCheck', healthCheck);

      handler.startHealthMonitoring(1000);
      handler.stopHealthMonitoring();
      jest.advanceTimersByTime(5000);

      expect(healthCheck).not.toHaveBeenCalled();
    });
  });
});
