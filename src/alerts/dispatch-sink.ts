/**
 * Bounded transition queue and the consumer that delivers it.
 * The producer never waits: when the queue is full the oldest entry is dropped.
 */

import { EventEmitter } from 'events';
import { Notifier, Persister, Tenant, Transition, TransitionSink } from '../types';
import { ErrorHandler, NotFoundError } from '../error-handling';
import { TenantRegistry } from '../registry/tenant-registry';
import { renderTemplate } from './template';
import { logger } from '../utils/logger';

export const DEFAULT_QUEUE_CAPACITY = 256;

export interface DispatchEntry {
  tenant_id: string;
  transition: Transition;
}

export interface DispatchStats {
  pending: number;
  in_flight: boolean;
  delivered: number;
  failed: number;
  skipped: number;
  dropped: number;
}

export interface DispatchSinkOptions {
  registry: TenantRegistry;
  notifier: Notifier;
  capacity?: number;
  persister?: Persister;
  errorHandler?: ErrorHandler;
}

export class DispatchSink extends EventEmitter implements TransitionSink {
  private readonly registry: TenantRegistry;
  private readonly notifier: Notifier;
  private readonly capacity: number;
  private readonly persister: Persister | undefined;
  private readonly errorHandler: ErrorHandler | undefined;

  private queue: DispatchEntry[] = [];
  private running = false;
  private inFlight = false;
  private draining: Promise<void> | null = null;
  private idleWaiters: Array<() => void> = [];
  private stats = { delivered: 0, failed: 0, skipped: 0, dropped: 0 };
  private log = logger.child('DispatchSink');

  constructor(options: DispatchSinkOptions) {
    super();
    this.registry = options.registry;
    this.notifier = options.notifier;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_QUEUE_CAPACITY);
    this.persister = options.persister;
    this.errorHandler = options.errorHandler;
  }

  push(transition: Transition): void {
    if (this.queue.length >= this.capacity) {
      const dropped = this.queue.shift();
      this.stats.dropped++;
      if (dropped) {
        this.log.warn(
          `Dispatch queue full (${this.capacity}), dropped transition ${dropped.transition.from} -> ${dropped.transition.to} of server ${dropped.tenant_id}`
        );
        this.emit('dropped', dropped);
      }
    }

    this.queue.push({ tenant_id: transition.tenant_id, transition });
    this.kick();
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.log.info('Dispatch sink started');
    this.kick();
  }

  /**
   * Finish the delivery in flight and stop consuming
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.draining) {
      await this.draining;
    }
    if (this.queue.length > 0) {
      this.log.warn(`Dispatch sink stopped with ${this.queue.length} undelivered transitions`);
    }
    this.notifyIdle();
    this.log.info('Dispatch sink stopped');
  }

  /**
   * Resolves once the queue is empty and nothing is being delivered, or at once
   * while the sink is not consuming. Waiters are released when it stops.
   */
  whenIdle(): Promise<void> {
    const idle = this.queue.length === 0 && !this.inFlight && this.draining === null;
    if (idle || (!this.running && this.draining === null)) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  pending(): DispatchEntry[] {
    return this.queue.map(entry => ({ ...entry }));
  }

  getStats(): DispatchStats {
    return {
      pending: this.queue.length,
      in_flight: this.inFlight,
      ...this.stats
    };
  }

  private kick(): void {
    if (!this.running || this.draining) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.queue.length === 0) {
        this.notifyIdle();
      } else {
        // pushed between the last shift and this callback
        this.kick();
      }
    });
  }

  private async drain(): Promise<void> {
    while (this.running) {
      const entry = this.queue.shift();
      if (!entry) {
        break;
      }

      this.inFlight = true;
      try {
        await this.deliver(entry);
      } finally {
        this.inFlight = false;
      }
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private async deliver(entry: DispatchEntry): Promise<void> {
    const { transition } = entry;
    const tenant = this.registry.get(entry.tenant_id);

    if (!tenant) {
      this.stats.skipped++;
      this.log.warn(`Server ${entry.tenant_id} is no longer registered, transition to ${transition.to} not delivered`);
      return;
    }
    if (tenant.notify_channel === null) {
      this.stats.skipped++;
      this.log.warn(`Server ${tenant.id} has no notification channel, transition to ${transition.to} not delivered`);
      return;
    }

    const message = renderTemplate(
      tenant.message_templates[transition.to],
      tenant.resource_name,
      this.notifier.mentionRole(tenant.notify_role)
    );

    try {
      await this.notifier.notify(tenant.notify_channel, tenant.notify_role, message);
      this.stats.delivered++;
      this.errorHandler?.recordSuccess('DispatchSink');
      this.emit('delivered', entry);
    } catch (error) {
      this.stats.failed++;
      this.log.error(`Failed to notify server ${tenant.id}:`, error);
      this.errorHandler?.report(error, { component: 'DispatchSink', target: tenant.id });
    }

    await this.publishStatus(tenant, tenant.notify_channel, transition);
  }

  private async publishStatus(tenant: Readonly<Tenant>, channel: string, transition: Transition): Promise<void> {
    if (!this.notifier.publishStatus) {
      return;
    }

    try {
      const messageId = await this.notifier.publishStatus(
        channel,
        {
          resource_name: tenant.resource_name,
          resource_address: tenant.resource_address,
          status: transition.to,
          since: transition.at
        },
        tenant.status_message_id
      );
      await this.registry.mutate(tenant.id, draft => {
        draft.status_message_id = messageId;
      });
      await this.persister?.persist();
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.log.debug(`Server ${tenant.id} removed while its status message was published`);
        return;
      }
      this.log.error(`Failed to publish status of server ${tenant.id}:`, error);
      this.errorHandler?.report(error, { component: 'DispatchSink', target: tenant.id });
    }
  }
}
