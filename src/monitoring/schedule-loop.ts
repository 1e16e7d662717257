/**
 * Single-timer probe loop. Each tick probes every distinct address of the due
 * tenants once and feeds the outcome to all of them.
 */

import { EventEmitter } from 'events';
import { Persister, ProbeOutcome, Prober, Tenant, Transition, TransitionSink } from '../types';
import { ErrorHandler, NotFoundError } from '../error-handling';
import { TenantRegistry } from '../registry/tenant-registry';
import { DebounceEvaluator } from './debounce-evaluator';
import { logger } from '../utils/logger';

export type LoopState = 'idle' | 'probing' | 'dispatching' | 'stopped';

export interface AddressOutcome {
  outcome: ProbeOutcome;
  at: Date;
  tenants: number;
}

export interface LoopStatus {
  state: LoopState;
  running: boolean;
  tick_count: number;
  tick_interval_ms: number;
  last_tick_at: Date | null;
  last_tick_duration_ms: number | null;
  last_outcomes: Record<string, AddressOutcome>;
}

interface FeedResult {
  applied: boolean;
  transition: Transition | null;
}

export interface ScheduleLoopOptions {
  registry: TenantRegistry;
  prober: Prober;
  sink: TransitionSink;
  persister?: Persister;
  evaluator?: DebounceEvaluator;
  errorHandler?: ErrorHandler;
}

export class ScheduleLoop extends EventEmitter {
  private readonly registry: TenantRegistry;
  private readonly prober: Prober;
  private readonly sink: TransitionSink;
  private readonly persister: Persister | undefined;
  private readonly evaluator: DebounceEvaluator;
  private readonly errorHandler: ErrorHandler | undefined;

  private state: LoopState = 'idle';
  private running = false;
  private timer: NodeJS.Timeout | undefined;
  private currentTick: Promise<Transition[]> | null = null;
  private tickCount = 0;
  private lastTickAt: Date | null = null;
  private lastTickDuration: number | null = null;
  private lastProbedTick: Map<string, number> = new Map();
  private lastOutcomes: Map<string, AddressOutcome> = new Map();
  private log = logger.child('ScheduleLoop');

  constructor(options: ScheduleLoopOptions) {
    super();
    this.registry = options.registry;
    this.prober = options.prober;
    this.sink = options.sink;
    this.persister = options.persister;
    this.evaluator = options.evaluator ?? new DebounceEvaluator();
    this.errorHandler = options.errorHandler;

    this.registry.on('tenant:removed', (id: string) => {
      this.lastProbedTick.delete(id);
    });
  }

  start(): void {
    if (this.running) {
      this.log.warn('Schedule loop is already running');
      return;
    }

    this.running = true;
    this.state = 'idle';
    this.log.info(`Starting schedule loop with tick interval ${this.registry.getTickIntervalMs()}ms`);
    this.scheduleNext(0);
  }

  /**
   * Cancel the next tick and wait for the current one to complete
   */
  async stop(): Promise<void> {
    if (!this.running && this.state === 'stopped') {
      return;
    }

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    if (this.currentTick) {
      this.log.info('Waiting for the current tick to finish');
      await this.currentTick.catch(() => []);
    }

    this.state = 'stopped';
    this.log.info('Schedule loop stopped');
  }

  /**
   * Applies from the next scheduling on
   */
  setTickInterval(ms: number): void {
    this.registry.setTickIntervalMs(ms);
    this.log.info(`Tick interval set to ${ms}ms`);
  }

  getStatus(): LoopStatus {
    const lastOutcomes: Record<string, AddressOutcome> = {};
    for (const [address, outcome] of this.lastOutcomes) {
      lastOutcomes[address] = { ...outcome };
    }

    return {
      state: this.state,
      running: this.running,
      tick_count: this.tickCount,
      tick_interval_ms: this.registry.getTickIntervalMs(),
      last_tick_at: this.lastTickAt,
      last_tick_duration_ms: this.lastTickDuration,
      last_outcomes: lastOutcomes
    };
  }

  /**
   * Run one tick. Calls made while a tick is in progress share it.
   */
  runTick(): Promise<Transition[]> {
    if (this.currentTick) {
      return this.currentTick;
    }

    const tick = this.executeTick().finally(() => {
      this.currentTick = null;
    });
    this.currentTick = tick;
    return tick;
  }

  private scheduleNext(delay: number): void {
    if (!this.running) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.runTick()
        .catch(error => {
          this.log.error('Tick failed:', error);
          this.errorHandler?.report(error, { component: 'ScheduleLoop' });
        })
        .finally(() => this.scheduleNext(this.registry.getTickIntervalMs()));
    }, delay);
  }

  private async executeTick(): Promise<Transition[]> {
    const tick = ++this.tickCount;
    const startedAt = Date.now();
    const tickInterval = this.registry.getTickIntervalMs();

    const groups = this.groupDueTenants(tick, tickInterval);
    const transitions: Transition[] = [];

    this.state = 'probing';
    for (const [address, tenants] of groups) {
      const timeoutMs = Math.min(...tenants.map(tenant => tenant.timeout_ms));
      const outcome = await this.probeWithTimeout(address, timeoutMs);
      const at = new Date();
      this.lastOutcomes.set(address, { outcome, at, tenants: tenants.length });

      if (outcome.kind === 'failure') {
        this.log.debug(`Probe of ${address} failed (${outcome.reason}): ${outcome.message}`);
      }

      for (const tenant of tenants) {
        const fed = await this.feed(tenant.id, address, outcome, at);
        if (fed.applied) {
          this.lastProbedTick.set(tenant.id, tick);
        }
        if (fed.transition) {
          transitions.push(fed.transition);
        }
      }
    }

    this.state = 'dispatching';
    for (const transition of transitions) {
      this.log.info(`Server ${transition.tenant_id}: ${transition.from} -> ${transition.to}`);
      this.sink.push(transition);
    }

    if (transitions.length > 0) {
      await this.persist();
    }

    this.lastTickAt = new Date(startedAt);
    this.lastTickDuration = Date.now() - startedAt;
    this.state = this.running ? 'idle' : 'stopped';
    this.emit('tick:complete', { tick, addresses: groups.size, transitions: transitions.length });

    return transitions;
  }

  /**
   * Due tenants grouped by address, in registration order
   */
  private groupDueTenants(tick: number, tickInterval: number): Map<string, Readonly<Tenant>[]> {
    const groups = new Map<string, Readonly<Tenant>[]>();

    for (const tenant of this.registry.list()) {
      const last = this.lastProbedTick.get(tenant.id);
      const due = last === undefined || (tick - last) * tickInterval >= tenant.interval_ms;
      if (!due) {
        continue;
      }

      const group = groups.get(tenant.resource_address);
      if (group) {
        group.push(tenant);
      } else {
        groups.set(tenant.resource_address, [tenant]);
      }
    }

    return groups;
  }

  /**
   * The prober's own deadline kills its process, so once the loop's deadline wins
   * it still waits for the probe to settle before the next address is probed.
   */
  private async probeWithTimeout(address: string, timeoutMs: number): Promise<ProbeOutcome> {
    const probing = this.prober.probe(address, timeoutMs).catch(
      (error: unknown): ProbeOutcome => ({
        kind: 'failure',
        reason: 'error',
        message: error instanceof Error ? error.message : String(error)
      })
    );

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<ProbeOutcome>(resolve => {
      timer = setTimeout(
        () => resolve({ kind: 'failure', reason: 'timeout', message: `No reply from ${address} within ${timeoutMs}ms` }),
        timeoutMs
      );
    });

    try {
      return await Promise.race([probing, deadline]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      await probing;
    }
  }

  private async feed(id: string, address: string, outcome: ProbeOutcome, at: Date): Promise<FeedResult> {
    try {
      return await this.registry.mutate(id, (draft): FeedResult => {
        // The address changed after the tick picked this tenant
        if (draft.resource_address !== address) {
          return { applied: false, transition: null };
        }
        return { applied: true, transition: this.evaluator.observe(draft, outcome, at) };
      });
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.log.debug(`Server ${id} was removed during the tick`);
        return { applied: false, transition: null };
      }
      this.log.error(`Failed to update server ${id}:`, error);
      this.errorHandler?.report(error, { component: 'ScheduleLoop', target: id });
      return { applied: false, transition: null };
    }
  }

  private async persist(): Promise<void> {
    if (!this.persister) {
      return;
    }
    try {
      await this.persister.persist();
    } catch (error) {
      this.log.error('Failed to persist registry after transitions:', error);
      this.errorHandler?.report(error, { component: 'ScheduleLoop' });
    }
  }
}
