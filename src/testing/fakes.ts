/**
 * In-process stand-ins shared by the test suites
 */

import {
  Notifier,
  Persister,
  ProbeOutcome,
  Prober,
  StatusBoard,
  TenantDefaults,
  Transition,
  TransitionSink
} from '../types';

export const TEST_DEFAULTS: TenantDefaults = {
  resource_name: 'Example',
  resource_address: 'host-a',
  interval_ms: 1000,
  timeout_ms: 5000,
  required_consecutive: 3,
  message_templates: {
    up: '%%RESOURCE%% is back online, %%ROLE%%!',
    down: '%%RESOURCE%% is down, %%ROLE%%.'
  }
};

export const SUCCESS: ProbeOutcome = { kind: 'success', rtt_ms: 12 };
export const FAILURE: ProbeOutcome = { kind: 'failure', reason: 'unreachable', message: 'no reply' };

export interface ProbeCall {
  address: string;
  timeoutMs: number;
}

/**
 * Prober answering from a per-address script; the last entry repeats
 */
export class FakeProber implements Prober {
  calls: ProbeCall[] = [];
  private scripts: Map<string, ProbeOutcome[]> = new Map();
  private unresolvable: Set<string> = new Set();

  constructor(private fallback: ProbeOutcome = SUCCESS) {}

  script(address: string, outcomes: ProbeOutcome[]): this {
    this.scripts.set(address, [...outcomes]);
    return this;
  }

  markUnresolvable(address: string): this {
    this.unresolvable.add(address);
    return this;
  }

  async probe(address: string, timeoutMs: number): Promise<ProbeOutcome> {
    this.calls.push({ address, timeoutMs });
    const script = this.scripts.get(address);
    if (!script || script.length === 0) {
      return this.fallback;
    }
    const next = script.length > 1 ? script.shift() : script[0];
    return next ?? this.fallback;
  }

  async resolve(address: string): Promise<string> {
    if (this.unresolvable.has(address)) {
      throw new Error(`getaddrinfo ENOTFOUND ${address}`);
    }
    return '192.0.2.10';
  }
}

export interface SentMessage {
  channel: string;
  role: string | null;
  message: string;
}

export interface PublishedStatus {
  channel: string;
  board: StatusBoard;
  previousMessageId: string | null;
}

export class RecordingNotifier implements Notifier {
  sent: SentMessage[] = [];
  published: PublishedStatus[] = [];
  failNext = 0;
  private nextMessageId = 1;

  mentionRole(role: string | null): string {
    return role === null ? 'people' : `<@&${role}>`;
  }

  async notify(channel: string, role: string | null, message: string): Promise<void> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('channel unavailable');
    }
    this.sent.push({ channel, role, message });
  }

  async publishStatus(channel: string, board: StatusBoard, previousMessageId: string | null): Promise<string | null> {
    this.published.push({ channel, board, previousMessageId });
    return `status-${this.nextMessageId++}`;
  }
}

export class RecordingSink implements TransitionSink {
  transitions: Transition[] = [];

  push(transition: Transition): void {
    this.transitions.push(transition);
  }
}

export class CountingPersister implements Persister {
  saves = 0;
  failWith: Error | null = null;

  async persist(): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.saves++;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}
