/**
 * Tests for DispatchSink
 */

import { DispatchSink } from './dispatch-sink';
import { TenantRegistry } from '../registry/tenant-registry';
import { ResourceStatus, SampleStatus, Transition } from '../types';
import { CountingPersister, RecordingNotifier, TEST_DEFAULTS } from '../testing/fakes';

const AT = new Date('2024-05-01T10:00:00.000Z');

function transition(tenantId: string, from: ResourceStatus, to: SampleStatus): Transition {
  return { tenant_id: tenantId, from, to, at: AT };
}

describe('DispatchSink', () => {
  let registry: TenantRegistry;
  let notifier: RecordingNotifier;
  let persister: CountingPersister;
  let sink: DispatchSink;

  beforeEach(() => {
    registry = new TenantRegistry({ defaults: TEST_DEFAULTS, maxTenants: 5, tickIntervalMs: 1000 });
    registry.register({ id: 'm', notify_channel: 'chan-1', notify_role: 'role-1' });
    notifier = new RecordingNotifier();
    persister = new CountingPersister();
    sink = new DispatchSink({ registry, notifier, persister, capacity: 3 });
  });

  afterEach(async () => {
    await sink.stop();
  });

  it('should drop the oldest entries when full', () => {
    const dropped = jest.fn();
    sink.on('dropped', dropped);

    for (let i = 0; i < 5; i++) {
      sink.push(transition(`t${i}`, 'unknown', 'up'));
    }

    expect(sink.pending().map(entry => entry.tenant_id)).toEqual(['t2', 't3', 't4']);
    expect(sink.getStats()).toMatchObject({ pending: 3, dropped: 2 });
    expect(dropped).toHaveBeenCalledTimes(2);
    expect(dropped.mock.calls[0][0]).toMatchObject({ tenant_id: 't0' });
  });

  it('should not deliver before it is started', async () => {
    sink.push(transition('m', 'unknown', 'down'));
    await new Promise(resolve => setImmediate(resolve));

    expect(notifier.sent).toEqual([]);
    expect(sink.getStats().pending).toBe(1);
  });

  it('should render the template with the current settings', async () => {
    sink.start();
    await registry.mutate('m', draft => {
      draft.resource_name = 'Game server';
    });

    sink.push(transition('m', 'unknown', 'down'));
    await sink.whenIdle();

    expect(notifier.sent).toEqual([{ channel: 'chan-1', role: 'role-1', message: 'Game server is down, <@&role-1>.' }]);
  });

  it('should fall back to people without a role', async () => {
    registry.register({ id: 't', notify_channel: 'chan-2' });
    sink.start();

    sink.push(transition('t', 'down', 'up'));
    await sink.whenIdle();

    expect(notifier.sent).toEqual([{ channel: 'chan-2', role: null, message: 'Example is back online, people!' }]);
  });

  it('should publish the status message and remember its id', async () => {
    sink.start();

    sink.push(transition('m', 'unknown', 'down'));
    sink.push(transition('m', 'down', 'up'));
    await sink.whenIdle();

    expect(notifier.published).toEqual([
      {
        channel: 'chan-1',
        board: { resource_name: 'Example', resource_address: 'host-a', status: 'down', since: AT },
        previousMessageId: null
      },
      {
        channel: 'chan-1',
        board: { resource_name: 'Example', resource_address: 'host-a', status: 'up', since: AT },
        previousMessageId: 'status-1'
      }
    ]);
    expect(registry.get('m')?.status_message_id).toBe('status-2');
    expect(persister.saves).toBe(2);
  });

  it('should deliver in the order transitions were pushed', async () => {
    sink.push(transition('m', 'unknown', 'up'));
    sink.push(transition('m', 'up', 'down'));
    sink.push(transition('m', 'down', 'up'));

    sink.start();
    await sink.whenIdle();

    expect(notifier.sent.map(sent => sent.message)).toEqual([
      'Example is back online, <@&role-1>!',
      'Example is down, <@&role-1>.',
      'Example is back online, <@&role-1>!'
    ]);
    expect(sink.getStats()).toEqual({
      pending: 0,
      in_flight: false,
      delivered: 3,
      failed: 0,
      skipped: 0,
      dropped: 0
    });
  });

  it('should skip tenants without a channel', async () => {
    registry.register({ id: 't' });
    sink.start();

    sink.push(transition('t', 'unknown', 'up'));
    await sink.whenIdle();

    expect(notifier.sent).toEqual([]);
    expect(notifier.published).toEqual([]);
    expect(sink.getStats().skipped).toBe(1);
  });

  it('should skip tenants that are no longer registered', async () => {
    sink.start();

    sink.push(transition('ghost', 'unknown', 'up'));
    await sink.whenIdle();

    expect(notifier.sent).toEqual([]);
    expect(sink.getStats().skipped).toBe(1);
  });

  it('should count failed deliveries and keep going', async () => {
    notifier.failNext = 1;
    sink.start();

    sink.push(transition('m', 'unknown', 'down'));
    sink.push(transition('m', 'down', 'up'));
    await sink.whenIdle();

    expect(notifier.sent.map(sent => sent.message)).toEqual(['Example is back online, <@&role-1>!']);
    expect(sink.getStats()).toMatchObject({ delivered: 1, failed: 1 });
    expect(notifier.published).toHaveLength(2);
  });

  it('should stop without delivering the rest of the queue', async () => {
    sink.push(transition('m', 'unknown', 'down'));

    await sink.stop();

    expect(notifier.sent).toEqual([]);
    expect(sink.pending()).toHaveLength(1);
  });

  it('should not wait for entries a stopped sink will never deliver', async () => {
    sink.push(transition('m', 'unknown', 'down'));

    await expect(sink.whenIdle()).resolves.toBeUndefined();
    expect(sink.pending()).toHaveLength(1);
  });

  it('should release idle waiters when it stops with entries queued', async () => {
    sink.push(transition('m', 'unknown', 'down'));
    sink.start();
    sink.push(transition('m', 'down', 'up'));
    let released = false;
    const idle = sink.whenIdle().then(() => {
      released = true;
    });

    await sink.stop();
    await idle;

    expect(released).toBe(true);
    expect(notifier.sent).toHaveLength(1);
    expect(sink.pending().map(entry => entry.transition.to)).toEqual(['up']);
  });
});
