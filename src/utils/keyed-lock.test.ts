import { KeyedLock } from './keyed-lock';
import { deferred } from '../testing/fakes';

describe('KeyedLock', () => {
  it('should run tasks for the same key one after another', async () => {
    const lock = new KeyedLock();
    const gate = deferred<void>();
    const order: string[] = [];

    const first = lock.run('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('a', () => {
      order.push('second');
    });

    await new Promise(resolve => setImmediate(resolve));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred<void>();

    const blocked = lock.run('a', () => gate.promise);

    await expect(lock.run('b', () => 'done')).resolves.toBe('done');
    gate.resolve();
    await blocked;
  });

  it('should release the key when a task throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('a', () => 7)).resolves.toBe(7);
  });
});
