/**
 * Unit tests for WorkerPool
 */

import { RequestIdentityContext } from '@docdesk/auth';
import { WorkerPool } from '../src/index.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('WorkerPool', () => {
  let identity: RequestIdentityContext;

  beforeEach(() => {
    identity = new RequestIdentityContext();
  });

  it('should reject a non-positive size', () => {
    expect(() => new WorkerPool(0, identity)).toThrow(RangeError);
  });

  it('should bound concurrency and queue the rest', async () => {
    const pool = new WorkerPool(2, identity);
    const gates = [deferred(), deferred(), deferred()];

    const results = gates.map((gate, i) => pool.submit(async () => {
      await gate.promise;
      return i;
    }));

    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(1);

    gates[0].resolve();
    await results[0];
    await settle();

    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(0);

    gates[1].resolve();
    gates[2].resolve();
    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2]);
    await settle();
    expect(pool.active).toBe(0);
  });

  it('should run queued tasks under the submitter identity', async () => {
    const pool = new WorkerPool(1, identity);
    const gate = deferred();

    const alice = identity.run('alice', () => pool.submit(async () => {
      await gate.promise;
      return identity.current();
    }));
    const bob = identity.run('bob', () => pool.submit(async () => identity.current()));

    gate.resolve();

    await expect(alice).resolves.toBe('alice');
    await expect(bob).resolves.toBe('bob');
  });

  it('should free the slot when a task fails', async () => {
    const pool = new WorkerPool(1, identity);

    const failing = pool.submit(async () => {
      throw new Error('boom');
    });
    const next = pool.submit(async () => 'done');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
    await settle();
    expect(pool.active).toBe(0);
  });

  it('should turn a synchronous throw into a rejection', async () => {
    const pool = new WorkerPool(1, identity);

    const failing = pool.submit((): Promise<string> => {
      throw new Error('sync boom');
    });

    await expect(failing).rejects.toThrow('sync boom');
    await expect(pool.submit(async () => 'after')).resolves.toBe('after');
  });
});
