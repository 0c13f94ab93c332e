// __tests__/services/EmployeeLock.test.ts
import {
  LockClient,
  MemoryEmployeeLock,
  RedisEmployeeLock,
  lockKey,
} from '@/services/Attendance/EmployeeLock';
import { AppError, ErrorCode } from '@/types/attendance/error';

const tick = () => new Promise((resolve) => setImmediate(resolve));

/** In-process stand-in for the two Redis commands the lock uses. */
class FakeLockClient implements LockClient {
  readonly keys = new Map<string, string>();
  failRelease = false;

  async set(
    key: string,
    value: string,
    _mode: 'PX',
    _ttlMs: number,
    _flag: 'NX',
  ): Promise<'OK' | null> {
    if (this.keys.has(key)) return null;
    this.keys.set(key, value);
    return 'OK';
  }

  async eval(_script: string, _numKeys: number, ...args: string[]): Promise<unknown> {
    if (this.failRelease) throw new Error('connection lost');
    const [key, token] = args;
    if (this.keys.get(key) !== token) return 0;
    this.keys.delete(key);
    return 1;
  }
}

describe('EmployeeLock', () => {
  it('should namespace keys per employee', () => {
    expect(lockKey('U1')).toBe('attendance:lock:U1');
  });

  describe('MemoryEmployeeLock', () => {
    it('should run calls for one employee one at a time', async () => {
      const lock = new MemoryEmployeeLock();
      const order: string[] = [];
      let releaseFirst: () => void = () => undefined;
      const firstGate = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const first = lock.withLock('U1', async () => {
        order.push('first:start');
        await firstGate;
        order.push('first:end');
        return 1;
      });
      const second = lock.withLock('U1', async () => {
        order.push('second');
        return 2;
      });

      await tick();
      expect(order).toEqual(['first:start']);

      releaseFirst();
      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not block other employees', async () => {
      const lock = new MemoryEmployeeLock();
      let releaseFirst: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const blocked = lock.withLock('U1', () => gate);
      await expect(lock.withLock('U2', async () => 'done')).resolves.toBe('done');

      releaseFirst();
      await blocked;
    });

    it('should release after a failure', async () => {
      const lock = new MemoryEmployeeLock();
      await expect(
        lock.withLock('U1', async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      await expect(lock.withLock('U1', async () => 'next')).resolves.toBe('next');
    });
  });

  describe('RedisEmployeeLock', () => {
    it('should hold the key while running and release it afterwards', async () => {
      const client = new FakeLockClient();
      const lock = new RedisEmployeeLock(client);

      const seen = await lock.withLock('U1', async () => client.keys.has('attendance:lock:U1'));

      expect(seen).toBe(true);
      expect(client.keys.size).toBe(0);
    });

    it('should wait for a held key', async () => {
      const client = new FakeLockClient();
      client.keys.set('attendance:lock:U1', 'someone-else');
      const lock = new RedisEmployeeLock(client, { retryDelayMs: 5, waitMs: 1000 });

      const pending = lock.withLock('U1', async () => 'ran');
      setTimeout(() => client.keys.delete('attendance:lock:U1'), 20);

      await expect(pending).resolves.toBe('ran');
    });

    it('should fail with STORE_UNAVAILABLE when the wait runs out', async () => {
      const client = new FakeLockClient();
      client.keys.set('attendance:lock:U1', 'someone-else');
      const lock = new RedisEmployeeLock(client, { retryDelayMs: 5, waitMs: 20 });
      const fn = jest.fn(async () => 'ran');

      const error = await lock.withLock('U1', fn).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AppError);
      expect(error instanceof AppError && error.code).toBe(ErrorCode.STORE_UNAVAILABLE);
      expect(fn).not.toHaveBeenCalled();
      expect(client.keys.get('attendance:lock:U1')).toBe('someone-else');
    });

    it('should not delete a key taken over by another holder', async () => {
      const client = new FakeLockClient();
      const lock = new RedisEmployeeLock(client);

      await lock.withLock('U1', async () => {
        // TTL expired and another process took the key
        client.keys.set('attendance:lock:U1', 'other-token');
      });

      expect(client.keys.get('attendance:lock:U1')).toBe('other-token');
    });

    it('should return the result even if the release fails', async () => {
      const client = new FakeLockClient();
      client.failRelease = true;
      const lock = new RedisEmployeeLock(client);

      await expect(lock.withLock('U1', async () => 42)).resolves.toBe(42);
    });
  });
});
