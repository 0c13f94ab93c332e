// services/Attendance/EmployeeLock.ts
import { randomUUID } from 'crypto';
import { AppError, ErrorCode } from '../../types/attendance/error';
import { Logger, createSilentLogger } from '../../utils/logger';

/** Serializes attendance writes for one employee. */
export interface EmployeeLock {
  withLock<T>(employeeId: string, fn: () => Promise<T>): Promise<T>;
}

export const lockKey = (employeeId: string) => `attendance:lock:${employeeId}`;

/**
 * In-process lock: each employee gets a promise chain, and every caller waits
 * for the previous tail before running.
 */
export class MemoryEmployeeLock implements EmployeeLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(employeeId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(employeeId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(employeeId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(employeeId) === tail) {
        this.tails.delete(employeeId);
      }
    }
  }
}

/** The subset of ioredis the lock needs. */
export interface LockClient {
  set(
    key: string,
    value: string,
    mode: 'PX',
    ttlMs: number,
    flag: 'NX',
  ): Promise<'OK' | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

// Deletes the key only while it still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export interface RedisEmployeeLockOptions {
  ttlMs?: number;
  waitMs?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

export class RedisEmployeeLock implements EmployeeLock {
  private readonly ttlMs: number;
  private readonly waitMs: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: LockClient,
    options: RedisEmployeeLockOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 30000;
    this.waitMs = options.waitMs ?? 5000;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.logger = options.logger ?? createSilentLogger('RedisEmployeeLock');
  }

  async withLock<T>(employeeId: string, fn: () => Promise<T>): Promise<T> {
    const key = lockKey(employeeId);
    const token = await this.acquire(key);
    try {
      return await fn();
    } finally {
      await this.release(key, token);
    }
  }

  private async acquire(key: string): Promise<string> {
    const token = randomUUID();
    const deadline = Date.now() + this.waitMs;

    for (;;) {
      const acquired = await this.client.set(key, token, 'PX', this.ttlMs, 'NX');
      if (acquired === 'OK') return token;

      if (Date.now() >= deadline) {
        this.logger.warn('Lock wait timed out', { key, waitMs: this.waitMs });
        throw new AppError({
          code: ErrorCode.STORE_UNAVAILABLE,
          message: `Could not acquire ${key}`,
          details: { key },
        });
      }
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
    }
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      await this.client.eval(RELEASE_SCRIPT, 1, key, token);
    } catch (error) {
      // The TTL frees the key if this fails
      this.logger.error('Failed to release lock', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
