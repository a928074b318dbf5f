import {ScanLock} from '../pure/effects';
import {LockConfig} from './types';
import {LockTimeoutError} from './LockTimeoutError';
import {errorMessage} from '../utils/errors';
import {randomUUID} from 'node:crypto';
import {setTimeout as sleep} from 'node:timers/promises';
import {createClient} from 'redis';

// deletes the key only while it still holds our token
export const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0`;

export type LockCommands = {
  readonly acquire: (key: string, token: string, ttlMs: number) => Promise<boolean>;
  readonly release: (key: string, token: string) => Promise<void>;
};

export function redisLockCommands(client: Pick<ReturnType<typeof createClient>, 'set' | 'eval'>): LockCommands {
  return {
    acquire: async (key, token, ttlMs) => (await client.set(key, token, {NX: true, PX: ttlMs})) === 'OK',
    release: async (key, token) => {
      await client.eval(RELEASE_SCRIPT, {keys: [key], arguments: [token]});
    },
  };
}

// ============================================================================
// Redis per-order lock
// ============================================================================

export class RedisScanLock implements ScanLock {
  constructor(private commands: LockCommands, private config: LockConfig) {}

  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const lockKey = `scan-lock:${key}`;
    const token = randomUUID();
    const deadline = Date.now() + this.config.waitMs;

    while (!(await this.commands.acquire(lockKey, token, this.config.ttlMs))) {
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(key, this.config.waitMs);
      }
      await sleep(this.config.retryDelayMs);
    }

    try {
      return await work();
    } finally {
      // an unreleased key expires after ttlMs
      await this.commands.release(lockKey, token).catch(error =>
        console.error(`Failed to release ${lockKey}:`, errorMessage(error))
      );
    }
  }
}
