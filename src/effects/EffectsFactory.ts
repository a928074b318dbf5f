/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Wires the scan pipeline to real services:
 * - Shopify Admin API (one axios client per store account)
 * - PostgreSQL for the scan ledger
 * - Redis for the per-order scan lock
 */
import {AppEffects, Clock, ScanLedger, ScanLock, StoreClient} from '../pure/effects';
import {ProductionConfig} from './types';
import {loadConfigFromEnv} from './config';
import {ShopifyStoreClient} from './ShopifyStoreClient';
import {PostgresScanLedger} from './PostgresScanLedger';
import {RedisScanLock, redisLockCommands} from './RedisScanLock';
import {Pool} from 'pg';
import {createClient} from 'redis';

export type ManagedEffects = AppEffects & {
  readonly close: () => Promise<void>;
};

const systemClock: Clock = {
  now: () => new Date(),
};

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements ManagedEffects {
  private _pool?: Pool;
  private _redisClient?: ReturnType<typeof createClient>;
  private _stores?: StoreClient[];
  private _ledger?: PostgresScanLedger;
  private _locks?: ScanLock;

  readonly clock: Clock = systemClock;

  constructor(private config: ProductionConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      const {database} = this.config;
      this._pool = new Pool({
        ...(database.connectionString
          ? {connectionString: database.connectionString}
          : {
              host: database.host,
              port: database.port,
              user: database.user,
              password: database.password,
              database: database.database,
            }),
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private async getRedisClient(): Promise<ReturnType<typeof createClient>> {
    if (!this._redisClient) {
      this._redisClient = createClient({
        socket: {
          host: this.config.redis.host,
          port: this.config.redis.port,
        },
      });

      this._redisClient.on('error', (err) => console.error('Redis Client Error:', err));

      await this._redisClient.connect();
      console.log('✅ Connected to Redis');
    }
    return this._redisClient;
  }

  get stores(): StoreClient[] {
    if (!this._stores) {
      this._stores = this.config.stores.map(account => new ShopifyStoreClient(account, this.config.scan));
    }
    return this._stores;
  }

  get ledger(): ScanLedger {
    if (!this._ledger) {
      // Synchronous access requires pool to be already initialized
      if (!this._pool) {
        throw new Error('Database pool not initialized. Call initialize() first.');
      }
      this._ledger = new PostgresScanLedger(this._pool);
    }
    return this._ledger;
  }

  get locks(): ScanLock {
    if (!this._locks) {
      if (!this._redisClient) {
        throw new Error('Redis client not initialized. Call initialize() first.');
      }
      this._locks = new RedisScanLock(redisLockCommands(this._redisClient), this.config.lock);
    }
    return this._locks;
  }

  /**
   * Connect PostgreSQL and Redis and make sure the scans table exists.
   * Must be called before using the effects.
   */
  async initialize(): Promise<void> {
    const pool = await this.getPool();
    await new PostgresScanLedger(pool).ensureSchema();
    await this.getRedisClient();
    if (this.config.stores.length === 0) {
      console.warn('⚠️ No store accounts configured; every scan will fail its lookup');
    }
    console.log(`✅ All production effects initialized (${this.config.stores.length} stores)`);
  }

  async close(): Promise<void> {
    await this._redisClient?.quit();
    await this._pool?.end();
    this._redisClient = undefined;
    this._pool = undefined;
  }

  static async make(config?: ProductionConfig): Promise<ManagedEffects> {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    await effects.initialize();
    return effects;
  }
}

export async function makeAppEffects(config?: ProductionConfig): Promise<ManagedEffects> {
  return EffectsFactory.make(config);
}
