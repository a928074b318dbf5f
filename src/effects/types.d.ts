// ============================================================================
// Configuration
// ============================================================================

import {ScanSettings, StoreAccount} from '../domain';

export type DatabaseConfig = {
    readonly connectionString?: string;
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type RedisConfig = {
    readonly host: string;
    readonly port: number;
}

export type LockConfig = {
    readonly ttlMs: number;
    readonly waitMs: number;
    readonly retryDelayMs: number;
}

export type ApiConfig = {
    readonly port: number;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly redis: RedisConfig;
    readonly lock: LockConfig;
    readonly api: ApiConfig;
    readonly stores: StoreAccount[];
    readonly scan: ScanSettings;
}
