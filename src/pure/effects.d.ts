/**
 * EFFECTS LAYER
 *
 * The scan pipeline touches the outside world only through these interfaces:
 * the store accounts, the scan ledger, a per-order lock and a clock.
 * Production implementations live in ../effects; tests hand in fakes.
 */

import {NewScanRecord, OrderSnapshot, ScanRecord, ScanRecordPatch, TimeWindow} from '../domain';
import {Maybe} from 'purify-ts';

// ============================================================================
// Effect Interfaces
// ============================================================================

/**
 * One store account. Resolves to Nothing when the store has no such order;
 * rejects when the store could not be asked.
 */
export interface StoreClient {
  readonly name: string;
  readonly lookupOrder: (orderIdentifier: string) => Promise<Maybe<OrderSnapshot>>;
}

export interface ScanLedger {
  readonly insert: (record: NewScanRecord) => Promise<ScanRecord>;
  readonly findRecentByOrder: (orderIdentifier: string, window: TimeWindow) => Promise<ScanRecord[]>;
  readonly findRecentByPhone: (phone: string, window: TimeWindow) => Promise<ScanRecord[]>;
  readonly listByDateAndTag: (date: string, tag?: string) => Promise<ScanRecord[]>;
  readonly update: (id: number, patch: ScanRecordPatch) => Promise<Maybe<ScanRecord>>;
  readonly delete: (id: number) => Promise<boolean>;
}

/**
 * Mutual exclusion keyed by order identifier around check-then-write.
 */
export interface ScanLock {
  readonly withLock: <T>(key: string, work: () => Promise<T>) => Promise<T>;
}

export interface Clock {
  readonly now: () => Date;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly stores: readonly StoreClient[];
  readonly ledger: ScanLedger;
  readonly locks: ScanLock;
  readonly clock: Clock;
}
