import {NewScanRecord, ScanRecord, ScanRecordPatch, TimeWindow} from '../domain';
import {ScanLedger} from '../pure/effects';
import {utcDayRange} from '../pure/businessLogic';
import {Pool} from 'pg';
import {Maybe} from 'purify-ts';

export const SCANS_SCHEMA = `
CREATE TABLE IF NOT EXISTS scans (
  id SERIAL PRIMARY KEY,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  order_identifier TEXT NOT NULL,
  store TEXT NOT NULL DEFAULT '',
  raw_barcode TEXT NOT NULL DEFAULT '',
  phone TEXT,
  tags TEXT NOT NULL DEFAULT '',
  delivery_tag TEXT NOT NULL DEFAULT '',
  fulfillment_status TEXT NOT NULL DEFAULT '',
  financial_status TEXT NOT NULL DEFAULT '',
  order_status TEXT NOT NULL DEFAULT '',
  result TEXT NOT NULL DEFAULT '',
  driver TEXT NOT NULL DEFAULT ''
);
CREATE INDEX IF NOT EXISTS scans_order_identifier_created_at_idx ON scans (order_identifier, created_at);
CREATE INDEX IF NOT EXISTS scans_phone_created_at_idx ON scans (phone, created_at);
CREATE INDEX IF NOT EXISTS scans_created_at_idx ON scans (created_at);
`;

const COLUMNS =
  'id, created_at, order_identifier, store, raw_barcode, phone, tags, delivery_tag, ' +
  'fulfillment_status, financial_status, order_status, result, driver';

type ScanRow = {
  id: number;
  created_at: Date;
  order_identifier: string;
  store: string;
  raw_barcode: string;
  phone: string | null;
  tags: string;
  delivery_tag: string;
  fulfillment_status: string;
  financial_status: string;
  order_status: string;
  result: string;
  driver: string;
};

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof ScanRecordPatch, string]> = [
  ['tags', 'tags'],
  ['deliveryTag', 'delivery_tag'],
  ['driver', 'driver'],
  ['orderStatus', 'order_status'],
  ['fulfillmentStatus', 'fulfillment_status'],
];

export function fromRow(row: ScanRow): ScanRecord {
  return {
    id: row.id,
    createdAt: row.created_at,
    orderIdentifier: row.order_identifier,
    store: row.store,
    rawBarcode: row.raw_barcode,
    phone: row.phone,
    tags: row.tags,
    deliveryTag: row.delivery_tag,
    fulfillmentStatus: row.fulfillment_status,
    financialStatus: row.financial_status,
    orderStatus: row.order_status,
    result: row.result,
    driver: row.driver,
  };
}

// ============================================================================
// PostgreSQL Scan Ledger
// ============================================================================

export class PostgresScanLedger implements ScanLedger {
  constructor(private pool: Pick<Pool, 'query'>) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(SCANS_SCHEMA);
  }

  async insert(record: NewScanRecord): Promise<ScanRecord> {
    const result = await this.pool.query<ScanRow>(
      `INSERT INTO scans (created_at, order_identifier, store, raw_barcode, phone, tags, delivery_tag,
         fulfillment_status, financial_status, order_status, result, driver)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING ${COLUMNS}`,
      [
        record.createdAt,
        record.orderIdentifier,
        record.store,
        record.rawBarcode,
        record.phone,
        record.tags,
        record.deliveryTag,
        record.fulfillmentStatus,
        record.financialStatus,
        record.orderStatus,
        record.result,
        record.driver,
      ]
    );
    return fromRow(result.rows[0]);
  }

  async findRecentByOrder(orderIdentifier: string, window: TimeWindow): Promise<ScanRecord[]> {
    const result = await this.pool.query<ScanRow>(
      `SELECT ${COLUMNS} FROM scans
       WHERE order_identifier = $1 AND created_at >= $2 AND created_at <= $3
       ORDER BY created_at DESC`,
      [orderIdentifier, window.since, window.until]
    );
    return result.rows.map(fromRow);
  }

  async findRecentByPhone(phone: string, window: TimeWindow): Promise<ScanRecord[]> {
    const result = await this.pool.query<ScanRow>(
      `SELECT ${COLUMNS} FROM scans
       WHERE phone = $1 AND created_at >= $2 AND created_at <= $3
       ORDER BY created_at DESC`,
      [phone, window.since, window.until]
    );
    return result.rows.map(fromRow);
  }

  async listByDateAndTag(date: string, tag?: string): Promise<ScanRecord[]> {
    const day = utcDayRange(date).caseOf({
      Left: message => { throw new Error(message); },
      Right: range => range,
    });
    const params: unknown[] = [day.since, day.until];
    const tagFilter = tag ? ` AND delivery_tag = $${params.push(tag)}` : '';

    const result = await this.pool.query<ScanRow>(
      `SELECT ${COLUMNS} FROM scans
       WHERE created_at >= $1 AND created_at < $2${tagFilter}
       ORDER BY created_at DESC`,
      params
    );
    return result.rows.map(fromRow);
  }

  async update(id: number, patch: ScanRecordPatch): Promise<Maybe<ScanRecord>> {
    const params: unknown[] = [id];
    const assignments = PATCH_COLUMNS.flatMap(([field, column]) => {
      const value = patch[field];
      return value === undefined ? [] : [`${column} = $${params.push(value)}`];
    });

    const result = assignments.length === 0
      ? await this.pool.query<ScanRow>(`SELECT ${COLUMNS} FROM scans WHERE id = $1`, params)
      : await this.pool.query<ScanRow>(
          `UPDATE scans SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${COLUMNS}`,
          params
        );
    return Maybe.fromNullable(result.rows.at(0)).map(fromRow);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM scans WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
