/**
 * HTTP HANDLERS
 *
 * Framework-free request handlers: each takes the already-parsed request
 * parts and the app effects and resolves to a status and a JSON body.
 * server.ts only moves these in and out of express.
 */
import {AcceptedScan, ScanRecord, ScanRejection, ScanSettings} from '../domain';
import {AppEffects} from '../pure/effects';
import {processScan} from '../pure/scanProcessing';
import {
  detectDeliveryTag,
  summarizeTags,
  summarizeTagsByStore,
  toRecordPatch,
  toUtcDate,
  utcDayRange,
} from '../pure/businessLogic';
import {errorMessage} from '../utils/errors';
import {LockTimeoutError} from '../effects/LockTimeoutError';
import {safeValidateData} from '../utils/validate';
import {Either} from 'purify-ts';
import {z} from 'zod';

export type HttpResult = {
  readonly status: number;
  readonly body?: unknown;
};

const ScanBodySchema = z.object({
  barcode: z.string(),
  confirm_duplicate: z.boolean().optional().default(false),
});

const ListQuerySchema = z.object({
  date: z.string().optional(),
  tag: z.string().optional(),
});

const CorrectionBodySchema = z.object({
  tags: z.string().optional(),
  driver: z.string().optional(),
  status: z.string().optional(),
  fulfillment_status: z.string().optional(),
});

const rejectionLabels: Record<ScanRejection['code'], (reason: string) => string> = {
  ValidationError: () => '❌ Invalid barcode',
  NotFound: () => '❌ Not Found',
  LookupFailure: () => '❌ Store lookup failed',
  DuplicateOrder: () => '⚠️ Already Scanned',
  DuplicatePhone: (reason) => `⚠️ ${reason}`,
  UnfulfilledUntagged: () => '❌ Unfulfilled order with no tag — not added',
};

const rejectionStatus: Partial<Record<ScanRejection['code'], number>> = {
  ValidationError: 400,
  LookupFailure: 502,
};

// ============================================================================
// Wire format
// ============================================================================

export function toScanRecordResponse(record: ScanRecord) {
  return {
    id: record.id,
    order_identifier: record.orderIdentifier,
    store: record.store,
    raw_barcode: record.rawBarcode,
    phone: record.phone ?? '',
    tags: record.tags,
    delivery_tag: record.deliveryTag,
    fulfillment_status: record.fulfillmentStatus,
    financial_status: record.financialStatus,
    status: record.orderStatus,
    result: record.result,
    driver: record.driver,
    ts: record.createdAt.toISOString(),
  };
}

export function toScanResponse(outcome: Either<ScanRejection, AcceptedScan>): HttpResult {
  return outcome.caseOf<HttpResult>({
    Right: ({record}) => ({
      status: 200,
      body: {
        decision: 'Accept',
        code: 'Accepted',
        id: record.id,
        order_identifier: record.orderIdentifier,
        tags: record.tags,
        delivery_tag: record.deliveryTag,
        fulfillment_status: record.fulfillmentStatus,
        result: record.result,
        store: record.store,
        ts: record.createdAt.toISOString(),
      },
    }),
    Left: (rejection) => {
      const {existing, snapshot} = rejection;
      const tags = existing?.tags ?? snapshot?.tags ?? '';
      return {
        status: rejectionStatus[rejection.code] ?? 200,
        body: {
          decision: rejection.decision,
          code: rejection.code,
          order_identifier: rejection.orderIdentifier,
          tags,
          delivery_tag: existing?.deliveryTag ?? detectDeliveryTag(tags),
          fulfillment_status: existing?.fulfillmentStatus ?? snapshot?.fulfillmentStatus ?? '',
          result: rejectionLabels[rejection.code](rejection.reason),
          store: existing?.store ?? snapshot?.store ?? '',
          ts: existing ? existing.createdAt.toISOString() : null,
          reason: rejection.reason,
          needs_confirmation: rejection.decision === 'NeedsConfirmation',
          retryable: rejection.retryable,
        },
      };
    },
  });
}

function badRequest(error: string): HttpResult {
  return {status: 400, body: {error}};
}

/**
 * Map infrastructure failures to a response. Domain outcomes never get here.
 */
async function guarded(label: string, work: () => Promise<HttpResult>): Promise<HttpResult> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof LockTimeoutError) {
      console.warn(`⏳ ${label}: ${error.message}`);
      return {status: 503, body: {error: error.message, retryable: true}};
    }
    console.error(`❌ ${label} failed:`, error);
    return {status: 500, body: {error: `${label} failed`, details: errorMessage(error)}};
  }
}

/**
 * Response for an error raised before a handler ran, such as a body the JSON
 * parser refused. Client errors keep their status; anything else is a 500.
 */
export function requestErrorResult(error: unknown): HttpResult {
  if (error instanceof SyntaxError) {
    return badRequest('Malformed JSON body');
  }
  if (typeof error === 'object' && error !== null && 'status' in error &&
      typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return {status: error.status, body: {error: errorMessage(error)}};
  }
  console.error('❌ Unhandled request error:', error);
  return {status: 500, body: {error: 'Internal server error'}};
}

function parseScanId(id: string): number | null {
  return /^\d+$/.test(id) ? Number(id) : null;
}

function resolveDate(date: string | undefined, appEffects: AppEffects): Either<string, string> {
  const day = date ?? toUtcDate(appEffects.clock.now());
  return utcDayRange(day).map(() => day);
}

// ============================================================================
// Handlers
// ============================================================================

export function handleScan(body: unknown, settings: ScanSettings): (appEffects: AppEffects) => Promise<HttpResult> {
  return (appEffects) => guarded('Scan', async () => {
    const parsed = safeValidateData(ScanBodySchema, body);
    if (!parsed.success) return badRequest(parsed.error);

    const outcome = await processScan(
      {barcode: parsed.data.barcode, confirmDuplicate: parsed.data.confirm_duplicate},
      settings
    )(appEffects);
    return toScanResponse(outcome);
  });
}

export function handleListScans(query: unknown): (appEffects: AppEffects) => Promise<HttpResult> {
  return (appEffects) => guarded('List scans', async () => {
    const parsed = safeValidateData(ListQuerySchema, query);
    if (!parsed.success) return badRequest(parsed.error);

    const date = resolveDate(parsed.data.date, appEffects);
    if (date.isLeft()) return badRequest(date.extract());

    const records = await appEffects.ledger.listByDateAndTag(date.extract(), parsed.data.tag || undefined);
    return {status: 200, body: records.map(toScanRecordResponse)};
  });
}

export function handleTagSummary(
  query: unknown,
  byStore: boolean
): (appEffects: AppEffects) => Promise<HttpResult> {
  return (appEffects) => guarded('Tag summary', async () => {
    const parsed = safeValidateData(ListQuerySchema, query);
    if (!parsed.success) return badRequest(parsed.error);

    const date = resolveDate(parsed.data.date, appEffects);
    if (date.isLeft()) return badRequest(date.extract());

    const records = await appEffects.ledger.listByDateAndTag(date.extract());
    return {status: 200, body: byStore ? summarizeTagsByStore(records) : summarizeTags(records)};
  });
}

export function handleUpdateScan(id: string, body: unknown): (appEffects: AppEffects) => Promise<HttpResult> {
  return (appEffects) => guarded('Update scan', async () => {
    const scanId = parseScanId(id);
    if (scanId === null) return badRequest(`Invalid scan id: ${id}`);

    const parsed = safeValidateData(CorrectionBodySchema, body);
    if (!parsed.success) return badRequest(parsed.error);

    const patch = toRecordPatch({
      tags: parsed.data.tags,
      driver: parsed.data.driver,
      status: parsed.data.status,
      fulfillmentStatus: parsed.data.fulfillment_status,
    });
    const updated = await appEffects.ledger.update(scanId, patch);
    return updated.caseOf<HttpResult>({
      Just: (record) => ({status: 200, body: toScanRecordResponse(record)}),
      Nothing: () => ({status: 404, body: {error: `Scan ${scanId} not found`}}),
    });
  });
}

export function handleDeleteScan(id: string): (appEffects: AppEffects) => Promise<HttpResult> {
  return (appEffects) => guarded('Delete scan', async () => {
    const scanId = parseScanId(id);
    if (scanId === null) return badRequest(`Invalid scan id: ${id}`);

    const deleted = await appEffects.ledger.delete(scanId);
    return deleted ? {status: 204} : {status: 404, body: {error: `Scan ${scanId} not found`}};
  });
}
