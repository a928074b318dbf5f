/**
 * PURE SCAN LOGIC
 *
 * Values in, values out. Barcode and phone normalisation, the duplicate
 * policy, delivery-tag detection and the tag summaries all live here so they
 * can be exercised without a ledger, a store or a clock.
 */

import {
    DuplicateVerdict,
    NewScanRecord,
    OrderSnapshot,
    ScanRecord,
    ScanRecordPatch,
    ScanRejection,
    ScanSettings,
    TagCounts,
    TimeWindow,
} from '../domain';
import {CorrectionInput, LookupError} from './types';
import {Either, Just, Left, Maybe, Nothing, Right} from 'purify-ts';

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SCAN_SETTINGS: ScanSettings = {
    recencyWindowDays: 7,
    phoneWindowDays: 3,
    maxOrderDigits: 6,
    orderCutoffDays: 50,
    storeTimeoutMs: 15000,
    phoneCountryCode: '212',
    rejectUntaggedUnfulfilled: true,
};

// ============================================================================
// Normalisation
// ============================================================================

/**
 * Reduce a raw barcode to the canonical order identifier (`#` + digits).
 * Separators, prefixes and leading zeros are dropped, so `"00123"`,
 * `"ORD-123"` and `"#123"` all become `"#123"`.
 */
export function normalizeBarcode(barcode: string, maxDigits: number): Either<string, string> {
    const digits = (barcode.match(/\d+/g) ?? []).join('').replace(/^0+/, '');
    if (!digits || digits.length > maxDigits) {
        return Left('Invalid barcode');
    }
    return Right(`#${digits}`);
}

/**
 * Phone numbers compare on their national digits: `+212 6-12 34 56 78`,
 * `0612345678` and `00212612345678` are the same phone.
 */
export function normalizePhone(phone: string | null | undefined, countryCode: string): string | null {
    let digits = (phone ?? '').replace(/\D+/g, '');
    if (digits.startsWith('00')) digits = digits.slice(2);
    if (countryCode && digits.startsWith(countryCode)) digits = digits.slice(countryCode.length);
    digits = digits.replace(/^0+/, '');
    return digits.length > 0 ? digits : null;
}

// ============================================================================
// Time Windows
// ============================================================================

export function windowEndingAt(now: Date, days: number): TimeWindow {
    return {since: new Date(now.getTime() - days * DAY_MS), until: now};
}

// inclusive of the start, nothing after `until`
export function isWithinWindow(timestamp: Date, window: TimeWindow): boolean {
    const t = timestamp.getTime();
    return t >= window.since.getTime() && t <= window.until.getTime();
}

/**
 * The UTC calendar day named by a `YYYY-MM-DD` string, as a half-open
 * `[since, until)` range.
 */
export function utcDayRange(date: string): Either<string, TimeWindow> {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
    if (!match) return Left(`Invalid date: ${date}`);
    const since = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
    if (Number.isNaN(since.getTime()) || since.toISOString().slice(0, 10) !== date) {
        return Left(`Invalid date: ${date}`);
    }
    return Right({since, until: new Date(since.getTime() + DAY_MS)});
}

export function toUtcDate(timestamp: Date): string {
    return timestamp.toISOString().slice(0, 10);
}

// ============================================================================
// Delivery Tags
// ============================================================================

export const DELIVERY_TAGS = ['k', 'big', '12livery', 'fast', 'oscario', 'sand'] as const;

const deliveryTagSynonyms: Record<string, string> = {
    k: 'k',
    big: 'big',
    '12livery': '12livery',
    '12livrey': '12livery',
    fast: 'fast',
    oscario: 'oscario',
    sand: 'sand',
    sandy: 'sand',
};

function synonymFor(token: string): Maybe<string> {
    return Maybe.fromNullable(
        Object.prototype.hasOwnProperty.call(deliveryTagSynonyms, token) ? deliveryTagSynonyms[token] : undefined
    );
}

/**
 * Pick the courier tag out of an order's free-text tags. Tokens split on
 * commas and whitespace; two adjacent tokens may form one tag ("12 livery").
 * Returns "" when no token is a known tag.
 */
export function detectDeliveryTag(tags: string): string {
    const tokens = tags.toLowerCase().split(/[,\s]+/).filter(token => token.length > 0);
    for (let i = 0; i < tokens.length; i++) {
        const single = synonymFor(tokens[i]);
        if (single.isJust()) return single.extract();
        if (i + 1 < tokens.length) {
            const pair = synonymFor(tokens[i] + tokens[i + 1]);
            if (pair.isJust()) return pair.extract();
        }
    }
    return '';
}

// ============================================================================
// Duplicate Policy
// ============================================================================

/**
 * The newest scan of the order inside the recency window, if any.
 */
export function findRepeatScan(
    orderIdentifier: string,
    orderHistory: ScanRecord[],
    now: Date,
    settings: Pick<ScanSettings, 'recencyWindowDays'>
): Maybe<ScanRecord> {
    const recencyWindow = windowEndingAt(now, settings.recencyWindowDays);
    return Maybe.fromNullable(orderHistory.find(record =>
        record.orderIdentifier === orderIdentifier && isWithinWindow(record.createdAt, recencyWindow)
    ));
}

/**
 * A repeat scan is rejected from the ledger alone, before any store is asked.
 */
export function checkRepeatScan(
    orderIdentifier: string,
    orderHistory: ScanRecord[],
    now: Date,
    settings: Pick<ScanSettings, 'recencyWindowDays'>
): Maybe<ScanRejection> {
    return findRepeatScan(orderIdentifier, orderHistory, now, settings)
        .map(existing => buildRejection('DuplicateOrder', 'Duplicate order', orderIdentifier, {existing}));
}

export type DuplicateCheck = {
    readonly snapshot: OrderSnapshot;
    readonly orderHistory: ScanRecord[];
    readonly phoneHistory: ScanRecord[];
    readonly confirmDuplicate: boolean;
    readonly now: Date;
    readonly settings: ScanSettings;
};

/**
 * Classify a scan attempt against the ledger's recent history.
 *
 * A repeat of the same order inside the recency window is always rejected,
 * whatever the confirmation flag says. A different order for the same phone
 * inside the phone window needs an explicit confirmation.
 */
export function classifyScan(check: DuplicateCheck): DuplicateVerdict {
    const {snapshot, settings, now} = check;

    const previous = findRepeatScan(snapshot.orderIdentifier, check.orderHistory, now, settings);
    if (previous.isJust()) {
        return {decision: 'Reject', code: 'DuplicateOrder', reason: 'Duplicate order', existing: previous.extract()};
    }

    if (check.confirmDuplicate || !snapshot.phone) {
        return {decision: 'Accept'};
    }

    const phoneWindow = windowEndingAt(now, settings.phoneWindowDays);
    const matches = check.phoneHistory.filter(record =>
        !!record.phone &&
        record.phone === snapshot.phone &&
        record.orderIdentifier !== snapshot.orderIdentifier &&
        isWithinWindow(record.createdAt, phoneWindow)
    );
    if (matches.length > 0) {
        return {
            decision: 'NeedsConfirmation',
            code: 'DuplicatePhone',
            reason: `Duplicate phone in last ${settings.phoneWindowDays} days`,
            matches,
        };
    }

    return {decision: 'Accept'};
}

// ============================================================================
// Eligibility & Verdicts
// ============================================================================

export function checkEligibility(snapshot: OrderSnapshot, settings: ScanSettings): Maybe<ScanRejection> {
    const untagged = snapshot.tags.trim().length === 0;
    if (settings.rejectUntaggedUnfulfilled && untagged && snapshot.fulfillmentStatus.toLowerCase() === 'unfulfilled') {
        return Just(buildRejection('UnfulfilledUntagged', 'Unfulfilled order with no tag', snapshot.orderIdentifier, {snapshot}));
    }
    return Nothing;
}

export type RejectionExtra = Pick<ScanRejection, 'snapshot' | 'existing'> & {
    readonly retryable?: boolean;
};

export function buildRejection(
    code: ScanRejection['code'],
    reason: string,
    orderIdentifier: string | null,
    extra: RejectionExtra = {}
): ScanRejection {
    const {retryable, ...context} = extra;
    return {
        decision: code === 'DuplicatePhone' ? 'NeedsConfirmation' : 'Reject',
        code,
        reason,
        orderIdentifier,
        retryable: retryable ?? code === 'LookupFailure',
        ...context,
    };
}

export function fromVerdict(verdict: DuplicateVerdict, snapshot: OrderSnapshot): Maybe<ScanRejection> {
    switch (verdict.decision) {
        case 'Accept':
            return Nothing;
        case 'Reject':
            return Just(buildRejection(verdict.code, verdict.reason, snapshot.orderIdentifier, {snapshot, existing: verdict.existing}));
        case 'NeedsConfirmation':
            return Just(buildRejection(verdict.code, verdict.reason, snapshot.orderIdentifier, {snapshot}));
    }
}

/**
 * A NotFound is final only when every store answered; with stores skipped the
 * order may sit in one of them, so the caller may retry.
 */
export function fromLookupError(orderIdentifier: string, error: LookupError): ScanRejection {
    const causes = error.failures.map(failure => `${failure.store}: ${failure.message}`).join('; ');
    if (error.kind === 'LookupFailure') {
        return buildRejection('LookupFailure', `Store lookup failed (${causes})`, orderIdentifier);
    }
    if (error.failures.length === 0) {
        return buildRejection('NotFound', 'Order not found', orderIdentifier);
    }
    return buildRejection('NotFound', `Order not found (stores skipped: ${causes})`, orderIdentifier, {retryable: true});
}

export function describeOrderState(snapshot: OrderSnapshot): string {
    if (snapshot.orderStatus === 'closed') return '⚠️ Cancelled';
    if (snapshot.fulfillmentStatus.toLowerCase() !== 'fulfilled') return '❌ Unfulfilled';
    return '✅ OK';
}

export function toNewScanRecord(snapshot: OrderSnapshot, rawBarcode: string, now: Date): NewScanRecord {
    return {
        orderIdentifier: snapshot.orderIdentifier,
        store: snapshot.store,
        rawBarcode,
        phone: snapshot.phone,
        tags: snapshot.tags,
        deliveryTag: detectDeliveryTag(snapshot.tags),
        fulfillmentStatus: snapshot.fulfillmentStatus,
        financialStatus: snapshot.financialStatus,
        orderStatus: snapshot.orderStatus,
        result: describeOrderState(snapshot),
        driver: '',
        createdAt: now,
    };
}

// ============================================================================
// Operator Corrections
// ============================================================================

export function toRecordPatch(input: CorrectionInput): ScanRecordPatch {
    return {
        ...(input.tags !== undefined ? {tags: input.tags, deliveryTag: detectDeliveryTag(input.tags)} : {}),
        ...(input.driver !== undefined ? {driver: input.driver} : {}),
        ...(input.status !== undefined ? {orderStatus: input.status} : {}),
        ...(input.fulfillmentStatus !== undefined ? {fulfillmentStatus: input.fulfillmentStatus} : {}),
    };
}

// ============================================================================
// Tag Summaries
// ============================================================================

function emptyCounts(): TagCounts {
    return Object.fromEntries(DELIVERY_TAGS.map(tag => [tag, 0]));
}

export function summarizeTags(records: ScanRecord[]): TagCounts {
    return records.reduce((counts, record) => {
        if (!(record.deliveryTag in counts)) return counts;
        return {...counts, [record.deliveryTag]: counts[record.deliveryTag] + 1};
    }, emptyCounts());
}

export function summarizeTagsByStore(records: ScanRecord[]): Record<string, TagCounts> {
    const byStore = records.reduce<Record<string, ScanRecord[]>>((groups, record) => ({
        ...groups,
        [record.store]: [...(groups[record.store] ?? []), record],
    }), {});

    return Object.fromEntries(
        Object.entries(byStore).map(([store, storeRecords]) => [store, summarizeTags(storeRecords)])
    );
}
