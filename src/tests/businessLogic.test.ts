/**
 * TESTS FOR PURE SCAN LOGIC
 *
 * No fakes and no mocks: plain values in, plain values out.
 */

import {ScanSettings} from '../domain';
import {
  DEFAULT_SCAN_SETTINGS,
  DuplicateCheck,
  buildRejection,
  checkEligibility,
  checkRepeatScan,
  classifyScan,
  describeOrderState,
  detectDeliveryTag,
  fromLookupError,
  normalizeBarcode,
  normalizePhone,
  summarizeTags,
  summarizeTagsByStore,
  toNewScanRecord,
  toRecordPatch,
  utcDayRange,
} from '../pure/businessLogic';
import {NOW, makeRecord, makeSnapshot} from './fakes';

const settings: ScanSettings = DEFAULT_SCAN_SETTINGS;

describe('normalizeBarcode', () => {
  it.each([
    ['1001', '#1001'],
    ['00123', '#123'],
    ['ORD-123', '#123'],
    ['#123', '#123'],
    [' 12 34 ', '#1234'],
    ['123456', '#123456'],
  ])('normalizes %p to %p', (barcode, expected) => {
    expect(normalizeBarcode(barcode, 6).extract()).toBe(expected);
  });

  it.each(['', 'abc', '0000', '1234567'])('rejects %p', (barcode) => {
    const result = normalizeBarcode(barcode, 6);
    expect(result.isLeft()).toBe(true);
    expect(result.extract()).toBe('Invalid barcode');
  });

  it('is idempotent', () => {
    const once = normalizeBarcode('ORD-000987', 6).extract();
    expect(once).toBe('#987');
    expect(normalizeBarcode(once, 6).extract()).toBe(once);
  });
});

describe('normalizePhone', () => {
  it('reduces every spelling of a number to its national digits', () => {
    expect(normalizePhone('+212 6-12 34 56 78', '212')).toBe('612345678');
    expect(normalizePhone('0612345678', '212')).toBe('612345678');
    expect(normalizePhone('00212612345678', '212')).toBe('612345678');
  });

  it('returns null when there are no digits', () => {
    expect(normalizePhone(null, '212')).toBeNull();
    expect(normalizePhone('', '212')).toBeNull();
    expect(normalizePhone('n/a', '212')).toBeNull();
  });
});

describe('detectDeliveryTag', () => {
  it('finds the courier among other tags, ignoring case', () => {
    expect(detectDeliveryTag('cod 24/07/25, FAST, urgent')).toBe('fast');
    expect(detectDeliveryTag('K')).toBe('k');
  });

  it('maps synonyms and spelling variants', () => {
    expect(detectDeliveryTag('SANDY')).toBe('sand');
    expect(detectDeliveryTag('12livrey')).toBe('12livery');
  });

  it('joins two adjacent tokens into one tag', () => {
    expect(detectDeliveryTag('12 livery')).toBe('12livery');
  });

  it('returns an empty string when no tag is known', () => {
    expect(detectDeliveryTag('snack, khaso')).toBe('');
    expect(detectDeliveryTag('')).toBe('');
  });
});

describe('classifyScan', () => {
  const check: DuplicateCheck = {
    snapshot: makeSnapshot(),
    orderHistory: [],
    phoneHistory: [],
    confirmDuplicate: false,
    now: NOW,
    settings,
  };

  it('accepts an order with no history', () => {
    expect(classifyScan(check)).toEqual({decision: 'Accept'});
  });

  it('rejects an order scanned inside the recency window, even when confirmed', () => {
    const existing = makeRecord();
    const verdict = classifyScan({...check, orderHistory: [existing], confirmDuplicate: true});

    expect(verdict).toEqual({decision: 'Reject', code: 'DuplicateOrder', reason: 'Duplicate order', existing});
  });

  it('includes the first instant of the recency window', () => {
    const onEdge = makeRecord({createdAt: new Date('2025-07-17T10:00:00.000Z')});
    const justOutside = makeRecord({createdAt: new Date('2025-07-17T09:59:59.999Z')});

    expect(classifyScan({...check, orderHistory: [onEdge]}).decision).toBe('Reject');
    expect(classifyScan({...check, orderHistory: [justOutside]}).decision).toBe('Accept');
  });

  it('asks for confirmation when another order used the same phone recently', () => {
    const other = makeRecord({id: 7, orderIdentifier: '#1000'});
    const verdict = classifyScan({...check, phoneHistory: [other]});

    expect(verdict).toEqual({
      decision: 'NeedsConfirmation',
      code: 'DuplicatePhone',
      reason: 'Duplicate phone in last 3 days',
      matches: [other],
    });
  });

  it('accepts a phone match once confirmed', () => {
    const other = makeRecord({orderIdentifier: '#1000'});
    expect(classifyScan({...check, phoneHistory: [other], confirmDuplicate: true})).toEqual({decision: 'Accept'});
  });

  it('skips the phone check when the order has no phone', () => {
    const other = makeRecord({orderIdentifier: '#1000'});
    const verdict = classifyScan({...check, snapshot: makeSnapshot({phone: null}), phoneHistory: [other]});
    expect(verdict).toEqual({decision: 'Accept'});
  });

  it('includes the first instant of the phone window', () => {
    const onEdge = makeRecord({orderIdentifier: '#1000', createdAt: new Date('2025-07-21T10:00:00.000Z')});
    const justOutside = makeRecord({orderIdentifier: '#1000', createdAt: new Date('2025-07-21T09:59:59.999Z')});

    expect(classifyScan({...check, phoneHistory: [onEdge]}).decision).toBe('NeedsConfirmation');
    expect(classifyScan({...check, phoneHistory: [justOutside]}).decision).toBe('Accept');
  });
});

describe('checkEligibility', () => {
  it('rejects an unfulfilled order without tags', () => {
    const rejection = checkEligibility(makeSnapshot({tags: '  ', fulfillmentStatus: 'unfulfilled'}), settings);

    expect(rejection.isJust()).toBe(true);
    rejection.ifJust(found => {
      expect(found.code).toBe('UnfulfilledUntagged');
      expect(found.decision).toBe('Reject');
      expect(found.reason).toBe('Unfulfilled order with no tag');
      expect(found.retryable).toBe(false);
    });
  });

  it('lets tagged or fulfilled orders through', () => {
    expect(checkEligibility(makeSnapshot({tags: 'fast', fulfillmentStatus: 'unfulfilled'}), settings).isNothing()).toBe(true);
    expect(checkEligibility(makeSnapshot({tags: '', fulfillmentStatus: 'fulfilled'}), settings).isNothing()).toBe(true);
  });

  it('can be switched off', () => {
    const lenient = {...settings, rejectUntaggedUnfulfilled: false};
    expect(checkEligibility(makeSnapshot({tags: '', fulfillmentStatus: 'unfulfilled'}), lenient).isNothing()).toBe(true);
  });
});

describe('rejections', () => {
  it('marks phone duplicates as needing confirmation and lookup failures as retryable', () => {
    expect(buildRejection('DuplicatePhone', 'x', '#1').decision).toBe('NeedsConfirmation');
    expect(buildRejection('DuplicateOrder', 'x', '#1').decision).toBe('Reject');
    expect(buildRejection('LookupFailure', 'x', '#1').retryable).toBe(true);
    expect(buildRejection('NotFound', 'x', '#1').retryable).toBe(false);
  });

  it('explains lookup errors', () => {
    expect(fromLookupError('#1001', {kind: 'NotFound', failures: []}).reason).toBe('Order not found');

    const failure = fromLookupError('#1001', {
      kind: 'LookupFailure',
      failures: [{store: 'alpha', message: 'timeout'}, {store: 'beta', message: 'boom'}],
    });
    expect(failure.code).toBe('LookupFailure');
    expect(failure.reason).toBe('Store lookup failed (alpha: timeout; beta: boom)');
  });

  it('makes a miss retryable when stores were skipped', () => {
    const rejection = fromLookupError('#1001', {kind: 'NotFound', failures: [{store: 'alpha', message: 'timeout'}]});

    expect(rejection.code).toBe('NotFound');
    expect(rejection.reason).toBe('Order not found (stores skipped: alpha: timeout)');
    expect(rejection.retryable).toBe(true);
    expect(fromLookupError('#1001', {kind: 'NotFound', failures: []}).retryable).toBe(false);
  });

  it('rejects a repeat scan from the ledger alone', () => {
    const existing = makeRecord({orderIdentifier: '#1001'});

    const rejection = checkRepeatScan('#1001', [existing], NOW, settings);

    expect(rejection.extract()).toEqual({
      decision: 'Reject',
      code: 'DuplicateOrder',
      reason: 'Duplicate order',
      orderIdentifier: '#1001',
      retryable: false,
      existing,
    });
    expect(checkRepeatScan('#1002', [existing], NOW, settings).isNothing()).toBe(true);
  });
});

describe('describeOrderState', () => {
  it('labels cancelled, unfulfilled and fulfilled orders', () => {
    expect(describeOrderState(makeSnapshot({orderStatus: 'closed'}))).toBe('⚠️ Cancelled');
    expect(describeOrderState(makeSnapshot({fulfillmentStatus: 'partial'}))).toBe('❌ Unfulfilled');
    expect(describeOrderState(makeSnapshot({fulfillmentStatus: 'FULFILLED'}))).toBe('✅ OK');
  });
});

describe('toNewScanRecord', () => {
  it('copies the snapshot and derives the delivery tag and result', () => {
    const record = toNewScanRecord(makeSnapshot({tags: 'cod, Fast'}), '001001', NOW);

    expect(record).toEqual({
      orderIdentifier: '#1001',
      store: 'alpha',
      rawBarcode: '001001',
      phone: '612345678',
      tags: 'cod, Fast',
      deliveryTag: 'fast',
      fulfillmentStatus: 'fulfilled',
      financialStatus: 'paid',
      orderStatus: 'open',
      result: '✅ OK',
      driver: '',
      createdAt: NOW,
    });
  });
});

describe('toRecordPatch', () => {
  it('re-derives the delivery tag when tags change', () => {
    expect(toRecordPatch({tags: 'SANDY'})).toEqual({tags: 'SANDY', deliveryTag: 'sand'});
  });

  it('keeps only the fields given', () => {
    expect(toRecordPatch({driver: 'driver-1', status: 'closed'})).toEqual({driver: 'driver-1', orderStatus: 'closed'});
    expect(toRecordPatch({})).toEqual({});
  });
});

describe('tag summaries', () => {
  const records = [
    makeRecord({id: 1, deliveryTag: 'fast'}),
    makeRecord({id: 2, deliveryTag: 'fast'}),
    makeRecord({id: 3, store: 'beta', deliveryTag: 'sand'}),
    makeRecord({id: 4, store: 'beta', deliveryTag: 'sand'}),
    makeRecord({id: 5, deliveryTag: ''}),
    makeRecord({id: 6, deliveryTag: 'unknown'}),
  ];

  it('counts every known tag, including those never seen', () => {
    expect(summarizeTags(records)).toEqual({k: 0, big: 0, '12livery': 0, fast: 2, oscario: 0, sand: 2});
  });

  it('counts per store', () => {
    expect(summarizeTagsByStore(records)).toEqual({
      alpha: {k: 0, big: 0, '12livery': 0, fast: 2, oscario: 0, sand: 0},
      beta: {k: 0, big: 0, '12livery': 0, fast: 0, oscario: 0, sand: 2},
    });
  });
});

describe('utcDayRange', () => {
  it('spans one UTC calendar day', () => {
    const range = utcDayRange('2025-07-24').extract();
    expect(range).toEqual({
      since: new Date('2025-07-24T00:00:00.000Z'),
      until: new Date('2025-07-25T00:00:00.000Z'),
    });
  });

  it('rejects impossible or malformed dates', () => {
    expect(utcDayRange('2025-02-30').extract()).toBe('Invalid date: 2025-02-30');
    expect(utcDayRange('yesterday').isLeft()).toBe(true);
  });
});
