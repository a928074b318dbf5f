import {StoreClient} from '../pure/effects';
import {lookupOrder, withTimeout} from '../pure/orderLookup';
import {DEFAULT_SCAN_SETTINGS} from '../pure/businessLogic';
import {failingStore, fixedClock, makeSnapshot, storeWith} from './fakes';

const clock = fixedClock();
const settings = DEFAULT_SCAN_SETTINGS;

describe('lookupOrder', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('returns the order from the store that has it', async () => {
    const order = makeSnapshot({store: 'beta'});
    const stores = [storeWith('alpha', []), storeWith('beta', [order])];

    const result = await lookupOrder('#1001', settings)({stores, clock});

    expect(result.extract()).toEqual(order);
  });

  it('prefers the first store in declaration order when several match', async () => {
    const stores = [
      storeWith('alpha', [makeSnapshot({store: 'alpha'})]),
      storeWith('beta', [makeSnapshot({store: 'beta'})]),
    ];

    const result = await lookupOrder('#1001', settings)({stores, clock});

    expect(result.isRight()).toBe(true);
    result.ifRight(order => expect(order.store).toBe('alpha'));
  });

  it('skips a failing store and logs it', async () => {
    const stores = [failingStore('alpha'), storeWith('beta', [makeSnapshot({store: 'beta'})])];

    const result = await lookupOrder('#1001', settings)({stores, clock});

    result.ifRight(order => expect(order.store).toBe('beta'));
    expect(result.isRight()).toBe(true);
    expect(warn).toHaveBeenCalledWith('Store alpha skipped for #1001: connection refused');
  });

  it('reports NotFound when every reachable store lacks the order', async () => {
    const stores = [failingStore('alpha'), storeWith('beta', [])];

    const result = await lookupOrder('#1001', settings)({stores, clock});

    expect(result.extract()).toEqual({
      kind: 'NotFound',
      failures: [{store: 'alpha', message: 'connection refused'}],
    });
  });

  it('reports LookupFailure when every store fails', async () => {
    const stores = [failingStore('alpha'), failingStore('beta', 'bad credentials')];

    const result = await lookupOrder('#1001', settings)({stores, clock});

    expect(result.extract()).toEqual({
      kind: 'LookupFailure',
      failures: [
        {store: 'alpha', message: 'connection refused'},
        {store: 'beta', message: 'bad credentials'},
      ],
    });
  });

  it('reports LookupFailure when no store is configured', async () => {
    const result = await lookupOrder('#1001', settings)({stores: [], clock});

    expect(result.extract()).toEqual({
      kind: 'LookupFailure',
      failures: [{store: '*', message: 'No store accounts configured'}],
    });
  });

  it('ignores orders created before the cutoff', async () => {
    const stale = makeSnapshot({store: 'alpha', createdAt: new Date('2025-06-01T00:00:00.000Z')});
    const fresh = makeSnapshot({store: 'beta', createdAt: new Date('2025-07-01T00:00:00.000Z')});

    const onlyStale = await lookupOrder('#1001', settings)({stores: [storeWith('alpha', [stale])], clock});
    const both = await lookupOrder('#1001', settings)({
      stores: [storeWith('alpha', [stale]), storeWith('beta', [fresh])],
      clock,
    });

    expect(onlyStale.extract()).toEqual({kind: 'NotFound', failures: []});
    expect(both.extract()).toEqual(fresh);
  });

  it('gives up on a store that does not answer in time', async () => {
    const silent: StoreClient = {name: 'slow', lookupOrder: () => new Promise(() => undefined)};

    const result = await lookupOrder('#1001', {...settings, storeTimeoutMs: 20})({stores: [silent], clock});

    expect(result.extract()).toEqual({
      kind: 'LookupFailure',
      failures: [{store: 'slow', message: 'slow did not answer within 20ms'}],
    });
  });
});

describe('withTimeout', () => {
  it('passes through a result that arrives first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, 'late')).resolves.toBe('done');
  });

  it('rejects with the given message when time runs out', async () => {
    await expect(withTimeout(new Promise(() => undefined), 10, 'late')).rejects.toThrow('late');
  });
});
