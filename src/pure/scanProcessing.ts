/**
 * SCAN PROCESSOR - The Coordinator
 *
 * Plumbing around the pure scan logic:
 * 1. Normalise the barcode (pure)
 * 2. Reject a repeat scan straight from the ledger (effect in, pure decision)
 * 3. Look the order up across the stores (effects)
 * 4. Classify against the ledger's recent history (effects in, pure decision)
 * 5. Record the scan, only when it is accepted (effect)
 *
 * Steps 4-5 run under the order's lock so two scans of the same order cannot
 * both pass the duplicate check before either one is written. The store
 * lookup stays outside the lock, which is held for ledger work only.
 */

import {AcceptedScan, OrderSnapshot, ScanRecord, ScanRejection, ScanRequest, ScanSettings} from '../domain';
import {AppEffects} from './effects';
import {
    buildRejection,
    checkEligibility,
    checkRepeatScan,
    classifyScan,
    fromLookupError,
    fromVerdict,
    normalizeBarcode,
    toNewScanRecord,
    windowEndingAt,
} from './businessLogic';
import {lookupOrder} from './orderLookup';
import {Either, Left, Right} from 'purify-ts';

type ScanOutcome = Either<ScanRejection, AcceptedScan>;

/**
 * Process one scan attempt.
 *
 * @return a function running the attempt against the given app effects,
 * returning either the rejection or the accepted scan with its new record
 * @throws LockTimeoutError when the order's lock cannot be taken; ledger
 * errors propagate unchanged
 */
export function processScan(
    request: ScanRequest,
    settings: ScanSettings
): (appEffects: AppEffects) => Promise<ScanOutcome> {
    return async (appEffects: AppEffects) => {
        const normalized = normalizeBarcode(request.barcode, settings.maxOrderDigits);
        if (normalized.isLeft()) {
            return Left(buildRejection('ValidationError', normalized.extract(), null));
        }
        const orderIdentifier = normalized.extract();

        const now = appEffects.clock.now();
        const orderHistory = await appEffects.ledger.findRecentByOrder(
            orderIdentifier,
            windowEndingAt(now, settings.recencyWindowDays)
        );
        const repeat = checkRepeatScan(orderIdentifier, orderHistory, now, settings);
        if (repeat.isJust()) {
            return Left(repeat.extract());
        }

        const lookup = await lookupOrder(orderIdentifier, settings)(appEffects);
        return lookup.caseOf<Promise<ScanOutcome>>({
            Left: error => Promise.resolve(Left(fromLookupError(orderIdentifier, error))),
            Right: snapshot => appEffects.locks.withLock(
                orderIdentifier,
                () => decideAndRecord(snapshot, request, settings)(appEffects)
            ),
        });
    };
}

/**
 * Consult the ledger, decide, and write the record iff the decision is Accept.
 * A repeated order outranks every other rejection; the phone check is the
 * last gate and the only one a confirmation can pass.
 */
function decideAndRecord(
    snapshot: OrderSnapshot,
    request: ScanRequest,
    settings: ScanSettings
): (appEffects: AppEffects) => Promise<ScanOutcome> {
    return async (appEffects: AppEffects) => {
        const {ledger} = appEffects;
        const now = appEffects.clock.now();

        const [orderHistory, phoneHistory] = await Promise.all([
            ledger.findRecentByOrder(snapshot.orderIdentifier, windowEndingAt(now, settings.recencyWindowDays)),
            snapshot.phone
                ? ledger.findRecentByPhone(snapshot.phone, windowEndingAt(now, settings.phoneWindowDays))
                : Promise.resolve<ScanRecord[]>([]),
        ]);

        const verdict = classifyScan({
            snapshot,
            orderHistory,
            phoneHistory,
            confirmDuplicate: request.confirmDuplicate,
            now,
            settings,
        });

        const rejection = verdict.decision === 'Reject'
            ? fromVerdict(verdict, snapshot)
            : checkEligibility(snapshot, settings).alt(fromVerdict(verdict, snapshot));

        return rejection.caseOf<Promise<ScanOutcome>>({
            Just: found => Promise.resolve(Left(found)),
            Nothing: async () => {
                const record = await ledger.insert(toNewScanRecord(snapshot, request.barcode, now));
                console.log(`Recorded scan ${record.id} for ${record.orderIdentifier} (${record.store})`);
                const accepted: AcceptedScan = {decision: 'Accept', record};
                return Right(accepted);
            },
        });
    };
}
