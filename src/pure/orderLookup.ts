/**
 * ORDER LOOKUP - asks every configured store for the order.
 *
 * Stores are asked concurrently, each bounded by its own timeout. A store
 * that errors or times out is logged and skipped. The first store in
 * declaration order that reports a recent enough match wins.
 */

import {OrderSnapshot, ScanSettings} from '../domain';
import {AppEffects} from './effects';
import {LookupError, StoreFailure} from './types';
import {windowEndingAt} from './businessLogic';
import {errorMessage} from '../utils/errors';
import {Either, EitherAsync, Left, Maybe, Right} from 'purify-ts';

/**
 * Settle `work` or reject with `message` after `ms` milliseconds, whichever
 * comes first. The timer is always cleared.
 */
export function withTimeout<T>(work: Promise<T>, ms: number, message: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(message)), ms);
    });
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Look the order up across the configured stores.
 *
 * @return the first match, `NotFound` when no store has the order (or some
 * stores failed and the rest had nothing), or `LookupFailure` when no store
 * could be asked at all
 */
export function lookupOrder(
    orderIdentifier: string,
    settings: Pick<ScanSettings, 'storeTimeoutMs' | 'orderCutoffDays'>
): (appEffects: Pick<AppEffects, 'stores' | 'clock'>) => Promise<Either<LookupError, OrderSnapshot>> {
    return async (appEffects) => {
        const {stores} = appEffects;
        if (stores.length === 0) {
            return Left({kind: 'LookupFailure', failures: [{store: '*', message: 'No store accounts configured'}]});
        }

        const attempts = await Promise.all(stores.map(store =>
            EitherAsync(() => withTimeout(
                store.lookupOrder(orderIdentifier),
                settings.storeTimeoutMs,
                `${store.name} did not answer within ${settings.storeTimeoutMs}ms`
            ))
                .mapLeft((err): StoreFailure => ({store: store.name, message: errorMessage(err)}))
                .run()
        ));

        const failures = Either.lefts(attempts);
        failures.forEach(failure =>
            console.warn(`Store ${failure.store} skipped for ${orderIdentifier}: ${failure.message}`)
        );

        const cutoff = windowEndingAt(appEffects.clock.now(), settings.orderCutoffDays).since;
        const match = Maybe.catMaybes(Either.rights(attempts))
            .find(snapshot => snapshot.createdAt.getTime() >= cutoff.getTime());

        if (match) {
            return Right(match);
        }
        if (failures.length === stores.length) {
            return Left({kind: 'LookupFailure', failures});
        }
        return Left({kind: 'NotFound', failures});
    };
}
