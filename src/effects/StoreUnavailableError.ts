import {errorMessage} from '../utils/errors';

export class StoreUnavailableError extends Error {
    constructor(readonly store: string, cause: unknown) {
        super(`${store} unavailable: ${errorMessage(cause)}`);
        this.name = 'StoreUnavailableError';
    }
}
