export class LockTimeoutError extends Error {
    constructor(readonly key: string, waitMs: number) {
        super(`Scan of ${key} is already in progress (waited ${waitMs}ms)`);
        this.name = 'LockTimeoutError';
    }
}
