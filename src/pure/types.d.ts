// Module product types

export type StoreFailure = {
    readonly store: string;
    readonly message: string;
};

export type LookupError =
    | { readonly kind: 'NotFound'; readonly failures: StoreFailure[] }
    | { readonly kind: 'LookupFailure'; readonly failures: StoreFailure[] };

export type CorrectionInput = {
    readonly tags?: string;
    readonly driver?: string;
    readonly status?: string;
    readonly fulfillmentStatus?: string;
};
