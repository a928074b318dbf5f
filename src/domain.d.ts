// Domain types shared across the application

export type StoreAccount = {
  readonly name: string;
  readonly apiKey: string;
  readonly password: string;
  readonly domain: string;
};

export type OrderStatus = 'open' | 'closed';

export type OrderSnapshot = {
  readonly orderIdentifier: string;
  readonly store: string;
  readonly tags: string;
  readonly fulfillmentStatus: string;
  readonly financialStatus: string;
  readonly orderStatus: OrderStatus;
  readonly phone: string | null;
  readonly createdAt: Date;
};

export type ScanRecord = {
  readonly id: number;
  readonly orderIdentifier: string;
  readonly store: string;
  readonly rawBarcode: string;
  readonly phone: string | null;
  readonly tags: string;
  readonly deliveryTag: string;
  readonly fulfillmentStatus: string;
  readonly financialStatus: string;
  readonly orderStatus: string;
  readonly result: string;
  readonly driver: string;
  readonly createdAt: Date;
};

export type NewScanRecord = Omit<ScanRecord, 'id'>;

export type ScanRecordPatch = {
  readonly tags?: string;
  readonly deliveryTag?: string;
  readonly driver?: string;
  readonly orderStatus?: string;
  readonly fulfillmentStatus?: string;
};

export type Decision = 'Accept' | 'Reject' | 'NeedsConfirmation';

export type RejectionCode =
  | 'ValidationError'
  | 'NotFound'
  | 'LookupFailure'
  | 'DuplicateOrder'
  | 'DuplicatePhone'
  | 'UnfulfilledUntagged';

export type DuplicateVerdict =
  | { readonly decision: 'Accept' }
  | { readonly decision: 'Reject'; readonly code: 'DuplicateOrder'; readonly reason: string; readonly existing: ScanRecord }
  | { readonly decision: 'NeedsConfirmation'; readonly code: 'DuplicatePhone'; readonly reason: string; readonly matches: ScanRecord[] };

export type ScanRejection = {
  readonly decision: 'Reject' | 'NeedsConfirmation';
  readonly code: RejectionCode;
  readonly reason: string;
  readonly orderIdentifier: string | null;
  readonly retryable: boolean;
  readonly snapshot?: OrderSnapshot;
  readonly existing?: ScanRecord;
};

export type AcceptedScan = {
  readonly decision: 'Accept';
  readonly record: ScanRecord;
};

export type ScanRequest = {
  readonly barcode: string;
  readonly confirmDuplicate: boolean;
};

export type ScanSettings = {
  readonly recencyWindowDays: number;
  readonly phoneWindowDays: number;
  readonly maxOrderDigits: number;
  readonly orderCutoffDays: number;
  readonly storeTimeoutMs: number;
  readonly phoneCountryCode: string;
  readonly rejectUntaggedUnfulfilled: boolean;
};

export type TimeWindow = {
  readonly since: Date;
  readonly until: Date;
};

export type TagCounts = Record<string, number>;
