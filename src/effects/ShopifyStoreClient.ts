import {OrderSnapshot, ScanSettings, StoreAccount} from '../domain';
import {StoreClient} from '../pure/effects';
import {normalizePhone} from '../pure/businessLogic';
import {errorMessage} from '../utils/errors';
import {StoreUnavailableError} from './StoreUnavailableError';
import {formatIssues} from '../utils/validate';
import axios, {AxiosInstance} from 'axios';
import {Maybe} from 'purify-ts';
import {z} from 'zod';

export const ORDERS_PATH = '/admin/api/2023-07/orders.json';

const PhoneHolderSchema = z.object({phone: z.string().nullish()}).nullish();

const ShopifyOrderSchema = z.object({
  name: z.string().optional(),
  tags: z.string().nullish(),
  fulfillment_status: z.string().nullish(),
  financial_status: z.string().nullish(),
  cancelled_at: z.string().nullish(),
  created_at: z.string(),
  phone: z.string().nullish(),
  shipping_address: PhoneHolderSchema,
  customer: PhoneHolderSchema,
});

const OrdersResponseSchema = z.object({
  orders: z.array(ShopifyOrderSchema).default([]),
});

export type ShopifyOrder = z.infer<typeof ShopifyOrderSchema>;

export function toOrderSnapshot(
  order: ShopifyOrder,
  store: string,
  orderIdentifier: string,
  phoneCountryCode: string
): OrderSnapshot {
  const phone = order.phone || order.shipping_address?.phone || order.customer?.phone;
  return {
    orderIdentifier,
    store,
    tags: order.tags ?? '',
    fulfillmentStatus: order.fulfillment_status || 'unfulfilled',
    financialStatus: order.financial_status || 'pending',
    orderStatus: order.cancelled_at ? 'closed' : 'open',
    phone: normalizePhone(phone, phoneCountryCode),
    createdAt: new Date(order.created_at),
  };
}

// ============================================================================
// Shopify Admin REST store client
// ============================================================================

export class ShopifyStoreClient implements StoreClient {
  readonly name: string;

  constructor(
    account: StoreAccount,
    private settings: Pick<ScanSettings, 'storeTimeoutMs' | 'phoneCountryCode'>,
    private http: Pick<AxiosInstance, 'get'> = axios.create({
      baseURL: `https://${account.domain}`,
      timeout: settings.storeTimeoutMs,
      auth: {username: account.apiKey, password: account.password},
    })
  ) {
    this.name = account.name;
  }

  async lookupOrder(orderIdentifier: string): Promise<Maybe<OrderSnapshot>> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(ORDERS_PATH, {
        params: {status: 'any', name: orderIdentifier},
      });
      body = response.data;
    } catch (error) {
      console.error(`Failed to query store ${this.name}:`, errorMessage(error));
      throw new StoreUnavailableError(this.name, error);
    }

    const parsed = OrdersResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new StoreUnavailableError(this.name, new Error(`unexpected response (${formatIssues(parsed.error.issues)})`));
    }

    return Maybe.fromNullable(parsed.data.orders.at(0))
      .map(order => toOrderSnapshot(order, this.name, orderIdentifier, this.settings.phoneCountryCode));
  }
}
