import { StoredRecord } from '../common/stored-record';
import { Currency } from '../payments/payment-intents.repository';

export interface OrderFields {
  intent_id: string;
  product_id: string;
  product_title: string;
  amount_usd: number;
  currency: Currency;
  amount_crypto: number;
  buyer_email?: string;
}

export interface OrderRecord extends StoredRecord, OrderFields {}

/** An order as read back unconverted; `amount_usd` may hold anything. */
export type StoredOrder = Omit<OrderRecord, 'amount_usd'> & {
  amount_usd: unknown;
};

/** Access to the `order` collection. */
export abstract class OrdersRepository {
  abstract create(fields: OrderFields): Promise<string>;

  abstract count(): Promise<number>;

  /**
   * Raw `amount_usd` of every order, as stored. Values are not coerced, so
   * callers must cope with documents written outside this service.
   */
  abstract listAmountsUsd(): Promise<unknown[]>;

  /** Newest first by `created_at`, with fields as stored. */
  abstract findRecent(limit: number): Promise<StoredOrder[]>;
}
