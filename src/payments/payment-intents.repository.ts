import { StoredRecord } from '../common/stored-record';

export const CURRENCIES = ['USDC', 'USDT', 'BTC'] as const;
export type Currency = (typeof CURRENCIES)[number];

export const INTENT_STATUSES = ['pending', 'confirmed', 'expired'] as const;
export type IntentStatus = (typeof INTENT_STATUSES)[number];

export function isCurrency(value: string): value is Currency {
  return CURRENCIES.some((currency) => currency === value);
}

export interface PaymentIntentFields {
  product_id: string;
  product_title: string;
  amount_usd: number;
  currency: Currency;
  address: string;
  amount_crypto: number;
  status: IntentStatus;
  expires_at?: Date;
  buyer_email?: string;
  payment_qr?: string;
  confirmed_at?: Date;
}

export type NewPaymentIntent = Omit<PaymentIntentFields, 'confirmed_at'>;

export interface PaymentIntentRecord
  extends StoredRecord,
    PaymentIntentFields {}

/**
 * Access to the `paymentintent` collection. Ids must already be valid
 * object ids.
 */
export abstract class PaymentIntentsRepository {
  abstract create(intent: NewPaymentIntent): Promise<string>;

  abstract findById(id: string): Promise<PaymentIntentRecord | null>;

  /**
   * Moves a pending, unexpired intent to `confirmed` in one conditional
   * update. Resolves to null when nothing matched.
   */
  abstract confirmPending(
    id: string,
    confirmedAt: Date,
  ): Promise<PaymentIntentRecord | null>;

  /** Marks one pending intent as expired. Returns whether it changed. */
  abstract markExpired(id: string): Promise<boolean>;

  /** Marks every pending intent whose expiry is at or before `now`. */
  abstract expireOverdue(now: Date): Promise<number>;
}
