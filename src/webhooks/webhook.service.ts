import { Injectable, Logger } from '@nestjs/common';
import { createHash, timingSafeEqual } from 'crypto';
import {
  InvalidIdException,
  InvalidWebhookSecretException,
  PaymentIntentExpiredException,
  PaymentIntentNotFoundException,
} from '../common/exceptions/domain.exceptions';
import { isObjectId } from '../common/object-id';
import { AppConfigService } from '../config/app-config.service';
import { OrdersRepository } from '../orders/orders.repository';
import {
  PaymentIntentsRepository,
} from '../payments/payment-intents.repository';

export type ConfirmationResult =
  | { status: 'confirmed'; order_id: string }
  | { status: 'already_confirmed' };

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

@Injectable()
export class WebhookService {
  private readonly logger = new Logger(WebhookService.name);

  constructor(
    private readonly intents: PaymentIntentsRepository,
    private readonly orders: OrdersRepository,
    private readonly config: AppConfigService,
  ) {}

  /**
   * Marks a payment intent as paid and records its order.
   *
   * The status transition is a single conditional update, so concurrent
   * deliveries for the same intent produce exactly one order; the losers
   * get `already_confirmed`.
   */
  async confirm(intentId: string, secret: string): Promise<ConfirmationResult> {
    if (!timingSafeEqual(digest(secret), digest(this.config.webhookSecret))) {
      this.logger.warn(`Rejected webhook for intent ${intentId}: bad secret`);
      throw new InvalidWebhookSecretException();
    }
    if (!isObjectId(intentId)) {
      throw new InvalidIdException('Invalid intent id');
    }

    const now = new Date();
    const intent = await this.intents.confirmPending(intentId, now);

    if (!intent) {
      const current = await this.intents.findById(intentId);
      if (!current) {
        throw new PaymentIntentNotFoundException('Intent not found');
      }
      if (current.status === 'confirmed') {
        return { status: 'already_confirmed' };
      }
      // Pending but past expiry, or already expired.
      if (await this.intents.markExpired(intentId)) {
        this.logger.log(`Payment intent ${intentId} expired on confirmation`);
      }
      throw new PaymentIntentExpiredException(intentId);
    }

    let orderId: string;
    try {
      orderId = await this.orders.create({
        intent_id: intent.id,
        product_id: intent.product_id,
        product_title: intent.product_title,
        amount_usd: intent.amount_usd,
        currency: intent.currency,
        amount_crypto: intent.amount_crypto,
        buyer_email: intent.buyer_email,
      });
    } catch (e) {
      this.logger.error(
        `Payment intent ${intentId} confirmed but its order was not recorded`,
        e instanceof Error ? e.stack : String(e),
      );
      throw e;
    }
    this.logger.log(`Payment intent ${intentId} confirmed, order ${orderId}`);

    return { status: 'confirmed', order_id: orderId };
  }
}
