import { Injectable, Logger } from '@nestjs/common';
import {
  ProductNotFoundException,
  UnsupportedCurrencyException,
} from '../common/exceptions/domain.exceptions';
import { isObjectId } from '../common/object-id';
import { AppConfigService } from '../config/app-config.service';
import {
  AddressGeneratorService,
} from '../mock-chain/address-generator.service';
import { PaymentQrService } from '../mock-chain/payment-qr.service';
import { PriceOracleService } from '../mock-chain/price-oracle.service';
import { ProductsRepository } from '../products/products.repository';
import {
  Currency,
  isCurrency,
  PaymentIntentsRepository,
} from './payment-intents.repository';

export interface CheckoutRequest {
  product_id: string;
  currency?: string;
  buyer_email?: string;
}

export interface CheckoutResult {
  intent_id: string;
  address: string;
  currency: Currency;
  amount_crypto: number;
  amount_usd: number;
  payment_qr: string;
}

@Injectable()
export class CheckoutService {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    private readonly products: ProductsRepository,
    private readonly intents: PaymentIntentsRepository,
    private readonly priceOracle: PriceOracleService,
    private readonly addressGenerator: AddressGeneratorService,
    private readonly paymentQr: PaymentQrService,
    private readonly config: AppConfigService,
  ) {}

  async checkout(request: CheckoutRequest): Promise<CheckoutResult> {
    const product = isObjectId(request.product_id)
      ? await this.products.findById(request.product_id)
      : null;
    if (!product || !product.active) {
      throw new ProductNotFoundException();
    }

    const currency = (request.currency ?? 'USDC').toUpperCase();
    if (!isCurrency(currency)) {
      throw new UnsupportedCurrencyException(currency);
    }

    const amountUsd = product.price_usd;
    const address = this.addressGenerator.generate(currency);
    const amountCrypto = this.priceOracle.convert(amountUsd, currency);
    const paymentQr = await this.paymentQr.generate(
      currency,
      address,
      amountCrypto,
    );
    const expiresAt = new Date(
      Date.now() + this.config.paymentIntentTtlMinutes * 60 * 1000,
    );

    const intentId = await this.intents.create({
      product_id: product.id,
      product_title: product.title,
      amount_usd: amountUsd,
      currency,
      address,
      amount_crypto: amountCrypto,
      status: 'pending',
      expires_at: expiresAt,
      buyer_email: request.buyer_email,
      payment_qr: paymentQr,
    });
    this.logger.log(
      `Payment intent ${intentId} created for product ${product.id}: ${amountCrypto} ${currency}`,
    );

    return {
      intent_id: intentId,
      address,
      currency,
      amount_crypto: amountCrypto,
      amount_usd: amountUsd,
      payment_qr: paymentQr,
    };
  }
}
