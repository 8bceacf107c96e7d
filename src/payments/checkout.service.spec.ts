import { Test } from '@nestjs/testing';
import {
  createInMemoryStores,
  InMemoryStores,
} from '../../test/support/in-memory-repositories';
import { createTestConfig } from '../../test/support/config';
import {
  ProductNotFoundException,
  UnsupportedCurrencyException,
} from '../common/exceptions/domain.exceptions';
import { AppConfigService } from '../config/app-config.service';
import { MockChainModule } from '../mock-chain/mock-chain.module';
import { ProductsRepository } from '../products/products.repository';
import { CheckoutService } from './checkout.service';
import { PaymentIntentsRepository } from './payment-intents.repository';

describe('CheckoutService', () => {
  let stores: InMemoryStores;
  let service: CheckoutService;
  let productId: string;

  beforeEach(async () => {
    stores = createInMemoryStores();
    const moduleRef = await Test.createTestingModule({
      imports: [MockChainModule],
      providers: [
        CheckoutService,
        { provide: ProductsRepository, useValue: stores.products },
        { provide: PaymentIntentsRepository, useValue: stores.intents },
        {
          provide: AppConfigService,
          useValue: createTestConfig({ PAYMENT_INTENT_TTL_MINUTES: '30' }),
        },
      ],
    }).compile();
    service = moduleRef.get(CheckoutService);

    productId = await stores.products.create({
      title: 'Hardware wallet',
      price_usd: 120,
      active: true,
    });
  });

  it('creates a pending BTC intent at the mock rate', async () => {
    const before = Date.now();
    const result = await service.checkout({
      product_id: productId,
      currency: 'BTC',
    });

    expect(result.amount_crypto).toBe(0.002);
    expect(result.amount_usd).toBe(120);
    expect(result.currency).toBe('BTC');
    expect(result.address).toMatch(/^BTC_[1-9A-HJ-NP-Za-km-z]{34}$/);
    expect(result.payment_qr.startsWith('data:image/png;base64,')).toBe(true);

    const intent = await stores.intents.findById(result.intent_id);
    expect(intent).toMatchObject({
      product_id: productId,
      product_title: 'Hardware wallet',
      amount_usd: 120,
      currency: 'BTC',
      address: result.address,
      amount_crypto: 0.002,
      status: 'pending',
    });
    const expiresAt = intent?.expires_at?.getTime() ?? 0;
    expect(expiresAt).toBeGreaterThanOrEqual(before + 30 * 60 * 1000);
    expect(expiresAt).toBeLessThanOrEqual(Date.now() + 30 * 60 * 1000);
  });

  it('defaults to USDC and upper-cases the currency', async () => {
    const usdc = await service.checkout({ product_id: productId });
    expect(usdc.currency).toBe('USDC');
    expect(usdc.amount_crypto).toBe(120);

    const usdt = await service.checkout({
      product_id: productId,
      currency: 'usdt',
    });
    expect(usdt.currency).toBe('USDT');
    expect(usdt.address.startsWith('USDT_')).toBe(true);
  });

  it('stores the buyer email on the intent it creates', async () => {
    const first = await service.checkout({ product_id: productId });
    const second = await service.checkout({
      product_id: productId,
      buyer_email: 'buyer@example.com',
    });

    expect((await stores.intents.findById(second.intent_id))?.buyer_email).toBe(
      'buyer@example.com',
    );
    expect(
      (await stores.intents.findById(first.intent_id))?.buyer_email,
    ).toBeUndefined();
  });

  it('rejects a malformed product id instead of substituting a product', async () => {
    await expect(
      service.checkout({ product_id: 'not-an-id' }),
    ).rejects.toBeInstanceOf(ProductNotFoundException);
    expect(stores.intents.rows).toHaveLength(0);
  });

  it('rejects an unknown product id', async () => {
    await expect(
      service.checkout({ product_id: '0123456789abcdef01234567' }),
    ).rejects.toBeInstanceOf(ProductNotFoundException);
  });

  it('rejects an inactive product', async () => {
    const retired = await stores.products.create({
      title: 'Old stock',
      price_usd: 5,
      active: false,
    });

    await expect(
      service.checkout({ product_id: retired }),
    ).rejects.toBeInstanceOf(ProductNotFoundException);
  });

  it('rejects currencies outside USDC, USDT and BTC', async () => {
    await expect(
      service.checkout({ product_id: productId, currency: 'eth' }),
    ).rejects.toThrow(new UnsupportedCurrencyException('ETH'));
    expect(stores.intents.rows).toHaveLength(0);
  });
});
