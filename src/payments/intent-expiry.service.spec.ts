import {
  InMemoryPaymentIntentsRepository,
} from '../../test/support/in-memory-repositories';
import { IntentExpiryService } from './intent-expiry.service';
import { NewPaymentIntent } from './payment-intents.repository';

describe('IntentExpiryService', () => {
  const base: NewPaymentIntent = {
    product_id: '0123456789abcdef01234567',
    product_title: 'Sticker pack',
    amount_usd: 4,
    currency: 'USDT',
    address: 'USDT_test',
    amount_crypto: 4,
    status: 'pending',
  };

  it('expires only pending intents whose expiry has passed', async () => {
    const intents = new InMemoryPaymentIntentsRepository();
    const now = new Date('2026-03-01T12:00:00Z');
    const overdue = await intents.create({
      ...base,
      expires_at: new Date('2026-03-01T11:59:00Z'),
    });
    const fresh = await intents.create({
      ...base,
      expires_at: new Date('2026-03-01T12:10:00Z'),
    });
    const confirmed = await intents.create({
      ...base,
      status: 'confirmed',
      expires_at: new Date('2026-03-01T11:00:00Z'),
    });
    const service = new IntentExpiryService(intents);

    await expect(service.expireOverdue(now)).resolves.toBe(1);

    expect((await intents.findById(overdue))?.status).toBe('expired');
    expect((await intents.findById(fresh))?.status).toBe('pending');
    expect((await intents.findById(confirmed))?.status).toBe('confirmed');
  });

  it('keeps the scheduled sweep alive when the store fails', async () => {
    const intents = new InMemoryPaymentIntentsRepository();
    jest
      .spyOn(intents, 'expireOverdue')
      .mockRejectedValue(new Error('connection reset'));
    const service = new IntentExpiryService(intents);

    await expect(service.handleExpiry()).resolves.toBeUndefined();
    expect(intents.expireOverdue).toHaveBeenCalledTimes(1);
  });
});
