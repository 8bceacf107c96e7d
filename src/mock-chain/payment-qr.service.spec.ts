import { PaymentQrService } from './payment-qr.service';

describe('PaymentQrService', () => {
  const qr = new PaymentQrService();

  it('uses the bitcoin scheme for BTC', () => {
    expect(qr.buildPaymentUri('BTC', 'BTC_abc', 0.002)).toBe(
      'bitcoin:BTC_abc?amount=0.002',
    );
  });

  it('uses the lower-cased currency as scheme otherwise', () => {
    expect(qr.buildPaymentUri('USDC', 'USDC_xyz', 120)).toBe(
      'usdc:USDC_xyz?amount=120',
    );
    expect(qr.buildPaymentUri('USDT', 'USDT_xyz', 9.5)).toBe(
      'usdt:USDT_xyz?amount=9.5',
    );
  });

  it('renders a PNG data URL', async () => {
    const dataUrl = await qr.generate('USDC', 'USDC_xyz', 120);
    expect(dataUrl.startsWith('data:image/png;base64,')).toBe(true);
  });
});
