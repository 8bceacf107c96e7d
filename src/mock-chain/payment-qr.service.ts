import { Injectable } from '@nestjs/common';
import * as QRCode from 'qrcode';

@Injectable()
export class PaymentQrService {
  buildPaymentUri(currency: string, address: string, amount: number): string {
    const scheme = currency === 'BTC' ? 'bitcoin' : currency.toLowerCase();
    return `${scheme}:${address}?amount=${amount}`;
  }

  /** Renders the payment URI as a PNG data URL. */
  async generate(
    currency: string,
    address: string,
    amount: number,
  ): Promise<string> {
    return QRCode.toDataURL(this.buildPaymentUri(currency, address, amount));
  }
}
