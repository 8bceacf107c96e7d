import { Injectable } from '@nestjs/common';

// Mock spot prices in USD.
export const BTC_USD_PRICE = 60000;

function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

@Injectable()
export class PriceOracleService {
  /**
   * Converts a USD amount into units of `currency`.
   *
   * Stablecoins are pegged 1:1 and rounded to cents, BTC is priced at
   * {@link BTC_USD_PRICE} and rounded to satoshis. Unknown codes pass the
   * amount through unchanged.
   */
  convert(amountUsd: number, currency: string): number {
    switch (currency) {
      case 'USDC':
      case 'USDT':
        return roundTo(amountUsd, 2);
      case 'BTC':
        return roundTo(amountUsd / BTC_USD_PRICE, 8);
      default:
        return amountUsd;
    }
  }
}
