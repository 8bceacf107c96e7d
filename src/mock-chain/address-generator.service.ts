import { Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';

// Base58 symbols: no 0, O, I or l.
export const ADDRESS_ALPHABET =
  'ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz123456789';
export const ADDRESS_BODY_LENGTH = 34;

@Injectable()
export class AddressGeneratorService {
  /** Returns a mock deposit address such as `BTC_7fQ...`. Not checked for collisions. */
  generate(prefix = 'USDC'): string {
    let body = '';
    for (let i = 0; i < ADDRESS_BODY_LENGTH; i++) {
      body += ADDRESS_ALPHABET[randomInt(ADDRESS_ALPHABET.length)];
    }
    return `${prefix}_${body}`;
  }
}
