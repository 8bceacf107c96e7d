import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';

@Injectable()
export class AppConfigService {
  constructor(private readonly configService: NestConfigService) {}

  get port(): number {
    return this.getNumber('PORT', 8000);
  }

  // Store
  get databaseUrl(): string {
    return this.configService.get<string>(
      'DATABASE_URL',
      'mongodb://127.0.0.1:27017',
    );
  }

  get isDatabaseUrlSet(): boolean {
    return Boolean(this.configService.get<string>('DATABASE_URL'));
  }

  get databaseName(): string {
    return this.configService.get<string>('DATABASE_NAME', 'crypto-store');
  }

  // Payments
  get webhookSecret(): string {
    return this.configService.get<string>('WEBHOOK_MOCK_SECRET', 'demo-secret');
  }

  get paymentIntentTtlMinutes(): number {
    return this.getNumber('PAYMENT_INTENT_TTL_MINUTES', 30);
  }

  private getNumber(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }
}
