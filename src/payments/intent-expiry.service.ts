import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { PaymentIntentsRepository } from './payment-intents.repository';

@Injectable()
export class IntentExpiryService {
  private readonly logger = new Logger(IntentExpiryService.name);

  constructor(private readonly intents: PaymentIntentsRepository) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async handleExpiry(): Promise<void> {
    try {
      const expired = await this.expireOverdue(new Date());
      if (expired > 0) {
        this.logger.log(`Expired ${expired} pending payment intents`);
      }
    } catch (e) {
      this.logger.error(
        `Expiry sweep failed: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  }

  async expireOverdue(now: Date): Promise<number> {
    return this.intents.expireOverdue(now);
  }
}
