import { Injectable } from '@nestjs/common';
import {
  InvalidIdException,
  PaymentIntentNotFoundException,
} from '../common/exceptions/domain.exceptions';
import { isObjectId } from '../common/object-id';
import { withoutId } from '../common/stored-record';
import {
  PaymentIntentRecord,
  PaymentIntentsRepository,
} from './payment-intents.repository';

export type PaymentStatusView = Omit<PaymentIntentRecord, 'id'> & {
  intent_id: string;
};

@Injectable()
export class PaymentsService {
  constructor(private readonly intents: PaymentIntentsRepository) {}

  async getStatus(
    intentId: string,
    now = new Date(),
  ): Promise<PaymentStatusView> {
    if (!isObjectId(intentId)) {
      throw new InvalidIdException('Invalid intent id');
    }
    const intent = await this.intents.findById(intentId);
    if (!intent) {
      throw new PaymentIntentNotFoundException();
    }

    // The sweeper may not have run yet.
    const overdue =
      intent.status === 'pending' &&
      intent.expires_at !== undefined &&
      intent.expires_at.getTime() <= now.getTime();

    return {
      ...withoutId(intent),
      status: overdue ? 'expired' : intent.status,
      intent_id: intent.id,
    };
  }
}
