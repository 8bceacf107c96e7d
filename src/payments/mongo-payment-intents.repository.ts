import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import {
  NewPaymentIntent,
  PaymentIntentRecord,
  PaymentIntentsRepository,
} from './payment-intents.repository';
import {
  PaymentIntent,
  PaymentIntentDocument,
} from './schemas/payment-intent.schema';

function toRecord(doc: PaymentIntentDocument): PaymentIntentRecord {
  return {
    id: doc._id.toString(),
    product_id: doc.product_id,
    product_title: doc.product_title,
    amount_usd: doc.amount_usd,
    currency: doc.currency,
    address: doc.address,
    amount_crypto: doc.amount_crypto,
    status: doc.status,
    expires_at: doc.expires_at,
    buyer_email: doc.buyer_email,
    payment_qr: doc.payment_qr,
    confirmed_at: doc.confirmed_at,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
  };
}

@Injectable()
export class MongoPaymentIntentsRepository implements PaymentIntentsRepository {
  constructor(
    @InjectModel(PaymentIntent.name)
    private readonly intentModel: Model<PaymentIntent>,
  ) {}

  async create(intent: NewPaymentIntent): Promise<string> {
    const created = await this.intentModel.create(intent);
    return created._id.toString();
  }

  async findById(id: string): Promise<PaymentIntentRecord | null> {
    const doc = await this.intentModel.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async confirmPending(
    id: string,
    confirmedAt: Date,
  ): Promise<PaymentIntentRecord | null> {
    const doc = await this.intentModel
      .findOneAndUpdate(
        {
          _id: id,
          status: 'pending',
          $or: [{ expires_at: null }, { expires_at: { $gt: confirmedAt } }],
        },
        { $set: { status: 'confirmed', confirmed_at: confirmedAt } },
        { new: true },
      )
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async markExpired(id: string): Promise<boolean> {
    const result = await this.intentModel
      .updateOne(
        { _id: id, status: 'pending' },
        { $set: { status: 'expired' } },
      )
      .exec();
    return result.modifiedCount > 0;
  }

  async expireOverdue(now: Date): Promise<number> {
    const result = await this.intentModel
      .updateMany(
        { status: 'pending', expires_at: { $lte: now } },
        { $set: { status: 'expired' } },
      )
      .exec();
    return result.modifiedCount;
  }
}
