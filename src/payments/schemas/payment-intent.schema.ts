// src/payments/schemas/payment-intent.schema.ts
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  CURRENCIES,
  Currency,
  INTENT_STATUSES,
  IntentStatus,
} from '../payment-intents.repository';

@Schema({
  collection: 'paymentintent',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
})
export class PaymentIntent {
  @Prop({ required: true })
  product_id!: string;

  // Title at checkout time
  @Prop({ required: true })
  product_title!: string;

  @Prop({ required: true, min: 0 })
  amount_usd!: number;

  @Prop({
    type: String,
    required: true,
    enum: [...CURRENCIES],
    default: 'USDC',
  })
  currency!: Currency;

  @Prop({ required: true })
  address!: string;

  @Prop({ required: true, min: 0 })
  amount_crypto!: number;

  @Prop({
    type: String,
    enum: [...INTENT_STATUSES],
    default: 'pending',
    index: true,
  })
  status!: IntentStatus;

  @Prop()
  expires_at?: Date;

  @Prop()
  buyer_email?: string;

  @Prop()
  payment_qr?: string;

  @Prop()
  confirmed_at?: Date;

  created_at!: Date;
  updated_at!: Date;
}

export type PaymentIntentDocument = HydratedDocument<PaymentIntent>;

export const PaymentIntentSchema = SchemaFactory.createForClass(PaymentIntent);
