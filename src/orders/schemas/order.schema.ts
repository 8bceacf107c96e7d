// src/orders/schemas/order.schema.ts
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import {
  CURRENCIES,
  Currency,
} from '../../payments/payment-intents.repository';

@Schema({
  collection: 'order',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
})
export class Order {
  // One order per confirmed intent
  @Prop({ required: true, unique: true })
  intent_id!: string;

  @Prop({ required: true })
  product_id!: string;

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

  @Prop({ required: true, min: 0 })
  amount_crypto!: number;

  @Prop()
  buyer_email?: string;

  created_at!: Date;
  updated_at!: Date;
}

export const OrderSchema = SchemaFactory.createForClass(Order);
