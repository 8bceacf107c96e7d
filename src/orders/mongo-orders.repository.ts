import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import {
  OrderFields,
  OrdersRepository,
  StoredOrder,
} from './orders.repository';
import { Order } from './schemas/order.schema';

type LeanOrder = Omit<StoredOrder, 'id'> & { _id: Types.ObjectId };

@Injectable()
export class MongoOrdersRepository implements OrdersRepository {
  constructor(@InjectModel(Order.name) private orderModel: Model<Order>) {}

  async create(fields: OrderFields): Promise<string> {
    const created = await this.orderModel.create(fields);
    return created._id.toString();
  }

  async count(): Promise<number> {
    return this.orderModel.countDocuments({}).exec();
  }

  async listAmountsUsd(): Promise<unknown[]> {
    // lean() skips casting, so hand-written documents come back untouched.
    const docs = await this.orderModel
      .find({}, { amount_usd: 1, _id: 0 })
      .lean<Array<{ amount_usd?: unknown }>>()
      .exec();
    return docs.map((doc) => doc.amount_usd);
  }

  async findRecent(limit: number): Promise<StoredOrder[]> {
    const docs = await this.orderModel
      .find({}, { __v: 0 })
      .sort({ created_at: -1 })
      .limit(limit)
      .lean<LeanOrder[]>()
      .exec();
    return docs.map(({ _id, ...order }) => ({ id: _id.toString(), ...order }));
  }
}
