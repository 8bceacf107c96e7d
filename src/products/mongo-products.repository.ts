import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import {
  ProductFields,
  ProductRecord,
  ProductsRepository,
} from './products.repository';
import { Product, ProductDocument } from './schemas/product.schema';

function toRecord(doc: ProductDocument): ProductRecord {
  return {
    id: doc._id.toString(),
    title: doc.title,
    description: doc.description,
    price_usd: doc.price_usd,
    image_url: doc.image_url,
    active: doc.active,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
  };
}

@Injectable()
export class MongoProductsRepository implements ProductsRepository {
  constructor(
    @InjectModel(Product.name) private readonly productModel: Model<Product>,
  ) {}

  async create(fields: ProductFields): Promise<string> {
    const created = await this.productModel.create(fields);
    return created._id.toString();
  }

  async findById(id: string): Promise<ProductRecord | null> {
    const doc = await this.productModel.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async findActive(): Promise<ProductRecord[]> {
    const docs = await this.productModel.find({ active: true }).exec();
    return docs.map(toRecord);
  }

  async count(): Promise<number> {
    return this.productModel.countDocuments({}).exec();
  }
}
