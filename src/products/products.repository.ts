import { StoredRecord } from '../common/stored-record';

export interface ProductFields {
  title: string;
  description?: string;
  price_usd: number;
  image_url?: string;
  active: boolean;
}

export interface ProductRecord extends StoredRecord, ProductFields {}

/** Access to the `product` collection. */
export abstract class ProductsRepository {
  /** Inserts a product and returns its id. */
  abstract create(fields: ProductFields): Promise<string>;

  /** `id` must already be a valid object id. */
  abstract findById(id: string): Promise<ProductRecord | null>;

  abstract findActive(): Promise<ProductRecord[]>;

  abstract count(): Promise<number>;
}
