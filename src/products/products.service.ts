import { Injectable, Logger } from '@nestjs/common';
import { CreateProductDto } from './dto/create-product.dto';
import { ProductRecord, ProductsRepository } from './products.repository';

export interface ProductView {
  title: string;
  description: string | null;
  price_usd: number;
  image_url: string | null;
  active: boolean;
}

export function toProductView(product: ProductRecord): ProductView {
  return {
    title: product.title,
    description: product.description ?? null,
    price_usd: product.price_usd,
    image_url: product.image_url ?? null,
    active: product.active,
  };
}

@Injectable()
export class ProductsService {
  private readonly logger = new Logger(ProductsService.name);

  constructor(private readonly products: ProductsRepository) {}

  async create(input: CreateProductDto): Promise<{ id: string }> {
    const id = await this.products.create({
      title: input.title,
      description: input.description,
      price_usd: input.price_usd,
      image_url: input.image_url,
      active: input.active ?? true,
    });
    this.logger.log(`Product ${id} created: ${input.title}`);
    return { id };
  }

  async listActive(): Promise<ProductView[]> {
    const products = await this.products.findActive();
    return products.map(toProductView);
  }
}
