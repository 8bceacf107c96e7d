import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import { MongoProductsRepository } from './mongo-products.repository';
import { Product } from './schemas/product.schema';

function execResolving(value: unknown) {
  return { exec: jest.fn().mockResolvedValue(value) };
}

describe('MongoProductsRepository', () => {
  const productModel = {
    find: jest.fn(),
    countDocuments: jest.fn(),
  };
  let repository: MongoProductsRepository;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        MongoProductsRepository,
        { provide: getModelToken(Product.name), useValue: productModel },
      ],
    }).compile();
    repository = moduleRef.get(MongoProductsRepository);
  });

  it('lists only active products', async () => {
    const at = new Date('2026-05-01T10:00:00Z');
    productModel.find.mockReturnValue(
      execResolving([
        {
          _id: new Types.ObjectId('0123456789abcdef01234567'),
          title: 'Mug',
          price_usd: 12,
          active: true,
          created_at: at,
          updated_at: at,
        },
      ]),
    );

    const products = await repository.findActive();

    expect(productModel.find).toHaveBeenCalledWith({ active: true });
    expect(products).toEqual([
      {
        id: '0123456789abcdef01234567',
        title: 'Mug',
        description: undefined,
        price_usd: 12,
        image_url: undefined,
        active: true,
        created_at: at,
        updated_at: at,
      },
    ]);
  });

  it('counts every product', async () => {
    productModel.countDocuments.mockReturnValue(execResolving(4));

    await expect(repository.count()).resolves.toBe(4);
    expect(productModel.countDocuments).toHaveBeenCalledWith({});
  });
});
