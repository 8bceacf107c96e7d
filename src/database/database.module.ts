import { Global, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { AppConfigService } from '../config/app-config.service';
import { MongoOrdersRepository } from '../orders/mongo-orders.repository';
import { OrdersRepository } from '../orders/orders.repository';
import { Order, OrderSchema } from '../orders/schemas/order.schema';
import {
  MongoPaymentIntentsRepository,
} from '../payments/mongo-payment-intents.repository';
import {
  PaymentIntentsRepository,
} from '../payments/payment-intents.repository';
import {
  PaymentIntent,
  PaymentIntentSchema,
} from '../payments/schemas/payment-intent.schema';
import { MongoProductsRepository } from '../products/mongo-products.repository';
import { ProductsRepository } from '../products/products.repository';
import { Product, ProductSchema } from '../products/schemas/product.schema';

/** Binds the repository tokens to their MongoDB implementations. */
@Global()
@Module({
  imports: [
    MongooseModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (config: AppConfigService) => ({
        uri: config.databaseUrl,
        dbName: config.databaseName,
      }),
    }),
    MongooseModule.forFeature([
      { name: Product.name, schema: ProductSchema },
      { name: PaymentIntent.name, schema: PaymentIntentSchema },
      { name: Order.name, schema: OrderSchema },
    ]),
  ],
  providers: [
    { provide: ProductsRepository, useClass: MongoProductsRepository },
    {
      provide: PaymentIntentsRepository,
      useClass: MongoPaymentIntentsRepository,
    },
    { provide: OrdersRepository, useClass: MongoOrdersRepository },
  ],
  exports: [
    MongooseModule,
    ProductsRepository,
    PaymentIntentsRepository,
    OrdersRepository,
  ],
})
export class DatabaseModule {}
