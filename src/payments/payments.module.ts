import { Module } from '@nestjs/common';
import { MockChainModule } from '../mock-chain/mock-chain.module';
import { CheckoutService } from './checkout.service';
import { IntentExpiryService } from './intent-expiry.service';
import { PaymentsController } from './payments.controller';
import { PaymentsService } from './payments.service';

@Module({
  imports: [MockChainModule],
  controllers: [PaymentsController],
  providers: [CheckoutService, PaymentsService, IntentExpiryService],
})
export class PaymentsModule {}
