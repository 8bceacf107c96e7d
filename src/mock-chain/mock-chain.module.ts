import { Module } from '@nestjs/common';
import { AddressGeneratorService } from './address-generator.service';
import { PaymentQrService } from './payment-qr.service';
import { PriceOracleService } from './price-oracle.service';

@Module({
  providers: [PriceOracleService, AddressGeneratorService, PaymentQrService],
  exports: [PriceOracleService, AddressGeneratorService, PaymentQrService],
})
export class MockChainModule {}
