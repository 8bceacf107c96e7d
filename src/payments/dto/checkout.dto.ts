import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { CURRENCIES, Currency } from '../payment-intents.repository';

export class CheckoutDto {
  @ApiProperty({ example: '66f1c2a9e4b0a1b2c3d4e5f6' })
  @IsString()
  @IsNotEmpty()
  product_id!: string;

  @ApiPropertyOptional({ enum: CURRENCIES, default: 'USDC' })
  @IsOptional()
  @Transform(({ value }) =>
    typeof value === 'string' ? value.toUpperCase() : value,
  )
  @IsIn(CURRENCIES)
  currency?: Currency;

  @ApiPropertyOptional({ example: 'buyer@example.com' })
  @IsOptional()
  @IsString()
  buyer_email?: string;
}
