import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

export class CreateProductDto {
  @ApiProperty({ example: 'Hardware wallet' })
  @IsString()
  @IsNotEmpty()
  title!: string;

  @ApiPropertyOptional({ example: 'Cold storage for your keys' })
  @IsOptional()
  @IsString()
  description?: string;

  @ApiProperty({ example: 120, minimum: 0 })
  @IsNumber()
  @Min(0)
  price_usd!: number;

  @ApiPropertyOptional({ example: 'https://example.com/wallet.png' })
  @IsOptional()
  @IsString()
  image_url?: string;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  active?: boolean;
}
