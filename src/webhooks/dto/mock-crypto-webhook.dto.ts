import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class MockCryptoWebhookDto {
  @ApiProperty({ example: '66f1c2a9e4b0a1b2c3d4e5f7' })
  @IsString()
  @IsNotEmpty()
  intent_id!: string;

  @ApiProperty({ example: 'demo-secret' })
  @IsString()
  secret!: string;
}
