import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { MockCryptoWebhookDto } from './dto/mock-crypto-webhook.dto';
import { WebhookService } from './webhook.service';

@ApiTags('webhook')
@Controller('webhook')
export class WebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  @Post('mock/crypto')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a payment intent as paid (demo only)' })
  async mockCrypto(@Body() body: MockCryptoWebhookDto) {
    return this.webhookService.confirm(body.intent_id, body.secret);
  }
}
