import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { CheckoutService } from './checkout.service';
import { CheckoutDto } from './dto/checkout.dto';
import { PaymentsService } from './payments.service';

@ApiTags('payments')
@Controller()
export class PaymentsController {
  constructor(
    private readonly checkoutService: CheckoutService,
    private readonly paymentsService: PaymentsService,
  ) {}

  @Post('checkout')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Create a payment intent for a product' })
  async checkout(@Body() body: CheckoutDto) {
    return this.checkoutService.checkout(body);
  }

  @Get('payments/:intentId')
  @ApiOperation({ summary: 'Get payment intent status' })
  @ApiParam({ name: 'intentId', type: String })
  async getPayment(@Param('intentId') intentId: string) {
    return this.paymentsService.getStatus(intentId);
  }
}
