import { HttpStatus } from '@nestjs/common';

export abstract class DomainException extends Error {
  abstract readonly errorCode: string;
  abstract readonly status: HttpStatus;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProductNotFoundException extends DomainException {
  readonly errorCode = 'PRODUCT_NOT_FOUND';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(message?: string) {
    super(message || 'Product not found');
  }
}

export class PaymentIntentNotFoundException extends DomainException {
  readonly errorCode = 'PAYMENT_INTENT_NOT_FOUND';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(message?: string) {
    super(message || 'Payment intent not found');
  }
}

export class InvalidIdException extends DomainException {
  readonly errorCode = 'INVALID_ID';
  readonly status = HttpStatus.BAD_REQUEST;

  constructor(message?: string) {
    super(message || 'Invalid id');
  }
}

export class InvalidWebhookSecretException extends DomainException {
  readonly errorCode = 'UNAUTHORIZED';
  readonly status = HttpStatus.UNAUTHORIZED;

  constructor(message?: string) {
    super(message || 'Unauthorized');
  }
}

export class UnsupportedCurrencyException extends DomainException {
  readonly errorCode = 'UNSUPPORTED_CURRENCY';
  readonly status = HttpStatus.BAD_REQUEST;

  constructor(currency: string) {
    super(`Unsupported currency: ${currency}`);
  }
}

export class PaymentIntentExpiredException extends DomainException {
  readonly errorCode = 'PAYMENT_INTENT_EXPIRED';
  readonly status = HttpStatus.CONFLICT;

  constructor(intentId: string) {
    super(`Payment intent ${intentId} has expired`);
  }
}
