// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// mutation attempted before loadOrCreate/takeCart bound a cart
export class CartNotLoadedError extends DomainError {
  constructor() {
    super('Cart not loaded.', 'CART_NOT_LOADED', 409);
  }
}

export class UnknownShipmentMethodError extends DomainError {
  constructor(
    public readonly shipmentMethodCode: string,
    public readonly shipmentMethodOption?: string
  ) {
    super(
      `Unknown shipment method: '${shipmentMethodCode}' with option: '${shipmentMethodOption ?? ''}'`,
      'UNKNOWN_SHIPMENT_METHOD',
      422
    );
  }
}

export class UnknownPaymentMethodError extends DomainError {
  constructor(public readonly paymentGatewayCode: string) {
    super(`Unknown payment method: '${paymentGatewayCode}'`, 'UNKNOWN_PAYMENT_METHOD', 422);
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}
