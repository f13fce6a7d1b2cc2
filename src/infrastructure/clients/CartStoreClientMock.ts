import { v4 as uuidv4 } from 'uuid';
import {
  CartDto,
  CartSearchCriteria,
  ICartStoreClient,
  PaymentMethodDto,
  ShippingRateDto,
} from './ICartStoreClient.js';
import { ResourceNotFoundError } from '../../domain/errors/index.js';
import { roundMoney } from '../../domain/catalog/pricing.js';

export interface CartStoreClientMockOptions {
  shippingRates?: ShippingRateDto[];
  paymentMethods?: PaymentMethodDto[];
}

// in-memory stand-in for the remote cart store; assigns ids and stamps totals like the real one
export class CartStoreClientMock implements ICartStoreClient {
  private carts: Map<string, CartDto> = new Map();
  private shippingRates: ShippingRateDto[];
  private paymentMethods: PaymentMethodDto[];

  constructor(options: CartStoreClientMockOptions = {}) {
    this.shippingRates = options.shippingRates ?? [];
    this.paymentMethods = options.paymentMethods ?? [];
  }

  async search(criteria: CartSearchCriteria): Promise<CartDto[]> {
    const matches: CartDto[] = [];
    for (const cart of this.carts.values()) {
      if (
        cart.storeId === criteria.storeId &&
        cart.customerId === criteria.customerId &&
        cart.name === criteria.name &&
        cart.currency === criteria.currency
      ) {
        matches.push(structuredClone(cart));
      }
    }
    return matches;
  }

  async getById(cartId: string): Promise<CartDto | null> {
    const cart = this.carts.get(cartId);
    return cart ? structuredClone(cart) : null;
  }

  async create(cart: CartDto): Promise<CartDto> {
    const now = new Date().toISOString();
    const id = cart.id ?? uuidv4();
    const stored = this.stamp({ ...structuredClone(cart), id, createdDate: now });
    this.carts.set(id, stored);
    return structuredClone(stored);
  }

  async update(cart: CartDto): Promise<void> {
    if (!cart.id || !this.carts.has(cart.id)) {
      throw new ResourceNotFoundError('Cart', cart.id ?? '');
    }
    const existing = this.carts.get(cart.id);
    this.carts.set(cart.id, this.stamp({ ...structuredClone(cart), createdDate: existing?.createdDate }));
  }

  async delete(cartIds: string[]): Promise<void> {
    for (const id of cartIds) {
      this.carts.delete(id);
    }
  }

  async getAvailableShippingRates(_cartId: string | undefined): Promise<ShippingRateDto[]> {
    return structuredClone(this.shippingRates);
  }

  async getAvailablePaymentMethods(_cartId: string | undefined): Promise<PaymentMethodDto[]> {
    return structuredClone(this.paymentMethods.filter((method) => method.isActive));
  }

  private stamp(cart: CartDto): CartDto {
    for (const item of cart.items) item.id ??= uuidv4();
    for (const shipment of cart.shipments) shipment.id ??= uuidv4();
    for (const payment of cart.payments) payment.id ??= uuidv4();

    const subTotal = cart.items.reduce((sum, item) => sum + item.salePrice * item.quantity, 0);
    const discountTotal =
      cart.items.reduce((sum, item) => sum + item.discountAmount * item.quantity, 0) +
      cart.shipments.reduce((sum, shipment) => sum + shipment.discountAmount, 0) +
      cart.payments.reduce((sum, payment) => sum + payment.discountAmount, 0);
    const taxTotal =
      cart.items.reduce((sum, item) => sum + item.taxTotal, 0) +
      cart.shipments.reduce((sum, shipment) => sum + shipment.taxTotal, 0) +
      cart.payments.reduce((sum, payment) => sum + payment.taxTotal, 0);
    const extras =
      cart.shipments.reduce((sum, shipment) => sum + shipment.price, 0) +
      cart.payments.reduce((sum, payment) => sum + payment.price, 0);

    return {
      ...cart,
      subTotal: roundMoney(subTotal),
      discountTotal: roundMoney(discountTotal),
      taxTotal: roundMoney(taxTotal),
      total: roundMoney(subTotal + extras - discountTotal + taxTotal),
      modifiedDate: new Date().toISOString(),
    };
  }

  // Utility methods for testing
  getCartCount(): number {
    return this.carts.size;
  }

  clearAllCarts(): void {
    this.carts.clear();
  }
}
