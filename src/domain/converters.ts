import type { Cart, CustomerInfo, LineItem, Payment, PaymentMethod, Shipment, ShippingMethod } from './models.js';
import type { Product } from './catalog/models.js';
import type {
  CartDto,
  LineItemDto,
  PaymentDto,
  PaymentMethodDto,
  ShipmentDto,
  ShippingRateDto,
} from '../infrastructure/clients/ICartStoreClient.js';
import { getTierPrice } from './catalog/pricing.js';

export function toLineItem(product: Product, currency: string, quantity: number): LineItem {
  let listPrice = 0;
  let salePrice = 0;
  if (product.price) {
    listPrice = product.price.listPrice;
    salePrice = getTierPrice(product.price, quantity).price;
  }

  return {
    productId: product.id,
    sku: product.code,
    name: product.name,
    imageUrl: product.imageUrl,
    currency,
    quantity,
    listPrice: Math.max(listPrice, salePrice),
    salePrice,
    discountAmount: 0,
    taxTotal: 0,
    taxPercentRate: 0,
    isReadOnly: false,
    isValid: true,
    validationErrors: [],
  };
}

export function createShipment(currency: string, init: Partial<Shipment> = {}): Shipment {
  return {
    currency,
    price: 0,
    discountAmount: 0,
    taxTotal: 0,
    taxPercentRate: 0,
    isValid: true,
    validationErrors: [],
    ...init,
  };
}

export function createPayment(currency: string, init: Partial<Payment> = {}): Payment {
  return {
    currency,
    amount: 0,
    price: 0,
    discountAmount: 0,
    taxTotal: 0,
    taxPercentRate: 0,
    ...init,
  };
}

export function toShippingMethod(rate: ShippingRateDto, currency: string): ShippingMethod {
  return {
    shipmentMethodCode: rate.shipmentMethodCode,
    optionName: rate.optionName,
    name: rate.name,
    currency,
    price: rate.rate,
    discountAmount: rate.discountAmount ?? 0,
    taxTotal: 0,
    taxPercentRate: 0,
    taxType: rate.taxType,
  };
}

export function toPaymentMethod(method: PaymentMethodDto, cart: Cart): PaymentMethod {
  return {
    code: method.code,
    name: method.name,
    currency: cart.currency,
    price: method.price,
    discountAmount: 0,
    taxTotal: 0,
    taxPercentRate: 0,
    taxType: method.taxType,
  };
}

export function toCart(dto: CartDto, currency: string, language: string, customer?: CustomerInfo): Cart {
  return {
    id: dto.id,
    storeId: dto.storeId,
    name: dto.name,
    customerId: dto.customerId,
    customerName: dto.customerName,
    customer,
    isAnonymous: dto.isAnonymous,
    language: dto.languageCode || language,
    currency,
    coupon: dto.coupon ? { code: dto.coupon } : undefined,
    items: dto.items.map((item) => ({ ...item, isValid: true, validationErrors: [] })),
    shipments: dto.shipments.map((shipment) => ({ ...shipment, isValid: true, validationErrors: [] })),
    payments: dto.payments.map((payment) => ({ ...payment })),
    isValid: true,
  };
}

export function toCartDto(cart: Cart): CartDto {
  return {
    id: cart.id,
    storeId: cart.storeId,
    name: cart.name,
    customerId: cart.customerId,
    customerName: cart.customerName,
    isAnonymous: cart.isAnonymous,
    languageCode: cart.language,
    currency: cart.currency,
    coupon: cart.coupon?.code,
    items: cart.items.map(toLineItemDto),
    shipments: cart.shipments.map(toShipmentDto),
    payments: cart.payments.map((payment): PaymentDto => ({ ...payment })),
  };
}

function toLineItemDto({ isValid: _isValid, validationErrors: _errors, ...item }: LineItem): LineItemDto {
  return item;
}

function toShipmentDto({ isValid: _isValid, validationErrors: _errors, ...shipment }: Shipment): ShipmentDto {
  return shipment;
}
