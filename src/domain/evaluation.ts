import type { Cart, CartTotals, LineItem, Payment, PaymentMethod, Shipment, ShippingMethod } from './models.js';
import { roundMoney, withTax } from './catalog/pricing.js';

// Anything promotion and tax evaluators read prices from and write results onto
export type Discountable = Cart | ShippingMethod | PaymentMethod;
export type Taxable = Cart | ShippingMethod | PaymentMethod;

export function isCart(target: Discountable): target is Cart {
  return 'items' in target;
}

export function isShippingMethod(target: Discountable): target is ShippingMethod {
  return 'shipmentMethodCode' in target;
}

export interface PromotionEntry {
  productId: string;
  quantity: number;
  listPrice: number;
  salePrice: number;
}

export interface PromotionEvaluationContext {
  storeId: string;
  customerId: string;
  isRegisteredUser: boolean;
  currency: string;
  language: string;
  coupon?: string;
  cartTotal: number;
  entries: PromotionEntry[];
  shipmentMethodCode?: string;
  paymentMethodCode?: string;
}

export type TaxLineType = 'lineItem' | 'shipment' | 'payment';

export interface TaxLine {
  id: string;
  code: string;
  name: string;
  type: TaxLineType;
  taxType?: string;
  quantity: number;
  amount: number; // already discounted
}

export interface TaxEvaluationContext {
  storeId: string;
  customerId: string;
  currency: string;
  lines: TaxLine[];
}

export interface TaxRate {
  lineId: string;
  rate: number;
  amount: number;
}

export function toPromotionEvaluationContext(cart: Cart): PromotionEvaluationContext {
  return {
    storeId: cart.storeId,
    customerId: cart.customerId,
    isRegisteredUser: !cart.isAnonymous,
    currency: cart.currency,
    language: cart.language,
    coupon: cart.coupon?.code,
    cartTotal: roundMoney(cart.items.reduce((sum, item) => sum + item.salePrice * item.quantity, 0)),
    entries: cart.items.map((item) => ({
      productId: item.productId,
      quantity: item.quantity,
      listPrice: item.listPrice,
      salePrice: item.salePrice,
    })),
    shipmentMethodCode: cart.shipments[0]?.shipmentMethodCode,
    paymentMethodCode: cart.payments[0]?.paymentGatewayCode,
  };
}

export function toTaxEvaluationContext(cart: Cart): TaxEvaluationContext {
  return {
    storeId: cart.storeId,
    customerId: cart.customerId,
    currency: cart.currency,
    lines: [
      ...cart.items.map(lineItemTaxLine),
      ...cart.shipments.map(shipmentTaxLine),
      ...cart.payments.map(paymentTaxLine),
    ],
  };
}

export function toTaxLines(target: Taxable): TaxLine[] {
  if (isCart(target)) return toTaxEvaluationContext(target).lines;
  if (isShippingMethod(target)) {
    return [
      {
        id: shippingMethodLineId(target.shipmentMethodCode, target.optionName),
        code: target.shipmentMethodCode,
        name: target.name,
        type: 'shipment',
        taxType: target.taxType,
        quantity: 1,
        amount: roundMoney(target.price - target.discountAmount),
      },
    ];
  }
  return [
    {
      id: `payment:${target.code}`,
      code: target.code,
      name: target.name,
      type: 'payment',
      taxType: target.taxType,
      quantity: 1,
      amount: roundMoney(target.price - target.discountAmount),
    },
  ];
}

/**
 * Writes evaluated rates back onto a target. Lines the evaluator returned
 * nothing for are reset to zero tax.
 */
export function applyTaxRates(target: Taxable, rates: TaxRate[]): void {
  const byLine = new Map(rates.map((rate) => [rate.lineId, rate]));
  const apply = (
    holder: { taxTotal: number; taxPercentRate: number },
    lineId: string
  ): void => {
    const rate = byLine.get(lineId);
    holder.taxTotal = rate ? rate.amount : 0;
    holder.taxPercentRate = rate ? rate.rate : 0;
  };

  if (isCart(target)) {
    target.items.forEach((item) => apply(item, lineItemTaxLine(item).id));
    target.shipments.forEach((shipment, index) => apply(shipment, shipmentTaxLine(shipment, index).id));
    target.payments.forEach((payment, index) => apply(payment, paymentTaxLine(payment, index).id));
    return;
  }
  apply(target, toTaxLines(target)[0].id);
}

export function salePriceWithTax(item: LineItem): number {
  return withTax(item.salePrice, item.taxPercentRate);
}

export function priceWithTax(holder: { price: number; taxPercentRate: number }): number {
  return withTax(holder.price, holder.taxPercentRate);
}

export function calculateCartTotals(cart: Cart): CartTotals {
  const subTotal = cart.items.reduce((sum, item) => sum + item.salePrice * item.quantity, 0);
  const shippingTotal = cart.shipments.reduce((sum, shipment) => sum + shipment.price, 0);
  const paymentTotal = cart.payments.reduce((sum, payment) => sum + payment.price, 0);
  const discountTotal =
    cart.items.reduce((sum, item) => sum + item.discountAmount * item.quantity, 0) +
    cart.shipments.reduce((sum, shipment) => sum + shipment.discountAmount, 0) +
    cart.payments.reduce((sum, payment) => sum + payment.discountAmount, 0);
  const taxTotal =
    cart.items.reduce((sum, item) => sum + item.taxTotal, 0) +
    cart.shipments.reduce((sum, shipment) => sum + shipment.taxTotal, 0) +
    cart.payments.reduce((sum, payment) => sum + payment.taxTotal, 0);

  return {
    subTotal: roundMoney(subTotal),
    discountTotal: roundMoney(discountTotal),
    shippingTotal: roundMoney(shippingTotal),
    paymentTotal: roundMoney(paymentTotal),
    taxTotal: roundMoney(taxTotal),
    total: roundMoney(subTotal + shippingTotal + paymentTotal - discountTotal + taxTotal),
  };
}

function shippingMethodLineId(code: string | undefined, option: string | undefined): string {
  return `shipment:${code ?? ''}:${option ?? ''}`;
}

function lineItemTaxLine(item: LineItem): TaxLine {
  return {
    id: `lineItem:${item.productId}`,
    code: item.sku ?? item.productId,
    name: item.name,
    type: 'lineItem',
    taxType: item.taxType,
    quantity: item.quantity,
    amount: roundMoney((item.salePrice - item.discountAmount) * item.quantity),
  };
}

// positional, like payments: shipments without a method would otherwise share one id
function shipmentTaxLine(shipment: Shipment, index: number): TaxLine {
  return {
    id: `shipment:${index}`,
    code: shipment.shipmentMethodCode ?? '',
    name: shipment.shipmentMethodCode ?? 'shipment',
    type: 'shipment',
    taxType: shipment.taxType,
    quantity: 1,
    amount: roundMoney(shipment.price - shipment.discountAmount),
  };
}

function paymentTaxLine(payment: Payment, index: number): TaxLine {
  return {
    id: `payment:${index}`,
    code: payment.paymentGatewayCode ?? '',
    name: payment.paymentGatewayCode ?? 'payment',
    type: 'payment',
    quantity: 1,
    amount: roundMoney(payment.price - payment.discountAmount),
  };
}
