import { describe, it, expect } from 'vitest';
import { CouponPromotionEvaluator, Promotion } from '../src/domain/strategies/IPromotionEvaluator.js';
import { FlatRateTaxEvaluator } from '../src/domain/strategies/ITaxEvaluator.js';
import {
  applyTaxRates,
  calculateCartTotals,
  toPromotionEvaluationContext,
  toTaxEvaluationContext,
  toTaxLines,
} from '../src/domain/evaluation.js';
import { createPayment, createShipment } from '../src/domain/converters.js';
import { getTierPrice } from '../src/domain/catalog/pricing.js';
import type { Cart, LineItem, PaymentMethod, ShippingMethod } from '../src/domain/models.js';

const lineItem = (overrides: Partial<LineItem> = {}): LineItem => ({
  productId: 'p-1',
  name: 'Widget',
  currency: 'USD',
  quantity: 1,
  listPrice: 120,
  salePrice: 100,
  discountAmount: 0,
  taxTotal: 0,
  taxPercentRate: 0,
  isReadOnly: false,
  isValid: true,
  validationErrors: [],
  ...overrides,
});

const makeCart = (overrides: Partial<Cart> = {}): Cart => ({
  storeId: 'store-1',
  name: 'default',
  customerId: 'c-1',
  customerName: 'Anonymous',
  isAnonymous: true,
  language: 'en-US',
  currency: 'USD',
  items: [lineItem()],
  shipments: [createShipment('USD', { shipmentMethodCode: 'FixedRate', shipmentMethodOption: 'Ground', price: 10 })],
  payments: [],
  isValid: true,
  ...overrides,
});

const ground = (): ShippingMethod => ({
  shipmentMethodCode: 'FixedRate',
  optionName: 'Ground',
  name: 'Ground',
  currency: 'USD',
  price: 10,
  discountAmount: 0,
  taxTotal: 0,
  taxPercentRate: 0,
});

const cash = (): PaymentMethod => ({
  code: 'Cash',
  name: 'Cash',
  currency: 'USD',
  price: 4,
  discountAmount: 0,
  taxTotal: 0,
  taxPercentRate: 0,
});

describe('CouponPromotionEvaluator', () => {
  const promotions: Promotion[] = [
    { id: 'coupon', name: '10% with coupon', couponCode: 'SAVE10', lineItemDiscountPercent: 10 },
    { id: 'auto', name: '5% for everyone', lineItemDiscountPercent: 5 },
    { id: 'shipping', name: 'Free shipping over 200', minCartTotal: 200, shipmentDiscountPercent: 100 },
    { id: 'payment', name: 'Half price cash handling', couponCode: 'CASH', paymentDiscountPercent: 50 },
  ];
  const evaluator = new CouponPromotionEvaluator(promotions);

  it('applies automatic promotions without a coupon', async () => {
    const cart = makeCart();

    await evaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), [cart]);

    expect(cart.items[0].discountAmount).toBe(5);
    expect(cart.shipments[0].discountAmount).toBe(0);
  });

  it('takes the best percentage once the coupon matches', async () => {
    const cart = makeCart({ coupon: { code: 'save10' } });

    await evaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), [cart]);

    expect(cart.items[0].discountAmount).toBe(10);
    expect(cart.coupon?.appliedSuccessfully).toBe(true);
  });

  it('honours the minimum cart total', async () => {
    const cart = makeCart({ items: [lineItem({ quantity: 2 })] });

    await evaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), [cart]);

    expect(cart.shipments[0].discountAmount).toBe(10);
  });

  it('discounts candidate shipping and payment methods', async () => {
    const cart = makeCart({ coupon: { code: 'CASH' }, items: [lineItem({ quantity: 3 })] });
    const shipping = ground();
    const payment = cash();

    await evaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), [shipping, payment]);

    expect(shipping.discountAmount).toBe(10);
    expect(payment.discountAmount).toBe(2);
    expect(cart.items[0].discountAmount).toBe(0);
  });
});

describe('FlatRateTaxEvaluator', () => {
  const evaluator = new FlatRateTaxEvaluator(0.2, { reduced: 0.05 });

  it('taxes discounted cart lines with per tax type overrides', async () => {
    const cart = makeCart({
      items: [lineItem({ quantity: 2, discountAmount: 10 })],
      shipments: [
        createShipment('USD', {
          shipmentMethodCode: 'FixedRate',
          shipmentMethodOption: 'Ground',
          price: 10,
          taxType: 'reduced',
        }),
      ],
      payments: [createPayment('USD', { paymentGatewayCode: 'Cash', price: 2 })],
    });

    await evaluator.evaluateTaxes(toTaxEvaluationContext(cart), [cart]);

    expect(cart.items[0].taxTotal).toBe(36);
    expect(cart.items[0].taxPercentRate).toBe(0.2);
    expect(cart.shipments[0].taxTotal).toBe(0.5);
    expect(cart.shipments[0].taxPercentRate).toBe(0.05);
    expect(cart.payments[0].taxTotal).toBe(0.4);
  });

  it('taxes candidate methods from their own lines', async () => {
    const shipping = { ...ground(), discountAmount: 5 };

    await evaluator.evaluateTaxes({ storeId: 'store-1', customerId: 'c-1', currency: 'USD', lines: toTaxLines(shipping) }, [
      shipping,
    ]);

    expect(shipping.taxTotal).toBe(1);
  });
});

describe('applyTaxRates', () => {
  it('resets lines the evaluator returned nothing for', () => {
    const cart = makeCart({ items: [lineItem({ taxTotal: 9, taxPercentRate: 0.1 })] });

    applyTaxRates(cart, [{ lineId: 'shipment:0', rate: 0.1, amount: 1 }]);

    expect(cart.items[0].taxTotal).toBe(0);
    expect(cart.items[0].taxPercentRate).toBe(0);
    expect(cart.shipments[0].taxTotal).toBe(1);
  });
});

describe('shipments without a method', () => {
  const evaluator = new FlatRateTaxEvaluator(0.2, { reduced: 0.05 });

  it('are taxed each at their own rate', async () => {
    const cart = makeCart({
      items: [],
      shipments: [createShipment('USD', { price: 10, taxType: 'reduced' }), createShipment('USD', { price: 20 })],
    });

    await evaluator.evaluateTaxes(toTaxEvaluationContext(cart), [cart]);

    expect(cart.shipments.map((s) => [s.taxPercentRate, s.taxTotal])).toEqual([
      [0.05, 0.5],
      [0.2, 4],
    ]);
  });
});

describe('calculateCartTotals', () => {
  it('adds shipping, payment and tax and subtracts discounts', () => {
    const cart = makeCart({
      items: [lineItem({ quantity: 2, discountAmount: 10, taxTotal: 36 })],
      shipments: [createShipment('USD', { price: 10, taxTotal: 0.5 })],
      payments: [createPayment('USD', { price: 2, taxTotal: 0.4 })],
    });

    expect(calculateCartTotals(cart)).toEqual({
      subTotal: 200,
      discountTotal: 20,
      shippingTotal: 10,
      paymentTotal: 2,
      taxTotal: 36.9,
      total: 228.9,
    });
  });
});

describe('getTierPrice', () => {
  const price = {
    currency: 'USD',
    listPrice: 50,
    salePrice: 40,
    taxPercentRate: 0.1,
    tierPrices: [
      { quantity: 1, price: 40, priceWithTax: 44 },
      { quantity: 5, price: 35, priceWithTax: 38.5 },
    ],
  };

  it('picks the largest breakpoint not above the quantity', () => {
    expect(getTierPrice(price, 4).price).toBe(40);
    expect(getTierPrice(price, 5).price).toBe(35);
    expect(getTierPrice(price, 12).price).toBe(35);
  });

  it('falls back to the sale price', () => {
    expect(getTierPrice({ ...price, salePrice: 100, tierPrices: [] }, 3)).toEqual({
      quantity: 1,
      price: 100,
      priceWithTax: 110,
    });
  });
});
