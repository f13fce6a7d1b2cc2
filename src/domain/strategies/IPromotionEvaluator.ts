import type { Discountable, PromotionEvaluationContext } from '../evaluation.js';
import { isCart, isShippingMethod } from '../evaluation.js';
import { roundMoney } from '../catalog/pricing.js';

export interface IPromotionEvaluator {
  // writes discount amounts onto the targets in place
  evaluateDiscounts(context: PromotionEvaluationContext, targets: Discountable[]): Promise<void>;
}

export interface Promotion {
  id: string;
  name: string;
  couponCode?: string; // no coupon means the promotion applies automatically
  minCartTotal?: number;
  lineItemDiscountPercent?: number;
  shipmentDiscountPercent?: number;
  paymentDiscountPercent?: number;
}

// percentage rewards, best promotion per reward kind wins
export class CouponPromotionEvaluator implements IPromotionEvaluator {
  constructor(private readonly promotions: Promotion[]) {}

  async evaluateDiscounts(context: PromotionEvaluationContext, targets: Discountable[]): Promise<void> {
    const active = this.promotions.filter(
      (promo) =>
        (!promo.couponCode || sameCode(promo.couponCode, context.coupon)) &&
        (promo.minCartTotal ?? 0) <= context.cartTotal
    );

    const itemPercent = best(active.map((p) => p.lineItemDiscountPercent));
    const shipmentPercent = best(active.map((p) => p.shipmentDiscountPercent));
    const paymentPercent = best(active.map((p) => p.paymentDiscountPercent));

    for (const target of targets) {
      if (isCart(target)) {
        // line percentages are taken of the sale price, not the list price; a method's price is its list price
        for (const item of target.items) {
          item.discountAmount = percentOf(item.salePrice, itemPercent);
        }
        for (const shipment of target.shipments) {
          shipment.discountAmount = percentOf(shipment.price, shipmentPercent);
        }
        for (const payment of target.payments) {
          payment.discountAmount = percentOf(payment.price, paymentPercent);
        }
        if (target.coupon) {
          target.coupon.appliedSuccessfully = active.some(
            (promo) => promo.couponCode !== undefined && sameCode(promo.couponCode, target.coupon?.code)
          );
        }
      } else if (isShippingMethod(target)) {
        target.discountAmount = percentOf(target.price, shipmentPercent);
      } else {
        target.discountAmount = percentOf(target.price, paymentPercent);
      }
    }
  }
}

function sameCode(left: string, right: string | undefined): boolean {
  return right !== undefined && left.toLowerCase() === right.toLowerCase();
}

function best(percents: Array<number | undefined>): number {
  return percents.reduce<number>((max, p) => Math.max(max, p ?? 0), 0);
}

function percentOf(amount: number, percent: number): number {
  return roundMoney((amount * percent) / 100);
}
