import type { ProductPrice, TierPrice } from './models.js';

// rounding to 2 decimals to avoid floating point weirdness
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function withTax(amount: number, taxPercentRate: number): number {
  return roundMoney(amount * (1 + taxPercentRate));
}

/**
 * Picks the tier with the largest quantity breakpoint not above `quantity`.
 * Falls back to the sale price when no tier applies.
 */
export function getTierPrice(price: ProductPrice, quantity: number): TierPrice {
  const applicable = price.tierPrices
    .filter((tier) => tier.quantity <= quantity)
    .sort((a, b) => b.quantity - a.quantity);

  if (applicable.length > 0) {
    return applicable[0];
  }

  return {
    quantity: 1,
    price: price.salePrice,
    priceWithTax: withTax(price.salePrice, price.taxPercentRate),
  };
}
