import type { CatalogSeed } from './clients/CatalogClientsMock.js';
import type { PaymentMethodDto, ShippingRateDto } from './clients/ICartStoreClient.js';
import type { Promotion } from '../domain/strategies/IPromotionEvaluator.js';

export interface StorefrontSeed extends CatalogSeed {
  promotions: Promotion[];
  shippingRates: ShippingRateDto[];
  paymentMethods: PaymentMethodDto[];
}

// demo data served by the in-memory backends when the API runs standalone
export const demoSeed: StorefrontSeed = {
  categories: [
    { id: 'cat-phones', code: 'phones', name: 'Phones', outline: 'catalog/phones' },
    { id: 'cat-accessories', code: 'accessories', name: 'Accessories', outline: 'catalog/accessories' },
  ],
  products: [
    {
      id: 'phone-x1',
      code: 'PHONE-X1',
      name: 'Phone X1',
      categoryId: 'cat-phones',
      outline: 'catalog/phones',
      isActive: true,
      isBuyable: true,
      trackInventory: true,
      vendorId: 'vendor-acme',
      variations: [
        {
          id: 'phone-x1-blue',
          code: 'PHONE-X1-BLUE',
          name: 'Phone X1 Blue',
          categoryId: 'cat-phones',
          outline: 'catalog/phones',
          isActive: true,
          isBuyable: true,
          trackInventory: true,
          vendorId: 'vendor-acme',
          variations: [],
          associations: [],
        },
      ],
      associations: [
        { kind: 'product', type: 'Accessories', priority: 1, productId: 'case-x1' },
        { kind: 'category', type: 'Related', priority: 2, categoryId: 'cat-accessories' },
      ],
    },
    {
      id: 'case-x1',
      code: 'CASE-X1',
      name: 'Case for Phone X1',
      categoryId: 'cat-accessories',
      outline: 'catalog/accessories',
      isActive: true,
      isBuyable: true,
      trackInventory: false,
      variations: [],
      associations: [],
    },
    {
      id: 'charger-usb-c',
      code: 'CHARGER-USBC',
      name: 'USB-C Charger',
      categoryId: 'cat-accessories',
      outline: 'catalog/accessories',
      isActive: true,
      isBuyable: true,
      trackInventory: true,
      vendorId: 'vendor-acme',
      variations: [],
      associations: [],
    },
    {
      id: 'phone-legacy',
      code: 'PHONE-LEGACY',
      name: 'Legacy Phone',
      categoryId: 'cat-phones',
      outline: 'catalog/phones',
      isActive: false,
      isBuyable: false,
      trackInventory: false,
      variations: [],
      associations: [],
    },
  ],
  inventories: [
    { productId: 'phone-x1', fulfillmentCenterId: 'main', inStockQuantity: 25, reservedQuantity: 5 },
    { productId: 'phone-x1-blue', fulfillmentCenterId: 'main', inStockQuantity: 3 },
    { productId: 'charger-usb-c', fulfillmentCenterId: 'main', inStockQuantity: 100, reservedQuantity: 10 },
  ],
  prices: [
    {
      productId: 'phone-x1',
      currency: 'USD',
      listPrice: 799,
      salePrice: 749,
      taxPercentRate: 0.09,
      tierPrices: [
        { quantity: 1, price: 749, priceWithTax: 816.41 },
        { quantity: 5, price: 719, priceWithTax: 783.71 },
      ],
    },
    {
      productId: 'phone-x1-blue',
      currency: 'USD',
      listPrice: 799,
      salePrice: 749,
      taxPercentRate: 0.09,
      tierPrices: [],
    },
    {
      productId: 'case-x1',
      currency: 'USD',
      listPrice: 29.99,
      salePrice: 24.99,
      taxPercentRate: 0.09,
      tierPrices: [],
    },
    {
      productId: 'charger-usb-c',
      currency: 'USD',
      listPrice: 19.99,
      salePrice: 19.99,
      taxPercentRate: 0.09,
      tierPrices: [{ quantity: 10, price: 15.99, priceWithTax: 17.43 }],
    },
  ],
  vendors: [{ id: 'vendor-acme', name: 'Acme Devices' }],
  promotions: [
    { id: 'promo-welcome', name: 'Welcome 10% off', couponCode: 'WELCOME10', lineItemDiscountPercent: 10 },
    { id: 'promo-free-shipping', name: 'Free ground shipping over 500', minCartTotal: 500, shipmentDiscountPercent: 100 },
  ],
  shippingRates: [
    { shipmentMethodCode: 'FixedRate', optionName: 'Ground', name: 'Ground', currency: 'USD', rate: 9.99 },
    { shipmentMethodCode: 'FixedRate', optionName: 'Air', name: 'Air', currency: 'USD', rate: 24.99 },
  ],
  paymentMethods: [
    { code: 'DefaultManualPaymentMethod', name: 'Pay on delivery', currency: 'USD', price: 0, isActive: true },
    { code: 'CreditCard', name: 'Credit card', currency: 'USD', price: 0, isActive: true },
    { code: 'Invoice', name: 'Invoice', currency: 'USD', price: 5, isActive: false },
  ],
};
