import { CartService } from '../src/domain/services/CartService.js';
import { CatalogService } from '../src/domain/services/CatalogService.js';
import { ItemResponseGroupPresets, type Product, type WorkContext } from '../src/domain/catalog/models.js';
import { CouponPromotionEvaluator } from '../src/domain/strategies/IPromotionEvaluator.js';
import { FlatRateTaxEvaluator } from '../src/domain/strategies/ITaxEvaluator.js';
import { MemoryCacheManager } from '../src/infrastructure/cache/MemoryCacheManager.js';
import { CartStoreClientMock } from '../src/infrastructure/clients/CartStoreClientMock.js';
import {
  CatalogApiClientMock,
  InventoryApiClientMock,
  PricingServiceMock,
  VendorServiceMock,
} from '../src/infrastructure/clients/CatalogClientsMock.js';
import type { StorefrontSeed } from '../src/infrastructure/seed.js';

const product = (init: Partial<Product> & Pick<Product, 'id' | 'name'>): Product => ({
  code: init.id.toUpperCase(),
  isActive: true,
  isBuyable: true,
  trackInventory: true,
  variations: [],
  associations: [],
  ...init,
});

export function testSeed(): StorefrontSeed {
  return {
    categories: [
      { id: 'cat-a', code: 'a', name: 'Alpha', outline: 'root/a' },
      { id: 'cat-b', code: 'b', name: 'Beta', outline: 'root/b' },
      { id: 'cat-c', code: 'c', name: 'Alpha Two', outline: 'root/a/two' },
    ],
    products: [
      product({
        id: 'p-100',
        name: 'Widget',
        categoryId: 'cat-a',
        outline: 'root/a',
        vendorId: 'v-1',
        variations: [product({ id: 'p-100-red', name: 'Widget Red', outline: 'root/a', vendorId: 'v-1' })],
        associations: [
          { kind: 'product', type: 'Accessories', priority: 1, productId: 'p-tier' },
          { kind: 'category', type: 'Related', priority: 2, categoryId: 'cat-b' },
        ],
      }),
      product({
        id: 'p-tier',
        name: 'Gadget',
        categoryId: 'cat-b',
        outline: 'root/b',
        trackInventory: false,
        associations: [{ kind: 'product', type: 'Accessories', priority: 1, productId: 'p-100' }],
      }),
      product({ id: 'p-odd', name: 'Oddity', categoryId: 'cat-b', outline: 'root/b', trackInventory: false }),
      product({ id: 'p-gone', name: 'Discontinued', isActive: false, isBuyable: false, trackInventory: false }),
    ],
    inventories: [
      { productId: 'p-100', fulfillmentCenterId: 'main', inStockQuantity: 10, reservedQuantity: 2 },
      { productId: 'p-100-red', fulfillmentCenterId: 'main', inStockQuantity: 1 },
    ],
    prices: [
      { productId: 'p-100', currency: 'USD', listPrice: 120, salePrice: 100, taxPercentRate: 0.1, tierPrices: [] },
      { productId: 'p-100-red', currency: 'USD', listPrice: 120, salePrice: 110, taxPercentRate: 0.1, tierPrices: [] },
      {
        productId: 'p-tier',
        currency: 'USD',
        listPrice: 50,
        salePrice: 40,
        taxPercentRate: 0.1,
        tierPrices: [
          { quantity: 1, price: 40, priceWithTax: 44 },
          { quantity: 5, price: 35, priceWithTax: 38.5 },
        ],
      },
      {
        productId: 'p-odd',
        currency: 'USD',
        listPrice: 30,
        salePrice: 30,
        taxPercentRate: 0.1,
        tierPrices: [
          { quantity: 1, price: 30, priceWithTax: 33 },
          { quantity: 3, price: 45, priceWithTax: 49.5 },
        ],
      },
      { productId: 'p-100', currency: 'EUR', listPrice: 110, salePrice: 90, taxPercentRate: 0.2, tierPrices: [] },
    ],
    vendors: [{ id: 'v-1', name: 'Vendor One' }],
    promotions: [{ id: 'promo-save10', name: '10% off', couponCode: 'SAVE10', lineItemDiscountPercent: 10 }],
    shippingRates: [
      { shipmentMethodCode: 'FixedRate', optionName: 'Ground', name: 'Ground', currency: 'USD', rate: 10 },
      { shipmentMethodCode: 'FixedRate', optionName: 'Air', name: 'Air', currency: 'USD', rate: 25 },
    ],
    paymentMethods: [
      { code: 'Card', name: 'Card', currency: 'USD', price: 0, isActive: true },
      { code: 'Cash', name: 'Cash on delivery', currency: 'USD', price: 2, isActive: true },
      { code: 'Invoice', name: 'Invoice', currency: 'USD', price: 5, isActive: false },
    ],
  };
}

export const STORE = { id: 'store-1' };

export function workContext(overrides: Partial<WorkContext> = {}): WorkContext {
  return {
    store: STORE,
    language: 'en-US',
    currency: 'USD',
    productResponseGroup: ItemResponseGroupPresets.ItemMedium,
    productSearchResponseGroup: ItemResponseGroupPresets.ItemMedium,
    ...overrides,
  };
}

export interface Harness {
  seed: StorefrontSeed;
  cache: MemoryCacheManager;
  cartApi: CartStoreClientMock;
  catalogApi: CatalogApiClientMock;
  catalog: CatalogService;
  promotionEvaluator: CouponPromotionEvaluator;
  taxEvaluator: FlatRateTaxEvaluator;
  newCartService(): CartService;
}

export function createHarness(seed: StorefrontSeed = testSeed()): Harness {
  const cache = new MemoryCacheManager({ cart: 300, api: 60 });
  const cartApi = new CartStoreClientMock({ shippingRates: seed.shippingRates, paymentMethods: seed.paymentMethods });
  const catalogApi = new CatalogApiClientMock(seed);
  const context = workContext();
  const catalog = new CatalogService(
    {
      catalogApi,
      searchApi: catalogApi,
      inventoryApi: new InventoryApiClientMock(seed.inventories),
      pricingService: new PricingServiceMock(seed.prices),
      vendorService: new VendorServiceMock(seed.vendors),
      workContext: () => context,
    },
    2
  );
  const promotionEvaluator = new CouponPromotionEvaluator(seed.promotions);
  const taxEvaluator = new FlatRateTaxEvaluator(0.1);

  return {
    seed,
    cache,
    cartApi,
    catalogApi,
    catalog,
    promotionEvaluator,
    taxEvaluator,
    newCartService: () =>
      new CartService({ cartApi, catalog, cache, promotionEvaluator, taxEvaluator }, { defaultCartName: 'default' }),
  };
}
