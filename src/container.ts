import type { AppConfig } from './config/index.js';
import { CartService } from './domain/services/CartService.js';
import { CatalogService } from './domain/services/CatalogService.js';
import { ItemResponseGroupPresets, WorkContext } from './domain/catalog/models.js';
import { CouponPromotionEvaluator, IPromotionEvaluator } from './domain/strategies/IPromotionEvaluator.js';
import { FlatRateTaxEvaluator, ITaxEvaluator } from './domain/strategies/ITaxEvaluator.js';
import { CacheRegions } from './infrastructure/cache/ICacheManager.js';
import { MemoryCacheManager } from './infrastructure/cache/MemoryCacheManager.js';
import { CartStoreClientMock } from './infrastructure/clients/CartStoreClientMock.js';
import {
  CatalogApiClientMock,
  InventoryApiClientMock,
  PricingServiceMock,
  VendorServiceMock,
} from './infrastructure/clients/CatalogClientsMock.js';
import type { StorefrontSeed } from './infrastructure/seed.js';

export interface RequestScope {
  storeId: string;
  language: string;
  currency: string;
  customer: { id: string; isRegisteredUser: boolean };
}

export interface AppContainer {
  config: AppConfig;
  catalogFor(scope: RequestScope): CatalogService;
  cartServiceFor(scope: RequestScope): CartService;
}

// wires the in-memory backends; shared state (cache, stores) lives here, services are per request
export function createContainer(config: AppConfig, seed: StorefrontSeed): AppContainer {
  const cache = new MemoryCacheManager(
    {
      [CacheRegions.Cart]: config.cache.cartTtlSeconds,
      [CacheRegions.Api]: config.cache.apiTtlSeconds,
    },
    config.cache.apiTtlSeconds
  );
  const cartApi = new CartStoreClientMock({
    shippingRates: seed.shippingRates,
    paymentMethods: seed.paymentMethods,
  });
  const catalogApi = new CatalogApiClientMock(seed);
  const inventoryApi = new InventoryApiClientMock(seed.inventories);
  const pricingService = new PricingServiceMock(seed.prices);
  const vendorService = new VendorServiceMock(seed.vendors);
  const promotionEvaluator: IPromotionEvaluator = new CouponPromotionEvaluator(seed.promotions);
  const taxEvaluator: ITaxEvaluator = new FlatRateTaxEvaluator(config.cart.taxRate);

  const catalogFor = (scope: RequestScope): CatalogService => {
    const workContext: WorkContext = {
      store: { id: scope.storeId },
      language: scope.language,
      currency: scope.currency,
      customer: scope.customer,
      productResponseGroup: ItemResponseGroupPresets.ItemMedium,
      productSearchResponseGroup: ItemResponseGroupPresets.ItemMedium,
    };
    return new CatalogService(
      {
        catalogApi,
        searchApi: catalogApi,
        inventoryApi,
        pricingService,
        vendorService,
        workContext: () => workContext,
      },
      config.catalog.pageSize
    );
  };

  return {
    config,
    catalogFor,
    cartServiceFor: (scope) =>
      new CartService(
        {
          cartApi,
          catalog: catalogFor(scope),
          cache,
          promotionEvaluator,
          taxEvaluator,
        },
        { defaultCartName: config.cart.defaultName }
      ),
  };
}
