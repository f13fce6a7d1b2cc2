import type {
  Category,
  CategorySearchCriteria,
  Inventory,
  Product,
  ProductPrice,
  ProductSearchCriteria,
  Vendor,
  WorkContext,
} from '../../domain/catalog/models.js';
import type {
  ICatalogApiClient,
  IInventoryApiClient,
  IPricingService,
  ISearchApiClient,
  IVendorService,
  ProductSearchResponse,
} from './ICatalogClients.js';

export interface CatalogSeed {
  products: Product[];
  categories: Category[];
  inventories: Inventory[];
  prices: Array<ProductPrice & { productId: string }>;
  vendors: Vendor[];
}

function flatten(products: Product[]): Product[] {
  return products.flatMap((product) => [product, ...flatten(product.variations)]);
}

// in-memory catalog and search API
export class CatalogApiClientMock implements ICatalogApiClient, ISearchApiClient {
  constructor(private readonly seed: Pick<CatalogSeed, 'products' | 'categories'>) {}

  async getProductsByIds(ids: string[], _responseGroup: number): Promise<Product[]> {
    const all = flatten(this.seed.products);
    return ids.flatMap((id) => {
      const product = all.find((p) => p.id === id);
      return product ? [structuredClone(product)] : [];
    });
  }

  async getCategoriesByIds(ids: string[], _responseGroup: number): Promise<Category[]> {
    return ids.flatMap((id) => {
      const category = this.seed.categories.find((c) => c.id === id);
      return category ? [structuredClone(category)] : [];
    });
  }

  async searchProducts(_storeId: string, criteria: ProductSearchCriteria): Promise<ProductSearchResponse> {
    const keyword = criteria.keyword?.toLowerCase();
    const matches = this.seed.products.filter(
      (p) =>
        (!keyword || p.name.toLowerCase().includes(keyword)) &&
        (!criteria.outline || (p.outline ?? '').startsWith(criteria.outline)) &&
        (!criteria.vendorId || p.vendorId === criteria.vendorId)
    );

    const [column, direction] = (criteria.sortBy ?? 'name:asc').split(';')[0].split(':');
    const sorted = [...matches].sort((a, b) => {
      const left = column === 'code' ? a.code : a.name;
      const right = column === 'code' ? b.code : b.name;
      return direction === 'desc' ? right.localeCompare(left) : left.localeCompare(right);
    });

    const start = (criteria.pageNumber - 1) * criteria.pageSize;
    const counts = new Map<string, number>();
    for (const product of matches) {
      if (product.categoryId) counts.set(product.categoryId, (counts.get(product.categoryId) ?? 0) + 1);
    }

    return {
      products: sorted.slice(start, start + criteria.pageSize).map((p) => structuredClone(p)),
      totalCount: matches.length,
      aggregations:
        counts.size > 0
          ? [{ field: 'categoryId', label: 'Category', items: [...counts].map(([value, count]) => ({ value, count })) }]
          : [],
    };
  }

  async searchCategories(_storeId: string, criteria: CategorySearchCriteria): Promise<Category[]> {
    const keyword = criteria.keyword?.toLowerCase();
    return this.seed.categories
      .filter(
        (c) =>
          (!keyword || c.name.toLowerCase().includes(keyword)) &&
          (!criteria.outline || c.outline.startsWith(criteria.outline))
      )
      .map((c) => structuredClone(c));
  }
}

export class InventoryApiClientMock implements IInventoryApiClient {
  constructor(private readonly inventories: Inventory[]) {}

  async getProductsInventories(productIds: string[]): Promise<Inventory[]> {
    return this.inventories.filter((inv) => productIds.includes(inv.productId)).map((inv) => ({ ...inv }));
  }
}

export class PricingServiceMock implements IPricingService {
  constructor(private readonly prices: Array<ProductPrice & { productId: string }>) {}

  async evaluateProductPrices(products: Product[], context: WorkContext): Promise<void> {
    for (const product of products) {
      const match = this.prices.find((p) => p.productId === product.id && p.currency === context.currency);
      if (match) {
        const { productId: _productId, ...price } = structuredClone(match);
        product.price = price;
      }
    }
  }
}

export class VendorServiceMock implements IVendorService {
  constructor(private readonly vendors: Vendor[]) {}

  async getVendorsByIds(_storeId: string, _language: string, vendorIds: string[]): Promise<Vendor[]> {
    return this.vendors.filter((v) => vendorIds.includes(v.id)).map((v) => ({ id: v.id, name: v.name }));
  }
}
