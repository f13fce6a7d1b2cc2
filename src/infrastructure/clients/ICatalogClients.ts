import type {
  Aggregation,
  Category,
  CategorySearchCriteria,
  Inventory,
  Product,
  ProductSearchCriteria,
  Vendor,
  WorkContext,
} from '../../domain/catalog/models.js';

export interface ICatalogApiClient {
  getProductsByIds(ids: string[], responseGroup: number): Promise<Product[]>;
  getCategoriesByIds(ids: string[], responseGroup: number): Promise<Category[]>;
}

export interface ProductSearchResponse {
  products: Product[];
  totalCount: number;
  aggregations: Aggregation[];
}

export interface ISearchApiClient {
  searchProducts(storeId: string, criteria: ProductSearchCriteria): Promise<ProductSearchResponse>;
  // not paginated server-side, returns the whole matching superset
  searchCategories(storeId: string, criteria: CategorySearchCriteria): Promise<Category[]>;
}

export interface IInventoryApiClient {
  getProductsInventories(productIds: string[]): Promise<Inventory[]>;
}

// writes `price` onto each product in place
export interface IPricingService {
  evaluateProductPrices(products: Product[], context: WorkContext): Promise<void>;
}

export interface IVendorService {
  getVendorsByIds(storeId: string, language: string, vendorIds: string[]): Promise<Vendor[]>;
}
