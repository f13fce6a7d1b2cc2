import type { MutablePagedList, PagedResult } from '../paging/PagedList.js';

// bit flags, callers OR them together
export const ItemResponseGroup = {
  None: 0,
  ItemInfo: 1 << 0,
  ItemAssets: 1 << 1,
  ItemProperties: 1 << 2,
  ItemAssociations: 1 << 3,
  ItemEditorialReviews: 1 << 4,
  ItemWithVariations: 1 << 5,
  ItemWithPrices: 1 << 6,
  Inventory: 1 << 7,
  ItemWithDiscounts: 1 << 8,
  ItemWithVendor: 1 << 9,
  Seo: 1 << 10,
  Outlines: 1 << 11,
} as const;

export const ItemResponseGroupPresets = {
  ItemSmall: ItemResponseGroup.ItemInfo | ItemResponseGroup.ItemAssets | ItemResponseGroup.Seo | ItemResponseGroup.Outlines,
  ItemMedium:
    ItemResponseGroup.ItemInfo |
    ItemResponseGroup.ItemAssets |
    ItemResponseGroup.ItemProperties |
    ItemResponseGroup.ItemWithPrices |
    ItemResponseGroup.Seo |
    ItemResponseGroup.Outlines,
  ItemLarge:
    ItemResponseGroup.ItemInfo |
    ItemResponseGroup.ItemAssets |
    ItemResponseGroup.ItemProperties |
    ItemResponseGroup.ItemAssociations |
    ItemResponseGroup.ItemEditorialReviews |
    ItemResponseGroup.ItemWithVariations |
    ItemResponseGroup.ItemWithPrices |
    ItemResponseGroup.Inventory |
    ItemResponseGroup.ItemWithDiscounts |
    ItemResponseGroup.ItemWithVendor |
    ItemResponseGroup.Seo |
    ItemResponseGroup.Outlines,
} as const;

export const CategoryResponseGroup = {
  Info: 1 << 0,
  WithImages: 1 << 1,
  WithProperties: 1 << 2,
  WithLinks: 1 << 3,
  WithSeo: 1 << 4,
  WithParents: 1 << 5,
  WithOutlines: 1 << 6,
} as const;

export function hasFlag(group: number, flag: number): boolean {
  return (group & flag) === flag;
}

export interface TierPrice {
  quantity: number;
  price: number;
  priceWithTax: number;
}

export interface ProductPrice {
  currency: string;
  listPrice: number;
  salePrice: number;
  taxPercentRate: number;
  tierPrices: TierPrice[];
}

export interface Inventory {
  productId: string;
  fulfillmentCenterId?: string;
  inStockQuantity?: number;
  reservedQuantity?: number;
}

export interface Vendor {
  id: string;
  name: string;
  products?: MutablePagedList<Product>;
}

export interface ProductAssociation {
  kind: 'product';
  type: string;
  priority: number;
  productId: string;
  product?: Product;
}

export interface CategoryAssociation {
  kind: 'category';
  type: string;
  priority: number;
  categoryId: string;
  category?: Category;
}

export type Association = ProductAssociation | CategoryAssociation;

export interface Product {
  id: string;
  code: string;
  name: string;
  catalogId?: string;
  categoryId?: string;
  outline?: string;
  seoPath?: string;
  imageUrl?: string;
  isActive: boolean;
  isBuyable: boolean;
  trackInventory: boolean;
  vendorId?: string;
  vendor?: Vendor;
  price?: ProductPrice;
  inventory?: Inventory;
  variations: Product[];
  associations: Association[];
}

export interface Category {
  id: string;
  code: string;
  name: string;
  outline: string;
  parentId?: string;
  seoPath?: string;
  imageUrl?: string;
  products?: MutablePagedList<Product>;
}

export interface SortInfo {
  sortColumn: string;
  sortDirection: 'asc' | 'desc';
}

export interface ProductSearchCriteria {
  keyword?: string;
  outline?: string;
  vendorId?: string;
  pageNumber: number;
  pageSize: number;
  sortBy?: string;
  responseGroup: number;
}

export interface CategorySearchCriteria {
  keyword?: string;
  outline?: string;
  pageNumber: number;
  pageSize: number;
  sortBy?: string;
  responseGroup: number;
}

export interface AggregationItem {
  value: string;
  count: number;
  label?: string;
}

export interface Aggregation {
  field: string;
  label: string;
  items: AggregationItem[];
}

export interface CatalogSearchResult {
  products: PagedResult<Product>;
  aggregations: Aggregation[];
}

export interface WorkContext {
  store: { id: string };
  language: string;
  currency: string;
  customer?: { id: string; isRegisteredUser: boolean };
  productResponseGroup: number;
  productSearchResponseGroup: number;
}
