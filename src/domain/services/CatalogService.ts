import {
  Category,
  CategoryAssociation,
  CategoryResponseGroup,
  CategorySearchCriteria,
  CatalogSearchResult,
  hasFlag,
  ItemResponseGroup,
  Product,
  ProductAssociation,
  ProductSearchCriteria,
  WorkContext,
} from '../catalog/models.js';
import { MutablePagedList, PagedResult, sortInfosToString, toPagedResult } from '../paging/PagedList.js';
import type {
  ICatalogApiClient,
  IInventoryApiClient,
  IPricingService,
  ISearchApiClient,
  IVendorService,
} from '../../infrastructure/clients/ICatalogClients.js';
import { componentLogger, type Logger } from '../../logger.js';

export interface ICatalogService {
  getProducts(ids: string[], responseGroup?: number): Promise<Product[]>;
  getCategories(ids: string[], responseGroup?: number): Promise<Category[]>;
  searchProducts(criteria: ProductSearchCriteria): Promise<CatalogSearchResult>;
  searchCategories(criteria: CategorySearchCriteria): Promise<PagedResult<Category>>;
}

export interface CatalogServiceDeps {
  catalogApi: ICatalogApiClient;
  searchApi: ISearchApiClient;
  inventoryApi: IInventoryApiClient;
  pricingService: IPricingService;
  vendorService: IVendorService;
  workContext: () => WorkContext;
  logger?: Logger;
}

// associated items are fetched without ItemAssociations, so resolution stops one level deep
const ASSOCIATED_PRODUCT_RESPONSE_GROUP =
  ItemResponseGroup.ItemInfo | ItemResponseGroup.ItemWithPrices | ItemResponseGroup.Seo | ItemResponseGroup.Outlines;

const ASSOCIATED_CATEGORY_RESPONSE_GROUP =
  CategoryResponseGroup.Info |
  CategoryResponseGroup.WithSeo |
  CategoryResponseGroup.WithOutlines |
  CategoryResponseGroup.WithImages;

const CATEGORY_PRODUCTS_RESPONSE_GROUP =
  ItemResponseGroup.ItemInfo |
  ItemResponseGroup.ItemWithPrices |
  ItemResponseGroup.Inventory |
  ItemResponseGroup.ItemWithVendor;

/**
 * Resolves product and category ids into enriched domain objects. Each facet
 * requested through the response group is loaded concurrently over the
 * products and their variations, then joined back by product id.
 */
export class CatalogService implements ICatalogService {
  private readonly log: Logger;

  constructor(
    private readonly deps: CatalogServiceDeps,
    private readonly defaultPageSize: number = 20
  ) {
    this.log = deps.logger ?? componentLogger('CatalogService');
  }

  async getProducts(ids: string[], responseGroup: number = ItemResponseGroup.None): Promise<Product[]> {
    const workContext = this.deps.workContext();
    const group = responseGroup === ItemResponseGroup.None ? workContext.productResponseGroup : responseGroup;

    const products = await this.deps.catalogApi.getProductsByIds(ids, group);
    const allProducts = withVariations(products);

    if (allProducts.length > 0) {
      const tasks: Promise<void>[] = [];

      if (hasFlag(group, ItemResponseGroup.ItemAssociations)) {
        tasks.push(this.loadProductAssociations(allProducts));
      }
      if (hasFlag(group, ItemResponseGroup.Inventory)) {
        tasks.push(this.loadProductInventories(allProducts));
      }
      if (hasFlag(group, ItemResponseGroup.ItemWithPrices)) {
        tasks.push(this.deps.pricingService.evaluateProductPrices(allProducts, workContext));
      }
      if (hasFlag(group, ItemResponseGroup.ItemWithVendor)) {
        tasks.push(this.loadProductVendors(allProducts, workContext));
      }

      await Promise.all(tasks);
    }

    this.log.debug({ requested: ids.length, found: products.length, responseGroup: group }, 'products loaded');
    return products;
  }

  async getCategories(ids: string[], responseGroup: number = CategoryResponseGroup.Info): Promise<Category[]> {
    return this.deps.catalogApi.getCategoriesByIds(ids, responseGroup);
  }

  async searchProducts(criteria: ProductSearchCriteria): Promise<CatalogSearchResult> {
    const workContext = this.deps.workContext();
    const query = { ...criteria };
    const result = await this.deps.searchApi.searchProducts(workContext.store.id, query);
    const products = result.products;

    if (products.length > 0) {
      const allProducts = withVariations(products);
      const tasks: Promise<void>[] = [];

      if (hasFlag(query.responseGroup, ItemResponseGroup.Inventory)) {
        tasks.push(this.loadProductInventories(allProducts));
      }
      if (hasFlag(query.responseGroup, ItemResponseGroup.ItemWithVendor)) {
        tasks.push(this.loadProductVendors(allProducts, workContext));
      }
      if (hasFlag(query.responseGroup, ItemResponseGroup.ItemWithPrices)) {
        tasks.push(this.deps.pricingService.evaluateProductPrices(allProducts, workContext));
      }

      await Promise.all(tasks);
    }

    return {
      products: {
        items: products,
        pageNumber: query.pageNumber,
        pageSize: query.pageSize,
        totalCount: result.totalCount,
      },
      aggregations: result.aggregations,
    };
  }

  async searchCategories(criteria: CategorySearchCriteria): Promise<PagedResult<Category>> {
    const workContext = this.deps.workContext();
    const query = { ...criteria };
    const categories = await this.deps.searchApi.searchCategories(workContext.store.id, query);
    return toPagedResult(categories, query.pageNumber, query.pageSize);
  }

  private async loadProductInventories(products: Product[]): Promise<void> {
    const inventories = await this.deps.inventoryApi.getProductsInventories(products.map((p) => p.id));
    for (const product of products) {
      product.inventory = inventories.find((inv) => inv.productId === product.id);
    }
  }

  private async loadProductVendors(products: Product[], workContext: WorkContext): Promise<void> {
    const vendorIds = [...new Set(products.flatMap((p) => (p.vendorId ? [p.vendorId] : [])))];
    if (vendorIds.length === 0) return;

    const vendors = await this.deps.vendorService.getVendorsByIds(
      workContext.store.id,
      workContext.language,
      vendorIds
    );

    for (const vendor of vendors) {
      vendor.products ??= new MutablePagedList<Product>(
        async (pageNumber, pageSize, sortInfos) => {
          const result = await this.searchProducts({
            vendorId: vendor.id,
            pageNumber,
            pageSize,
            sortBy: sortInfosToString(sortInfos),
            responseGroup: workContext.productSearchResponseGroup & ~ItemResponseGroup.ItemWithVendor,
          });
          return result.products;
        },
        1,
        this.defaultPageSize
      );
    }

    for (const product of products) {
      product.vendor = vendors.find((v) => v.id === product.vendorId);
    }
  }

  private async loadProductAssociations(products: Product[]): Promise<void> {
    const associations = products.flatMap((p) => p.associations);
    const productAssociations = associations.filter((a): a is ProductAssociation => a.kind === 'product');
    const categoryAssociations = associations.filter((a): a is CategoryAssociation => a.kind === 'category');

    const tasks: Promise<void>[] = [];

    if (productAssociations.length > 0) {
      tasks.push(
        this.getProducts(
          unique(productAssociations.map((a) => a.productId)),
          ASSOCIATED_PRODUCT_RESPONSE_GROUP
        ).then((associated) => {
          for (const association of productAssociations) {
            association.product = associated.find((p) => p.id === association.productId);
          }
        })
      );
    }

    if (categoryAssociations.length > 0) {
      tasks.push(
        this.getCategories(
          unique(categoryAssociations.map((a) => a.categoryId)),
          ASSOCIATED_CATEGORY_RESPONSE_GROUP
        ).then((associated) => {
          for (const association of categoryAssociations) {
            association.category = associated.find((c) => c.id === association.categoryId);
            const category = association.category;
            if (category && !category.products) {
              category.products = this.categoryProducts(category);
            }
          }
        })
      );
    }

    await Promise.all(tasks);
  }

  private categoryProducts(category: Category): MutablePagedList<Product> {
    return new MutablePagedList<Product>(
      async (pageNumber, pageSize, sortInfos) => {
        const result = await this.searchProducts({
          outline: category.outline,
          pageNumber,
          pageSize,
          sortBy: sortInfosToString(sortInfos),
          responseGroup: CATEGORY_PRODUCTS_RESPONSE_GROUP,
        });
        return result.products;
      },
      1,
      this.defaultPageSize
    );
  }
}

function withVariations(products: Product[]): Product[] {
  return [...products, ...products.flatMap((p) => p.variations)];
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}
