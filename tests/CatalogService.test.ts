import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CatalogService } from '../src/domain/services/CatalogService.js';
import {
  CategoryAssociation,
  ItemResponseGroup,
  Product,
  ProductAssociation,
} from '../src/domain/catalog/models.js';
import {
  CatalogApiClientMock,
  InventoryApiClientMock,
  PricingServiceMock,
  VendorServiceMock,
} from '../src/infrastructure/clients/CatalogClientsMock.js';
import { createHarness, Harness, testSeed, workContext } from './fixtures.js';

function productAssociation(product: Product): ProductAssociation {
  const association = product.associations.find((a): a is ProductAssociation => a.kind === 'product');
  if (!association) throw new Error(`no product association on ${product.id}`);
  return association;
}

function categoryAssociation(product: Product): CategoryAssociation {
  const association = product.associations.find((a): a is CategoryAssociation => a.kind === 'category');
  if (!association) throw new Error(`no category association on ${product.id}`);
  return association;
}

describe('CatalogService', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('getProducts', () => {
    it('loads prices and inventory for products and their variations', async () => {
      const [widget] = await h.catalog.getProducts(
        ['p-100'],
        ItemResponseGroup.ItemInfo | ItemResponseGroup.ItemWithPrices | ItemResponseGroup.Inventory
      );

      expect(widget.price?.salePrice).toBe(100);
      expect(widget.inventory?.inStockQuantity).toBe(10);
      expect(widget.variations[0].price?.salePrice).toBe(110);
      expect(widget.variations[0].inventory?.inStockQuantity).toBe(1);
    });

    it('skips facets the response group does not ask for', async () => {
      const [widget] = await h.catalog.getProducts(['p-100'], ItemResponseGroup.ItemInfo);

      expect(widget.price).toBeUndefined();
      expect(widget.inventory).toBeUndefined();
      expect(widget.vendor).toBeUndefined();
      expect(productAssociation(widget).product).toBeUndefined();
    });

    it('falls back to the work context response group', async () => {
      const [widget] = await h.catalog.getProducts(['p-100']);

      expect(widget.price?.listPrice).toBe(120);
      expect(widget.inventory).toBeUndefined();
    });

    it('prices in the work context currency', async () => {
      const seed = testSeed();
      const catalogApi = new CatalogApiClientMock(seed);
      const catalog = new CatalogService({
        catalogApi,
        searchApi: catalogApi,
        inventoryApi: new InventoryApiClientMock(seed.inventories),
        pricingService: new PricingServiceMock(seed.prices),
        vendorService: new VendorServiceMock(seed.vendors),
        workContext: () => workContext({ currency: 'EUR' }),
      });

      const [widget] = await catalog.getProducts(['p-100'], ItemResponseGroup.ItemWithPrices);

      expect(widget.price).toEqual({ currency: 'EUR', listPrice: 110, salePrice: 90, taxPercentRate: 0.2, tierPrices: [] });
      expect(widget.variations[0].price).toBeUndefined();
    });

    it('returns only the products that exist', async () => {
      const products = await h.catalog.getProducts(['missing', 'p-tier'], ItemResponseGroup.ItemInfo);

      expect(products.map((p) => p.id)).toEqual(['p-tier']);
    });

    it('attaches one shared vendor object with a lazy product list', async () => {
      const [widget] = await h.catalog.getProducts(['p-100'], ItemResponseGroup.ItemWithVendor);

      expect(widget.vendor?.name).toBe('Vendor One');
      expect(widget.variations[0].vendor).toBe(widget.vendor);

      const page = await widget.vendor?.products?.load();
      expect(page?.items.map((p) => p.id)).toEqual(['p-100']);
      expect(page?.totalCount).toBe(1);
      expect(page?.pageSize).toBe(2);
      expect(page?.items[0].price?.salePrice).toBe(100);
      expect(page?.items[0].vendor).toBeUndefined();
    });

    it('re-issues the vendor query on every load', async () => {
      const [widget] = await h.catalog.getProducts(['p-100'], ItemResponseGroup.ItemWithVendor);
      const searchProducts = vi.spyOn(h.catalogApi, 'searchProducts');

      await widget.vendor?.products?.load();
      await widget.vendor?.products?.slice(1, 5, [{ sortColumn: 'code', sortDirection: 'desc' }]).load();

      expect(searchProducts).toHaveBeenCalledTimes(2);
      expect(searchProducts.mock.calls[1][1]).toMatchObject({ vendorId: 'v-1', pageSize: 5, sortBy: 'code:desc' });
    });

    it('resolves associated products and categories one level deep', async () => {
      const getProductsByIds = vi.spyOn(h.catalogApi, 'getProductsByIds');

      const [widget] = await h.catalog.getProducts(['p-100'], ItemResponseGroup.ItemAssociations);

      const associated = productAssociation(widget).product;
      expect(associated?.id).toBe('p-tier');
      expect(associated?.price?.salePrice).toBe(40);
      expect(associated && productAssociation(associated).product).toBeUndefined();
      expect(categoryAssociation(widget).category?.name).toBe('Beta');
      expect(getProductsByIds).toHaveBeenCalledTimes(2);
    });

    it('gives associated categories a lazy product list by outline', async () => {
      const [widget] = await h.catalog.getProducts(['p-100'], ItemResponseGroup.ItemAssociations);

      const page = await categoryAssociation(widget).category?.products?.load();

      expect(page?.items.map((p) => p.name)).toEqual(['Gadget', 'Oddity']);
      expect(page?.items[0].price?.salePrice).toBe(40);
      expect(page?.totalCount).toBe(2);
    });
  });

  describe('getCategories', () => {
    it('returns the categories that exist', async () => {
      const categories = await h.catalog.getCategories(['cat-a', 'missing']);

      expect(categories.map((c) => c.id)).toEqual(['cat-a']);
    });
  });

  describe('searchProducts', () => {
    it('enriches the page and returns aggregations', async () => {
      const result = await h.catalog.searchProducts({
        keyword: 'widget',
        pageNumber: 1,
        pageSize: 10,
        responseGroup: ItemResponseGroup.ItemWithPrices | ItemResponseGroup.Inventory,
      });

      expect(result.products.totalCount).toBe(1);
      expect(result.products.items[0].price?.salePrice).toBe(100);
      expect(result.products.items[0].inventory?.inStockQuantity).toBe(10);
      expect(result.aggregations).toEqual([
        { field: 'categoryId', label: 'Category', items: [{ value: 'cat-a', count: 1 }] },
      ]);
    });

    it('pages and sorts the matches', async () => {
      const second = await h.catalog.searchProducts({
        outline: 'root',
        pageNumber: 2,
        pageSize: 2,
        sortBy: 'name:asc',
        responseGroup: ItemResponseGroup.ItemInfo,
      });
      const descending = await h.catalog.searchProducts({
        outline: 'root',
        pageNumber: 1,
        pageSize: 2,
        sortBy: 'name:desc',
        responseGroup: ItemResponseGroup.ItemInfo,
      });

      expect(second.products.items.map((p) => p.name)).toEqual(['Widget']);
      expect(second.products.pageNumber).toBe(2);
      expect(second.products.totalCount).toBe(3);
      expect(descending.products.items.map((p) => p.name)).toEqual(['Widget', 'Oddity']);
    });

    it('returns an empty page without loading facets', async () => {
      const getProductsInventories = vi.spyOn(InventoryApiClientMock.prototype, 'getProductsInventories');

      const result = await h.catalog.searchProducts({
        keyword: 'nothing matches this',
        pageNumber: 1,
        pageSize: 10,
        responseGroup: ItemResponseGroup.Inventory,
      });

      expect(result.products.items).toEqual([]);
      expect(result.aggregations).toEqual([]);
      expect(getProductsInventories).not.toHaveBeenCalled();
      getProductsInventories.mockRestore();
    });
  });

  describe('searchCategories', () => {
    it('pages the matching categories in memory', async () => {
      const page = await h.catalog.searchCategories({ outline: 'root/a', pageNumber: 2, pageSize: 1, responseGroup: 0 });

      expect(page.items.map((c) => c.id)).toEqual(['cat-c']);
      expect(page.totalCount).toBe(2);
    });
  });
});
