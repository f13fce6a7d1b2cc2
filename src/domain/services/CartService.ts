import type {
  Cart,
  CustomerInfo,
  LineItem,
  Payment,
  PaymentMethod,
  QuoteRequest,
  Shipment,
  ShippingMethod,
  Store,
  UserLoginEvent,
} from '../models.js';
import { ItemResponseGroup, ItemResponseGroupPresets, Product } from '../catalog/models.js';
import { getTierPrice } from '../catalog/pricing.js';
import {
  createPayment,
  createShipment,
  toCart,
  toCartDto,
  toLineItem,
  toPaymentMethod,
  toShippingMethod,
} from '../converters.js';
import {
  priceWithTax,
  salePriceWithTax,
  toPromotionEvaluationContext,
  toTaxEvaluationContext,
  toTaxLines,
} from '../evaluation.js';
import {
  CartNotLoadedError,
  ResourceNotFoundError,
  UnknownPaymentMethodError,
  UnknownShipmentMethodError,
} from '../errors/index.js';
import { DefaultCartFactory, ICartFactory } from '../factories/CartFactory.js';
import type { ICatalogService } from './CatalogService.js';
import type { IPromotionEvaluator } from '../strategies/IPromotionEvaluator.js';
import type { ITaxEvaluator } from '../strategies/ITaxEvaluator.js';
import type { ICartStoreClient } from '../../infrastructure/clients/ICartStoreClient.js';
import { CacheRegions, ICacheManager } from '../../infrastructure/cache/ICacheManager.js';
import { componentLogger, type Logger } from '../../logger.js';

export const ANONYMOUS_USER_NAME = 'Anonymous';

const VALIDATION_RESPONSE_GROUP =
  ItemResponseGroup.ItemWithPrices | ItemResponseGroup.ItemWithDiscounts | ItemResponseGroup.Inventory;

export interface CartServiceDeps {
  cartApi: ICartStoreClient;
  catalog: ICatalogService;
  cache: ICacheManager;
  promotionEvaluator: IPromotionEvaluator;
  taxEvaluator: ITaxEvaluator;
  cartFactory?: ICartFactory;
  logger?: Logger;
}

/**
 * Owns one in-memory cart for the duration of a request. Every load that
 * misses the cache and every save re-runs promotions and then taxes, so the
 * bound cart is never handed out unevaluated. The cache keeps the evaluated
 * cart; each load binds its own copy.
 *
 * Calls on one instance are expected to be sequential.
 */
export class CartService {
  private current: Cart | undefined;
  private readonly cartFactory: ICartFactory;
  private readonly log: Logger;
  private readonly defaultCartName: string;

  constructor(
    private readonly deps: CartServiceDeps,
    config?: {
      defaultCartName?: string;
    }
  ) {
    this.cartFactory = deps.cartFactory ?? new DefaultCartFactory();
    this.log = deps.logger ?? componentLogger('CartService');
    this.defaultCartName = config?.defaultCartName ?? 'default';
  }

  get cart(): Cart | undefined {
    return this.current;
  }

  takeCart(cart: Cart): void {
    this.current = cart;
  }

  async loadOrCreate(
    cartName: string,
    store: Store,
    customer: CustomerInfo,
    language: string,
    currency: string
  ): Promise<void> {
    cartName = cartName || this.defaultCartName;
    const cacheKey = naturalCacheKey(store.id, cartName, customer.id, currency);

    // a cache hit was evaluated by whoever populated it
    const cached = await this.deps.cache.getOrCompute(cacheKey, CacheRegions.Cart, async () => {
      const found = await this.deps.cartApi.search({
        storeId: store.id,
        customerId: customer.id,
        name: cartName,
        currency,
      });

      const cart =
        found.length > 0
          ? toCart(found[0], currency, language, customer)
          : this.createTransientCart(cartName, store, customer, language, currency);
      cart.customer = customer;
      await this.evaluateCart(cart);
      return cart;
    });

    this.current = structuredClone(cached);
    this.current.customer = customer;
  }

  async loadById(cartId: string, customer?: CustomerInfo): Promise<void> {
    const cached = await this.deps.cache.getOrCompute(idCacheKey(cartId), CacheRegions.Cart, async () => {
      const dto = await this.deps.cartApi.getById(cartId);
      if (!dto) throw new ResourceNotFoundError('Cart', cartId);
      const cart = toCart(dto, dto.currency, dto.languageCode, customer);
      await this.evaluateCart(cart);
      return cart;
    });

    this.current = structuredClone(cached);
    if (customer) this.current.customer = customer;
  }

  async addItem(product: Product, quantity: number): Promise<void> {
    const cart = this.ensureCart();
    await this.addLineItem(toLineItem(product, cart.currency, quantity));
  }

  async changeQuantity(lineItemId: string, quantity: number): Promise<void> {
    const cart = this.ensureCart();
    const lineItem = cart.items.find((item) => item.id === lineItemId);
    if (lineItem) {
      await this.changeLineItemQuantity(lineItem, quantity);
    }
  }

  async changeQuantityAt(index: number, quantity: number): Promise<void> {
    const cart = this.ensureCart();
    const lineItem = cart.items.at(index);
    if (lineItem) {
      await this.changeLineItemQuantity(lineItem, quantity);
    }
  }

  // positional; non-positive entries are skipped rather than removing the item
  async changeQuantities(quantities: number[]): Promise<void> {
    const cart = this.ensureCart();
    for (let i = 0; i < quantities.length; i++) {
      const lineItem = cart.items.at(i);
      if (lineItem && quantities[i] > 0) {
        await this.changeLineItemQuantity(lineItem, quantities[i]);
      }
    }
  }

  async removeItem(lineItemId: string): Promise<void> {
    const cart = this.ensureCart();
    const index = cart.items.findIndex((item) => item.id === lineItemId);
    if (index >= 0) {
      cart.items.splice(index, 1);
    }
  }

  async clear(): Promise<void> {
    const cart = this.ensureCart();
    cart.items.splice(0, cart.items.length);
  }

  // legitimacy is decided later, by promotion evaluation
  async addOrUpdateCoupon(couponCode: string): Promise<void> {
    const cart = this.ensureCart();
    cart.coupon = { code: couponCode };
  }

  async removeCoupon(): Promise<void> {
    const cart = this.ensureCart();
    cart.coupon = undefined;
  }

  async addOrUpdateShipment(shipment: Shipment): Promise<void> {
    const cart = this.ensureCart();

    // resolve before touching the cart so an unknown method leaves it unchanged
    let method: ShippingMethod | undefined;
    if (shipment.shipmentMethodCode) {
      const available = await this.listShippingMethods();
      method = available.find(
        (sm) =>
          equalsIgnoreCase(shipment.shipmentMethodCode, sm.shipmentMethodCode) &&
          equalsIgnoreCase(shipment.shipmentMethodOption, sm.optionName)
      );
      if (!method) {
        this.log.warn(
          { cartId: cart.id, code: shipment.shipmentMethodCode, option: shipment.shipmentMethodOption },
          'rejected unknown shipment method'
        );
        throw new UnknownShipmentMethodError(shipment.shipmentMethodCode, shipment.shipmentMethodOption);
      }
    }

    this.removeExistingShipment(cart, shipment);

    shipment.currency = cart.currency;
    if (method) {
      shipment.price = method.price;
      shipment.discountAmount = method.discountAmount;
      shipment.taxType = method.taxType;
      shipment.taxTotal = method.taxTotal;
      shipment.taxPercentRate = method.taxPercentRate;
    }
    cart.shipments.push(shipment);
  }

  async removeShipment(shipmentId: string): Promise<void> {
    const cart = this.ensureCart();
    const index = cart.shipments.findIndex((s) => s.id === shipmentId);
    if (index >= 0) {
      cart.shipments.splice(index, 1);
    }
  }

  async addOrUpdatePayment(payment: Payment): Promise<void> {
    const cart = this.ensureCart();

    let method: PaymentMethod | undefined;
    if (payment.paymentGatewayCode) {
      const available = await this.listPaymentMethods();
      method = available.find((pm) => equalsIgnoreCase(pm.code, payment.paymentGatewayCode));
      if (!method) {
        this.log.warn({ cartId: cart.id, code: payment.paymentGatewayCode }, 'rejected unknown payment method');
        throw new UnknownPaymentMethodError(payment.paymentGatewayCode);
      }
    }

    if (payment.id) {
      const index = cart.payments.findIndex((p) => p.id === payment.id);
      if (index >= 0) cart.payments.splice(index, 1);
    }

    payment.currency = cart.currency;
    if (method) {
      payment.price = method.price;
      payment.discountAmount = method.discountAmount;
      payment.taxTotal = method.taxTotal;
      payment.taxPercentRate = method.taxPercentRate;
    }
    cart.payments.push(payment);
  }

  /**
   * Candidate shipping methods for the bound cart, discounted and then taxed
   * in the cart's context. The cart itself is not modified.
   */
  async listShippingMethods(): Promise<ShippingMethod[]> {
    const cart = this.ensureCart();
    const rates = await this.deps.cartApi.getAvailableShippingRates(cart.id);
    const methods = rates.map((rate) => toShippingMethod(rate, cart.currency));

    await this.deps.promotionEvaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), methods);

    const taxContext = toTaxEvaluationContext(cart);
    taxContext.lines = methods.flatMap(toTaxLines);
    await this.deps.taxEvaluator.evaluateTaxes(taxContext, methods);

    return methods;
  }

  async listPaymentMethods(): Promise<PaymentMethod[]> {
    const cart = this.ensureCart();
    const dtos = await this.deps.cartApi.getAvailablePaymentMethods(cart.id);
    const methods = dtos.map((dto) => toPaymentMethod(dto, cart));

    await this.deps.promotionEvaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), methods);

    const taxContext = toTaxEvaluationContext(cart);
    taxContext.lines = methods.flatMap(toTaxLines);
    await this.deps.taxEvaluator.evaluateTaxes(taxContext, methods);

    return methods;
  }

  async validate(): Promise<void> {
    const cart = this.ensureCart();
    await Promise.all([this.validateItems(cart), this.validateShipments(cart)]);
    cart.isValid = cart.items.every((item) => item.isValid) && cart.shipments.every((s) => s.isValid);
  }

  async evaluatePromotions(): Promise<void> {
    const cart = this.ensureCart();
    await this.deps.promotionEvaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), [cart]);
  }

  async evaluateTaxes(): Promise<void> {
    const cart = this.ensureCart();
    await this.deps.taxEvaluator.evaluateTaxes(toTaxEvaluationContext(cart), [cart]);
  }

  // promotions first: taxes are charged on the discounted amounts
  private async evaluateCart(cart: Cart): Promise<void> {
    await this.deps.promotionEvaluator.evaluateDiscounts(toPromotionEvaluationContext(cart), [cart]);
    await this.deps.taxEvaluator.evaluateTaxes(toTaxEvaluationContext(cart), [cart]);
  }

  /**
   * Line items merge through merge-add so quantities combine; coupon,
   * shipments and payments replace the bound cart's own. Copied shipments and
   * payments lose their ids since they belong to the other cart.
   */
  async mergeWithCart(other: Cart): Promise<void> {
    const cart = this.ensureCart();

    for (const lineItem of other.items) {
      await this.addLineItem({ ...lineItem, validationErrors: [...lineItem.validationErrors] });
    }

    cart.coupon = other.coupon ? { ...other.coupon } : undefined;
    cart.shipments = other.shipments.map((s) => ({ ...s, id: undefined, validationErrors: [] }));
    cart.payments = other.payments.map((p) => ({ ...p, id: undefined }));
  }

  async removeCart(): Promise<void> {
    const cart = this.ensureCart();
    this.invalidateCache(cart);
    if (cart.id) {
      await this.deps.cartApi.delete([cart.id]);
      this.log.info({ cartId: cart.id }, 'cart deleted');
    }
    this.current = undefined;
  }

  async fillFromQuoteRequest(quote: QuoteRequest): Promise<void> {
    const cart = this.ensureCart();

    const products = await this.deps.catalog.getProducts(
      quote.items.map((item) => item.productId),
      ItemResponseGroupPresets.ItemLarge
    );

    cart.items.splice(0, cart.items.length);
    for (const product of products) {
      const quoteItem = quote.items.find((item) => item.productId === product.id);
      if (!quoteItem) continue;

      const lineItem = toLineItem(product, cart.currency, quoteItem.selectedTierPrice.quantity);
      lineItem.listPrice = Math.max(quoteItem.listPrice, quoteItem.selectedTierPrice.price);
      lineItem.salePrice = quoteItem.selectedTierPrice.price;
      lineItem.isReadOnly = true;
      lineItem.id = undefined;
      cart.items.push(lineItem);
    }

    if (quote.requestShippingQuote) {
      let shipment = createShipment(cart.currency, { deliveryAddress: quote.shippingAddress });

      const quoted = quote.shipmentMethod;
      if (quoted) {
        const available = await this.listShippingMethods();
        if (available.some((sm) => sm.shipmentMethodCode === quoted.shipmentMethodCode)) {
          shipment = createShipment(cart.currency, {
            shipmentMethodCode: quoted.shipmentMethodCode,
            shipmentMethodOption: quoted.optionName,
            price: quoted.price,
            deliveryAddress: quote.shippingAddress,
          });
        }
      }
      cart.shipments = [shipment];
    }

    cart.payments = [
      createPayment(cart.currency, {
        amount: quote.totals.grandTotalInclTax,
        billingAddress: quote.billingAddress,
      }),
    ];
  }

  /**
   * Persists the bound cart and rebinds to the store's copy, which owns ids
   * and computed totals from here on. Cache entries are dropped first so a
   * failure part way cannot leave a stale copy behind, and again after the
   * write since a concurrent load may have cached the pre-save state.
   */
  async save(): Promise<void> {
    const cart = this.ensureCart();
    this.invalidateCache(cart);

    await this.evaluatePromotions();
    await this.evaluateTaxes();

    const dto = toCartDto(cart);
    let cartId = dto.id;
    if (!cartId) {
      const created = await this.deps.cartApi.create(dto);
      cartId = created.id;
      this.log.info({ cartId, customerId: cart.customerId }, 'cart created');
    } else {
      await this.deps.cartApi.update(dto);
      this.log.info({ cartId, customerId: cart.customerId }, 'cart updated');
    }

    if (!cartId) throw new ResourceNotFoundError('Cart', `${cart.storeId}:${cart.name}:${cart.customerId}`);
    this.invalidateCache({ ...cart, id: cartId });

    const persisted = await this.deps.cartApi.getById(cartId);
    if (!persisted) throw new ResourceNotFoundError('Cart', cartId);

    this.current = toCart(persisted, cart.currency, cart.language, cart.customer);
  }

  /**
   * Moves an anonymous visitor's cart into the cart of the user who just
   * signed in. The anonymous cart is deleted only once the merged cart has
   * been saved.
   */
  async onUserLogin(event: UserLoginEvent): Promise<void> {
    const { prevUser, prevUserCart, newUser } = event;
    if (prevUser.isRegisteredUser || !prevUserCart || prevUserCart.items.length === 0) {
      return;
    }

    await this.loadOrCreate(prevUserCart.name, event.store, newUser, event.language, event.currency);
    await this.mergeWithCart(prevUserCart);
    await this.save();

    if (prevUserCart.id) {
      this.invalidateCache(prevUserCart);
      await this.deps.cartApi.delete([prevUserCart.id]);
    }

    this.log.info(
      { from: prevUserCart.id, into: this.current?.id, customerId: newUser.id, items: prevUserCart.items.length },
      'anonymous cart merged on login'
    );
  }

  private async validateItems(cart: Cart): Promise<void> {
    const productIds = cart.items.map((item) => item.productId);
    if (productIds.length === 0) return;

    const cacheKey = `CartService.validateItems:${cart.id ?? ''}:${productIds.join(':')}`;
    const products = await this.deps.cache.getOrCompute(cacheKey, CacheRegions.Api, () =>
      this.deps.catalog.getProducts(productIds, VALIDATION_RESPONSE_GROUP)
    );

    for (const lineItem of [...cart.items]) {
      lineItem.validationErrors = [];
      lineItem.isValid = true;

      const product = products.find((p) => p.id === lineItem.productId);
      if (!product || !product.isActive || !product.isBuyable) {
        lineItem.validationErrors.push({ kind: 'unavailable' });
        lineItem.isValid = false;
        continue;
      }

      const inventory = product.inventory;
      if (product.trackInventory && inventory && inventory.inStockQuantity !== undefined) {
        const availableQuantity = inventory.inStockQuantity - (inventory.reservedQuantity ?? 0);
        if (lineItem.quantity > availableQuantity) {
          lineItem.validationErrors.push({ kind: 'quantity', availableQuantity });
          lineItem.isValid = false;
        }
      }

      // informational, does not invalidate the item
      if (product.price) {
        const tierPrice = getTierPrice(product.price, lineItem.quantity);
        if (tierPrice.price > lineItem.salePrice) {
          lineItem.validationErrors.push({
            kind: 'price',
            oldPrice: lineItem.salePrice,
            oldPriceWithTax: salePriceWithTax(lineItem),
            newPrice: tierPrice.price,
            newPriceWithTax: tierPrice.priceWithTax,
          });
        }
      }
    }
  }

  private async validateShipments(cart: Cart): Promise<void> {
    if (cart.shipments.length === 0) return;

    const available = await this.listShippingMethods();
    for (const shipment of [...cart.shipments]) {
      shipment.validationErrors = [];
      shipment.isValid = true;

      const method = available.find(
        (sm) =>
          equalsIgnoreCase(shipment.shipmentMethodCode, sm.shipmentMethodCode) &&
          equalsIgnoreCase(shipment.shipmentMethodOption, sm.optionName)
      );
      if (!method) {
        shipment.validationErrors.push({ kind: 'unavailable' });
        shipment.isValid = false;
      } else if (method.price !== shipment.price) {
        shipment.validationErrors.push({
          kind: 'price',
          oldPrice: shipment.price,
          oldPriceWithTax: priceWithTax(shipment),
          newPrice: method.price,
          newPriceWithTax: priceWithTax(method),
        });
      }
    }
  }

  private async addLineItem(lineItem: LineItem): Promise<void> {
    const cart = this.ensureCart();
    const existing = cart.items.find((item) => item.productId === lineItem.productId);

    if (existing) {
      await this.changeLineItemQuantity(existing, existing.quantity + Math.max(1, lineItem.quantity));
    } else {
      lineItem.id = undefined;
      cart.items.push(lineItem);
    }
  }

  private async changeLineItemQuantity(lineItem: LineItem, quantity: number): Promise<void> {
    if (lineItem.isReadOnly) return;
    const cart = this.ensureCart();

    if (quantity <= 0) {
      const index = cart.items.indexOf(lineItem);
      if (index >= 0) cart.items.splice(index, 1);
      return;
    }

    const products = await this.deps.catalog.getProducts([lineItem.productId], ItemResponseGroup.ItemWithPrices);
    const product = products.find((p) => p.id === lineItem.productId);
    if (product?.price) {
      lineItem.salePrice = getTierPrice(product.price, quantity).price;
      // list price below sale price would produce negative discounts in totals
      if (lineItem.listPrice < lineItem.salePrice) {
        lineItem.listPrice = lineItem.salePrice;
      }
    }
    lineItem.quantity = quantity;
  }

  private removeExistingShipment(cart: Cart, shipment: Shipment): void {
    cart.shipments = cart.shipments.filter((existing) => {
      if (shipment.id && existing.id === shipment.id) return false;
      // one shipment per method + option
      return !(
        shipment.shipmentMethodCode &&
        equalsIgnoreCase(existing.shipmentMethodCode, shipment.shipmentMethodCode) &&
        equalsIgnoreCase(existing.shipmentMethodOption, shipment.shipmentMethodOption)
      );
    });
  }

  private invalidateCache(cart: Cart): void {
    this.deps.cache.invalidate(naturalCacheKey(cart.storeId, cart.name, cart.customerId, cart.currency), CacheRegions.Cart);
    if (cart.id) {
      this.deps.cache.invalidate(idCacheKey(cart.id), CacheRegions.Cart);
    }
  }

  private createTransientCart(
    cartName: string,
    store: Store,
    customer: CustomerInfo,
    language: string,
    currency: string
  ): Cart {
    const cart = this.cartFactory.createCart(currency, language);
    cart.name = cartName || this.defaultCartName;
    cart.storeId = store.id;
    cart.customerId = customer.id;
    cart.isAnonymous = !customer.isRegisteredUser;
    cart.customerName = customer.isRegisteredUser ? customer.userName ?? customer.id : ANONYMOUS_USER_NAME;
    return cart;
  }

  private ensureCart(): Cart {
    if (!this.current) {
      throw new CartNotLoadedError();
    }
    return this.current;
  }
}

export function naturalCacheKey(storeId: string, cartName: string, customerId: string, currency: string): string {
  return `CartService:${[storeId, cartName, customerId, currency].join(':').toLowerCase()}`;
}

export function idCacheKey(cartId: string): string {
  return `CartService:${cartId}`;
}

function equalsIgnoreCase(left: string | undefined, right: string | undefined): boolean {
  return (left ?? '').toLowerCase() === (right ?? '').toLowerCase();
}
