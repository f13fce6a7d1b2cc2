import type { FastifyInstance } from 'fastify';
import type { AppContainer, RequestScope } from '../container.js';
import type { Address, Cart } from '../domain/models.js';
import { ItemResponseGroup } from '../domain/catalog/models.js';
import { createPayment, createShipment } from '../domain/converters.js';
import { calculateCartTotals } from '../domain/evaluation.js';
import { ResourceNotFoundError } from '../domain/errors/index.js';
import type { CartService } from '../domain/services/CartService.js';

interface CartParams {
  storeId: string;
  customerId: string;
}

interface CartQuery {
  currency?: string;
  language?: string;
  name?: string;
  registered?: boolean;
}

const cartParamsSchema = {
  type: 'object',
  required: ['storeId', 'customerId'],
  properties: {
    storeId: { type: 'string', minLength: 1 },
    customerId: { type: 'string', minLength: 1 },
  },
} as const;

const cartQuerySchema = {
  type: 'object',
  properties: {
    currency: { type: 'string', minLength: 3, maxLength: 3 },
    language: { type: 'string' },
    name: { type: 'string' },
    registered: { type: 'boolean' },
  },
} as const;

const addressSchema = {
  type: 'object',
  properties: {
    firstName: { type: 'string' },
    lastName: { type: 'string' },
    line1: { type: 'string' },
    city: { type: 'string' },
    postalCode: { type: 'string' },
    countryCode: { type: 'string' },
  },
} as const;

// the part of a request every cart route reads
interface CartRequest {
  params: CartParams;
  query: CartQuery;
}

function present(cart: Cart | undefined) {
  if (!cart) return null;
  const { customer: _customer, ...rest } = cart;
  return { ...rest, totals: calculateCartTotals(cart) };
}

// cart endpoints, mounted under /v1/stores/:storeId/customers/:customerId/cart
export async function cartRoutes(app: FastifyInstance, opts: { container: AppContainer }): Promise<void> {
  const { container } = opts;

  const scopeOf = (request: CartRequest): RequestScope => ({
    storeId: request.params.storeId,
    currency: (request.query.currency ?? 'USD').toUpperCase(),
    language: request.query.language ?? 'en-US',
    customer: { id: request.params.customerId, isRegisteredUser: request.query.registered ?? false },
  });

  const loadCart = async (request: CartRequest): Promise<CartService> => {
    const scope = scopeOf(request);
    const service = container.cartServiceFor(scope);
    await service.loadOrCreate(
      request.query.name || container.config.cart.defaultName,
      { id: scope.storeId },
      { ...scope.customer, userName: scope.customer.isRegisteredUser ? scope.customer.id : undefined },
      scope.language,
      scope.currency
    );
    return service;
  };

  const respond = (service: CartService) => ({
    data: present(service.cart),
    timestamp: new Date().toISOString(),
  });

  const baseSchema = { tags: ['cart'], params: cartParamsSchema, querystring: cartQuerySchema };

  app.get<{ Params: CartParams; Querystring: CartQuery }>(
    '/',
    { schema: { ...baseSchema, description: 'Load the cart, creating a transient one when none is stored' } },
    async (request) => respond(await loadCart(request))
  );

  app.post<{ Params: CartParams; Querystring: CartQuery; Body: { productId: string; quantity: number } }>(
    '/items',
    {
      schema: {
        ...baseSchema,
        description: 'Add a product; an existing line for the same product has its quantity increased',
        body: {
          type: 'object',
          required: ['productId', 'quantity'],
          properties: {
            productId: { type: 'string', minLength: 1 },
            quantity: { type: 'integer', minimum: 1 },
          },
        },
      },
    },
    async (request) => {
      const service = await loadCart(request);
      const catalog = container.catalogFor(scopeOf(request));
      const [product] = await catalog.getProducts(
        [request.body.productId],
        ItemResponseGroup.ItemInfo | ItemResponseGroup.ItemWithPrices | ItemResponseGroup.Inventory
      );
      if (!product) throw new ResourceNotFoundError('Product', request.body.productId);

      await service.addItem(product, request.body.quantity);
      await service.save();
      return respond(service);
    }
  );

  app.patch<{ Params: CartParams & { lineItemId: string }; Querystring: CartQuery; Body: { quantity: number } }>(
    '/items/:lineItemId',
    {
      schema: {
        ...baseSchema,
        description: 'Change a line item quantity; zero or less removes the line',
        params: {
          type: 'object',
          required: ['storeId', 'customerId', 'lineItemId'],
          properties: { ...cartParamsSchema.properties, lineItemId: { type: 'string' } },
        },
        body: {
          type: 'object',
          required: ['quantity'],
          properties: { quantity: { type: 'integer' } },
        },
      },
    },
    async (request) => {
      const service = await loadCart(request);
      await service.changeQuantity(request.params.lineItemId, request.body.quantity);
      await service.save();
      return respond(service);
    }
  );

  app.delete<{ Params: CartParams & { lineItemId: string }; Querystring: CartQuery }>(
    '/items/:lineItemId',
    { schema: { tags: ['cart'], querystring: cartQuerySchema, description: 'Remove a line item' } },
    async (request) => {
      const service = await loadCart(request);
      await service.removeItem(request.params.lineItemId);
      await service.save();
      return respond(service);
    }
  );

  app.put<{ Params: CartParams; Querystring: CartQuery; Body: { code: string } }>(
    '/coupon',
    {
      schema: {
        ...baseSchema,
        description: 'Set the coupon; it is checked during promotion evaluation on save',
        body: { type: 'object', required: ['code'], properties: { code: { type: 'string', minLength: 1 } } },
      },
    },
    async (request) => {
      const service = await loadCart(request);
      await service.addOrUpdateCoupon(request.body.code);
      await service.save();
      return respond(service);
    }
  );

  app.delete<{ Params: CartParams; Querystring: CartQuery }>(
    '/coupon',
    { schema: { ...baseSchema, description: 'Remove the coupon' } },
    async (request) => {
      const service = await loadCart(request);
      await service.removeCoupon();
      await service.save();
      return respond(service);
    }
  );

  app.get<{ Params: CartParams; Querystring: CartQuery }>(
    '/shipping-methods',
    { schema: { ...baseSchema, description: 'Shipping methods available to the cart, discounted and taxed' } },
    async (request) => {
      const service = await loadCart(request);
      return { data: await service.listShippingMethods(), timestamp: new Date().toISOString() };
    }
  );

  app.post<{
    Params: CartParams;
    Querystring: CartQuery;
    Body: { shipmentMethodCode: string; shipmentMethodOption?: string; deliveryAddress?: Address };
  }>(
    '/shipments',
    {
      schema: {
        ...baseSchema,
        description: 'Add or replace the shipment for a shipping method',
        body: {
          type: 'object',
          required: ['shipmentMethodCode'],
          properties: {
            shipmentMethodCode: { type: 'string', minLength: 1 },
            shipmentMethodOption: { type: 'string' },
            deliveryAddress: addressSchema,
          },
        },
      },
    },
    async (request) => {
      const service = await loadCart(request);
      const currency = service.cart?.currency ?? scopeOf(request).currency;
      await service.addOrUpdateShipment(createShipment(currency, request.body));
      await service.save();
      return respond(service);
    }
  );

  app.get<{ Params: CartParams; Querystring: CartQuery }>(
    '/payment-methods',
    { schema: { ...baseSchema, description: 'Payment methods available to the cart' } },
    async (request) => {
      const service = await loadCart(request);
      return { data: await service.listPaymentMethods(), timestamp: new Date().toISOString() };
    }
  );

  app.post<{
    Params: CartParams;
    Querystring: CartQuery;
    Body: { paymentGatewayCode: string; amount?: number; billingAddress?: Address };
  }>(
    '/payments',
    {
      schema: {
        ...baseSchema,
        description: 'Add a payment for an available payment method',
        body: {
          type: 'object',
          required: ['paymentGatewayCode'],
          properties: {
            paymentGatewayCode: { type: 'string', minLength: 1 },
            amount: { type: 'number', minimum: 0 },
            billingAddress: addressSchema,
          },
        },
      },
    },
    async (request) => {
      const service = await loadCart(request);
      const currency = service.cart?.currency ?? scopeOf(request).currency;
      await service.addOrUpdatePayment(createPayment(currency, request.body));
      await service.save();
      return respond(service);
    }
  );

  app.post<{ Params: CartParams; Querystring: CartQuery }>(
    '/validate',
    { schema: { ...baseSchema, description: 'Check availability, stock and prices of the cart contents' } },
    async (request) => {
      const service = await loadCart(request);
      await service.validate();
      return respond(service);
    }
  );

  app.delete<{ Params: CartParams; Querystring: CartQuery }>(
    '/',
    { schema: { ...baseSchema, description: 'Delete the stored cart' } },
    async (request, reply) => {
      const service = await loadCart(request);
      await service.removeCart();
      return reply.code(204).send();
    }
  );

  app.post<{ Params: CartParams; Querystring: CartQuery; Body: { anonymousCustomerId: string } }>(
    '/merge',
    {
      schema: {
        ...baseSchema,
        description: "Merge an anonymous visitor's cart into this customer's cart after sign-in",
        body: {
          type: 'object',
          required: ['anonymousCustomerId'],
          properties: { anonymousCustomerId: { type: 'string', minLength: 1 } },
        },
      },
    },
    async (request) => {
      const scope = scopeOf(request);
      const cartName = request.query.name || container.config.cart.defaultName;
      const prevUser = { id: request.body.anonymousCustomerId, isRegisteredUser: false };

      const anonymous = container.cartServiceFor({ ...scope, customer: prevUser });
      await anonymous.loadOrCreate(cartName, { id: scope.storeId }, prevUser, scope.language, scope.currency);

      const service = container.cartServiceFor(scope);
      await service.onUserLogin({
        store: { id: scope.storeId },
        language: scope.language,
        currency: scope.currency,
        prevUser,
        newUser: { id: scope.customer.id, userName: scope.customer.id, isRegisteredUser: true },
        prevUserCart: anonymous.cart,
      });

      if (!service.cart) {
        await service.loadOrCreate(
          cartName,
          { id: scope.storeId },
          { id: scope.customer.id, userName: scope.customer.id, isRegisteredUser: true },
          scope.language,
          scope.currency
        );
      }
      return respond(service);
    }
  );
}
