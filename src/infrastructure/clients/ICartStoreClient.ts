import type { Address } from '../../domain/models.js';

// Remote representation of a cart as the cart store persists it

export interface LineItemDto {
  id?: string;
  productId: string;
  sku?: string;
  name: string;
  imageUrl?: string;
  currency: string;
  quantity: number;
  listPrice: number;
  salePrice: number;
  discountAmount: number;
  taxTotal: number;
  taxPercentRate: number;
  taxType?: string;
  isReadOnly: boolean;
}

export interface ShipmentDto {
  id?: string;
  shipmentMethodCode?: string;
  shipmentMethodOption?: string;
  currency: string;
  price: number;
  discountAmount: number;
  taxTotal: number;
  taxPercentRate: number;
  taxType?: string;
  deliveryAddress?: Address;
}

export interface PaymentDto {
  id?: string;
  paymentGatewayCode?: string;
  currency: string;
  amount: number;
  price: number;
  discountAmount: number;
  taxTotal: number;
  taxPercentRate: number;
  billingAddress?: Address;
}

export interface CartDto {
  id?: string;
  storeId: string;
  name: string;
  customerId: string;
  customerName: string;
  isAnonymous: boolean;
  languageCode: string;
  currency: string;
  coupon?: string;
  items: LineItemDto[];
  shipments: ShipmentDto[];
  payments: PaymentDto[];
  // stamped by the store on create/update
  subTotal?: number;
  discountTotal?: number;
  taxTotal?: number;
  total?: number;
  createdDate?: string;
  modifiedDate?: string;
}

export interface CartSearchCriteria {
  storeId: string;
  customerId: string;
  name: string;
  currency: string;
}

export interface ShippingRateDto {
  shipmentMethodCode: string;
  optionName?: string;
  name: string;
  currency: string;
  rate: number;
  discountAmount?: number;
  taxType?: string;
}

export interface PaymentMethodDto {
  code: string;
  name: string;
  currency: string;
  price: number;
  taxType?: string;
  isActive: boolean;
}

export interface ICartStoreClient {
  search(criteria: CartSearchCriteria): Promise<CartDto[]>;
  getById(cartId: string): Promise<CartDto | null>;
  create(cart: CartDto): Promise<CartDto>;
  update(cart: CartDto): Promise<void>;
  delete(cartIds: string[]): Promise<void>;
  getAvailableShippingRates(cartId: string | undefined): Promise<ShippingRateDto[]>;
  getAvailablePaymentMethods(cartId: string | undefined): Promise<PaymentMethodDto[]>;
}
