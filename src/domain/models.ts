export interface Store {
  id: string;
  name?: string;
  defaultCurrency?: string;
  defaultLanguage?: string;
}

export interface CustomerInfo {
  id: string;
  userName?: string;
  isRegisteredUser: boolean;
}

export interface Address {
  firstName?: string;
  lastName?: string;
  line1?: string;
  city?: string;
  postalCode?: string;
  countryCode?: string;
}

// attached to line items and shipments, recomputed on every validation pass
export type CartValidationError =
  | { kind: 'unavailable' }
  | { kind: 'quantity'; availableQuantity: number }
  | {
      kind: 'price';
      oldPrice: number;
      oldPriceWithTax: number;
      newPrice: number;
      newPriceWithTax: number;
    };

export interface LineItem {
  id?: string; // undefined until the cart store assigns one
  productId: string;
  sku?: string;
  name: string;
  imageUrl?: string;
  currency: string;
  quantity: number;
  listPrice: number;
  salePrice: number;
  discountAmount: number; // per unit
  taxTotal: number;
  taxPercentRate: number;
  taxType?: string;
  isReadOnly: boolean;
  isValid: boolean;
  validationErrors: CartValidationError[];
}

export interface Shipment {
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
  isValid: boolean;
  validationErrors: CartValidationError[];
}

export interface Payment {
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

export interface Coupon {
  code: string;
  appliedSuccessfully?: boolean;
}

export interface Cart {
  id?: string;
  storeId: string;
  name: string;
  customerId: string;
  customerName: string;
  customer?: CustomerInfo;
  isAnonymous: boolean;
  language: string;
  currency: string;
  items: LineItem[];
  shipments: Shipment[];
  payments: Payment[];
  coupon?: Coupon;
  isValid: boolean;
}

export interface ShippingMethod {
  shipmentMethodCode: string;
  optionName?: string;
  name: string;
  currency: string;
  price: number;
  discountAmount: number;
  taxTotal: number;
  taxPercentRate: number;
  taxType?: string;
}

export interface PaymentMethod {
  code: string;
  name: string;
  currency: string;
  price: number;
  discountAmount: number;
  taxTotal: number;
  taxPercentRate: number;
  taxType?: string;
}

export interface CartTotals {
  subTotal: number;
  discountTotal: number;
  shippingTotal: number;
  paymentTotal: number;
  taxTotal: number;
  total: number;
}

export interface QuoteItem {
  productId: string;
  listPrice: number;
  selectedTierPrice: { quantity: number; price: number };
}

export interface QuoteRequest {
  items: QuoteItem[];
  requestShippingQuote: boolean;
  shippingAddress?: Address;
  billingAddress?: Address;
  shipmentMethod?: { shipmentMethodCode: string; optionName?: string; price: number };
  totals: { grandTotalInclTax: number };
}

export interface UserLoginEvent {
  store: Store;
  language: string;
  currency: string;
  prevUser: CustomerInfo;
  newUser: CustomerInfo;
  prevUserCart?: Cart;
}
