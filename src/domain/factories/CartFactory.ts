import type { Cart } from '../models.js';

export interface ICartFactory {
  createCart(currency: string, language: string): Cart;
}

export class DefaultCartFactory implements ICartFactory {
  createCart(currency: string, language: string): Cart {
    return {
      storeId: '',
      name: '',
      customerId: '',
      customerName: '',
      isAnonymous: true,
      language,
      currency,
      items: [],
      shipments: [],
      payments: [],
      isValid: true,
    };
  }
}
