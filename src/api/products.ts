/**
 * Products API
 */

import type { CommerceClient } from './client.js';
import type { Product, ProductDraft } from './types.js';

export class ProductsAPI {
  constructor(private readonly client: CommerceClient) {}

  /**
   * Create a product
   * With `publish: true` the product is immediately available to carts
   */
  async create(draft: ProductDraft, accessToken: string): Promise<Product> {
    return this.client.request<Product>('/products', accessToken, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(draft),
    });
  }
}
