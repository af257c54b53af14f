/**
 * Product Types API
 */

import type { CommerceClient } from './client.js';
import type { ProductType, ProductTypeDraft } from './types.js';

export class ProductTypesAPI {
  constructor(private readonly client: CommerceClient) {}

  async create(draft: ProductTypeDraft, accessToken: string): Promise<ProductType> {
    return this.client.request<ProductType>('/product-types', accessToken, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(draft),
    });
  }
}
