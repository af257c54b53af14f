/**
 * Tax Categories API
 */

import type { CommerceClient } from './client.js';
import type { TaxCategory, TaxCategoryDraft } from './types.js';

export class TaxCategoriesAPI {
  constructor(private readonly client: CommerceClient) {}

  async create(draft: TaxCategoryDraft, accessToken: string): Promise<TaxCategory> {
    return this.client.request<TaxCategory>('/tax-categories', accessToken, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(draft),
    });
  }
}
