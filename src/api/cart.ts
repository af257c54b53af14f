/**
 * Carts API
 */

import type { CommerceClient } from './client.js';
import type { Cart, CartDraft, CartUpdate } from './types.js';

export class CartAPI {
  constructor(private readonly client: CommerceClient) {}

  /**
   * Create a cart
   */
  async create(draft: CartDraft, accessToken: string): Promise<Cart> {
    return this.client.request<Cart>('/carts', accessToken, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(draft),
    });
  }

  async getById(cartId: string, accessToken: string): Promise<Cart> {
    return this.client.request<Cart>(`/carts/${encodeURIComponent(cartId)}`, accessToken);
  }

  /**
   * Apply update actions to a cart
   * The platform rejects the update with 409 when `version` is stale
   */
  async update(cartId: string, update: CartUpdate, accessToken: string): Promise<Cart> {
    return this.client.request<Cart>(`/carts/${encodeURIComponent(cartId)}`, accessToken, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(update),
    });
  }
}
