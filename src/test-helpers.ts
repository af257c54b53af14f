/**
 * In-process stand-in for the commerce platform, used as the `fetch`
 * implementation in end-to-end tests. Carts keep real versions: a stale
 * version answers 409, every accepted update increments it once.
 */

import type {
  Address,
  Cart,
  CartDraft,
  CartUpdate,
  CartUpdateAction,
  ItemShippingDetailsDraft,
  LineItem,
} from './api/types.js';

export const TEST_CONFIG = {
  authUrl: 'https://auth.test.local',
  apiUrl: 'https://api.test.local',
  projectKey: 'test-project',
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
};

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

class PlatformRejection extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly currentVersion?: number
  ) {
    super(message);
  }
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function allocated(details: ItemShippingDetailsDraft | undefined): number {
  return (details?.targets ?? []).reduce((total, target) => total + target.quantity, 0);
}

export class FakePlatform {
  readonly requests: RecordedRequest[] = [];
  readonly carts = new Map<string, Cart>();
  private sequence = 0;
  private failures: { match: string; status: number; message: string }[] = [];

  /**
   * Answer the next request whose `METHOD path` contains `match` with an error
   */
  failNext(match: string, status: number, message = 'Simulated failure'): void {
    this.failures.push({ match, status, message });
  }

  /**
   * Simulate another writer changing the cart
   */
  bumpVersion(cartId: string): void {
    const cart = this.carts.get(cartId);
    if (cart) {
      cart.version += 1;
    }
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    const raw = typeof init?.body === 'string' ? init.body : undefined;
    const body: unknown = raw && raw.startsWith('{') ? JSON.parse(raw) : raw;
    this.requests.push({ method, url: url.href, body });

    const failure = this.failures.findIndex((f) => `${method} ${url.pathname}`.includes(f.match));
    if (failure !== -1) {
      const [{ status, message }] = this.failures.splice(failure, 1);
      return json(status, { statusCode: status, message, errors: [{ code: 'General', message }] });
    }

    try {
      if (url.origin === TEST_CONFIG.authUrl) {
        return this.token(url, init);
      }
      return this.api(method, url.pathname, body);
    } catch (error) {
      if (error instanceof PlatformRejection) {
        return json(error.status, {
          statusCode: error.status,
          message: error.message,
          errors: [{ code: error.code, message: error.message, currentVersion: error.currentVersion }],
        });
      }
      throw error;
    }
  };

  private token(url: URL, init: RequestInit | undefined): Response {
    const headers = new Headers(init?.headers);
    const expected = `Basic ${Buffer.from(`${TEST_CONFIG.clientId}:${TEST_CONFIG.clientSecret}`).toString('base64')}`;
    if (url.pathname !== '/oauth/token' || headers.get('Authorization') !== expected) {
      return json(401, { error: 'invalid_client', error_description: 'Please provide valid client credentials.' });
    }
    return json(200, {
      access_token: 'test-access-token',
      token_type: 'Bearer',
      expires_in: 172800,
      scope: `manage_project:${TEST_CONFIG.projectKey}`,
    });
  }

  private api(method: string, pathname: string, body: unknown): Response {
    const prefix = `/${TEST_CONFIG.projectKey}`;
    if (!pathname.startsWith(prefix)) {
      return json(404, { statusCode: 404, message: `Project not found` });
    }
    const path = pathname.slice(prefix.length) || '/';

    if (method === 'GET' && path === '/') {
      return json(200, {
        key: TEST_CONFIG.projectKey,
        name: 'Test Project',
        countries: ['DE'],
        currencies: ['EUR'],
        languages: ['de'],
      });
    }

    if (method === 'POST' && ['/product-types', '/tax-categories', '/products'].includes(path)) {
      const draft = typeof body === 'object' && body !== null ? body : {};
      return json(201, { ...draft, id: this.nextId(path.slice(1)), version: 1 });
    }

    if (method === 'POST' && path === '/carts') {
      return json(201, this.createCart(body as CartDraft));
    }

    const match = /^\/carts\/([^/]+)$/.exec(path);
    const cart = match ? this.carts.get(decodeURIComponent(match[1])) : undefined;
    if (match && !cart) {
      throw new PlatformRejection(404, 'ResourceNotFound', `The Resource with ID '${match[1]}' was not found.`);
    }
    if (cart && method === 'GET') {
      return json(200, cart);
    }
    if (cart && method === 'POST') {
      return json(200, this.updateCart(cart, body as CartUpdate));
    }

    return json(404, { statusCode: 404, message: `No route for ${method} ${path}` });
  }

  private createCart(draft: CartDraft): Cart {
    const cart: Cart = {
      id: this.nextId('cart'),
      version: 1,
      cartState: 'Active',
      country: draft.country,
      lineItems: (draft.lineItems ?? []).map((item) => ({
        id: this.nextId('line-item'),
        productId: item.productId,
        quantity: item.quantity,
      })),
      itemShippingAddresses: [...(draft.itemShippingAddresses ?? [])],
    };
    this.carts.set(cart.id, cart);
    return structuredClone(cart);
  }

  private updateCart(cart: Cart, update: CartUpdate): Cart {
    if (update.version !== cart.version) {
      throw new PlatformRejection(
        409,
        'ConcurrentModification',
        `Object ${cart.id} has a different version than expected. Expected: ${update.version} - Actual: ${cart.version}.`,
        cart.version
      );
    }

    // Actions apply to a copy so a rejected update leaves the cart untouched
    const next = structuredClone(cart);
    for (const action of update.actions) {
      this.apply(next, action);
    }
    next.version += 1;
    this.carts.set(next.id, next);
    return structuredClone(next);
  }

  private apply(cart: Cart, action: CartUpdateAction): void {
    switch (action.action) {
      case 'addItemShippingAddress': {
        if (cart.itemShippingAddresses.some((a) => a.key === action.address.key)) {
          throw new PlatformRejection(400, 'DuplicateField', `Address key '${action.address.key}' already exists.`);
        }
        const address: Address = { ...action.address, id: this.nextId('address') };
        cart.itemShippingAddresses.push(address);
        return;
      }
      case 'setLineItemShippingDetails': {
        const item = this.lineItem(cart, action.lineItemId);
        this.setShippingDetails(cart, item, action.shippingDetails);
        return;
      }
      case 'addLineItem': {
        const item: LineItem = {
          id: this.nextId('line-item'),
          productId: action.productId,
          quantity: action.quantity,
        };
        this.setShippingDetails(cart, item, action.shippingDetails);
        cart.lineItems.push(item);
        return;
      }
      case 'removeLineItem': {
        const item = this.lineItem(cart, action.lineItemId);
        if (action.quantity === undefined || action.quantity >= item.quantity) {
          cart.lineItems = cart.lineItems.filter((candidate) => candidate.id !== item.id);
          return;
        }
        item.quantity -= action.quantity;
        if (item.shippingDetails) {
          const remaining = item.shippingDetails.targets
            .map((target) => {
              const removed = action.shippingDetailsToRemove?.targets.find((t) => t.addressKey === target.addressKey);
              return { ...target, quantity: target.quantity - (removed?.quantity ?? 0) };
            })
            .filter((target) => target.quantity > 0);
          this.setShippingDetails(cart, item, { targets: remaining });
        }
        return;
      }
      case 'changeLineItemQuantity': {
        const item = this.lineItem(cart, action.lineItemId);
        if (!action.shippingDetails && allocated(item.shippingDetails) > action.quantity) {
          throw new PlatformRejection(
            400,
            'InvalidItemShippingDetails',
            `LineItem '${item.id}' has shipping details for ${allocated(item.shippingDetails)} units, more than the quantity ${action.quantity}.`
          );
        }
        item.quantity = action.quantity;
        if (action.shippingDetails) {
          this.setShippingDetails(cart, item, action.shippingDetails);
        }
        return;
      }
    }
  }

  private lineItem(cart: Cart, lineItemId: string): LineItem {
    const item = cart.lineItems.find((candidate) => candidate.id === lineItemId);
    if (!item) {
      throw new PlatformRejection(400, 'InvalidOperation', `The cart does not contain a line item with the ID '${lineItemId}'.`);
    }
    return item;
  }

  private setShippingDetails(cart: Cart, item: LineItem, details: ItemShippingDetailsDraft | undefined): void {
    if (!details) {
      item.shippingDetails = undefined;
      return;
    }
    for (const target of details.targets) {
      if (!cart.itemShippingAddresses.some((address) => address.key === target.addressKey)) {
        throw new PlatformRejection(400, 'InvalidItemShippingDetails', `Unknown address key '${target.addressKey}'.`);
      }
    }
    const total = allocated(details);
    if (total > item.quantity) {
      throw new PlatformRejection(
        400,
        'InvalidItemShippingDetails',
        `Shipping targets of ${total} units exceed the quantity ${item.quantity}.`
      );
    }
    item.shippingDetails = { targets: details.targets.map((target) => ({ ...target })), valid: total === item.quantity };
  }
}
