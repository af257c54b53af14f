/**
 * Tests for the project setup APIs
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProjectAPI } from './project.js';
import { ProductTypesAPI } from './product-types.js';
import { TaxCategoriesAPI } from './tax-categories.js';
import { ProductsAPI } from './products.js';
import type { CommerceClient } from './client.js';
import type { ProductDraft } from './types.js';

const createMockClient = () => ({
  request: vi.fn(),
});

const jsonPost = (body: unknown) => ({
  method: 'POST',
  headers: {
    'Content-Type': 'application/json',
  },
  body: JSON.stringify(body),
});

describe('setup APIs', () => {
  let mockClient: ReturnType<typeof createMockClient>;
  let client: CommerceClient;

  beforeEach(() => {
    mockClient = createMockClient();
    client = mockClient as unknown as CommerceClient;
  });

  describe('ProjectAPI', () => {
    it('should fetch the project root', async () => {
      const project = { key: 'test-project', name: 'Test', countries: ['DE'], currencies: ['EUR'], languages: ['de'] };
      mockClient.request.mockResolvedValueOnce(project);

      const result = await new ProjectAPI(client).get('access-token');

      expect(result).toBe(project);
      expect(mockClient.request).toHaveBeenCalledWith('', 'access-token');
    });
  });

  describe('ProductTypesAPI', () => {
    it('should create a product type', async () => {
      mockClient.request.mockResolvedValueOnce({ id: 'product-type-1', version: 1 });
      const draft = { name: 'productType42', description: 'productType' };

      const result = await new ProductTypesAPI(client).create(draft, 'access-token');

      expect(result.id).toBe('product-type-1');
      expect(mockClient.request).toHaveBeenCalledWith('/product-types', 'access-token', jsonPost(draft));
    });
  });

  describe('TaxCategoriesAPI', () => {
    it('should create a tax category with its rates', async () => {
      mockClient.request.mockResolvedValueOnce({ id: 'tax-category-1', version: 1 });
      const draft = {
        name: 'taxCat42',
        rates: [{ name: 'de', amount: 0.19, includedInPrice: true, country: 'DE' }],
      };

      await new TaxCategoriesAPI(client).create(draft, 'access-token');

      expect(mockClient.request).toHaveBeenCalledWith('/tax-categories', 'access-token', jsonPost(draft));
    });
  });

  describe('ProductsAPI', () => {
    it('should create a product', async () => {
      mockClient.request.mockResolvedValueOnce({ id: 'product-1', version: 1 });
      const draft: ProductDraft = {
        productType: { id: 'product-type-1' },
        name: { de: 'product' },
        slug: { de: 'product42' },
        taxCategory: { id: 'tax-category-1', typeId: 'tax-category' },
        masterVariant: { prices: [{ value: { currencyCode: 'EUR', centAmount: 4200 } }] },
        publish: true,
      };

      await new ProductsAPI(client).create(draft, 'access-token');

      expect(mockClient.request).toHaveBeenCalledWith('/products', 'access-token', jsonPost(draft));
    });

    it('should propagate API errors', async () => {
      mockClient.request.mockRejectedValueOnce(new Error('API request failed: slug already exists'));

      await expect(
        new ProductsAPI(client).create(
          { productType: { id: 'product-type-1' }, name: { de: 'product' }, slug: { de: 'product42' } },
          'access-token'
        )
      ).rejects.toThrow('API request failed: slug already exists');
    });
  });
});
