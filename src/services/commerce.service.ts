/**
 * Commerce Service
 * High-level layer wrapping the API client with project-scoped authentication
 */

import {
  CommerceClient,
  ProjectAPI,
  ProductTypesAPI,
  TaxCategoriesAPI,
  ProductsAPI,
  CartAPI,
  type CommerceClientConfig,
  type Cart,
  type CartDraft,
  type CartUpdate,
  type Product,
  type ProductDraft,
  type ProductType,
  type ProductTypeDraft,
  type Project,
  type TaxCategory,
  type TaxCategoryDraft,
} from '../api/index.js';
import { AuthService } from './auth.service.js';

export class CommerceService {
  private readonly client: CommerceClient;
  private readonly auth: AuthService;
  private readonly project: ProjectAPI;
  private readonly productTypes: ProductTypesAPI;
  private readonly taxCategories: TaxCategoriesAPI;
  private readonly products: ProductsAPI;
  private readonly carts: CartAPI;
  private readonly scope: string;

  constructor(config: CommerceClientConfig) {
    this.client = new CommerceClient(config);
    this.auth = new AuthService(this.client);
    this.project = new ProjectAPI(this.client);
    this.productTypes = new ProductTypesAPI(this.client);
    this.taxCategories = new TaxCategoriesAPI(this.client);
    this.products = new ProductsAPI(this.client);
    this.carts = new CartAPI(this.client);
    this.scope = `manage_project:${config.projectKey}`;
  }

  /**
   * Scope requested for every call: full read and write access to the project
   */
  getScope(): string {
    return this.scope;
  }

  private token(): Promise<string> {
    return this.auth.getAppToken(this.scope);
  }

  // ============ Project setup ============

  async getProject(): Promise<Project> {
    return this.project.get(await this.token());
  }

  async createProductType(draft: ProductTypeDraft): Promise<ProductType> {
    return this.productTypes.create(draft, await this.token());
  }

  async createTaxCategory(draft: TaxCategoryDraft): Promise<TaxCategory> {
    return this.taxCategories.create(draft, await this.token());
  }

  async createProduct(draft: ProductDraft): Promise<Product> {
    return this.products.create(draft, await this.token());
  }

  // ============ Carts ============

  async createCart(draft: CartDraft): Promise<Cart> {
    return this.carts.create(draft, await this.token());
  }

  async getCart(cartId: string): Promise<Cart> {
    return this.carts.getById(cartId, await this.token());
  }

  async updateCart(cartId: string, update: CartUpdate): Promise<Cart> {
    return this.carts.update(cartId, update, await this.token());
  }
}
