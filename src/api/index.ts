/**
 * Commerce Platform API Client - Main Export
 */

export { CommerceClient, type CommerceClientConfig } from './client.js';
export { ProjectAPI } from './project.js';
export { ProductTypesAPI } from './product-types.js';
export { TaxCategoriesAPI } from './tax-categories.js';
export { ProductsAPI } from './products.js';
export { CartAPI } from './cart.js';
export * from './types.js';
