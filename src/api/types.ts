/**
 * Commerce Platform API Types
 * Only the fields this workflow reads or sends are modelled
 */

// Auth types
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer' | 'bearer';
  expires_in: number;
  scope?: string;
}

// Common types
export type LocalizedString = Record<string, string>;

export interface Reference<T extends string = string> {
  typeId: T;
  id: string;
}

export interface ResourceIdentifier<T extends string = string> {
  typeId?: T;
  id: string;
}

export interface Money {
  currencyCode: string;
  centAmount: number;
}

export interface TypedMoney extends Money {
  type: 'centPrecision' | 'highPrecision';
  fractionDigits: number;
}

export interface Versioned {
  id: string;
  version: number;
}

export interface PlatformErrorDetail {
  code: string;
  message: string;
  currentVersion?: number;
}

// Project types
export interface Project {
  key: string;
  name: string;
  countries: string[];
  currencies: string[];
  languages: string[];
  version?: number;
}

// Product type and tax category
export interface ProductTypeDraft {
  name: string;
  description: string;
}

export interface ProductType extends Versioned {
  name: string;
  description: string;
}

export interface TaxRateDraft {
  name: string;
  amount: number;
  includedInPrice: boolean;
  country: string;
}

export interface TaxCategoryDraft {
  name: string;
  rates: TaxRateDraft[];
}

export interface TaxCategory extends Versioned {
  name: string;
  rates: (TaxRateDraft & { id: string })[];
}

// Product types
export interface PriceDraft {
  value: Money;
}

export interface ProductVariantDraft {
  sku?: string;
  prices?: PriceDraft[];
}

export interface ProductDraft {
  productType: ResourceIdentifier<'product-type'>;
  name: LocalizedString;
  slug: LocalizedString;
  taxCategory?: ResourceIdentifier<'tax-category'>;
  masterVariant?: ProductVariantDraft;
  publish?: boolean;
}

export interface Product extends Versioned {
  productType: Reference<'product-type'>;
  taxCategory?: Reference<'tax-category'>;
}

// Address types
export interface BaseAddress {
  key: string;
  country: string;
  firstName?: string;
  lastName?: string;
  streetName?: string;
  streetNumber?: string;
  postalCode?: string;
  city?: string;
}

export interface Address extends BaseAddress {
  id?: string;
}

// Shipping detail types
export interface ItemShippingTarget {
  addressKey: string;
  quantity: number;
}

export interface ItemShippingDetailsDraft {
  targets: ItemShippingTarget[];
}

export interface ItemShippingDetails {
  targets: ItemShippingTarget[];
  valid: boolean;
}

// Cart types
export interface LineItemDraft {
  productId: string;
  variantId?: number;
  quantity: number;
  shippingDetails?: ItemShippingDetailsDraft;
}

export interface CartDraft {
  currency: string;
  country?: string;
  lineItems?: LineItemDraft[];
  itemShippingAddresses?: BaseAddress[];
}

export interface LineItem {
  id: string;
  productId: string;
  quantity: number;
  shippingDetails?: ItemShippingDetails;
  totalPrice?: TypedMoney;
}

export interface Cart extends Versioned {
  cartState: 'Active' | 'Merged' | 'Ordered' | 'Frozen';
  lineItems: LineItem[];
  itemShippingAddresses: Address[];
  totalPrice?: TypedMoney;
  country?: string;
}

// Cart update actions
export interface AddItemShippingAddressAction {
  action: 'addItemShippingAddress';
  address: BaseAddress;
}

export interface SetLineItemShippingDetailsAction {
  action: 'setLineItemShippingDetails';
  lineItemId: string;
  shippingDetails?: ItemShippingDetailsDraft;
}

export interface AddLineItemAction {
  action: 'addLineItem';
  productId: string;
  variantId?: number;
  quantity: number;
  shippingDetails?: ItemShippingDetailsDraft;
}

export interface RemoveLineItemAction {
  action: 'removeLineItem';
  lineItemId: string;
  quantity?: number;
  shippingDetailsToRemove?: ItemShippingDetailsDraft;
}

export interface ChangeLineItemQuantityAction {
  action: 'changeLineItemQuantity';
  lineItemId: string;
  quantity: number;
  shippingDetails?: ItemShippingDetailsDraft;
}

export type CartUpdateAction =
  | AddItemShippingAddressAction
  | SetLineItemShippingDetailsAction
  | AddLineItemAction
  | RemoveLineItemAction
  | ChangeLineItemQuantityAction;

export interface UpdateRequest<A> {
  version: number;
  actions: A[];
}

export type CartUpdate = UpdateRequest<CartUpdateAction>;
