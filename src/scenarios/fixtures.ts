/**
 * Static request data for the multiple shipping addresses scenario
 */

import type { BaseAddress, ItemShippingDetailsDraft, TaxRateDraft } from '../api/types.js';

export const CURRENCY = 'EUR';
export const COUNTRY = 'DE';
export const PRODUCT_PRICE_CENTS = 4200;

export const GERMAN_VAT: TaxRateDraft = {
  name: 'de',
  amount: 0.19,
  includedInPrice: true,
  country: COUNTRY,
};

export const OFFICE_ADDRESS: BaseAddress = {
  key: 'office',
  country: COUNTRY,
  firstName: 'Erika',
  lastName: 'Mustermann',
  streetName: 'Friedrichstraße',
  streetNumber: '1',
  postalCode: '10117',
  city: 'Berlin',
};

export const HOME_ADDRESS: BaseAddress = {
  key: 'home',
  country: COUNTRY,
  firstName: 'Erika',
  lastName: 'Mustermann',
  streetName: 'Heidestraße',
  streetNumber: '17',
  postalCode: '51147',
  city: 'Köln',
};

export const ITEM_SHIPPING_ADDRESSES = [OFFICE_ADDRESS, HOME_ADDRESS];

/** Line item already in the cart */
export const INITIAL_QUANTITY = 100;

export const INITIAL_SHIPPING_DETAILS: ItemShippingDetailsDraft = {
  targets: [
    { addressKey: OFFICE_ADDRESS.key, quantity: 30 },
    { addressKey: HOME_ADDRESS.key, quantity: 70 },
  ],
};

/** Line item added together with its shipping details */
export const ADDED_QUANTITY = 10;

export const ADDED_SHIPPING_DETAILS: ItemShippingDetailsDraft = {
  targets: [
    { addressKey: OFFICE_ADDRESS.key, quantity: 4 },
    { addressKey: HOME_ADDRESS.key, quantity: 6 },
  ],
};

/** Units removed from the line item along with their allocation */
export const REMOVED_QUANTITY = 3;

export const REMOVED_SHIPPING_DETAILS: ItemShippingDetailsDraft = {
  targets: [{ addressKey: HOME_ADDRESS.key, quantity: REMOVED_QUANTITY }],
};

/** Absolute quantity with matching allocation */
export const CHANGED_QUANTITY = 5;

export const CHANGED_SHIPPING_DETAILS: ItemShippingDetailsDraft = {
  targets: [
    { addressKey: OFFICE_ADDRESS.key, quantity: 2 },
    { addressKey: HOME_ADDRESS.key, quantity: 3 },
  ],
};

/** Quantity below the current allocation, sent without shipping details */
export const PROBE_QUANTITY = 1;
