/**
 * Multiple Shipping Addresses Scenario
 *
 * Sets up a sellable product, then walks one cart through the item shipping
 * address workflow:
 *   A. line item already in the cart: add addresses, then split the quantity
 *   B. managing a line item: remove it, re-add it with its split, remove part
 *      of it with its allocation, set an absolute quantity with a new split
 *   C. optionally, reduce the quantity without touching the split and report
 *      what the platform does
 */

import { z } from 'zod';
import type {
  Address,
  Cart,
  CartUpdateAction,
  ItemShippingDetails,
  ItemShippingDetailsDraft,
} from '../api/types.js';
import { ApiError, ExtractionError, PipelineStepError, SetupStepError } from '../errors.js';
import {
  VersionedPipeline,
  type ArtifactSink,
  type MutationStep,
  type PipelineOrigin,
  type StepEvent,
  type StepRecord,
} from '../pipeline/index.js';
import type { CommerceService } from '../services/commerce.service.js';
import {
  ADDED_QUANTITY,
  ADDED_SHIPPING_DETAILS,
  CHANGED_QUANTITY,
  CHANGED_SHIPPING_DETAILS,
  COUNTRY,
  CURRENCY,
  GERMAN_VAT,
  INITIAL_QUANTITY,
  INITIAL_SHIPPING_DETAILS,
  ITEM_SHIPPING_ADDRESSES,
  PROBE_QUANTITY,
  PRODUCT_PRICE_CENTS,
  REMOVED_QUANTITY,
  REMOVED_SHIPPING_DETAILS,
} from './fixtures.js';

const LINE_ITEM = 'lineItemId';

export type CartStep = MutationStep<Cart, CartUpdateAction>;

export interface CatalogIds {
  productTypeId: string;
  taxCategoryId: string;
  productId: string;
}

export interface CartSnapshot {
  id: string;
  version: number;
  lineItems: {
    id: string;
    quantity: number;
    shippingDetails: ItemShippingDetails | null;
  }[];
  itemShippingAddresses: Address[];
}

export type QuantityPolicyProbe =
  | { outcome: 'accepted'; cart: Cart }
  | { outcome: 'rejected'; status: number; message: string; cart: Cart };

export interface ScenarioOptions {
  sink?: ArtifactSink;
  /** Section headings as the run progresses */
  log?: (message: string) => void;
  onStep?: (event: StepEvent<Cart>) => void;
  /** Also run the quantity-only reduction against the final cart */
  probeQuantityPolicy?: boolean;
  /** Name suffix for the product type, tax category and product slug */
  suffix?: () => string;
}

export interface ScenarioResult {
  projectKey: string;
  catalog: CatalogIds;
  cart: Cart;
  steps: StepRecord<CartUpdateAction>[];
  probe?: QuantityPolicyProbe;
}

const IdSchema = z.object({ id: z.string().min(1) });

function readId(resource: unknown, label: string): string {
  const parsed = IdSchema.safeParse(resource);
  if (!parsed.success) {
    throw new ExtractionError(`${label} response has no id`, 'id');
  }
  return parsed.data.id;
}

/**
 * Integer in [0, 32767] as a string
 */
export function randomSuffix(): string {
  return String(Math.floor(Math.random() * 32768));
}

/**
 * Fields of a cart worth looking at in this workflow
 */
export function projectCart(cart: Cart): CartSnapshot {
  return {
    id: cart.id,
    version: cart.version,
    lineItems: cart.lineItems.map((item) => ({
      id: item.id,
      quantity: item.quantity,
      shippingDetails: item.shippingDetails ?? null,
    })),
    itemShippingAddresses: cart.itemShippingAddresses,
  };
}

export function sumTargets(details: ItemShippingDetails | ItemShippingDetailsDraft | null | undefined): number {
  return (details?.targets ?? []).reduce((total, target) => total + target.quantity, 0);
}

/**
 * The first line item must have `quantity` units, all of them allocated
 */
function expectAllocated(cart: Cart, quantity: number): string | undefined {
  const item = cart.lineItems[0];
  if (!item) {
    return 'cart has no line item';
  }
  if (item.quantity !== quantity) {
    return `line item quantity is ${item.quantity}, expected ${quantity}`;
  }
  if (!item.shippingDetails) {
    return 'line item has no shipping details';
  }
  const allocated = sumTargets(item.shippingDetails);
  if (allocated !== quantity) {
    return `shipping targets sum to ${allocated}, expected ${quantity}`;
  }
  return undefined;
}

// ============ Setup ============

/**
 * Create product type, tax category and a published product
 */
export async function setupCatalog(
  service: CommerceService,
  suffix: () => string = randomSuffix
): Promise<CatalogIds> {
  const productType = await service.createProductType({
    name: `productType${suffix()}`,
    description: 'productType',
  });
  const productTypeId = readId(productType, 'Product type');

  const taxCategory = await service.createTaxCategory({
    name: `taxCat${suffix()}`,
    rates: [GERMAN_VAT],
  });
  const taxCategoryId = readId(taxCategory, 'Tax category');

  const product = await service.createProduct({
    productType: { id: productTypeId },
    name: { de: 'product' },
    slug: { de: `product${suffix()}` },
    taxCategory: { id: taxCategoryId, typeId: 'tax-category' },
    masterVariant: {
      prices: [{ value: { currencyCode: CURRENCY, centAmount: PRODUCT_PRICE_CENTS } }],
    },
    publish: true,
  });

  return { productTypeId, taxCategoryId, productId: readId(product, 'Product') };
}

// ============ Scenario A ============

export function cartOrigin(service: CommerceService, productId: string): PipelineOrigin<Cart> {
  return {
    name: 'create cart with line item',
    responseArtifact: 'given-cart',
    start: () =>
      service.createCart({
        currency: CURRENCY,
        country: COUNTRY,
        lineItems: [{ productId, quantity: INITIAL_QUANTITY }],
      }),
    extract: (cart) => ({ [LINE_ITEM]: cart.lineItems[0]?.id }),
  };
}

export function shippingDetailsSteps(): CartStep[] {
  return [
    {
      name: 'add item shipping addresses',
      requestArtifact: 'add-itemShippingAddresses',
      responseArtifact: 'cartWithItemShippingAddresses',
      actions: () =>
        ITEM_SHIPPING_ADDRESSES.map(
          (address): CartUpdateAction => ({ action: 'addItemShippingAddress', address })
        ),
      check: (cart) => {
        const keys = new Set(cart.itemShippingAddresses.map((address) => address.key));
        const missing = ITEM_SHIPPING_ADDRESSES.filter((address) => !keys.has(address.key));
        return missing.length > 0
          ? `cart is missing shipping addresses: ${missing.map((address) => address.key).join(', ')}`
          : undefined;
      },
    },
    {
      name: 'set line item shipping details',
      requestArtifact: 'setLineItemShippingDetails',
      responseArtifact: 'cartWithItemShippingDetailsSet',
      actions: (refs) => [
        {
          action: 'setLineItemShippingDetails',
          lineItemId: refs.get(LINE_ITEM),
          shippingDetails: INITIAL_SHIPPING_DETAILS,
        },
      ],
      check: (cart) => expectAllocated(cart, INITIAL_QUANTITY),
    },
  ];
}

// ============ Scenario B ============

/**
 * Continue on a cart produced by an earlier run
 */
export function existingCartOrigin(cart: Cart, lineItemId: string): PipelineOrigin<Cart> {
  return {
    name: 'cart from previous scenario',
    start: async () => cart,
    extract: () => ({ [LINE_ITEM]: lineItemId }),
  };
}

export function lineItemManagementSteps(productId: string): CartStep[] {
  return [
    {
      name: 'remove line item',
      responseArtifact: 'cartReadyForAddLineItem',
      actions: (refs) => [{ action: 'removeLineItem', lineItemId: refs.get(LINE_ITEM) }],
      release: [LINE_ITEM],
      check: (cart) =>
        cart.lineItems.length === 0 ? undefined : `cart still has ${cart.lineItems.length} line item(s)`,
    },
    {
      name: 'add line item with shipping details',
      requestArtifact: 'addLineItem',
      responseArtifact: 'cartWithAddedLineItem',
      actions: () => [
        {
          action: 'addLineItem',
          productId,
          quantity: ADDED_QUANTITY,
          shippingDetails: ADDED_SHIPPING_DETAILS,
        },
      ],
      extract: (cart) => ({ [LINE_ITEM]: cart.lineItems[0]?.id }),
      check: (cart) => expectAllocated(cart, ADDED_QUANTITY),
    },
    {
      name: 'remove quantity with its shipping details',
      requestArtifact: 'removeLineItem',
      responseArtifact: 'cartWithRemovedLineItem',
      actions: (refs) => [
        {
          action: 'removeLineItem',
          lineItemId: refs.get(LINE_ITEM),
          quantity: REMOVED_QUANTITY,
          shippingDetailsToRemove: REMOVED_SHIPPING_DETAILS,
        },
      ],
      check: (cart) => expectAllocated(cart, ADDED_QUANTITY - REMOVED_QUANTITY),
    },
    {
      name: 'change line item quantity',
      requestArtifact: 'changeLineItemQuantity',
      responseArtifact: 'cartWithChangedLineItemQuantity',
      actions: (refs) => [
        {
          action: 'changeLineItemQuantity',
          lineItemId: refs.get(LINE_ITEM),
          quantity: CHANGED_QUANTITY,
          shippingDetails: CHANGED_SHIPPING_DETAILS,
        },
      ],
      check: (cart) => expectAllocated(cart, CHANGED_QUANTITY),
    },
  ];
}

// ============ Scenario C ============

/**
 * Send a quantity-only change and report whether the platform accepts it.
 * A 400 answer is an outcome here, not a failure; the cart is re-read to show
 * it is unchanged.
 */
export async function probeQuantityOnlyReduction(
  service: CommerceService,
  cart: Cart,
  lineItemId: string,
  quantity: number = PROBE_QUANTITY,
  sink?: ArtifactSink
): Promise<QuantityPolicyProbe> {
  const pipeline = new VersionedPipeline<Cart, CartUpdateAction>(
    (id, update) => service.updateCart(id, update),
    { sink, snapshot: projectCart }
  );

  try {
    const result = await pipeline.run(existingCartOrigin(cart, lineItemId), [
      {
        name: 'change quantity without shipping details',
        requestArtifact: 'changeLineItemQuantityOnly',
        responseArtifact: 'cartWithQuantityOnlyChange',
        actions: (refs) => [
          { action: 'changeLineItemQuantity', lineItemId: refs.get(LINE_ITEM), quantity },
        ],
      },
    ]);
    return { outcome: 'accepted', cart: result.resource };
  } catch (error) {
    if (error instanceof PipelineStepError && error.cause instanceof ApiError && error.cause.status === 400) {
      return {
        outcome: 'rejected',
        status: error.cause.status,
        message: error.cause.errors[0]?.message ?? error.cause.message,
        cart: await service.getCart(cart.id),
      };
    }
    throw error;
  }
}

// ============ Runner ============

async function setupStep<T>(name: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw new SetupStepError(name, error instanceof Error ? error : new Error(String(error)));
  }
}

export async function runMultipleShippingAddressesScenario(
  service: CommerceService,
  options: ScenarioOptions = {}
): Promise<ScenarioResult> {
  const log = options.log ?? (() => undefined);
  const pipelineOptions = { sink: options.sink, snapshot: projectCart, onStep: options.onStep };

  log('Fetch project settings');
  const project = await setupStep('fetch project settings', () => service.getProject());

  log('Setup product type, tax category and product');
  const catalog = await setupStep('create catalog', () => setupCatalog(service, options.suffix));

  log('Scenario: Setting the shipping address quantity when the line item is already in the cart');
  const given = await new VersionedPipeline<Cart, CartUpdateAction>(
    (id, update) => service.updateCart(id, update),
    pipelineOptions
  ).run(cartOrigin(service, catalog.productId), shippingDetailsSteps());

  log('Scenario: Setting the shipping address quantity when managing a line item');
  const managed = await new VersionedPipeline<Cart, CartUpdateAction>(
    (id, update) => service.updateCart(id, update),
    pipelineOptions
  ).run(
    existingCartOrigin(given.resource, given.references[LINE_ITEM] ?? ''),
    lineItemManagementSteps(catalog.productId)
  );

  const result: ScenarioResult = {
    projectKey: project.key,
    catalog,
    cart: managed.resource,
    steps: [
      ...given.steps,
      ...managed.steps.slice(1).map((step, offset) => ({ ...step, index: given.steps.length + offset })),
    ],
  };

  if (options.probeQuantityPolicy) {
    log('Scenario: Reducing the line item quantity without adjusting its shipping details');
    result.probe = await probeQuantityOnlyReduction(
      service,
      managed.resource,
      managed.references[LINE_ITEM] ?? '',
      PROBE_QUANTITY,
      options.sink
    );
  }

  return result;
}
