import { getLogger } from '../lib/logger.js';
import {
  isPlainObject,
  readArray,
  readNumber,
  readObject,
  readString,
  type JsonValue,
  type Payload,
} from '../lib/payload.js';
import type { MetafieldInput } from '../api/target-client.js';

/**
 * Source → target record translation. Everything here is pure: staged
 * payloads in, target API request bodies out.
 */

export const IMPORT_TAG = 'source-import';
export const SUBSCRIPTION_ORDER_TAG = 'source-subscription';
export const METAFIELD_NAMESPACE = 'source_migration';

export class MappingError extends Error {
  constructor(message: string, public readonly naturalId: number | null) {
    super(message);
    this.name = 'MappingError';
  }
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

// ─── Status tables ───────────────────────────────────────────────────────────

const SOURCE_FINANCIAL_STATUSES = [
  'paid',
  'completed',
  'pending',
  'cancelled',
  'refunded',
  'partially_refunded',
  'failed',
] as const;

export type TargetFinancialStatus = 'paid' | 'pending' | 'voided' | 'refunded' | 'partially_refunded';

const FINANCIAL_STATUS: Record<(typeof SOURCE_FINANCIAL_STATUSES)[number], TargetFinancialStatus> = {
  paid: 'paid',
  completed: 'paid',
  pending: 'pending',
  cancelled: 'voided',
  refunded: 'refunded',
  partially_refunded: 'partially_refunded',
  failed: 'pending',
};

const DEFAULT_FINANCIAL_STATUS: TargetFinancialStatus = 'pending';

export function mapFinancialStatus(status: string | null): TargetFinancialStatus {
  const key = status?.trim().toLowerCase() ?? '';
  return isOneOf(SOURCE_FINANCIAL_STATUSES, key) ? FINANCIAL_STATUS[key] : DEFAULT_FINANCIAL_STATUS;
}

const SOURCE_FULFILLMENT_STATUSES = [
  'shipped',
  'delivered',
  'fulfilled',
  'pending',
  'processing',
  'cancelled',
] as const;

export type TargetFulfillmentStatus = 'shipped' | 'delivered' | 'fulfilled';

const FULFILLMENT_STATUS: Record<(typeof SOURCE_FULFILLMENT_STATUSES)[number], TargetFulfillmentStatus | null> = {
  shipped: 'shipped',
  delivered: 'delivered',
  fulfilled: 'fulfilled',
  pending: null,
  processing: null,
  cancelled: null,
};

/** Unknown and not-yet-fulfilled statuses map to null (unfulfilled). */
export function mapFulfillmentStatus(status: string | null): TargetFulfillmentStatus | null {
  const key = status?.trim().toLowerCase() ?? '';
  return isOneOf(SOURCE_FULFILLMENT_STATUSES, key) ? FULFILLMENT_STATUS[key] : null;
}

// ─── Field cleanup ───────────────────────────────────────────────────────────

/**
 * Normalize phone numbers to E.164. Ten-digit numbers (optionally with a
 * leading 1 or +1) become +1XXXXXXXXXX; longer ones keep their digits with a
 * leading +; anything shorter is dropped. Extensions are removed.
 */
export function cleanPhoneNumber(phone: string | null): string | null {
  if (!phone) return null;

  let value = phone.trim().replace(/[^\d+\s\-().x]/gi, '');
  value = value.replace(/x\d+$/i, '').replace(/ext\.\s*\d+$/i, '');

  let digits = value.replace(/[^\d+]/g, '');
  if (!/\d/.test(digits)) return null;

  if (digits.startsWith('+1')) {
    digits = digits.slice(2);
  } else if (digits.startsWith('1') && digits.length === 11) {
    digits = digits.slice(1);
  }

  if (/^\d{10}$/.test(digits)) return `+1${digits}`;
  if (digits.replace(/\+/g, '').length > 10) {
    const international = value.replace(/[^\d+]/g, '');
    return international.startsWith('+') ? international : `+${international}`;
  }
  return null;
}

const HTML_ENTITIES: Array<[string, string]> = [
  ['&nbsp;', ' '],
  ['&amp;', '&'],
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&quot;', '"'],
  ['&#39;', "'"],
];

export function cleanText(text: string | null): string | null {
  if (!text) return null;
  let value = text.replace(/<[^>]+>/g, '');
  for (const [entity, replacement] of HTML_ENTITIES) {
    value = value.split(entity).join(replacement);
  }
  value = value.split(/\s+/).filter(Boolean).join(' ');
  return value === '' ? null : value;
}

/**
 * Source timestamps come as `2024-01-05T10:00:00Z`, with optional fractional
 * seconds, or as `2024-01-05 10:00:00` (UTC). Output is ISO 8601 with an
 * explicit UTC offset.
 */
export function convertDatetime(value: string | null): string | null {
  if (!value) return null;
  const match = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.\d+)?Z?$/.exec(value.trim());
  if (!match) {
    getLogger().debug({ value }, 'Unrecognized datetime format');
    return null;
  }
  return `${match[1]}T${match[2]}+00:00`;
}

function money(payload: Payload, key: string): string {
  const value = readNumber(payload, key);
  return (value ?? 0).toFixed(2);
}

function withoutNulls(payload: Record<string, JsonValue | undefined>): Payload {
  const result: Payload = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== null && value !== undefined) result[key] = value;
  }
  return result;
}

// ─── Addresses ───────────────────────────────────────────────────────────────

export function mapAddress(source: Payload | null): Payload | null {
  if (!source) return null;

  const address1 = readString(source, 'line1');
  const city = readString(source, 'city');
  if (!address1 || !city) return null;

  return {
    first_name: readString(source, 'first_name') ?? '',
    last_name: readString(source, 'last_name') ?? '',
    company: readString(source, 'company') ?? '',
    address1,
    address2: readString(source, 'line2') ?? '',
    city,
    province: readString(source, 'state') ?? '',
    country: readString(source, 'country') ?? '',
    zip: readString(source, 'postal_code') ?? '',
    phone: cleanPhoneNumber(readString(source, 'phone')),
  };
}

function extractAddress(record: Payload, type: 'shipping' | 'billing'): Payload | null {
  const key = `${type}_address`;
  if (key in record) return mapAddress(readObject(record, key));
  return mapAddress(readObject(record, 'address'));
}

// ─── Customers ───────────────────────────────────────────────────────────────

export function mapCustomer(customer: Payload, naturalId: number): Payload {
  const email = readString(customer, 'email');
  const phone = cleanPhoneNumber(readString(customer, 'phone'));
  const firstName = cleanText(readString(customer, 'first_name'));
  const lastName = cleanText(readString(customer, 'last_name'));

  if (!email && !phone && !firstName && !lastName) {
    throw new MappingError(`Customer ${naturalId} has no email, phone or name`, naturalId);
  }

  const addresses: Payload[] = [];
  const shipping = extractAddress(customer, 'shipping');
  const billing = extractAddress(customer, 'billing');
  if (shipping) addresses.push(shipping);
  if (billing && JSON.stringify(billing) !== JSON.stringify(shipping)) addresses.push(billing);

  const acceptsMarketing = customer.marketing_opt_in === true;

  return withoutNulls({
    email: email ?? '',
    first_name: firstName ?? '',
    last_name: lastName ?? '',
    phone,
    verified_email: true,
    tags: IMPORT_TAG,
    note: `Imported from source platform. Original ID: ${naturalId}`,
    created_at: convertDatetime(readString(customer, 'date_created')),
    updated_at: convertDatetime(readString(customer, 'date_updated')),
    addresses: addresses.length > 0 ? addresses : null,
    default_address: addresses[0] ?? null,
    accepts_marketing: acceptsMarketing ? true : null,
    marketing_opt_in_level: acceptsMarketing ? 'confirmed_opt_in' : null,
  });
}

// ─── Orders ──────────────────────────────────────────────────────────────────

export interface ProductLink {
  productId: number;
  variantId: number;
  title: string;
}

export type ProductIndex = ReadonlyMap<string, ProductLink>;

export function mapLineItem(item: Payload, products: ProductIndex): Payload {
  const sku = readString(item, 'sku')?.trim() ?? '';
  const link = sku ? products.get(sku) : undefined;
  const sourceProductId = item.product_id;

  const properties: Payload[] = [
    {
      name: 'Source Product ID',
      value: sourceProductId === undefined || sourceProductId === null ? '' : String(sourceProductId),
    },
  ];
  if (sku && !link) {
    properties.push({ name: 'Migration Note', value: `Original SKU ${sku} - no matching target product found` });
  }

  return withoutNulls({
    title: readString(item, 'product_name') ?? 'Unknown Product',
    quantity: readNumber(item, 'quantity') ?? 1,
    price: money(item, 'price'),
    sku,
    vendor: readString(item, 'vendor') ?? '',
    requires_shipping: true,
    taxable: true,
    properties,
    product_id: link?.productId ?? null,
    variant_id: link?.variantId ?? null,
  });
}

export function mapOrder(
  order: Payload,
  naturalId: number,
  targetCustomerId: number | null,
  products: ProductIndex,
): Payload {
  const lineItems = readArray(order, 'items').filter(isPlainObject).map((item) => mapLineItem(item, products));
  if (lineItems.length === 0) {
    throw new MappingError(`Order ${naturalId} has no line items`, naturalId);
  }

  const currency = readString(order, 'currency') ?? 'USD';
  const isSubscriptionOrder = order.subscription_id !== undefined && order.subscription_id !== null;
  const discount = readNumber(order, 'discount_amount');

  return withoutNulls({
    email: readString(order, 'customer_email') ?? '',
    created_at: convertDatetime(readString(order, 'date_created')),
    updated_at: convertDatetime(readString(order, 'date_updated')),
    line_items: lineItems,
    financial_status: mapFinancialStatus(readString(order, 'status')),
    fulfillment_status: mapFulfillmentStatus(readString(order, 'fulfillment_status')),
    tags: isSubscriptionOrder ? `${IMPORT_TAG},${SUBSCRIPTION_ORDER_TAG}` : IMPORT_TAG,
    note: 'Imported from source platform',
    currency,
    total_price: money(order, 'total'),
    subtotal_price: money(order, 'subtotal'),
    total_tax: money(order, 'tax'),
    total_shipping_price_set: {
      shop_money: { amount: money(order, 'shipping'), currency_code: currency },
    },
    metafields: [
      { namespace: METAFIELD_NAMESPACE, key: 'order_id', value: String(naturalId), type: 'single_line_text_field' },
    ],
    customer: targetCustomerId !== null ? { id: targetCustomerId } : null,
    shipping_address: extractAddress(order, 'shipping'),
    billing_address: extractAddress(order, 'billing'),
    discount_applications: discount
      ? [
          {
            type: 'discount_code',
            code: readString(order, 'discount_code') ?? 'SOURCE_DISCOUNT',
            value: discount.toFixed(2),
            value_type: 'fixed_amount',
            allocation_method: 'across',
          },
        ]
      : null,
  });
}

// ─── Subscription summary ────────────────────────────────────────────────────

/** A customer carries a subscription indicator unless its status is absent or 'none'. */
export function hasSubscriptionIndicator(customer: Payload): boolean {
  const status = readString(customer, 'subscription_status');
  return status !== null && status !== 'none';
}

function summarizeSubscription(subscription: Payload, naturalId: number): Payload {
  return {
    id: naturalId,
    status: readString(subscription, 'status') ?? 'unknown',
    frequency: readString(subscription, 'frequency') ?? 'unknown',
    created_at: convertDatetime(readString(subscription, 'date_created')),
    next_billing_date: convertDatetime(readString(subscription, 'next_billing_date')),
    cancelled_at: convertDatetime(readString(subscription, 'cancelled_at')),
    total_value: money(subscription, 'total'),
    billing_cycles_completed: readNumber(subscription, 'billing_cycles_completed') ?? 0,
  };
}

export function buildSubscriptionSummary(
  customer: Payload,
  naturalId: number,
  subscriptions: Array<{ naturalId: number; payload: Payload }>,
  migratedAt: Date,
): MetafieldInput {
  return {
    namespace: METAFIELD_NAMESPACE,
    key: 'subscription_summary',
    type: 'json',
    value: {
      migration_date: migratedAt.toISOString(),
      source: 'customer_record',
      subscription_data: {
        source_customer_id: naturalId,
        subscription_status: readString(customer, 'subscription_status') ?? 'unknown',
        total_revenue: money(customer, 'total_revenue'),
        currency: 'USD',
        customer_since: readString(customer, 'date_created'),
        last_updated: readString(customer, 'date_updated'),
      },
      subscriptions: subscriptions.map((entry) => summarizeSubscription(entry.payload, entry.naturalId)),
    },
  };
}
