import {
  buildSubscriptionSummary,
  cleanPhoneNumber,
  cleanText,
  convertDatetime,
  mapAddress,
  mapCustomer,
  mapFinancialStatus,
  mapFulfillmentStatus,
  mapOrder,
  MappingError,
  type ProductIndex,
} from '../../src/transform/field-mapper.js';
import { eligibilityReasons, isMigrationEligible } from '../../src/migration/eligibility.js';
import { buildProductIndex, loadProductIndex } from '../../src/migration/product-index.js';
import { StubTargetClient } from '../support/fakes.js';

describe('status tables', () => {
  it('maps financial statuses case-insensitively with a pending default', () => {
    expect(mapFinancialStatus('Completed')).toBe('paid');
    expect(mapFinancialStatus(' cancelled ')).toBe('voided');
    expect(mapFinancialStatus('partially_refunded')).toBe('partially_refunded');
    expect(mapFinancialStatus('failed')).toBe('pending');
    expect(mapFinancialStatus('on_hold')).toBe('pending');
    expect(mapFinancialStatus(null)).toBe('pending');
  });

  it('maps only fulfilled-like statuses, leaving the rest unfulfilled', () => {
    expect(mapFulfillmentStatus('SHIPPED')).toBe('shipped');
    expect(mapFulfillmentStatus('delivered')).toBe('delivered');
    expect(mapFulfillmentStatus('processing')).toBeNull();
    expect(mapFulfillmentStatus('lost_in_transit')).toBeNull();
    expect(mapFulfillmentStatus(null)).toBeNull();
  });
});

describe('cleanPhoneNumber', () => {
  it.each([
    ['(555) 123-4567', '+15551234567'],
    ['+1 555-123-4567', '+15551234567'],
    ['1-555-123-4567', '+15551234567'],
    ['555.123.4567', '+15551234567'],
    ['555-123-4567 x89', '+15551234567'],
    ['+44 20 7946 0958', '+442079460958'],
  ])('normalizes %s', (input, expected) => {
    expect(cleanPhoneNumber(input)).toBe(expected);
  });

  it('drops numbers that are too short or have no digits', () => {
    expect(cleanPhoneNumber('12345')).toBeNull();
    expect(cleanPhoneNumber('n/a')).toBeNull();
    expect(cleanPhoneNumber(null)).toBeNull();
  });
});

describe('cleanText', () => {
  it('strips markup, decodes entities and collapses whitespace', () => {
    expect(cleanText('<p>Hello&nbsp;&amp; <b>world</b></p>  ')).toBe('Hello & world');
    expect(cleanText('<br/>')).toBeNull();
  });
});

describe('convertDatetime', () => {
  it('normalizes source timestamps to an explicit UTC offset', () => {
    expect(convertDatetime('2024-01-05T10:00:00.123Z')).toBe('2024-01-05T10:00:00+00:00');
    expect(convertDatetime('2024-01-05 10:00:00')).toBe('2024-01-05T10:00:00+00:00');
    expect(convertDatetime('05/01/2024')).toBeNull();
  });
});

describe('mapAddress', () => {
  it('requires a street line and a city', () => {
    expect(mapAddress({ line1: '1 Main St' })).toBeNull();
    expect(mapAddress(null)).toBeNull();
  });
});

describe('mapCustomer', () => {
  const address = { line1: '1 Main St', city: 'Springfield', state: 'IL', postal_code: '62701', country: 'US' };
  const mappedAddress = {
    first_name: '',
    last_name: '',
    company: '',
    address1: '1 Main St',
    address2: '',
    city: 'Springfield',
    province: 'IL',
    country: 'US',
    zip: '62701',
    phone: null,
  };

  it('builds a target customer with one address when billing equals shipping', () => {
    const mapped = mapCustomer(
      {
        id: 42,
        email: 'jane@example.test',
        first_name: '<b>Jane</b>',
        last_name: 'Doe',
        phone: '555.123.4567',
        date_created: '2023-02-01T08:30:00Z',
        marketing_opt_in: true,
        shipping_address: address,
        billing_address: address,
      },
      42,
    );

    expect(mapped).toEqual({
      email: 'jane@example.test',
      first_name: 'Jane',
      last_name: 'Doe',
      phone: '+15551234567',
      verified_email: true,
      tags: 'source-import',
      note: 'Imported from source platform. Original ID: 42',
      created_at: '2023-02-01T08:30:00+00:00',
      addresses: [mappedAddress],
      default_address: mappedAddress,
      accepts_marketing: true,
      marketing_opt_in_level: 'confirmed_opt_in',
    });
  });

  it('falls back to the generic address field', () => {
    const mapped = mapCustomer({ email: 'a@example.test', address }, 3);
    expect(mapped.addresses).toEqual([mappedAddress]);
    expect(mapped.accepts_marketing).toBeUndefined();
  });

  it('refuses customers with nothing to identify them by', () => {
    expect(() => mapCustomer({ id: 1, email: '' }, 1)).toThrow(
      new MappingError('Customer 1 has no email, phone or name', 1),
    );
  });
});

describe('mapOrder', () => {
  const products: ProductIndex = new Map([['COF-1', { productId: 1, variantId: 11, title: 'Coffee' }]]);

  it('maps money, statuses, tags and line items', () => {
    const mapped = mapOrder(
      {
        id: 7,
        customer_email: 'jane@example.test',
        status: 'Completed',
        fulfillment_status: 'shipped',
        total: '59.5',
        subtotal: 50,
        tax: '4.5',
        shipping: 5,
        subscription_id: 3,
        discount_amount: '10',
        items: [
          { product_name: 'Coffee', quantity: 2, price: '12.5', sku: 'COF-1', product_id: 900 },
          { product_name: 'Mug', sku: 'MUG-9', price: 8 },
        ],
      },
      7,
      555,
      products,
    );

    expect(mapped).toMatchObject({
      email: 'jane@example.test',
      financial_status: 'paid',
      fulfillment_status: 'shipped',
      tags: 'source-import,source-subscription',
      currency: 'USD',
      total_price: '59.50',
      subtotal_price: '50.00',
      total_tax: '4.50',
      total_shipping_price_set: { shop_money: { amount: '5.00', currency_code: 'USD' } },
      metafields: [{ namespace: 'source_migration', key: 'order_id', value: '7', type: 'single_line_text_field' }],
      customer: { id: 555 },
      discount_applications: [
        {
          type: 'discount_code',
          code: 'SOURCE_DISCOUNT',
          value: '10.00',
          value_type: 'fixed_amount',
          allocation_method: 'across',
        },
      ],
    });
    expect(mapped.line_items).toEqual([
      {
        title: 'Coffee',
        quantity: 2,
        price: '12.50',
        sku: 'COF-1',
        vendor: '',
        requires_shipping: true,
        taxable: true,
        properties: [{ name: 'Source Product ID', value: '900' }],
        product_id: 1,
        variant_id: 11,
      },
      {
        title: 'Mug',
        quantity: 1,
        price: '8.00',
        sku: 'MUG-9',
        vendor: '',
        requires_shipping: true,
        taxable: true,
        properties: [
          { name: 'Source Product ID', value: '' },
          { name: 'Migration Note', value: 'Original SKU MUG-9 - no matching target product found' },
        ],
      },
    ]);
    expect(mapped).not.toHaveProperty('shipping_address');
    expect(mapped).not.toHaveProperty('created_at');
  });

  it('tags plain orders with the import tag only and omits an empty customer', () => {
    const mapped = mapOrder({ items: [{ product_name: 'Tea' }] }, 8, null, new Map());
    expect(mapped.tags).toBe('source-import');
    expect(mapped).not.toHaveProperty('customer');
    expect(mapped).not.toHaveProperty('discount_applications');
  });

  it('refuses orders without line items', () => {
    expect(() => mapOrder({ items: [] }, 8, null, products)).toThrow('Order 8 has no line items');
  });
});

describe('buildSubscriptionSummary', () => {
  it('summarizes the customer and each staged subscription', () => {
    const summary = buildSubscriptionSummary(
      { subscription_status: 'active', total_revenue: '120', date_created: '2022-01-01T00:00:00Z' },
      42,
      [
        {
          naturalId: 5,
          payload: {
            status: 'active',
            frequency: 'monthly',
            total: '30',
            next_billing_date: '2024-02-01 00:00:00',
            billing_cycles_completed: 4,
          },
        },
      ],
      new Date('2024-01-15T00:00:00Z'),
    );

    expect(summary).toEqual({
      namespace: 'source_migration',
      key: 'subscription_summary',
      type: 'json',
      value: {
        migration_date: '2024-01-15T00:00:00.000Z',
        source: 'customer_record',
        subscription_data: {
          source_customer_id: 42,
          subscription_status: 'active',
          total_revenue: '120.00',
          currency: 'USD',
          customer_since: '2022-01-01T00:00:00Z',
          last_updated: null,
        },
        subscriptions: [
          {
            id: 5,
            status: 'active',
            frequency: 'monthly',
            created_at: null,
            next_billing_date: '2024-02-01T00:00:00+00:00',
            cancelled_at: null,
            total_value: '30.00',
            billing_cycles_completed: 4,
          },
        ],
      },
    });
  });
});

describe('eligibility', () => {
  it('lists every reason a customer qualifies', () => {
    expect(eligibilityReasons({ subscription_status: 'active', total_revenue: '10' }, 2)).toEqual([
      'has_orders',
      'subscription',
      'revenue',
    ]);
  });

  it('excludes customers with no orders, no subscription and no revenue', () => {
    expect(isMigrationEligible({ subscription_status: 'none', total_revenue: '0' }, 0)).toBe(false);
    expect(isMigrationEligible({ subscription_status: '' }, 0)).toBe(false);
    expect(isMigrationEligible({ total_revenue: 'abc' }, 1)).toBe(true);
  });
});

describe('product index', () => {
  it('links each SKU to the first variant that carries it', () => {
    const index = buildProductIndex([
      { id: 1, title: 'Coffee', variants: [{ id: 11, sku: ' COF-1 ', title: null, price: '9.00' }] },
      { id: 2, title: 'Coffee (dup)', variants: [{ id: 21, sku: 'COF-1', title: null, price: '9.00' }, { id: 22, sku: null, title: null, price: null }] },
    ]);

    expect([...index.entries()]).toEqual([['COF-1', { productId: 1, variantId: 11, title: 'Coffee' }]]);
  });

  it('falls back to an empty index when the catalog cannot be fetched', async () => {
    const target = new StubTargetClient();
    target.listAllProducts = async () => {
      throw new Error('403 Forbidden');
    };

    await expect(loadProductIndex(target)).resolves.toEqual(new Map());
  });
});
