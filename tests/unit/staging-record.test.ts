import { lookupInChunks } from '../../src/lib/chunked-lookup.js';
import { payloadSize, readNumber, readString } from '../../src/lib/payload.js';
import {
  decodeStagingRecord,
  extractOwnerId,
  InvalidRecordError,
  isEntityKind,
  parseNaturalId,
} from '../../src/transform/staging-record.js';

describe('decodeStagingRecord', () => {
  const fetchedAt = new Date('2024-03-01T12:00:00Z');

  it('keys customers by id with no owner', () => {
    expect(decodeStagingRecord('customer', { id: 42, email: 'a@example.test' }, fetchedAt)).toEqual({
      naturalId: 42,
      ownerId: null,
      payload: { id: 42, email: 'a@example.test' },
      fetchedAt,
    });
  });

  it('reads the owner of orders from customer_id or the embedded customer', () => {
    expect(decodeStagingRecord('order', { id: '7', customer_id: '42' }, fetchedAt).ownerId).toBe(42);
    expect(decodeStagingRecord('subscription', { id: 8, customer: { id: 43 } }, fetchedAt).ownerId).toBe(43);
    expect(decodeStagingRecord('order', { id: 9 }, fetchedAt).ownerId).toBeNull();
  });

  it('accepts digit strings as ids', () => {
    expect(decodeStagingRecord('order', { id: '1001' }, fetchedAt).naturalId).toBe(1001);
  });

  it('rejects payloads that are not objects', () => {
    expect(() => decodeStagingRecord('order', [1, 2], fetchedAt)).toThrow(
      new InvalidRecordError('Invalid order: payload is not a JSON object', 'order', undefined),
    );
    expect(() => decodeStagingRecord('order', null, fetchedAt)).toThrow(InvalidRecordError);
  });

  it('rejects missing or malformed ids', () => {
    for (const raw of [{}, { id: null }, { id: -3 }, { id: 1.5 }, { id: '12a' }, { id: 0 }]) {
      expect(() => decodeStagingRecord('customer', raw, fetchedAt)).toThrow('Invalid customer: missing or malformed id');
    }
  });
});

describe('parseNaturalId', () => {
  it('rejects ids beyond the safe integer range', () => {
    expect(parseNaturalId('9007199254740993')).toBeNull();
    expect(parseNaturalId(Number.MAX_SAFE_INTEGER)).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe('extractOwnerId', () => {
  it('never assigns an owner to customers', () => {
    expect(extractOwnerId('customer', { id: 1, customer_id: 2 })).toBeNull();
  });
});

describe('isEntityKind', () => {
  it('accepts only the three staged kinds', () => {
    expect(['customer', 'order', 'subscription', 'product'].filter(isEntityKind)).toEqual([
      'customer',
      'order',
      'subscription',
    ]);
  });
});

describe('payload readers', () => {
  it('reads money fields given as strings', () => {
    expect(readNumber({ total: '12.50' }, 'total')).toBe(12.5);
    expect(readNumber({ total: 'n/a' }, 'total')).toBeNull();
    expect(readNumber({ total: '  ' }, 'total')).toBeNull();
  });

  it('treats empty strings as absent', () => {
    expect(readString({ email: '' }, 'email')).toBeNull();
    expect(readString({ email: 'a@example.test' }, 'email')).toBe('a@example.test');
  });

  it('measures serialized size in bytes', () => {
    expect(payloadSize({ id: 1 })).toBe(8);
    expect(payloadSize({ name: 'é' })).toBe(13);
  });
});

describe('lookupInChunks', () => {
  it('unions chunked results into one sorted, de-duplicated list', async () => {
    const chunks: number[][] = [];
    const present = new Set([2, 5, 9, 11]);

    const found = await lookupInChunks([11, 2, 3, 5, 9, 2, 11, 20], 3, async (chunk) => {
      chunks.push(chunk);
      return chunk.filter((id) => present.has(id));
    });

    expect(found).toEqual([2, 5, 9, 11]);
    expect(chunks).toEqual([
      [11, 2, 3],
      [5, 9, 20],
    ]);
  });

  it('makes no calls for an empty input', async () => {
    const fetchChunk = jest.fn(async (chunk: number[]) => chunk);
    await expect(lookupInChunks([], 10, fetchChunk)).resolves.toEqual([]);
    expect(fetchChunk).not.toHaveBeenCalled();
  });

  it('rejects non-positive chunk sizes', async () => {
    await expect(lookupInChunks([1], 0, async () => [])).rejects.toThrow(RangeError);
  });
});
