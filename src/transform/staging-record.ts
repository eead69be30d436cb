import { isPayload, isPlainObject, type JsonValue, type Payload } from '../lib/payload.js';

export const ENTITY_KINDS = ['customer', 'order', 'subscription'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}

export interface StagingRecord {
  naturalId: number;
  ownerId: number | null;
  payload: Payload;
  fetchedAt: Date;
}

export class InvalidRecordError extends Error {
  constructor(
    message: string,
    public readonly kind: EntityKind,
    public readonly rawId: JsonValue | undefined,
  ) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

/**
 * Positive safe integers, either as JSON numbers or digit-only strings.
 * Anything else (floats, negatives, "12a") is not an identifier.
 */
export function parseNaturalId(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
  }
  return null;
}

export function extractNaturalId(payload: Payload): number | null {
  return parseNaturalId(payload.id);
}

/**
 * Orders and subscriptions point at their customer through `customer_id`,
 * or through an embedded `customer` object when the API expands it.
 */
export function extractOwnerId(kind: EntityKind, payload: Payload): number | null {
  if (kind === 'customer') return null;

  const direct = parseNaturalId(payload.customer_id);
  if (direct !== null) return direct;

  const embedded = payload.customer;
  if (isPlainObject(embedded)) {
    return parseNaturalId(embedded.id);
  }
  return null;
}

export function decodeStagingRecord(
  kind: EntityKind,
  raw: unknown,
  fetchedAt: Date = new Date(),
): StagingRecord {
  if (!isPayload(raw)) {
    throw new InvalidRecordError(`Invalid ${kind}: payload is not a JSON object`, kind, undefined);
  }

  const naturalId = extractNaturalId(raw);
  if (naturalId === null) {
    throw new InvalidRecordError(`Invalid ${kind}: missing or malformed id`, kind, raw.id);
  }

  return {
    naturalId,
    ownerId: extractOwnerId(kind, raw),
    payload: raw,
    fetchedAt,
  };
}
