import { z } from 'zod';

/**
 * Semi-structured documents as they arrive from the source API and sit in
 * staging. The worker only reads a handful of fields by name; everything
 * else is carried through untouched.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Payload = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const payloadSchema: z.ZodType<Payload> = z.record(jsonValueSchema);

export function isPayload(value: unknown): value is Payload {
  return payloadSchema.safeParse(value).success;
}

export function isPlainObject(value: JsonValue | undefined): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(payload: Payload, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/** Numbers or numeric strings ("12.50"), as money fields often arrive. */
export function readNumber(payload: Payload, key: string): number | null {
  const value = payload[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readObject(payload: Payload, key: string): Payload | null {
  const value = payload[key];
  return isPlainObject(value) ? value : null;
}

export function readArray(payload: Payload, key: string): JsonValue[] {
  const value = payload[key];
  return Array.isArray(value) ? value : [];
}

/** Serialized size in bytes, as reported for missing records in audits. */
export function payloadSize(value: JsonValue): number {
  return Buffer.byteLength(JSON.stringify(value), 'utf8');
}
