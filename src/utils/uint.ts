import { z } from 'zod';

const UINT_PATTERN = /^\d+$/;

/**
 * Unsigned integer accepted from JSON: a decimal string of any length, or a
 * safe non-negative integer number. Always yields a bigint.
 */
export const uintSchema = z
  .union([
    z.string().regex(UINT_PATTERN, 'Must be an unsigned integer string'),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value));

export const marketIdSchema = z
  .string()
  .regex(UINT_PATTERN, 'Must be a market id')
  .transform(Number)
  .refine((id) => Number.isSafeInteger(id), 'Market id is out of range');

export type Serialized<T> = T extends bigint
  ? string
  : T extends Array<infer U>
    ? Serialized<U>[]
    : T extends object
      ? { [K in keyof T]: Serialized<T[K]> }
      : T;

// bigint -> decimal string, recursively
export function serialize<T>(value: T): Serialized<T>;
export function serialize(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map((item) => serialize(item));
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = serialize(item);
    }
    return out;
  }
  return value;
}
