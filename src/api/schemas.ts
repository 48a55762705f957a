/**
 * Wire shapes of benchmark API responses.
 *
 * Responses are validated loosely: unknown fields pass through untouched so
 * the executor sees what the server sent.
 */

import { z } from 'zod';

const Cursor = z.number().int().nullable().optional();

export const ProductSchema = z
  .object({
    sku: z.union([z.string(), z.number()]),
    name: z.string(),
    price: z.number(),
    available: z.number().int().optional(),
  })
  .passthrough();

export const ProductPageSchema = z
  .object({
    products: z.array(ProductSchema).nullable().optional(),
    items: z.array(ProductSchema).nullable().optional(),
    next_offset: Cursor,
  })
  .passthrough();

export const BasketSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            sku: z.union([z.string(), z.number()]),
            quantity: z.number(),
          })
          .passthrough()
      )
      .nullable()
      .optional(),
    subtotal: z.number().nullable().optional(),
    total: z.number().nullable().optional(),
    discount: z.number().nullable().optional(),
    coupon: z.string().nullable().optional(),
  })
  .passthrough();

export type Product = z.infer<typeof ProductSchema>;
export type Basket = z.infer<typeof BasketSchema>;

export const RecordSchema = z.record(z.unknown());

/**
 * Read `key` of a response object as a record, or null when absent.
 */
export function pickRecord(body: unknown, key: string): Record<string, unknown> | null {
  const parsed = z.object({ [key]: RecordSchema.nullable().optional() }).passthrough().safeParse(body);
  if (!parsed.success) return null;
  const value = parsed.data[key];
  return value ?? null;
}

/**
 * Read `key` of a response object as a list of records (missing → []).
 */
export function pickRecords(body: unknown, key: string): Array<Record<string, unknown>> {
  const parsed = z
    .object({ [key]: z.array(RecordSchema).nullable().optional() })
    .passthrough()
    .safeParse(body);
  if (!parsed.success) return [];
  return parsed.data[key] ?? [];
}

export function pickNextOffset(body: unknown): number | null {
  const parsed = z.object({ next_offset: Cursor }).passthrough().safeParse(body);
  if (!parsed.success) return null;
  return parsed.data.next_offset ?? null;
}

export function asRecord(body: unknown): Record<string, unknown> {
  const parsed = RecordSchema.safeParse(body);
  return parsed.success ? parsed.data : { value: body };
}
