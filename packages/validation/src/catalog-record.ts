import { z } from 'zod';

const INTEGER_STRING = /^[+-]?\d+$/;
const DECIMAL_STRING = /^[+-]?\d+(\.\d+)?$/;

/** A JSON object, as opposed to an array, scalar or null. */
export const ProductRecordObjectSchema = z.record(z.string(), z.unknown());

/**
 * Product id: a safe integer, or a string holding one. Fractional numbers and
 * booleans are refused rather than truncated.
 */
export const ProductIdSchema = z.union([
  z.number().int('id must be an integer').refine(Number.isSafeInteger, 'id out of range'),
  z
    .string()
    .trim()
    .regex(INTEGER_STRING, 'id must be an integer')
    .transform(Number)
    .refine(Number.isSafeInteger, 'id out of range'),
]);

/**
 * Price as a decimal string. Numbers are stringified, decimal strings are kept
 * as written so NUMERIC receives the source precision.
 */
export const ProductPriceSchema = z
  .union([
    z
      .number()
      .finite('price must be finite')
      .transform((n) => String(n)),
    z.string().trim().regex(DECIMAL_STRING, 'price must be a decimal number'),
  ])
  .refine((value) => !(Number(value) < 0), { message: 'price must not be negative' });

/** Best-effort text: strings verbatim, numbers and booleans stringified, anything else null. */
export const ProductTextSchema = z
  .union([
    z.string(),
    z.number().transform((n) => String(n)),
    z.boolean().transform((b) => String(b)),
  ])
  .nullable()
  .catch(null);

/** Keeps the non-empty string entries of an array, in order; a non-array yields []. */
export const ProductImageListSchema = z
  .array(z.unknown())
  .transform((entries) =>
    entries.filter((entry): entry is string => typeof entry === 'string' && entry.trim() !== '')
  )
  .catch([]);
