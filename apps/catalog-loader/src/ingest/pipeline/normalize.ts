import type { CatalogProduct, JsonValue } from '@app/types';
import {
  ProductIdSchema,
  ProductImageListSchema,
  ProductPriceSchema,
  ProductRecordObjectSchema,
  ProductTextSchema,
} from '@app/validation';

import { MalformedRecord, type MalformedRecordReason } from '../errors.js';

export type RecordLocation = Readonly<{
  sourceFile: string;
  index: number;
  line: number | null;
}>;

export type NormalizeResult =
  | Readonly<{ ok: true; product: CatalogProduct }>
  | Readonly<{ ok: false; error: MalformedRecord }>;

/**
 * Turns one raw JSON record into a catalog row. Pure: the same input always
 * yields the same result.
 *
 * Only `id` and `price` can reject a record. Text fields and images are
 * best-effort.
 */
export function normalizeProductRecord(raw: unknown, location: RecordLocation): NormalizeResult {
  const reject = (reason: MalformedRecordReason, detail: string): NormalizeResult => ({
    ok: false,
    error: new MalformedRecord({
      file: location.sourceFile,
      index: location.index,
      line: location.line,
      reason,
      detail,
    }),
  });

  const object = ProductRecordObjectSchema.safeParse(raw);
  if (!object.success) {
    return reject('not_an_object', `expected a JSON object, got ${describeJsonType(raw)}`);
  }
  const record = object.data;

  const rawId = record['id'];
  if (rawId === undefined || rawId === null) {
    return reject('missing_id', "missing 'id'");
  }
  const id = ProductIdSchema.safeParse(rawId);
  if (!id.success) {
    return reject('invalid_id', `invalid 'id' ${preview(rawId)}`);
  }

  let price: string | null = null;
  const rawPrice = record['price'];
  if (rawPrice !== undefined && rawPrice !== null) {
    const parsed = ProductPriceSchema.safeParse(rawPrice);
    if (!parsed.success) {
      const negative = parsed.error.issues.some((issue) => issue.code === 'custom');
      return negative
        ? reject('negative_price', `negative 'price' ${preview(rawPrice)}`)
        : reject('invalid_price', `invalid 'price' ${preview(rawPrice)}`);
    }
    price = parsed.data;
  }

  const rawImages = record['images'];

  return {
    ok: true,
    product: {
      id: id.data,
      name: ProductTextSchema.parse(record['name']),
      urlKey: ProductTextSchema.parse(record['url_key']),
      price,
      description: ProductTextSchema.parse(record['description']),
      images: ProductImageListSchema.parse(rawImages),
      imagesDocument: rawImages === undefined ? [] : toJsonValue(rawImages),
      sourceFile: location.sourceFile,
    },
  };
}

/** Values here come from JSON.parse; this only recovers the static type. */
function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJsonValue(item);
    }
    return out;
  }
  return null;
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function preview(value: unknown): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > 40 ? `${text.slice(0, 37)}...` : text;
}
