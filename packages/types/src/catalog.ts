/**
 * Catalog row shapes shared by the loader and the database package.
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/** One normalized product, ready to be upserted into `tiki_products`. */
export type CatalogProduct = Readonly<{
  id: number;
  name: string | null;
  urlKey: string | null;
  /** Decimal string, passed to NUMERIC untouched. */
  price: string | null;
  description: string | null;
  /** Coerced image URLs, in source order. Feeds `tiki_product_images`. */
  images: readonly string[];
  /** The record's `images` value as found in the source; stored as JSONB. */
  imagesDocument: JsonValue;
  /** Base name of the file the record came from. */
  sourceFile: string;
}>;

/** One row of `tiki_product_images`. */
export type CatalogProductImage = Readonly<{
  productId: number;
  position: number;
  imageUrl: string;
}>;

/** A product row as stored, including the processing timestamp. */
export type StoredCatalogProduct = CatalogProduct & Readonly<{ ingestedAt: Date }>;
