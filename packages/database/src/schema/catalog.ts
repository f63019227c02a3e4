/**
 * Catalog tables: tiki_products & tiki_product_images
 *
 * Created with IF NOT EXISTS on every run; there are no migrations. The image
 * table is only created when image normalization is enabled.
 */

const PRODUCTS_TABLE = 'tiki_products';
const PRODUCT_IMAGES_TABLE = 'tiki_product_images';

export const DDL_PRODUCTS = `
CREATE TABLE IF NOT EXISTS ${PRODUCTS_TABLE} (
    id           BIGINT PRIMARY KEY,
    name         TEXT,
    url_key      TEXT,
    price        NUMERIC,
    description  TEXT,
    images       JSONB,
    source_file  TEXT,
    ingested_at  TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_${PRODUCTS_TABLE}_price ON ${PRODUCTS_TABLE}(price);
CREATE INDEX IF NOT EXISTS idx_${PRODUCTS_TABLE}_url_key ON ${PRODUCTS_TABLE}(url_key);
`;

export const DDL_PRODUCT_IMAGES = `
CREATE TABLE IF NOT EXISTS ${PRODUCT_IMAGES_TABLE} (
    product_id   BIGINT NOT NULL REFERENCES ${PRODUCTS_TABLE}(id) ON DELETE CASCADE,
    position     INT NOT NULL,
    image_url    TEXT NOT NULL,
    PRIMARY KEY (product_id, position)
);

CREATE INDEX IF NOT EXISTS idx_${PRODUCT_IMAGES_TABLE}_url ON ${PRODUCT_IMAGES_TABLE}(image_url);
`;

// Column arrays go through unnest() so the parameter count stays at 8
// regardless of batch size.
export const UPSERT_PRODUCTS_SQL = `
INSERT INTO ${PRODUCTS_TABLE} (id, name, url_key, price, description, images, source_file, ingested_at)
SELECT u.id, u.name, u.url_key, u.price, u.description, u.images, u.source_file, $8::timestamptz
FROM unnest(
    $1::bigint[],
    $2::text[],
    $3::text[],
    $4::numeric[],
    $5::text[],
    $6::jsonb[],
    $7::text[]
) AS u(id, name, url_key, price, description, images, source_file)
ON CONFLICT (id) DO UPDATE SET
    name        = EXCLUDED.name,
    url_key     = EXCLUDED.url_key,
    price       = EXCLUDED.price,
    description = EXCLUDED.description,
    images      = EXCLUDED.images,
    source_file = EXCLUDED.source_file,
    ingested_at = EXCLUDED.ingested_at
`;

export const DELETE_PRODUCT_IMAGES_SQL = `DELETE FROM ${PRODUCT_IMAGES_TABLE} WHERE product_id = ANY($1::bigint[])`;

export const INSERT_PRODUCT_IMAGES_SQL = `
INSERT INTO ${PRODUCT_IMAGES_TABLE} (product_id, position, image_url)
SELECT u.product_id, u.position, u.image_url
FROM unnest($1::bigint[], $2::int[], $3::text[]) AS u(product_id, position, image_url)
ON CONFLICT (product_id, position) DO UPDATE SET
    image_url = EXCLUDED.image_url
`;
