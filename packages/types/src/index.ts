export type {
  CatalogProduct,
  CatalogProductImage,
  JsonValue,
  StoredCatalogProduct,
} from './catalog.js';
