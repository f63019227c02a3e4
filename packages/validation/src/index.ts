export {
  ProductIdSchema,
  ProductImageListSchema,
  ProductPriceSchema,
  ProductRecordObjectSchema,
  ProductTextSchema,
} from './catalog-record.js';
