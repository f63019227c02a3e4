export { createLogger } from './schema.js';
export type { Logger } from './schema.js';

export { withSpan } from './otel-correlation.js';

export { OTEL_ATTR } from './otel-attributes.js';
