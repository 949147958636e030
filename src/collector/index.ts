/**
 * TickScore — Collector module barrel export
 */

export type {
  ReportBatch,
  ReportSource,
  ServerEntry,
  ServerCatalog,
  PublicKeyResolver,
} from './types.js';
export { CollectorError, serverEntrySchema } from './types.js';

export type { CollectorClientOptions } from './client.js';
export { CollectorClient } from './client.js';

export { StaticKeyResolver, CatalogKeyResolver, staticResolverFromEnv } from './keys.js';
