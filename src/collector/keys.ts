/**
 * TickScore — Public Key Resolvers
 *
 *   StaticKeyResolver  — fixed entity → key map (config, tests, preview)
 *   CatalogKeyResolver — keys published in the Collector's server catalog,
 *                        refreshed after a TTL
 */

import type { PublicKeyResolver, ServerCatalog } from './types.js';

export class StaticKeyResolver implements PublicKeyResolver {
  private readonly keys: Map<string, string>;

  constructor(keys: Iterable<readonly [string, string]> | Record<string, string> = {}) {
    this.keys = new Map(isIterable(keys) ? keys : Object.entries(keys));
  }

  set(entityId: string, publicKey: string): void {
    this.keys.set(entityId, publicKey);
  }

  async resolve(entityId: string): Promise<string | null> {
    return this.keys.get(entityId) ?? null;
  }
}

/**
 * Parse "id=key,id2=key2" into a resolver. Blank entries are skipped.
 */
export function staticResolverFromEnv(value: string | undefined): StaticKeyResolver {
  const entries: Array<[string, string]> = [];
  for (const pair of (value ?? '').split(',')) {
    const [id, key] = pair.split('=').map((s) => s.trim());
    if (id && key) entries.push([id, key]);
  }
  return new StaticKeyResolver(entries);
}

const DEFAULT_CATALOG_TTL_MS = 5 * 60_000;

export class CatalogKeyResolver implements PublicKeyResolver {
  private keys = new Map<string, string>();
  private fetchedAt: number | null = null;
  private refreshing: Promise<void> | null = null;

  constructor(
    private readonly catalog: ServerCatalog,
    private readonly ttlMs: number = DEFAULT_CATALOG_TTL_MS,
    private readonly clock: () => number = Date.now,
  ) {}

  async resolve(entityId: string): Promise<string | null> {
    if (this.fetchedAt === null || this.clock() - this.fetchedAt > this.ttlMs) {
      await this.refresh();
    }
    return this.keys.get(entityId) ?? null;
  }

  /** Reload the catalog; concurrent callers share one request */
  async refresh(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.load().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async load(): Promise<void> {
    const servers = await this.catalog.listServers();
    const keys = new Map<string, string>();
    for (const server of servers) {
      if (server.public_key) keys.set(server.id, server.public_key);
    }
    this.keys = keys;
    this.fetchedAt = this.clock();
    console.log(`[collector] Loaded ${keys.size} public key(s) from server catalog`);
  }
}

function isIterable(
  value: Iterable<readonly [string, string]> | Record<string, string>,
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
