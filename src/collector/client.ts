/**
 * TickScore — Collector HTTP Client
 *
 * Reads server reports and the server catalog from the Collector service.
 *
 * Endpoints:
 *   GET {base}/validators/servers/{id}/reports?limit=N   (bearer API key)
 *   GET {base}/servers                                   (public)
 *
 * Both answer `{ items: [...] }`; entries that are not objects are dropped.
 * Non-2xx responses and transport errors throw CollectorError, which the
 * scoring cycle catches per entity.
 */

import { parseReports } from '../reports/schema.js';
import type { ReportBatch, ReportSource, ServerCatalog, ServerEntry } from './types.js';
import { CollectorError, serverEntrySchema } from './types.js';

export interface CollectorClientOptions {
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout (ms) */
  timeoutMs?: number;
  /** Reports requested when the caller gives no limit */
  reportsLimitDefault?: number;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_REPORTS_LIMIT = 25;

export class CollectorClient implements ReportSource, ServerCatalog {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly reportsLimitDefault: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CollectorClientOptions) {
    const baseUrl = options.baseUrl.trim().replace(/\/+$/, '');
    if (!baseUrl) {
      throw new Error('Collector base URL is required (TICKSCORE_COLLECTOR_URL)');
    }
    const apiKey = options.apiKey.trim();
    if (!apiKey) {
      throw new Error('Collector API key is required (TICKSCORE_COLLECTOR_API_KEY)');
    }

    this.baseUrl = baseUrl;
    this.apiKey = apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.reportsLimitDefault = options.reportsLimitDefault ?? DEFAULT_REPORTS_LIMIT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Most recent reports for one server, most-recent-first.
   */
  async fetchReports(entityId: string, limit: number = this.reportsLimitDefault): Promise<ReportBatch> {
    if (!entityId) throw new CollectorError('Server id is required', 400);

    const query = new URLSearchParams({ limit: String(limit) });
    const url = `${this.baseUrl}/validators/servers/${encodeURIComponent(entityId)}/reports?${query}`;
    const items = await this.getItems(url, true, `reports server_id=${entityId}`);

    const batch = parseReports(items);
    if (batch.malformed.length > 0) {
      console.warn(`[collector] ${entityId}: dropped ${batch.malformed.length} malformed report(s)`);
    }
    return batch;
  }

  /**
   * Current server catalog. Entries without an id are skipped.
   */
  async listServers(): Promise<ServerEntry[]> {
    const items = await this.getItems(`${this.baseUrl}/servers`, false, 'servers');
    const servers: ServerEntry[] = [];
    for (const item of items) {
      const parsed = serverEntrySchema.safeParse(item);
      if (parsed.success) servers.push(parsed.data);
    }
    return servers;
  }

  // -----------------------------------------------------------------------
  // Transport
  // -----------------------------------------------------------------------

  private async getItems(url: string, authenticated: boolean, label: string): Promise<Record<string, unknown>[]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (authenticated) headers.Authorization = `Bearer ${this.apiKey}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new CollectorError(`collector ${label} error: ${msg}`, 0);
    }

    const body = await res.text();
    if (!res.ok) {
      throw new CollectorError(`collector ${label} status=${res.status} body=${body.slice(0, 200)}`, res.status);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new CollectorError(`collector ${label} returned non-JSON body`, res.status);
    }

    if (!isRecord(data) || !Array.isArray(data.items)) return [];
    return data.items.filter(isRecord);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
