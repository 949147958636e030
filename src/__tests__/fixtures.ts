/**
 * Shared builders for synthetic server reports.
 */

import type { ReportSigner } from '../integrity/keys.js';
import { parseReport } from '../reports/schema.js';
import type { Report, WirePayload, WireReport } from '../reports/types.js';

export const T0 = 1_750_000_000_000;
export const GIB = 1024 ** 3;
export const MINUTE = 60_000;
export const HOUR = 3_600_000;

export interface ReportOptions {
  id?: string;
  entityId?: string;
  counter?: number;
  nonce?: string;
  createdAt?: number;
  tpsMillis?: number;
  maxPlayers?: number;
  players?: number;
  plugins?: string[];
  uptimeMs?: number;
  freeBytes?: number;
  totalBytes?: number;
}

export function wirePayload(opts: ReportOptions = {}): WirePayload {
  const total = opts.totalBytes ?? 8 * GIB;
  const free = opts.freeBytes ?? 6 * GIB;
  return {
    active_players: Array.from({ length: opts.players ?? 40 }, (_, i) => `player${i}`),
    max_players: opts.maxPlayers ?? 100,
    tps_millis: opts.tpsMillis ?? 50,
    memory_ram_info: {
      free_memory_bytes: free,
      used_memory_bytes: total - free,
      total_memory_bytes: total,
    },
    plugins: opts.plugins ?? ['Level114', 'EssentialsX'],
    system_info: {
      cpu_cores: 4,
      java_version: '21',
      uptime_ms: opts.uptimeMs ?? 48 * HOUR,
    },
  };
}

export function wireReport(opts: ReportOptions = {}): WireReport {
  const counter = opts.counter ?? 1;
  return {
    id: opts.id ?? `report-${counter}`,
    server_id: opts.entityId ?? 'server-1',
    counter,
    nonce: opts.nonce ?? `nonce-${counter}`,
    client_timestamp_ms: opts.createdAt ?? T0,
    payload: wirePayload(opts),
  };
}

/** Parse a wire report, failing the test on a schema error */
export function toReport(wire: unknown): Report {
  const parsed = parseReport(wire);
  if (!parsed.ok) {
    throw new Error(`fixture did not parse: ${parsed.error.issues.join('; ')}`);
  }
  return parsed.report;
}

export function signedReport(signer: ReportSigner, opts: ReportOptions = {}): Report {
  return toReport(signer.signReport(wireReport(opts)));
}

/**
 * `count` signed reports five minutes apart ending at `endAt`, with uptime
 * growing in step. Returned most-recent-first, as the Collector sends them.
 */
export function signedSeries(
  signer: ReportSigner,
  count: number,
  endAt: number = T0,
  opts: (index: number) => ReportOptions = () => ({}),
): Report[] {
  const reports: Report[] = [];
  for (let i = 0; i < count; i++) {
    const createdAt = endAt - (count - 1 - i) * 5 * MINUTE;
    reports.push(signedReport(signer, {
      id: `report-${i + 1}`,
      counter: i + 1,
      createdAt,
      uptimeMs: 48 * HOUR + i * 5 * MINUTE,
      ...opts(i),
    }));
  }
  return reports.reverse();
}
