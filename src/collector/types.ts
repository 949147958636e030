/**
 * TickScore — Collector Types
 *
 * Contracts for the services the engine consumes but does not implement:
 * where reports come from and which key each server signs with.
 */

import { z } from 'zod';
import type { Report } from '../reports/types.js';
import type { MalformedReport } from '../reports/schema.js';

// ---------------------------------------------------------------------------
// Report source
// ---------------------------------------------------------------------------

export interface ReportBatch {
  /** Parsed reports, most-recent-first, as the source returned them */
  reports: Report[];
  /** Items that failed to parse */
  malformed: MalformedReport[];
}

export interface ReportSource {
  /** At most `limit` most recent reports for one entity, never reordered */
  fetchReports(entityId: string, limit?: number): Promise<ReportBatch>;
}

// ---------------------------------------------------------------------------
// Server catalog
// ---------------------------------------------------------------------------

export const serverEntrySchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    hotkey: z.string().nullish(),
    public_key: z.string().nullish(),
    host: z.string().nullish(),
    port: z.number().int().nullish(),
    status: z.string().nullish(),
    registered_at: z.string().nullish(),
  })
  .passthrough();

export type ServerEntry = z.infer<typeof serverEntrySchema>;

export interface ServerCatalog {
  listServers(): Promise<ServerEntry[]>;
}

// ---------------------------------------------------------------------------
// Public keys
// ---------------------------------------------------------------------------

/**
 * Maps an entity to its current signing key. Rotation is the resolver's
 * business; the verifier always trusts the latest answer.
 */
export interface PublicKeyResolver {
  resolve(entityId: string): Promise<string | null>;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class CollectorError extends Error {
  /** HTTP status, or 0 for transport failures */
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'CollectorError';
    this.status = status;
  }
}
