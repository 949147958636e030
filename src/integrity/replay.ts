/**
 * TickScore — Replay Guard
 *
 * Caller-owned replay memory. The verifier is pure; it reads a ReplayState
 * snapshot from here and the cycle records acceptance afterwards. Only
 * reports that were actually scored should be accepted. Snapshots are plain
 * JSON so accepted counters survive a validator restart.
 */

import { z } from 'zod';
import type { Report } from '../reports/types.js';
import type { ReplayState } from './types.js';

/** How long a seen nonce is remembered (24 hours) */
export const DEFAULT_NONCE_RETENTION_MS = 24 * 60 * 60 * 1000;

interface EntityReplayRecord {
  lastCounter: number;
  /** nonce → time it was accepted (ms) */
  nonces: Map<string, number>;
}

export interface ReplayGuardStats {
  entities: number;
  trackedNonces: number;
}

const snapshotSchema = z.object({
  version: z.literal(1),
  entities: z.array(
    z.object({
      entityId: z.string().min(1),
      lastCounter: z.number().int().nonnegative(),
      nonces: z.array(z.object({ nonce: z.string().min(1), acceptedAt: z.number() })),
    }),
  ),
});

export type ReplaySnapshot = z.infer<typeof snapshotSchema>;

export class ReplayGuard {
  private readonly records = new Map<string, EntityReplayRecord>();
  private readonly nonceRetentionMs: number;

  constructor(nonceRetentionMs: number = DEFAULT_NONCE_RETENTION_MS) {
    this.nonceRetentionMs = nonceRetentionMs;
  }

  /** Snapshot to hand to the verifier */
  stateFor(entityId: string): ReplayState {
    const record = this.records.get(entityId);
    if (!record) return { lastCounter: null };
    return {
      lastCounter: record.lastCounter,
      seenNonces: new Set(record.nonces.keys()),
    };
  }

  /**
   * Record an accepted report. Returns false (and records nothing) if the
   * counter does not advance, so a racing duplicate cannot regress state.
   */
  accept(report: Report, now: number = Date.now()): boolean {
    const record = this.records.get(report.entityId);
    if (record && report.counter <= record.lastCounter) return false;

    const nonces = record?.nonces ?? new Map<string, number>();
    if (report.nonce) nonces.set(report.nonce, now);
    this.records.set(report.entityId, { lastCounter: report.counter, nonces });
    return true;
  }

  /** Forget nonces older than the retention window. Returns how many were dropped. */
  prune(now: number = Date.now()): number {
    let dropped = 0;
    for (const record of this.records.values()) {
      for (const [nonce, acceptedAt] of record.nonces) {
        if (now - acceptedAt > this.nonceRetentionMs) {
          record.nonces.delete(nonce);
          dropped++;
        }
      }
    }
    return dropped;
  }

  forget(entityId: string): void {
    this.records.delete(entityId);
  }

  stats(): ReplayGuardStats {
    let trackedNonces = 0;
    for (const record of this.records.values()) trackedNonces += record.nonces.size;
    return { entities: this.records.size, trackedNonces };
  }

  // -----------------------------------------------------------------------
  // Persistence
  // -----------------------------------------------------------------------

  snapshot(): ReplaySnapshot {
    return {
      version: 1,
      entities: [...this.records].map(([entityId, record]) => ({
        entityId,
        lastCounter: record.lastCounter,
        nonces: [...record.nonces].map(([nonce, acceptedAt]) => ({ nonce, acceptedAt })),
      })),
    };
  }

  /**
   * Rebuild a guard from a snapshot. Throws when the data does not match
   * the snapshot format.
   */
  static fromSnapshot(data: unknown, nonceRetentionMs: number = DEFAULT_NONCE_RETENTION_MS): ReplayGuard {
    const parsed = snapshotSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new Error(`Invalid replay snapshot: ${issues.join('; ')}`);
    }
    const guard = new ReplayGuard(nonceRetentionMs);
    for (const entity of parsed.data.entities) {
      guard.records.set(entity.entityId, {
        lastCounter: entity.lastCounter,
        nonces: new Map(entity.nonces.map(({ nonce, acceptedAt }): [string, number] => [nonce, acceptedAt])),
      });
    }
    return guard;
  }
}
