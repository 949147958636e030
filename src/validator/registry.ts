/**
 * TickScore — Score Registry
 *
 * The caller-owned store of published scores. The engine never holds state
 * between cycles; the scoring cycle reads the previous score from here and
 * writes the new one back. Snapshots are plain JSON so a validator can
 * persist across restarts.
 */

import { z } from 'zod';
import type { Classification, PenaltyKind, StoredScore } from '../scoring/types.js';
import { classifyScore } from '../scoring/types.js';
import type { WeightEntry } from '../ledger/weights.js';

export type ZeroReason = 'no_reports' | 'reports_stale';

export interface ScoreRecord extends StoredScore {
  entityId: string;
  classification: Classification;
  penalty: PenaltyKind | null;
  /** Set when the score was forced to zero without scoring a report */
  zeroReason: ZeroReason | null;
  /** Report the score was computed from */
  reportId: string | null;
}

export interface RegistryStats {
  entities: number;
  byClassification: Record<Classification, number>;
  meanScore: number;
  penalized: number;
  lastUpdatedAt: number | null;
}

const scoreRecordSchema = z.object({
  entityId: z.string().min(1),
  score: z.number().int().nonnegative(),
  rawScore: z.number().int().nonnegative(),
  updatedAt: z.number(),
  classification: z.enum(['Excellent', 'Good', 'Average', 'Poor']),
  penalty: z
    .enum(['ComplianceFailure', 'IntegrityFailure', 'ClockDrift', 'SignatureFailure', 'MissingHistory'])
    .nullable(),
  zeroReason: z.enum(['no_reports', 'reports_stale']).nullable(),
  reportId: z.string().nullable(),
});

const snapshotSchema = z.object({
  version: z.literal(1),
  records: z.array(scoreRecordSchema),
});

export type RegistrySnapshot = z.infer<typeof snapshotSchema>;

export class ScoreRegistry {
  private readonly records = new Map<string, ScoreRecord>();

  get(entityId: string): ScoreRecord | undefined {
    return this.records.get(entityId);
  }

  /** Previous published score, undefined on first sight */
  previousScore(entityId: string): number | undefined {
    return this.records.get(entityId)?.score;
  }

  set(record: ScoreRecord): void {
    this.records.set(record.entityId, record);
  }

  /** Force an entity to zero without a scored report */
  zero(entityId: string, reason: ZeroReason, now: number, maxScore: number): ScoreRecord {
    const record: ScoreRecord = {
      entityId,
      score: 0,
      rawScore: 0,
      updatedAt: now,
      classification: classifyScore(0, maxScore),
      penalty: null,
      zeroReason: reason,
      reportId: null,
    };
    this.records.set(entityId, record);
    return record;
  }

  delete(entityId: string): boolean {
    return this.records.delete(entityId);
  }

  /** Drop every entity not in `entityIds`; returns the dropped ids */
  retain(entityIds: Iterable<string>): string[] {
    const keep = new Set(entityIds);
    const dropped: string[] = [];
    for (const entityId of this.records.keys()) {
      if (!keep.has(entityId)) dropped.push(entityId);
    }
    for (const entityId of dropped) this.records.delete(entityId);
    return dropped;
  }

  get size(): number {
    return this.records.size;
  }

  /** All records, highest score first */
  list(): ScoreRecord[] {
    return [...this.records.values()].sort(
      (a, b) => b.score - a.score || a.entityId.localeCompare(b.entityId),
    );
  }

  /** score / maxScore for every entity, for the weight publisher */
  weights(maxScore: number): WeightEntry[] {
    return [...this.records.values()].map((r) => ({
      entityId: r.entityId,
      weight: Math.max(0, Math.min(1, r.score / maxScore)),
    }));
  }

  stats(): RegistryStats {
    const byClassification: Record<Classification, number> = {
      Excellent: 0,
      Good: 0,
      Average: 0,
      Poor: 0,
    };
    let total = 0;
    let penalized = 0;
    let lastUpdatedAt: number | null = null;

    for (const r of this.records.values()) {
      byClassification[r.classification]++;
      total += r.score;
      if (r.penalty) penalized++;
      if (lastUpdatedAt === null || r.updatedAt > lastUpdatedAt) lastUpdatedAt = r.updatedAt;
    }

    const entities = this.records.size;
    return {
      entities,
      byClassification,
      meanScore: entities === 0 ? 0 : Math.round((total / entities) * 100) / 100,
      penalized,
      lastUpdatedAt,
    };
  }

  // -----------------------------------------------------------------------
  // Persistence
  // -----------------------------------------------------------------------

  snapshot(): RegistrySnapshot {
    return { version: 1, records: this.list() };
  }

  /**
   * Rebuild a registry from a snapshot. Throws when the data does not
   * match the snapshot format.
   */
  static fromSnapshot(data: unknown): ScoreRegistry {
    const parsed = snapshotSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new Error(`Invalid score registry snapshot: ${issues.join('; ')}`);
    }
    const registry = new ScoreRegistry();
    for (const record of parsed.data.records) registry.set(record);
    return registry;
  }
}
