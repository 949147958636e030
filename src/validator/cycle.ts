/**
 * TickScore — Scoring Cycle
 *
 * One pass over a set of entities:
 *   1. Fetch recent reports from the Collector
 *   2. Drop stale reports (older than the configured max age)
 *   3. Zero entities with no reports or only stale ones
 *   4. Verify and score the latest report against the rest
 *   5. Record acceptance, store the score, emit events
 *   6. Forget entities that are no longer in the catalog
 *   7. Publish the weight of every entity still listed
 *
 * Entities are processed concurrently. A failure for one entity is logged
 * and never stops the others.
 */

import type { Report } from '../reports/types.js';
import { HistoryWindow } from '../reports/history.js';
import type { ReplayGuard } from '../integrity/replay.js';
import type { ScoringConfig } from '../scoring/config.js';
import type { Classification, PenaltyKind } from '../scoring/types.js';
import type { RejectionReason } from '../integrity/types.js';
import { evaluateReport } from '../scoring/engine.js';
import type { PublicKeyResolver, ReportSource } from '../collector/types.js';
import type { PublishResult, WeightPublisher } from '../ledger/weights.js';
import type { TickScoreEmitter } from '../events/emitter.js';
import type { ScoreRegistry, ZeroReason } from './registry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EntityOutcome =
  | {
      entityId: string;
      status: 'scored';
      score: number;
      previousScore: number | null;
      classification: Classification;
      penalty: PenaltyKind | null;
    }
  | { entityId: string; status: 'rejected'; reason: RejectionReason; score: number | null }
  | { entityId: string; status: 'zeroed'; reason: ZeroReason }
  | { entityId: string; status: 'skipped' }
  | { entityId: string; status: 'failed'; error: string };

export interface CycleSummary {
  cycle: number;
  entities: number;
  scored: number;
  rejected: number;
  zeroed: number;
  skipped: number;
  failed: number;
  durationMs: number;
  outcomes: EntityOutcome[];
  publish: PublishResult | null;
}

export interface ScoringCycleDeps {
  source: ReportSource;
  keys: PublicKeyResolver;
  registry: ScoreRegistry;
  replay: ReplayGuard;
  config: ScoringConfig;
  publisher?: WeightPublisher;
  emitter?: TickScoreEmitter;
  /** Measured latency to the entity (seconds); 0 when not measured */
  measureLatency?: (entityId: string) => Promise<number>;
  /** Whether the entity is currently registered; true when not tracked */
  isRegistered?: (entityId: string) => boolean;
  clock?: () => number;
}

// ---------------------------------------------------------------------------
// Cycle
// ---------------------------------------------------------------------------

export class ScoringCycle {
  private readonly deps: ScoringCycleDeps;
  private readonly clock: () => number;
  private cycleCount = 0;
  private running = false;

  constructor(deps: ScoringCycleDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
  }

  get cycles(): number {
    return this.cycleCount;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Score every entity once and publish weights. `entityIds` is the full
   * current catalog: stored scores for anything else are dropped. Overlapping
   * calls are refused rather than queued.
   */
  async run(entityIds: readonly string[]): Promise<CycleSummary> {
    if (this.running) {
      throw new Error('Scoring cycle already in progress');
    }
    this.running = true;
    const startedAt = this.clock();
    const cycle = ++this.cycleCount;

    try {
      const unique = [...new Set(entityIds)];
      const settled = await Promise.allSettled(unique.map((id) => this.scoreEntity(id)));

      const outcomes: EntityOutcome[] = settled.map((result, i) => {
        if (result.status === 'fulfilled') return result.value;
        const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.error(`[cycle] ${unique[i]}: ${error}`);
        return { entityId: unique[i], status: 'failed', error };
      });

      const departed = this.deps.registry.retain(unique);
      for (const entityId of departed) this.deps.replay.forget(entityId);
      if (departed.length > 0) {
        console.log(`[cycle] Dropped ${departed.length} server(s) no longer listed: ${departed.join(', ')}`);
      }

      const publish = await this.publishWeights();
      this.deps.replay.prune(this.clock());

      const count = (status: EntityOutcome['status']): number =>
        outcomes.filter((o) => o.status === status).length;

      const summary: CycleSummary = {
        cycle,
        entities: unique.length,
        scored: count('scored'),
        rejected: count('rejected'),
        zeroed: count('zeroed'),
        skipped: count('skipped'),
        failed: count('failed'),
        durationMs: this.clock() - startedAt,
        outcomes,
        publish,
      };

      console.log(
        `[cycle] #${cycle}: ${summary.entities} entities — ${summary.scored} scored, ` +
        `${summary.rejected} rejected, ${summary.zeroed} zeroed, ${summary.failed} failed ` +
        `(${summary.durationMs}ms)`,
      );

      this.deps.emitter?.emitEvent('cycle:completed', {
        type: 'cycle:completed',
        payload: {
          cycle,
          entities: summary.entities,
          scored: summary.scored,
          rejected: summary.rejected,
          zeroed: summary.zeroed,
          failed: summary.failed,
          durationMs: summary.durationMs,
        },
      });

      return summary;
    } finally {
      this.running = false;
    }
  }

  /**
   * Fetch, verify, score and store one entity.
   */
  async scoreEntity(entityId: string): Promise<EntityOutcome> {
    const { source, keys, registry, replay, config } = this.deps;

    const batch = await source.fetchReports(entityId, config.maxHistory);
    const now = this.clock();
    const previous = registry.get(entityId);

    if (batch.reports.length === 0) {
      if (previous && previous.score > 0) return this.zero(entityId, 'no_reports', now);
      return { entityId, status: 'skipped' };
    }

    const fresh = filterFreshReports(batch.reports, now, config.integrity.reportMaxAgeSeconds * 1000);
    if (fresh.length === 0) {
      console.warn(`[cycle] ${entityId}: all ${batch.reports.length} report(s) stale`);
      return this.zero(entityId, 'reports_stale', now);
    }

    const latest = fresh[0];
    const history = HistoryWindow.from(fresh, config.maxHistory);
    const [publicKey, latencySeconds] = await Promise.all([
      keys.resolve(entityId),
      this.deps.measureLatency ? this.deps.measureLatency(entityId) : Promise.resolve(0),
    ]);

    const outcome = evaluateReport(
      {
        report: latest,
        publicKey,
        history,
        replay: replay.stateFor(entityId),
        previousScore: previous?.score,
        latencySeconds,
        registrationValid: this.deps.isRegistered ? this.deps.isRegistered(entityId) : true,
        now,
      },
      config,
    );

    if (outcome.status === 'rejected') {
      this.deps.emitter?.emitEvent('score:rejected', {
        type: 'score:rejected',
        payload: { entityId, reportId: latest.id, reason: outcome.reason, timestamp: now },
      });
      return { entityId, status: 'rejected', reason: outcome.reason, score: outcome.score ?? null };
    }

    if (outcome.verification.flags.length > 0) {
      console.warn(`[integrity] ${entityId} report ${latest.id}: ${outcome.verification.flags.join(', ')}`);
    }

    replay.accept(latest, now);
    registry.set({
      entityId,
      score: outcome.score,
      rawScore: outcome.rawScore,
      updatedAt: now,
      classification: outcome.classification,
      penalty: outcome.penalty,
      zeroReason: null,
      reportId: latest.id,
    });

    this.deps.emitter?.emitEvent('score:updated', {
      type: 'score:updated',
      payload: {
        entityId,
        score: outcome.score,
        rawScore: outcome.rawScore,
        previousScore: previous?.score ?? null,
        classification: outcome.classification,
        penalty: outcome.penalty,
        reportId: latest.id,
        timestamp: now,
      },
    });

    return {
      entityId,
      status: 'scored',
      score: outcome.score,
      previousScore: previous?.score ?? null,
      classification: outcome.classification,
      penalty: outcome.penalty,
    };
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private zero(entityId: string, reason: ZeroReason, now: number): EntityOutcome {
    const previous = this.deps.registry.previousScore(entityId);
    this.deps.registry.zero(entityId, reason, now, this.deps.config.maxScore);
    console.warn(`[cycle] ${entityId}: score zeroed (${reason})`);
    this.deps.emitter?.emitEvent('score:zeroed', {
      type: 'score:zeroed',
      payload: { entityId, reason, previousScore: previous ?? null, timestamp: now },
    });
    return { entityId, status: 'zeroed', reason };
  }

  private async publishWeights(): Promise<PublishResult | null> {
    const { publisher, registry, config } = this.deps;
    if (!publisher || registry.size === 0) return null;

    try {
      const result = await publisher.publish(registry.weights(config.maxScore));
      this.deps.emitter?.emitEvent('weights:published', {
        type: 'weights:published',
        payload: { ...result, timestamp: this.clock() },
      });
      return result;
    } catch (err) {
      console.error(`[ledger] Failed to publish weights: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }
}

/**
 * Reports no older than `maxAgeMs`, order preserved.
 */
export function filterFreshReports(reports: readonly Report[], now: number, maxAgeMs: number): Report[] {
  return reports.filter((r) => now - r.createdAt <= maxAgeMs);
}
