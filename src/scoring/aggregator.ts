/**
 * TickScore — Score Aggregator
 *
 * Weighted combination of the three component scores, followed by the
 * penalty policy. Clock drift first halves the weighted raw score; caps are
 * then applied from least to most severe, the lowest one winning:
 *
 *   ComplianceFailure  min(raw, 0.30)
 *   IntegrityFailure   min(raw, 0.30)
 *   ClockDrift         min(raw × 0.5, 0.30)
 *   SignatureFailure   min(raw, 0.10)
 *   MissingHistory     0
 */

import type { ScoringConfig } from './config.js';
import type { PenaltyApplied, PenaltyKind, PenaltySignals } from './types.js';
import { clamp01 } from './infrastructure.js';

export interface AggregateInput {
  infrastructure: number;
  participation: number;
  reliability: number;
}

export interface AggregateResult {
  /** Weighted combination before penalties, 0..1 */
  raw: number;
  /** After penalties, 0..1 */
  penalized: number;
  /** round(penalized × maxScore), clamped */
  score: number;
  penalty: PenaltyApplied | null;
}

export function weightedRaw(components: AggregateInput, config: ScoringConfig): number {
  const w = config.componentWeights;
  return clamp01(
    w.infrastructure * components.infrastructure +
    w.participation * components.participation +
    w.reliability * components.reliability,
  );
}

/**
 * Apply the penalty policy to a raw fraction.
 */
export function applyPenalties(
  raw: number,
  signals: PenaltySignals,
  penalties: ScoringConfig['penalties'],
): { value: number; penalty: PenaltyApplied | null } {
  let value = signals.clockDrift ? raw * penalties.clockDriftMultiplier : raw;
  let cap = 1;
  const applied: PenaltyKind[] = [];

  const capAt = (kind: PenaltyKind, limit: number): void => {
    value = Math.min(value, limit);
    cap = Math.min(cap, limit);
    applied.push(kind);
  };

  if (signals.complianceFailed) capAt('ComplianceFailure', penalties.complianceCap);
  if (signals.integrityFailure) capAt('IntegrityFailure', penalties.integrityCap);
  if (signals.clockDrift) capAt('ClockDrift', penalties.integrityCap);
  if (signals.signatureFailure) capAt('SignatureFailure', penalties.signatureCap);
  if (signals.missingHistory) capAt('MissingHistory', 0);

  if (applied.length === 0) return { value, penalty: null };
  return {
    value: clamp01(value),
    penalty: { kind: applied[applied.length - 1], applied, cap },
  };
}

export function aggregate(
  components: AggregateInput,
  signals: PenaltySignals,
  config: ScoringConfig,
): AggregateResult {
  const raw = weightedRaw(components, config);
  const { value, penalty } = applyPenalties(raw, signals, config.penalties);
  return {
    raw,
    penalized: value,
    score: toScore(value, config.maxScore),
    penalty,
  };
}

/** Fraction → integer score on the 0..maxScore scale */
export function toScore(fraction: number, maxScore: number): number {
  return Math.max(0, Math.min(maxScore, Math.round(fraction * maxScore)));
}
