/**
 * TickScore — Scoring Types
 *
 * Inputs and outputs of the scoring engine. The engine is stateless: the
 * caller owns history and the previously published score and passes both
 * in on every call.
 */

import type { Report } from '../reports/types.js';
import type { HistoryWindow } from '../reports/history.js';
import type { IntegrityFlag, RejectionReason, VerificationResult } from '../integrity/types.js';

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type Classification = 'Excellent' | 'Good' | 'Average' | 'Poor';

/** Lower bounds as a fraction of MAX_SCORE (850 / 650 / 300 on the 0-1000 scale) */
export const CLASSIFICATION_THRESHOLDS: { min: number; classification: Classification }[] = [
  { min: 0.85, classification: 'Excellent' },
  { min: 0.65, classification: 'Good' },
  { min: 0.3, classification: 'Average' },
  { min: 0, classification: 'Poor' },
];

/** Map an integer score on the 0..maxScore scale to its classification */
export function classifyScore(score: number, maxScore: number): Classification {
  const clamped = Math.max(0, Math.min(maxScore, score));
  for (const { min, classification } of CLASSIFICATION_THRESHOLDS) {
    if (clamped >= Math.round(min * maxScore)) return classification;
  }
  return 'Poor';
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/** Per-cycle scoring input for one entity */
export interface MinerContext {
  /** Latest verified (sanitized) report */
  report: Report;
  /** Measured request latency to the entity (seconds) */
  latencySeconds: number;
  registrationValid: boolean;
  /** Externally derived compliance flag (plugin / integrity checks upstream) */
  complianceValid: boolean;
  /** Penalty-grade flags from the verifier */
  integrityFlags: readonly IntegrityFlag[];
  /** Past reports, most-recent-first */
  history: HistoryWindow;
  /**
   * Whether the entity is expected to have a reporting history.
   * Defaults to true when a previous score exists.
   */
  expectsHistory?: boolean;
  /** Evaluation time (ms); defaults to the report's createdAt */
  now?: number;
}

// ---------------------------------------------------------------------------
// Component scores
// ---------------------------------------------------------------------------

export interface InfrastructureBreakdown {
  tps: number;
  latency: number;
  memory: number;
  score: number;
}

export interface ParticipationBreakdown {
  compliance: number;
  players: number;
  registration: number;
  /** Required plugins the report did not list */
  missingPlugins: string[];
  score: number;
}

export interface ReliabilityBreakdown {
  uptime: number;
  stability: number;
  recovery: number;
  /** Number of reports (current + history) the score was computed over */
  reportCount: number;
  /** True when too few reports existed and only the uptime fallback applied */
  insufficientHistory: boolean;
  score: number;
}

export interface ComponentScores {
  infrastructure: number;
  participation: number;
  reliability: number;
  /** Weighted combination before penalties */
  raw: number;
  /** Weighted combination after penalties */
  penalized: number;
}

// ---------------------------------------------------------------------------
// Penalties
// ---------------------------------------------------------------------------

/** Ordered from least to most severe */
export type PenaltyKind =
  | 'ComplianceFailure'
  | 'IntegrityFailure'
  | 'ClockDrift'
  | 'SignatureFailure'
  | 'MissingHistory';

export interface PenaltySignals {
  complianceFailed: boolean;
  integrityFailure: boolean;
  clockDrift: boolean;
  signatureFailure: boolean;
  missingHistory: boolean;
}

export interface PenaltyApplied {
  /** Most severe penalty that applied */
  kind: PenaltyKind;
  /** Every penalty that applied, least severe first */
  applied: PenaltyKind[];
  /** Ceiling on the raw fraction that the published score must respect */
  cap: number;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface ScoreResult {
  /** Published (smoothed, penalty-bounded) score, 0..maxScore */
  score: number;
  /** This cycle's unsmoothed score, 0..maxScore */
  rawScore: number;
  components: ComponentScores;
  breakdown: {
    infrastructure: InfrastructureBreakdown;
    participation: ParticipationBreakdown;
    reliability: ReliabilityBreakdown;
  };
  classification: Classification;
  penalty: PenaltyKind | null;
  /** score / maxScore, the figure handed to the weight publisher */
  weight: number;
}

/** Caller-owned state persisted across cycles */
export interface StoredScore {
  score: number;
  rawScore: number;
  /** Unix timestamp (ms) */
  updatedAt: number;
}

export type ScoringOutcome =
  | {
      status: 'rejected';
      reason: RejectionReason;
      /** Previous score, unchanged */
      score: number | undefined;
      verification: VerificationResult;
    }
  | ({ status: 'scored'; verification: VerificationResult } & ScoreResult);
