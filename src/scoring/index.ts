/**
 * TickScore — Scoring module barrel export
 */

// Types
export type {
  Classification,
  MinerContext,
  ComponentScores,
  InfrastructureBreakdown,
  ParticipationBreakdown,
  ReliabilityBreakdown,
  PenaltyKind,
  PenaltySignals,
  PenaltyApplied,
  ScoreResult,
  StoredScore,
  ScoringOutcome,
} from './types.js';
export { classifyScore, CLASSIFICATION_THRESHOLDS } from './types.js';

// Configuration
export type { ScoringConfig, ScoringConfigOverrides } from './config.js';
export {
  ConfigurationError,
  DEFAULT_SCORING_CONFIG,
  UNTRACKED_PARTICIPATION_WEIGHTS,
  createScoringConfig,
  validateScoringConfig,
  loadScoringConfig,
  describeConfig,
} from './config.js';

// Components
export { scoreInfrastructure, tpsScore, latencyScore, memoryScore, clamp01 } from './infrastructure.js';
export {
  scoreParticipation,
  findMissingPlugins,
  complianceScore,
  playerActivityScore,
  utilizationMultiplier,
} from './participation.js';
export type { DropEpisode } from './reliability.js';
export {
  scoreReliability,
  reportSeries,
  uptimeTrendScore,
  tpsStabilityScore,
  findDropEpisodes,
  recoveryCredit,
  recoveryScore,
} from './reliability.js';

// Aggregation & smoothing
export type { AggregateInput, AggregateResult } from './aggregator.js';
export { aggregate, applyPenalties, weightedRaw, toScore } from './aggregator.js';
export { smoothScore } from './smoothing.js';

// Engine
export type { EvaluateInput } from './engine.js';
export { score, evaluateReport } from './engine.js';
