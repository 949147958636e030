/**
 * TickScore — Validator module barrel export
 */

export type { ScoreRecord, ZeroReason, RegistryStats, RegistrySnapshot } from './registry.js';
export { ScoreRegistry } from './registry.js';

export type { EntityOutcome, CycleSummary, ScoringCycleDeps } from './cycle.js';
export { ScoringCycle, filterFreshReports } from './cycle.js';
