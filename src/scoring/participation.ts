/**
 * TickScore — Participation Scorer
 *
 * Whether the server plays by the network's rules and actually hosts
 * players. Compliance dominates; player activity is capped (anti-whale)
 * and shaped by how full the server is; registration is optional.
 */

import type { Report } from '../reports/types.js';
import type { IntegrityFlag } from '../integrity/types.js';
import type { ScoringConfig } from './config.js';
import type { ParticipationBreakdown } from './types.js';
import { clamp01 } from './infrastructure.js';

// ---------------------------------------------------------------------------
// Compliance
// ---------------------------------------------------------------------------

/** Required plugins absent from the report (case-insensitive match) */
export function findMissingPlugins(plugins: readonly string[], required: readonly string[]): string[] {
  const present = new Set(plugins.map((p) => p.toLowerCase()));
  return required.filter((r) => !present.has(r.toLowerCase()));
}

/**
 * 1.0 with every required plugin present; each missing one costs
 * `missingPluginPenalty`. Integrity problems or an invalid compliance flag
 * scale the result down further.
 */
export function complianceScore(
  missingCount: number,
  integrityFailed: boolean,
  complianceValid: boolean,
  config: ScoringConfig['participation'],
): number {
  let score = Math.max(0, 1 - missingCount * config.missingPluginPenalty);
  if (integrityFailed || !complianceValid) {
    score *= config.integrityComplianceMultiplier;
  }
  return clamp01(score);
}

// ---------------------------------------------------------------------------
// Player activity
// ---------------------------------------------------------------------------

/**
 * Multiplier for how full the server is: peak inside the optimal band,
 * ramping linearly down to the floor at empty and at full capacity.
 */
export function utilizationMultiplier(ratio: number, config: ScoringConfig['participation']): number {
  const {
    optimalUtilizationMin: lo,
    optimalUtilizationMax: hi,
    utilizationPeak: peak,
    utilizationFloor: floor,
  } = config;

  if (ratio < lo) return floor + (peak - floor) * (Math.max(0, ratio) / lo);
  if (ratio <= hi) return peak;
  return peak - (peak - floor) * Math.min(1, (ratio - hi) / (1 - hi));
}

export function playerActivityScore(
  activePlayers: number,
  maxPlayers: number,
  config: ScoringConfig['participation'],
): number {
  const counted = Math.min(activePlayers, config.maxPlayersWeight);
  const base = counted / config.maxPlayersWeight;

  let ratio: number;
  if (maxPlayers > 0) ratio = activePlayers / maxPlayers;
  else ratio = activePlayers > 0 ? Number.POSITIVE_INFINITY : 0;

  return clamp01(base * utilizationMultiplier(ratio, config));
}

// ---------------------------------------------------------------------------
// Combined
// ---------------------------------------------------------------------------

export function scoreParticipation(
  report: Report,
  flags: {
    registrationValid: boolean;
    complianceValid: boolean;
    integrityFlags: readonly IntegrityFlag[];
  },
  config: ScoringConfig,
): ParticipationBreakdown {
  const part = config.participation;
  const missingPlugins = findMissingPlugins(report.payload.plugins, part.requiredPlugins);
  const integrityFailed = flags.integrityFlags.some(
    (f) => f === 'IntegrityFailure' || f === 'SignatureFailure',
  );

  const compliance = complianceScore(missingPlugins.length, integrityFailed, flags.complianceValid, part);
  const players = playerActivityScore(report.payload.activePlayers.length, report.payload.maxPlayers, part);
  const registration = flags.registrationValid ? 1 : 0;

  const score = clamp01(
    part.weights.compliance * compliance +
    part.weights.players * players +
    part.weights.registration * registration,
  );

  return { compliance, players, registration, missingPlugins, score };
}
