/**
 * TickScore — Score Smoother
 *
 * Bounded exponential moving average between the previously published
 * score and this cycle's raw score:
 *
 *   smoothed = previous + clamp(alpha × (raw − previous), ±maxChange)
 *
 * First observation passes the raw score through; changes smaller than
 * minChange leave the previous score in place.
 */

import type { ScoringConfig } from './config.js';

export function smoothScore(
  rawScore: number,
  previousScore: number | undefined,
  config: Pick<ScoringConfig, 'smoothing' | 'maxScore'>,
): number {
  const { alpha, minChange, maxChange } = config.smoothing;
  const clampScore = (v: number): number => Math.max(0, Math.min(config.maxScore, Math.round(v)));

  if (previousScore === undefined) return clampScore(rawScore);

  const delta = rawScore - previousScore;
  if (Math.abs(delta) < minChange) return previousScore;

  const step = Math.max(-maxChange, Math.min(maxChange, alpha * delta));
  return clampScore(previousScore + step);
}
