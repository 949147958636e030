/**
 * TickScore — Reliability Scorer
 *
 * How consistently the server has run over its recent history:
 *   Uptime trend   — sustained process uptime, penalizing restarts
 *   TPS stability  — freshness-weighted coefficient of variation of TPS
 *   Recovery speed — how quickly TPS climbs back after a drop
 *
 * Computed over the current report plus history, oldest first.
 */

import type { Report } from '../reports/types.js';
import { tpsFromMillis } from '../reports/types.js';
import { HistoryWindow } from '../reports/history.js';
import type { ScoringConfig } from './config.js';
import type { ReliabilityBreakdown } from './types.js';
import { clamp01 } from './infrastructure.js';

const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;

type ReliabilitySettings = ScoringConfig['reliability'];

// ---------------------------------------------------------------------------
// Series
// ---------------------------------------------------------------------------

/**
 * Union of history and the current report, deduplicated by id (the current
 * report wins), as a window sized to hold all of them.
 */
export function reportSeries(current: Report, history: HistoryWindow): HistoryWindow {
  const byId = new Map<string, Report>();
  for (const report of history.toArray()) byId.set(report.id, report);
  byId.set(current.id, current);
  const ordered = [...byId.values()].sort(
    (a, b) => a.createdAt - b.createdAt || a.counter - b.counter,
  );

  const merged = new HistoryWindow(ordered.length);
  for (const report of ordered) merged.push(report);
  return merged;
}

// ---------------------------------------------------------------------------
// Uptime trend
// ---------------------------------------------------------------------------

/**
 * Uptime relative to the cap, minus a penalty for each reset (uptime going
 * backwards between consecutive reports). Earlier resets cost more. A clean
 * series whose uptime grows in step with wall-clock time earns a bonus.
 */
export function uptimeTrendScore(series: readonly Report[], current: Report, settings: ReliabilitySettings): number {
  const n = series.length;
  const currentHours = current.payload.systemInfo.uptimeMs / MS_PER_HOUR;
  let score = Math.min(currentHours / settings.uptimeCapHours, 1);

  let resets = 0;
  for (let i = 1; i < n; i++) {
    if (series[i].payload.systemInfo.uptimeMs < series[i - 1].payload.systemInfo.uptimeMs) {
      resets++;
      score -= settings.resetPenalty * ((n - i) / n);
    }
  }
  score = Math.max(0, score);

  if (resets === 0 && n >= settings.minReports) {
    const rate = meanGrowthRate(series);
    if (rate !== null && rate > settings.growthBonusRate) {
      score = Math.min(1, score * settings.bonusMultiplier);
    }
  }

  return clamp01(score);
}

/** Mean uptime gained per wall-clock unit over consecutive pairs, null if none measurable */
function meanGrowthRate(series: readonly Report[]): number | null {
  const rates: number[] = [];
  for (let i = 1; i < series.length; i++) {
    const wall = series[i].createdAt - series[i - 1].createdAt;
    if (wall <= 0) continue;
    const gained = series[i].payload.systemInfo.uptimeMs - series[i - 1].payload.systemInfo.uptimeMs;
    rates.push(gained / wall);
  }
  if (rates.length === 0) return null;
  return rates.reduce((a, b) => a + b, 0) / rates.length;
}

// ---------------------------------------------------------------------------
// TPS stability
// ---------------------------------------------------------------------------

/**
 * 1 − CV / threshold over the most recent window, each sample weighted by
 * freshness. TPS is capped at ideal so overclocked ticks do not read as
 * instability.
 */
export function tpsStabilityScore(
  series: HistoryWindow,
  now: number,
  idealTps: number,
  settings: ReliabilitySettings,
): number {
  const cutoffMs = settings.freshnessCutoffSeconds * 1000;
  const window = series.freshnessWeighted(now, cutoffMs, settings.stabilityWindow);
  if (window.length < settings.minStabilitySamples) return 0.5;

  const samples = window.map(({ report, weight }) => ({
    tps: Math.min(tpsFromMillis(report.payload.tpsMillis), idealTps),
    weight,
  }));

  const totalWeight = samples.reduce((acc, s) => acc + s.weight, 0);
  const mean = samples.reduce((acc, s) => acc + s.weight * s.tps, 0) / totalWeight;
  if (mean <= 0) return 0;

  const variance = samples.reduce((acc, s) => acc + s.weight * (s.tps - mean) ** 2, 0) / totalWeight;
  const cv = Math.sqrt(variance) / mean;

  let score = Math.max(0, 1 - cv / settings.cvThreshold);
  if (mean >= settings.stabilityBonusFraction * idealTps) {
    score = Math.min(1, score * settings.bonusMultiplier);
  }
  return clamp01(score);
}

// ---------------------------------------------------------------------------
// Recovery speed
// ---------------------------------------------------------------------------

export interface DropEpisode {
  startedAt: number;
  /** Null when TPS had not recovered by the end of the series */
  recoveredAt: number | null;
  durationMs: number;
}

/**
 * Find drops (TPS falling below the threshold from at or above it) and
 * when each recovered. Unrecovered drops are measured up to `now`.
 */
export function findDropEpisodes(series: readonly Report[], now: number, threshold: number): DropEpisode[] {
  const episodes: DropEpisode[] = [];
  let startedAt: number | null = null;

  for (let i = 1; i < series.length; i++) {
    const prev = tpsFromMillis(series[i - 1].payload.tpsMillis);
    const tps = tpsFromMillis(series[i].payload.tpsMillis);

    if (startedAt === null && prev >= threshold && tps < threshold) {
      startedAt = series[i].createdAt;
    } else if (startedAt !== null && tps >= threshold) {
      const recoveredAt = series[i].createdAt;
      episodes.push({ startedAt, recoveredAt, durationMs: recoveredAt - startedAt });
      startedAt = null;
    }
  }

  if (startedAt !== null) {
    episodes.push({ startedAt, recoveredAt: null, durationMs: Math.max(0, now - startedAt) });
  }
  return episodes;
}

/** Full credit within the grace period, linear to 0 at the outer bound */
export function recoveryCredit(durationMs: number, settings: ReliabilitySettings): number {
  const minutes = durationMs / MS_PER_MINUTE;
  const full = settings.recoveryFullCreditMinutes;
  const max = settings.recoveryMaxMinutes;
  if (minutes <= full) return 1;
  if (minutes >= max) return 0;
  return 1 - (minutes - full) / (max - full);
}

export function recoveryScore(series: readonly Report[], now: number, settings: ReliabilitySettings): number {
  const episodes = findDropEpisodes(series, now, settings.tpsDropThreshold);
  if (episodes.length === 0) return 1;
  const total = episodes.reduce((acc, e) => acc + recoveryCredit(e.durationMs, settings), 0);
  return total / episodes.length;
}

// ---------------------------------------------------------------------------
// Combined
// ---------------------------------------------------------------------------

export function scoreReliability(
  current: Report,
  history: HistoryWindow,
  now: number,
  config: ScoringConfig,
): ReliabilityBreakdown {
  const settings = config.reliability;
  const window = reportSeries(current, history);
  const series = window.chronological();

  if (series.length < settings.minReports) {
    const hours = current.payload.systemInfo.uptimeMs / MS_PER_HOUR;
    const uptime = Math.min(hours / (settings.uptimeCapHours / 2), 1);
    return {
      uptime,
      stability: 0,
      recovery: 0,
      reportCount: series.length,
      insufficientHistory: true,
      score: clamp01(uptime * 0.5),
    };
  }

  const uptime = uptimeTrendScore(series, current, settings);
  const stability = tpsStabilityScore(window, now, config.infrastructure.idealTps, settings);
  const recovery = recoveryScore(series, now, settings);

  const score = clamp01(
    settings.weights.uptime * uptime +
    settings.weights.stability * stability +
    settings.weights.recovery * recovery,
  );

  return {
    uptime,
    stability,
    recovery,
    reportCount: series.length,
    insufficientHistory: false,
    score,
  };
}
