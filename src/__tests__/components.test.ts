import { describe, it, expect } from 'vitest';
import { DEFAULT_SCORING_CONFIG as config, createScoringConfig } from '../scoring/config.js';
import {
  latencyScore,
  memoryScore,
  scoreInfrastructure,
  tpsScore,
  clamp01,
} from '../scoring/infrastructure.js';
import {
  complianceScore,
  findMissingPlugins,
  playerActivityScore,
  scoreParticipation,
  utilizationMultiplier,
} from '../scoring/participation.js';
import {
  findDropEpisodes,
  recoveryCredit,
  reportSeries,
  scoreReliability,
  tpsStabilityScore,
  uptimeTrendScore,
} from '../scoring/reliability.js';
import { HistoryWindow } from '../reports/history.js';
import type { Report } from '../reports/types.js';
import { GIB, HOUR, MINUTE, T0, toReport, wireReport } from './fixtures.js';
import type { ReportOptions } from './fixtures.js';

const infra = config.infrastructure;
const part = config.participation;
const rel = config.reliability;

/** Unsigned reports five minutes apart, oldest first */
function series(count: number, opts: (i: number) => ReportOptions = () => ({})): Report[] {
  return Array.from({ length: count }, (_, i) =>
    toReport(wireReport({
      id: `r${i}`,
      counter: i + 1,
      createdAt: T0 + i * 5 * MINUTE,
      uptimeMs: 48 * HOUR + i * 5 * MINUTE,
      ...opts(i),
    })),
  );
}

/** Window over reports given oldest first */
function windowOf(reports: Report[]): HistoryWindow {
  return HistoryWindow.from([...reports].reverse(), reports.length);
}

/** Ten reports ten seconds apart ending at T0: five volatile, then five steady at 20 TPS */
function mixedStability(volatileAgeMs: (i: number) => number): Report[] {
  return Array.from({ length: 10 }, (_, i) => {
    const volatile = i < 5;
    return toReport(wireReport({
      id: `m${i}`,
      counter: i + 1,
      createdAt: volatile ? T0 - volatileAgeMs(i) : T0 - (9 - i) * 10_000,
      tpsMillis: volatile && i % 2 === 0 ? 100 : 50,
    }));
  });
}

describe('infrastructure', () => {
  it('scores a perfect server at exactly 1.0', () => {
    const report = toReport(wireReport({ tpsMillis: 50, freeBytes: 8 * GIB, totalBytes: 8 * GIB }));
    const result = scoreInfrastructure(report, 0, config);
    expect(result).toEqual({ tps: 1, latency: 1, memory: 1, score: 1 });
  });

  it('scores TPS against the ideal and caps overclocked ticks', () => {
    expect(tpsScore(100, 20)).toBe(0.5);
    expect(tpsScore(25, 20)).toBe(1);
    expect(tpsScore(0, 20)).toBe(0);
  });

  it('interpolates latency between the excellent and maximum bounds', () => {
    expect(latencyScore(0.1, infra)).toBe(1);
    expect(latencyScore(0.55, infra)).toBeCloseTo(0.5, 10);
    expect(latencyScore(1.0, infra)).toBe(0);
    expect(latencyScore(Number.POSITIVE_INFINITY, infra)).toBe(0);
  });

  it('scores memory by free ratio, steeper below the floor', () => {
    expect(memoryScore({ freeBytes: 6, usedBytes: 2, totalBytes: 8 }, 0.1)).toBe(0.75);
    expect(memoryScore({ freeBytes: 5, usedBytes: 95, totalBytes: 100 }, 0.1)).toBeCloseTo(0.025, 10);
    expect(memoryScore(undefined, 0.1)).toBe(0.5);
    expect(memoryScore({ freeBytes: 0, usedBytes: 0, totalBytes: 0 }, 0.1)).toBe(0.5);
  });

  it('weights the sub-scores 0.55 / 0.25 / 0.20', () => {
    const report = toReport(wireReport({ tpsMillis: 100 }));
    const result = scoreInfrastructure(report, 0.55, config);
    expect(result.score).toBeCloseTo(0.55 * 0.5 + 0.25 * 0.5 + 0.2 * 0.75, 10);
  });

  it('treats NaN as zero when clamping', () => {
    expect(clamp01(Number.NaN)).toBe(0);
    expect(clamp01(1.5)).toBe(1);
  });
});

describe('participation', () => {
  it('finds missing required plugins case-insensitively', () => {
    expect(findMissingPlugins(['level114', 'Essentials'], ['Level114'])).toEqual([]);
    expect(findMissingPlugins(['Essentials'], ['Level114', 'Essentials'])).toEqual(['Level114']);
  });

  it('drops compliance for missing plugins and integrity failures', () => {
    expect(complianceScore(0, false, true, part)).toBe(1);
    expect(complianceScore(1, false, true, part)).toBe(0);
    expect(complianceScore(0, true, true, part)).toBeCloseTo(0.3, 10);
    expect(complianceScore(0, false, false, part)).toBeCloseTo(0.3, 10);
  });

  it('peaks inside the optimal utilization band', () => {
    expect(utilizationMultiplier(0, part)).toBe(0.6);
    expect(utilizationMultiplier(0.1, part)).toBeCloseTo(0.9, 10);
    expect(utilizationMultiplier(0.5, part)).toBe(1.2);
    expect(utilizationMultiplier(1, part)).toBeCloseTo(0.6, 10);
  });

  it('caps counted players and scales by utilization', () => {
    expect(playerActivityScore(40, 100, part)).toBeCloseTo(0.24, 10);
    expect(playerActivityScore(500, 1000, part)).toBe(1);
    expect(playerActivityScore(0, 100, part)).toBe(0);
  });

  it('treats players on a zero-capacity server as fully saturated', () => {
    expect(playerActivityScore(5, 0, part)).toBeCloseTo(0.015, 10);
  });

  it('combines compliance, players and registration', () => {
    const report = toReport(wireReport({ players: 40, maxPlayers: 100 }));
    const result = scoreParticipation(
      report,
      { registrationValid: true, complianceValid: true, integrityFlags: [] },
      config,
    );
    expect(result.compliance).toBe(1);
    expect(result.registration).toBe(1);
    expect(result.missingPlugins).toEqual([]);
    expect(result.score).toBeCloseTo(0.55 + 0.3 * 0.24 + 0.15, 10);
  });

  it('reduces compliance when the signature failed', () => {
    const report = toReport(wireReport());
    const result = scoreParticipation(
      report,
      { registrationValid: false, complianceValid: true, integrityFlags: ['SignatureFailure'] },
      config,
    );
    expect(result.compliance).toBeCloseTo(0.3, 10);
    expect(result.registration).toBe(0);
  });

  it('ignores clock drift when judging compliance', () => {
    const report = toReport(wireReport());
    const result = scoreParticipation(
      report,
      { registrationValid: true, complianceValid: true, integrityFlags: ['ClockDrift'] },
      config,
    );
    expect(result.compliance).toBe(1);
  });
});

describe('reliability', () => {
  it('merges current and history without double-counting', () => {
    const reports = series(3);
    const history = HistoryWindow.from([...reports].reverse());
    const merged = reportSeries(reports[2], history);
    expect(merged.chronological().map((r) => r.id)).toEqual(['r0', 'r1', 'r2']);
  });

  it('falls back to half-weighted uptime with too little history', () => {
    const current = toReport(wireReport({ uptimeMs: 18 * HOUR }));
    const result = scoreReliability(current, new HistoryWindow(), T0, config);
    expect(result).toEqual({
      uptime: 0.5,
      stability: 0,
      recovery: 0,
      reportCount: 1,
      insufficientHistory: true,
      score: 0.25,
    });
  });

  it('rewards steady uptime growth', () => {
    const reports = series(6, (i) => ({ uptimeMs: 36 * HOUR + i * 5 * MINUTE }));
    const current = reports[5];
    const expected = Math.min(1, ((36 * HOUR + 25 * MINUTE) / HOUR / 72) * 1.1);
    expect(uptimeTrendScore(reports, current, rel)).toBeCloseTo(expected, 10);
  });

  it('penalizes uptime resets, earlier ones more', () => {
    const late = series(5, (i) => ({ uptimeMs: [70, 71, 72, 1, 80][i] * HOUR }));
    const early = series(5, (i) => ({ uptimeMs: [70, 1, 2, 3, 80][i] * HOUR }));

    // 1.0 capped uptime, minus 0.3 × (5 − i) / 5 for the reset at index i
    expect(uptimeTrendScore(late, late[4], rel)).toBeCloseTo(0.88, 10);
    expect(uptimeTrendScore(early, early[4], rel)).toBeCloseTo(0.76, 10);
  });

  it('never scores uptime below zero', () => {
    const reports = series(5, (i) => ({ uptimeMs: [10, 11, 1, 2, 3][i] * HOUR }));
    expect(uptimeTrendScore(reports, reports[4], rel)).toBe(0);
  });

  it('scores a flat TPS series as fully stable', () => {
    const reports = series(10);
    expect(tpsStabilityScore(windowOf(reports), T0 + 45 * MINUTE, 20, rel)).toBe(1);
  });

  it('returns a neutral stability score with too few samples', () => {
    expect(tpsStabilityScore(windowOf(series(2)), T0, 20, rel)).toBe(0.5);
  });

  it('scores a volatile TPS series low', () => {
    const reports = series(10, (i) => ({ tpsMillis: i % 2 === 0 ? 50 : 200 }));
    expect(tpsStabilityScore(windowOf(reports), T0 + 45 * MINUTE, 20, rel)).toBe(0);
  });

  it('down-weights stale volatility', () => {
    // 10, 20, 10, 20, 10 TPS followed by five reports at 20 TPS
    const allFresh = mixedStability((i) => (9 - i) * 10_000);
    const staleVolatile = mixedStability((i) => 3_000_000 + (4 - i) * 10_000);

    const fresh = tpsStabilityScore(windowOf(allFresh), T0, 20, rel);
    const stale = tpsStabilityScore(windowOf(staleVolatile), T0, 20, rel);

    // Equal weights: mean 17, CV √21 / 17
    expect(fresh).toBeCloseTo(1 - Math.sqrt(21) / 17 / 0.3, 10);
    // Volatile reports at weight 0.1: mean ≈ 19.45, past the bonus threshold
    expect(stale).toBeCloseTo(0.672, 3);
    expect(stale).toBeGreaterThan(fresh);
  });

  it('looks only at the most recent stability window', () => {
    // Five volatile reports followed by twenty steady ones, all fresh
    const reports = Array.from({ length: 25 }, (_, i) =>
      toReport(wireReport({
        id: `w${i}`,
        counter: i + 1,
        createdAt: T0 - (24 - i) * 10_000,
        tpsMillis: i < 5 && i % 2 === 0 ? 100 : 50,
      })),
    );
    const wide = createScoringConfig({ reliability: { stabilityWindow: 25 } }).reliability;

    expect(tpsStabilityScore(windowOf(reports), T0, 20, rel)).toBe(1);
    expect(tpsStabilityScore(windowOf(reports), T0, 20, wide)).toBeLessThan(1);
  });

  it('finds drop episodes and when they recovered', () => {
    const reports = series(6, (i) => ({ tpsMillis: i === 2 || i === 3 ? 100 : 50 }));
    expect(findDropEpisodes(reports, T0 + 25 * MINUTE, 18)).toEqual([
      { startedAt: T0 + 10 * MINUTE, recoveredAt: T0 + 20 * MINUTE, durationMs: 10 * MINUTE },
    ]);
  });

  it('measures an unrecovered drop up to now', () => {
    const reports = series(3, (i) => ({ tpsMillis: i === 2 ? 100 : 50 }));
    expect(findDropEpisodes(reports, T0 + 70 * MINUTE, 18)).toEqual([
      { startedAt: T0 + 10 * MINUTE, recoveredAt: null, durationMs: 60 * MINUTE },
    ]);
  });

  it('gives full recovery credit inside the grace period', () => {
    expect(recoveryCredit(30 * MINUTE, rel)).toBe(1);
    expect(recoveryCredit(75 * MINUTE, rel)).toBeCloseTo(0.5, 10);
    expect(recoveryCredit(120 * MINUTE, rel)).toBe(0);
  });

  it('combines uptime, stability and recovery', () => {
    const reports = series(12);
    const current = reports[11];
    const history = HistoryWindow.from([...reports].reverse());
    const result = scoreReliability(current, history, current.createdAt, config);

    const uptime = ((48 * HOUR + 55 * MINUTE) / HOUR / 72) * 1.1;
    expect(result.insufficientHistory).toBe(false);
    expect(result.reportCount).toBe(12);
    expect(result.uptime).toBeCloseTo(uptime, 10);
    expect(result.stability).toBe(1);
    expect(result.recovery).toBe(1);
    expect(result.score).toBeCloseTo(0.5 * uptime + 0.35 + 0.15, 10);
  });
});
