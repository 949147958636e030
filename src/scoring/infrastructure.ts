/**
 * TickScore — Infrastructure Scorer
 *
 * How well the server is running right now:
 *   TPS      — actual tick rate against the ideal (20 TPS)
 *   Latency  — validator-measured response time
 *   Memory   — free heap headroom
 */

import type { MemoryInfo, Report } from '../reports/types.js';
import { reportMemory, tpsFromMillis } from '../reports/types.js';
import type { ScoringConfig } from './config.js';
import type { InfrastructureBreakdown } from './types.js';

/** Memory sub-score when the report carries no usable totals */
const UNKNOWN_MEMORY_SCORE = 0.5;

export function tpsScore(tpsMillis: number, idealTps: number): number {
  return clamp01(tpsFromMillis(tpsMillis) / idealTps);
}

/**
 * 1.0 up to the excellent threshold, then linear down to 0 at the maximum.
 * Non-finite latency scores 0.
 */
export function latencyScore(
  latencySeconds: number,
  config: ScoringConfig['infrastructure'],
): number {
  if (!Number.isFinite(latencySeconds)) return 0;
  const { excellentLatencySeconds: excellent, maxLatencySeconds: max } = config;
  if (latencySeconds <= excellent) return 1;
  if (latencySeconds >= max) return 0;
  return 1 - (latencySeconds - excellent) / (max - excellent);
}

/**
 * Free/total ratio. Below the headroom floor the ratio is scaled down again
 * by how far under the floor it is, so near-OOM servers drop off quickly.
 */
export function memoryScore(memory: MemoryInfo | undefined, headroomFloor: number): number {
  if (!memory || memory.totalBytes <= 0) return UNKNOWN_MEMORY_SCORE;
  const ratio = clamp01(memory.freeBytes / memory.totalBytes);
  if (headroomFloor > 0 && ratio < headroomFloor) {
    return ratio * (ratio / headroomFloor);
  }
  return ratio;
}

export function scoreInfrastructure(
  report: Report,
  latencySeconds: number,
  config: ScoringConfig,
): InfrastructureBreakdown {
  const infra = config.infrastructure;
  const tps = tpsScore(report.payload.tpsMillis, infra.idealTps);
  const latency = latencyScore(latencySeconds, infra);
  const memory = memoryScore(reportMemory(report.payload), infra.memoryHeadroomFloor);

  const score = clamp01(
    infra.weights.tps * tps +
    infra.weights.latency * latency +
    infra.weights.memory * memory,
  );

  return { tps, latency, memory, score };
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}
