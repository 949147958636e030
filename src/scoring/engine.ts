/**
 * TickScore — Scoring Engine
 *
 * Entry points:
 *   score()          — score a verified report against its history
 *   evaluateReport() — verify first, then score; rejections keep the
 *                      previous score
 *
 * Both are pure functions of their arguments. Nothing here reads the
 * clock, touches the network, or keeps state between calls.
 */

import type { Report } from '../reports/types.js';
import type { HistoryWindow } from '../reports/history.js';
import type { ReplayState } from '../integrity/types.js';
import { isRejection } from '../integrity/types.js';
import { IntegrityVerifier } from '../integrity/verifier.js';
import type { ScoringConfig } from './config.js';
import type { MinerContext, PenaltySignals, ScoreResult, ScoringOutcome } from './types.js';
import { classifyScore } from './types.js';
import { scoreInfrastructure } from './infrastructure.js';
import { scoreParticipation } from './participation.js';
import { scoreReliability } from './reliability.js';
import { aggregate, toScore } from './aggregator.js';
import { smoothScore } from './smoothing.js';

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

/**
 * Score one entity for one cycle.
 *
 * @param previousScore - Last published score, undefined on first sight
 */
export function score(
  context: MinerContext,
  previousScore: number | undefined,
  config: ScoringConfig,
): ScoreResult {
  const { report } = context;
  const now = context.now ?? report.createdAt;

  const infrastructure = scoreInfrastructure(report, context.latencySeconds, config);
  const participation = scoreParticipation(report, context, config);
  const reliability = scoreReliability(report, context.history, now, config);

  const expectsHistory = context.expectsHistory ?? previousScore !== undefined;
  const signals: PenaltySignals = {
    complianceFailed:
      participation.missingPlugins.length > 0 ||
      participation.compliance < config.participation.compliancePassThreshold ||
      !context.complianceValid,
    integrityFailure: context.integrityFlags.includes('IntegrityFailure'),
    clockDrift: context.integrityFlags.includes('ClockDrift'),
    signatureFailure: context.integrityFlags.includes('SignatureFailure'),
    missingHistory: expectsHistory && context.history.isEmpty(),
  };

  const aggregated = aggregate(
    {
      infrastructure: infrastructure.score,
      participation: participation.score,
      reliability: reliability.score,
    },
    signals,
    config,
  );

  let published = smoothScore(aggregated.score, previousScore, config);
  if (aggregated.penalty) {
    // Smoothing must not carry a penalized entity above its cap
    published = Math.min(published, toScore(aggregated.penalty.cap, config.maxScore));
  }

  const result: ScoreResult = {
    score: published,
    rawScore: aggregated.score,
    components: {
      infrastructure: infrastructure.score,
      participation: participation.score,
      reliability: reliability.score,
      raw: aggregated.raw,
      penalized: aggregated.penalized,
    },
    breakdown: { infrastructure, participation, reliability },
    classification: classifyScore(published, config.maxScore),
    penalty: aggregated.penalty?.kind ?? null,
    weight: published / config.maxScore,
  };

  if (config.debug) {
    console.log(
      `[scoring] ${report.entityId} infra=${infrastructure.score.toFixed(3)} ` +
      `part=${participation.score.toFixed(3)} rel=${reliability.score.toFixed(3)} ` +
      `raw=${aggregated.raw.toFixed(3)} → ${aggregated.score} ` +
      `(prev ${previousScore ?? '-'}, published ${published}` +
      `${aggregated.penalty ? `, penalty ${aggregated.penalty.applied.join('>')}` : ''})`,
    );
  }

  return result;
}

// ---------------------------------------------------------------------------
// Verify + score
// ---------------------------------------------------------------------------

export interface EvaluateInput {
  report: Report;
  /** Current key from the resolver, null when unknown */
  publicKey: string | null;
  history: HistoryWindow;
  replay: ReplayState;
  previousScore?: number;
  latencySeconds: number;
  registrationValid: boolean;
  complianceValid?: boolean;
  expectsHistory?: boolean;
  /** Validator wall-clock time (ms) */
  now: number;
}

/**
 * Verify a report and, unless it is rejected, score it. Never throws for
 * per-report conditions: problems come back in the outcome.
 */
export function evaluateReport(input: EvaluateInput, config: ScoringConfig): ScoringOutcome {
  const verifier = new IntegrityVerifier({
    maxClockDriftMs: config.integrity.maxClockDriftSeconds * 1000,
    allowUnsigned: config.integrity.allowUnsigned,
  });
  const verification = verifier.verify(input.report, input.publicKey, input.now, input.replay);

  if (!verification.ok) {
    const reason = isRejection(verification.reason) ? verification.reason : 'MalformedReport';
    if (config.debug) {
      console.log(`[integrity] ${input.report.entityId} rejected: ${verification.notes.join('; ')}`);
    }
    return { status: 'rejected', reason, score: input.previousScore, verification };
  }

  const result = score(
    {
      report: verification.report,
      latencySeconds: input.latencySeconds,
      registrationValid: input.registrationValid,
      complianceValid: input.complianceValid ?? true,
      integrityFlags: verification.flags,
      history: input.history,
      expectsHistory: input.expectsHistory,
      now: input.now,
    },
    input.previousScore,
    config,
  );

  return { status: 'scored', verification, ...result };
}
