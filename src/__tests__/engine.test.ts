import { describe, it, expect } from 'vitest';
import { createScoringConfig, DEFAULT_SCORING_CONFIG as config } from '../scoring/config.js';
import { evaluateReport, score } from '../scoring/engine.js';
import type { EvaluateInput } from '../scoring/engine.js';
import { HistoryWindow } from '../reports/history.js';
import { ReportSigner } from '../integrity/keys.js';
import { HOUR, MINUTE, T0, signedReport, signedSeries, toReport, wireReport } from './fixtures.js';

const signer = new ReportSigner();

/** Twelve reports over an hour from a healthy 20 TPS server, newest first */
const reports = signedSeries(signer, 12);
const [latest, ...older] = reports;

function input(overrides: Partial<EvaluateInput> = {}): EvaluateInput {
  return {
    report: latest,
    publicKey: signer.publicKeyHex,
    history: HistoryWindow.from(older),
    replay: { lastCounter: older[0].counter },
    latencySeconds: 0,
    registrationValid: true,
    now: latest.createdAt,
    ...overrides,
  };
}

// infrastructure 0.95 (memory 6/8 free), participation 0.772 (40 of 100
// players), reliability 0.5 × uptime + 0.5 with uptime 48h55m / 72h × 1.1
const UPTIME = ((48 * HOUR + 55 * MINUTE) / HOUR / 72) * 1.1;
const EXPECTED_RAW = 0.4 * 0.95 + 0.35 * 0.772 + 0.25 * (0.5 * UPTIME + 0.5);

describe('evaluateReport', () => {
  it('scores a well-behaved server with 48h of history as Good or better', () => {
    const outcome = evaluateReport(input(), config);

    expect(outcome.status).toBe('scored');
    if (outcome.status !== 'scored') return;
    expect(outcome.verification.flags).toEqual([]);
    expect(outcome.components.infrastructure).toBeCloseTo(0.95, 10);
    expect(outcome.components.participation).toBeCloseTo(0.772, 10);
    expect(outcome.components.raw).toBeCloseTo(EXPECTED_RAW, 10);
    expect(outcome.rawScore).toBe(869);
    expect(outcome.score).toBe(869);
    expect(outcome.classification).toBe('Excellent');
    expect(outcome.penalty).toBeNull();
    expect(outcome.weight).toBe(0.869);
  });

  it('holds a forged signature to 100 or less', () => {
    const impostor = new ReportSigner();
    const outcome = evaluateReport(input({ publicKey: impostor.publicKeyHex }), config);

    expect(outcome.status).toBe('scored');
    if (outcome.status !== 'scored') return;
    expect(outcome.verification.flags).toEqual(['SignatureFailure']);
    expect(outcome.penalty).toBe('SignatureFailure');
    expect(outcome.score).toBe(100);
    expect(outcome.classification).toBe('Poor');
  });

  it('keeps a penalized score under its cap even from a high previous score', () => {
    const outcome = evaluateReport(input({ publicKey: null, previousScore: 900 }), config);
    if (outcome.status !== 'scored') throw new Error('expected a scored outcome');
    expect(outcome.rawScore).toBe(100);
    expect(outcome.score).toBe(100);
  });

  it('caps a report missing a required plugin as a compliance failure', () => {
    const report = signedReport(signer, {
      id: 'report-13',
      counter: 13,
      createdAt: latest.createdAt + 5 * MINUTE,
      uptimeMs: 49 * HOUR,
      plugins: ['EssentialsX'],
    });
    const outcome = evaluateReport(
      input({ report, history: HistoryWindow.from(reports), replay: { lastCounter: 12 }, now: report.createdAt }),
      config,
    );
    if (outcome.status !== 'scored') throw new Error('expected a scored outcome');
    expect(outcome.breakdown.participation.missingPlugins).toEqual(['Level114']);
    expect(outcome.penalty).toBe('ComplianceFailure');
    expect(outcome.score).toBe(300);
  });

  it('zeroes an entity that should have history but has none', () => {
    const outcome = evaluateReport(
      input({ history: new HistoryWindow(), previousScore: 700 }),
      config,
    );
    if (outcome.status !== 'scored') throw new Error('expected a scored outcome');
    expect(outcome.penalty).toBe('MissingHistory');
    expect(outcome.score).toBe(0);
    expect(outcome.classification).toBe('Poor');
  });

  it('does not treat a first sighting without history as missing history', () => {
    const outcome = evaluateReport(input({ history: new HistoryWindow() }), config);
    if (outcome.status !== 'scored') throw new Error('expected a scored outcome');
    expect(outcome.penalty).toBeNull();
    expect(outcome.breakdown.reliability.insufficientHistory).toBe(true);
  });

  it('rejects a replayed report and keeps the previous score', () => {
    const outcome = evaluateReport(
      input({ replay: { lastCounter: latest.counter }, previousScore: 640 }),
      config,
    );
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'ReplayDetected', score: 640 });
  });

  it('rejects a malformed report', () => {
    const report = signedReport(signer, { counter: 13, maxPlayers: -5 });
    const outcome = evaluateReport(input({ report, replay: { lastCounter: 12 } }), config);
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'MalformedReport', score: undefined });
  });

  it('halves and caps a report from a drifting clock', () => {
    const outcome = evaluateReport(input({ now: latest.createdAt + 20 * MINUTE }), config);
    if (outcome.status !== 'scored') throw new Error('expected a scored outcome');
    expect(outcome.verification.flags).toEqual(['ClockDrift']);
    expect(outcome.penalty).toBe('ClockDrift');
    expect(outcome.score).toBe(300);
  });

  it('is deterministic for identical inputs', () => {
    const args = input({ previousScore: 700 });
    expect(evaluateReport(args, config)).toEqual(evaluateReport(args, config));
  });

  it('smooths toward the new score from the previous one', () => {
    const outcome = evaluateReport(input({ previousScore: 700 }), config);
    if (outcome.status !== 'scored') throw new Error('expected a scored outcome');
    // 700 + 0.2 × (869 − 700) = 733.8
    expect(outcome.score).toBe(734);
    expect(outcome.classification).toBe('Good');
  });
});

describe('score', () => {
  it('defaults evaluation time to the report timestamp', () => {
    const context = {
      report: latest,
      latencySeconds: 0,
      registrationValid: true,
      complianceValid: true,
      integrityFlags: [],
      history: HistoryWindow.from(older),
    };
    const implicit = score(context, undefined, config);
    const explicit = score({ ...context, now: latest.createdAt }, undefined, config);
    expect(implicit).toEqual(explicit);
  });

  it('treats an externally invalid compliance flag as a failure', () => {
    const result = score(
      {
        report: toReport(wireReport({ createdAt: T0 })),
        latencySeconds: 0,
        registrationValid: true,
        complianceValid: false,
        integrityFlags: [],
        history: HistoryWindow.from(older),
      },
      undefined,
      config,
    );
    expect(result.penalty).toBe('ComplianceFailure');
    expect(result.breakdown.participation.compliance).toBeCloseTo(0.3, 10);
    expect(result.score).toBeLessThanOrEqual(300);
  });

  it('uses the configured scale', () => {
    const small = createScoringConfig({ maxScore: 100, smoothing: { maxChange: 20 } });
    const result = score(
      {
        report: latest,
        latencySeconds: 0,
        registrationValid: true,
        complianceValid: true,
        integrityFlags: [],
        history: HistoryWindow.from(older),
      },
      undefined,
      small,
    );
    expect(result.rawScore).toBe(87);
    expect(result.classification).toBe('Excellent');
  });
});
