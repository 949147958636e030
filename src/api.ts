/**
 * TickScore — HTTP API
 *
 * Endpoints:
 *   GET  /api/scores          — All published scores, highest first
 *   GET  /api/scores/:id      — One entity's published score
 *   GET  /api/config          — Active scoring constants
 *   GET  /api/stats           — Counts per classification, mean score, cycle state
 *   POST /api/score/preview   — Verify and score a submitted report without storing it
 *   GET  /api/health          — Liveness
 *
 * The app is built from its dependencies so tests can mount it on an
 * ephemeral port with an in-memory registry.
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { HistoryWindow, parseReport, parseReports } from './reports/index.js';
import { describeConfig, evaluateReport } from './scoring/index.js';
import type { ScoringConfig } from './scoring/index.js';
import type { ScoreRegistry, ScoringCycle } from './validator/index.js';

export interface ApiDeps {
  registry: ScoreRegistry;
  config: ScoringConfig;
  cycle?: ScoringCycle;
  /** Comma-separated allowed origins; all origins when unset */
  corsOrigin?: string;
  clock?: () => number;
}

const previewRequestSchema = z.object({
  report: z.unknown(),
  history: z.array(z.unknown()).default([]),
  publicKey: z.string().nullish(),
  previousScore: z.number().int().nonnegative().nullish(),
  latencySeconds: z.number().nonnegative().default(0),
  registrationValid: z.boolean().default(true),
  complianceValid: z.boolean().default(true),
  now: z.number().nullish(),
});

export function createApp(deps: ApiDeps): Express {
  const { registry, config } = deps;
  const clock = deps.clock ?? Date.now;
  const app = express();

  app.use(cors(deps.corsOrigin ? {
    origin: deps.corsOrigin.split(',').map(o => o.trim()),
    credentials: true,
  } : undefined));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', serverTime: clock() });
  });

  app.get('/api/scores', (_req, res) => {
    res.json({ items: registry.list(), maxScore: config.maxScore });
  });

  app.get('/api/scores/:id', (req, res) => {
    const record = registry.get(req.params.id);
    if (!record) {
      res.status(404).json({ error: `No score for '${req.params.id}'` });
      return;
    }
    res.json({ ...record, weight: record.score / config.maxScore });
  });

  app.get('/api/config', (_req, res) => {
    res.json(describeConfig(config));
  });

  app.get('/api/stats', (_req, res) => {
    res.json({
      ...registry.stats(),
      cycles: deps.cycle?.cycles ?? 0,
      cycleRunning: deps.cycle?.isRunning ?? false,
    });
  });

  app.post('/api/score/preview', (req, res) => {
    const body = previewRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        error: 'Invalid preview request',
        issues: body.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
      return;
    }

    const parsed = parseReport(body.data.report);
    if (!parsed.ok) {
      res.status(422).json({ status: 'rejected', reason: 'MalformedReport', error: parsed.error });
      return;
    }

    const { reports: history, malformed } = parseReports(body.data.history);
    const now = body.data.now ?? clock();
    const outcome = evaluateReport(
      {
        report: parsed.report,
        publicKey: body.data.publicKey ?? null,
        history: HistoryWindow.from(history, config.maxHistory),
        replay: { lastCounter: null },
        previousScore: body.data.previousScore ?? undefined,
        latencySeconds: body.data.latencySeconds,
        registrationValid: body.data.registrationValid,
        complianceValid: body.data.complianceValid,
        now,
      },
      config,
    );

    res.json({ ...outcome, droppedHistory: malformed.length });
  });

  return app;
}
