/**
 * TickScore — Validator Service
 *
 * Runs the scoring cycle on an interval and serves the HTTP API plus the
 * WebSocket event stream.
 *
 * Environment:
 *   PORT                          — HTTP port (default 3001)
 *   CORS_ORIGIN                   — Comma-separated allowed origins
 *   TICKSCORE_COLLECTOR_URL       — Collector base URL (cycle disabled when unset)
 *   TICKSCORE_COLLECTOR_API_KEY   — Collector bearer token
 *   TICKSCORE_COLLECTOR_TIMEOUT_MS
 *   TICKSCORE_CYCLE_INTERVAL_MS   — Time between scoring cycles (default 5 min)
 *   TICKSCORE_SERVER_KEYS         — "id=pubkey,..." static keys; catalog keys otherwise
 *   TICKSCORE_STATE_FILE          — Where scores and replay counters are persisted
 *   TICKSCORE_WEIGHTS_CONTRACT    — Weights contract (log-only publishing when unset)
 *   TICKSCORE_* scoring constants — see scoring/config.ts
 *
 *   WS   /ws                      — score:updated, score:rejected, score:zeroed,
 *                                   cycle:completed, weights:published
 */

import 'dotenv/config';
import { createServer } from 'node:http';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { createApp } from './api.js';
import { initWebSocketServer, closeWebSocketServer, tickScoreEmitter } from './events/index.js';
import { loadScoringConfig, ConfigurationError } from './scoring/config.js';
import type { ScoringConfig } from './scoring/config.js';
import { ReplayGuard } from './integrity/replay.js';
import {
  CollectorClient,
  CatalogKeyResolver,
  staticResolverFromEnv,
} from './collector/index.js';
import type { PublicKeyResolver } from './collector/index.js';
import { closeClient, createLedgerWeightPublisher, LogOnlyWeightPublisher } from './ledger/index.js';
import type { WeightPublisher } from './ledger/index.js';
import { ScoreRegistry, ScoringCycle } from './validator/index.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const PORT = parseInt(process.env.PORT || '3001', 10);
const COLLECTOR_URL = process.env.TICKSCORE_COLLECTOR_URL || '';
const COLLECTOR_API_KEY = process.env.TICKSCORE_COLLECTOR_API_KEY || '';
const COLLECTOR_TIMEOUT_MS = parseInt(process.env.TICKSCORE_COLLECTOR_TIMEOUT_MS || '10000', 10);
const CYCLE_INTERVAL_MS = parseInt(process.env.TICKSCORE_CYCLE_INTERVAL_MS || '300000', 10);
const STATE_FILE = process.env.TICKSCORE_STATE_FILE || '';

function loadConfigOrExit(): ScoringConfig {
  try {
    return loadScoringConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const scoringConfig = loadConfigOrExit();

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

interface ValidatorState {
  registry: ScoreRegistry;
  replay: ReplayGuard;
}

/** Scores and accepted replay counters, restored together from one file */
function loadState(): ValidatorState {
  const empty = (): ValidatorState => ({ registry: new ScoreRegistry(), replay: new ReplayGuard() });
  if (!STATE_FILE || !existsSync(STATE_FILE)) return empty();
  try {
    const data: unknown = JSON.parse(readFileSync(STATE_FILE, 'utf-8'));
    if (typeof data !== 'object' || data === null || !('scores' in data) || !('replay' in data)) {
      throw new Error('expected { scores, replay }');
    }
    const state: ValidatorState = {
      registry: ScoreRegistry.fromSnapshot(data.scores),
      replay: ReplayGuard.fromSnapshot(data.replay),
    };
    console.log(
      `[state] Restored ${state.registry.size} score(s) and ` +
      `${state.replay.stats().entities} replay counter(s) from ${STATE_FILE}`,
    );
    return state;
  } catch (err) {
    console.error(`[state] Could not restore ${STATE_FILE}, starting empty:`, err instanceof Error ? err.message : err);
    return empty();
  }
}

function saveState(): void {
  if (!STATE_FILE) return;
  try {
    writeFileSync(STATE_FILE, JSON.stringify({ scores: registry.snapshot(), replay: replay.snapshot() }, null, 2));
  } catch (err) {
    console.error(`[state] Failed to write ${STATE_FILE}:`, err instanceof Error ? err.message : err);
  }
}

const { registry, replay } = loadState();

// ---------------------------------------------------------------------------
// Scoring cycle
// ---------------------------------------------------------------------------

let collector: CollectorClient | null = null;
let cycle: ScoringCycle | undefined;

if (COLLECTOR_URL) {
  collector = new CollectorClient({
    baseUrl: COLLECTOR_URL,
    apiKey: COLLECTOR_API_KEY,
    timeoutMs: COLLECTOR_TIMEOUT_MS,
  });

  const keys: PublicKeyResolver = process.env.TICKSCORE_SERVER_KEYS
    ? staticResolverFromEnv(process.env.TICKSCORE_SERVER_KEYS)
    : new CatalogKeyResolver(collector);

  const publisher: WeightPublisher = createLedgerWeightPublisher() ?? new LogOnlyWeightPublisher();

  cycle = new ScoringCycle({
    source: collector,
    keys,
    registry,
    replay,
    config: scoringConfig,
    publisher,
    emitter: tickScoreEmitter,
  });
}

async function runCycle(): Promise<void> {
  if (!collector || !cycle || cycle.isRunning) return;
  try {
    const servers = await collector.listServers();
    await cycle.run(servers.map((s) => s.id));
    saveState();
  } catch (err) {
    console.error('[cycle] Cycle failed:', err instanceof Error ? err.message : err);
  }
}

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

const app = createApp({
  registry,
  config: scoringConfig,
  cycle,
  corsOrigin: process.env.CORS_ORIGIN,
});
const httpServer = createServer(app);
export { app, httpServer };

initWebSocketServer(httpServer, () => ({
  cycles: cycle?.cycles ?? 0,
  scoredEntities: registry.size,
}));

let cycleTimer: ReturnType<typeof setInterval> | null = null;

httpServer.listen(PORT, () => {
  console.log(`\n  TickScore validator API running on http://localhost:${PORT}`);
  console.log(`  Max score ${scoringConfig.maxScore}, required plugins: ${scoringConfig.participation.requiredPlugins.join(', ') || 'none'}`);

  console.log('  Endpoints:');
  console.log('    GET  /api/scores          — Published scores');
  console.log('    GET  /api/scores/:id      — One server\'s score');
  console.log('    GET  /api/config          — Active scoring constants');
  console.log('    GET  /api/stats           — Aggregate statistics');
  console.log('    POST /api/score/preview   — Score a report without storing it');
  console.log(`    WS   ws://localhost:${PORT}/ws — Real-time event stream\n`);

  if (!cycle) {
    console.warn('  [cycle] TICKSCORE_COLLECTOR_URL not set — scoring cycle disabled');
    return;
  }

  void runCycle();
  cycleTimer = setInterval(() => void runCycle(), CYCLE_INTERVAL_MS);
  console.log(`  [cycle] Scoring every ${CYCLE_INTERVAL_MS / 1000}s`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`\n  ${signal} received, shutting down`);
  if (cycleTimer) clearInterval(cycleTimer);
  saveState();
  await closeWebSocketServer();
  closeClient();
  httpServer.close(() => process.exit(0));
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
