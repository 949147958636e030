/**
 * TickScore — Score Preview Script
 *
 * Scores a synthetic server locally (no Collector, no ledger) and prints
 * the breakdown, then repeats the latest report with a missing plugin and
 * a forged signature to show the penalty caps.
 *
 * Run: npm run preview
 */

import { ReportSigner } from '../src/integrity/index.js';
import { parseReport } from '../src/reports/schema.js';
import type { Report, WireReport } from '../src/reports/types.js';
import { HistoryWindow } from '../src/reports/history.js';
import { createScoringConfig, describeConfig } from '../src/scoring/config.js';
import { evaluateReport } from '../src/scoring/engine.js';
import type { ScoringOutcome } from '../src/scoring/types.js';

const config = createScoringConfig();
const signer = new ReportSigner();
const SERVER_ID = 'preview-server';
const NOW = Date.now();
const INTERVAL_MS = 5 * 60_000;
const REPORTS = 12;

function wireReport(i: number, plugins: string[] = ['Level114', 'EssentialsX']): WireReport {
  const createdAt = NOW - (REPORTS - 1 - i) * INTERVAL_MS;
  return signer.signReport({
    id: `preview-${i}`,
    server_id: SERVER_ID,
    counter: i + 1,
    nonce: `nonce-${i}`,
    client_timestamp_ms: createdAt,
    payload: {
      active_players: Array.from({ length: 40 }, (_, p) => `player${p}`),
      max_players: 100,
      tps_millis: i % 4 === 0 ? 51 : 50,
      memory_ram_info: {
        free_memory_bytes: 6 * 1024 ** 3,
        used_memory_bytes: 2 * 1024 ** 3,
        total_memory_bytes: 8 * 1024 ** 3,
      },
      plugins,
      system_info: {
        cpu_cores: 8,
        java_version: '21',
        uptime_ms: 48 * 3_600_000 + i * INTERVAL_MS,
      },
    },
  });
}

function parse(wire: WireReport): Report {
  const parsed = parseReport(wire);
  if (!parsed.ok) throw new Error(`${parsed.error.message}: ${parsed.error.issues.join('; ')}`);
  return parsed.report;
}

function print(label: string, outcome: ScoringOutcome): void {
  console.log(`\n── ${label} ──`);
  if (outcome.status === 'rejected') {
    console.log(`  rejected: ${outcome.reason}`);
    return;
  }
  const { components: c, breakdown: b } = outcome;
  console.log(`  infrastructure ${c.infrastructure.toFixed(3)}  (tps ${b.infrastructure.tps.toFixed(3)}, latency ${b.infrastructure.latency.toFixed(3)}, memory ${b.infrastructure.memory.toFixed(3)})`);
  console.log(`  participation  ${c.participation.toFixed(3)}  (compliance ${b.participation.compliance.toFixed(3)}, players ${b.participation.players.toFixed(3)})`);
  console.log(`  reliability    ${c.reliability.toFixed(3)}  (uptime ${b.reliability.uptime.toFixed(3)}, stability ${b.reliability.stability.toFixed(3)}, recovery ${b.reliability.recovery.toFixed(3)})`);
  console.log(`  raw ${c.raw.toFixed(3)} → penalized ${c.penalized.toFixed(3)}`);
  console.log(`  score ${outcome.score} (${outcome.classification})${outcome.penalty ? `, penalty ${outcome.penalty}` : ''}`);
  for (const note of outcome.verification.notes) console.log(`    · ${note}`);
}

const reports = Array.from({ length: REPORTS }, (_, i) => parse(wireReport(i))).reverse();
const [latest, ...older] = reports;
const history = HistoryWindow.from(older, config.maxHistory);

console.log('TickScore preview');
console.log(`  constants: ${Object.keys(describeConfig(config)).length} values, max score ${config.maxScore}`);

print('Honest server', evaluateReport({
  report: latest,
  publicKey: signer.publicKeyHex,
  history,
  replay: { lastCounter: older[0]?.counter ?? null },
  latencySeconds: 0.05,
  registrationValid: true,
  now: NOW,
}, config));

const noPlugin = parse(wireReport(REPORTS - 1, ['EssentialsX']));
print('Missing required plugin', evaluateReport({
  report: noPlugin,
  publicKey: signer.publicKeyHex,
  history,
  replay: { lastCounter: older[0]?.counter ?? null },
  latencySeconds: 0.05,
  registrationValid: true,
  now: NOW,
}, config));

const impostor = new ReportSigner();
print('Signed with the wrong key', evaluateReport({
  report: latest,
  publicKey: impostor.publicKeyHex,
  history,
  replay: { lastCounter: older[0]?.counter ?? null },
  latencySeconds: 0.05,
  registrationValid: true,
  now: NOW,
}, config));

print('Replayed report', evaluateReport({
  report: latest,
  publicKey: signer.publicKeyHex,
  history,
  replay: { lastCounter: latest.counter },
  latencySeconds: 0.05,
  registrationValid: true,
  now: NOW,
}, config));
