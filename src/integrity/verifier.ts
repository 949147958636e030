/**
 * TickScore — Report Integrity Verifier
 *
 * Verification pipeline for a parsed telemetry report:
 *   1. Sanity       — clamp out-of-range numbers, reject structural corruption
 *   2. Hash binding — recompute the canonical payload hash, compare to payload_hash
 *   3. Signature    — Ed25519 over the canonical payload with the server's key
 *   4. Replay       — counter strictly above the last accepted one, nonce unseen
 *   5. Clock drift  — created_at within tolerance of the validator's clock
 *
 * Steps 1 and 4 reject the report outright. Steps 2, 3 and 5 only flag it;
 * the scorer turns flags into penalties. The verifier holds no state: the
 * caller passes the replay context in and records acceptance afterwards.
 */

import type { MemoryInfo, Report } from '../reports/types.js';
import type {
  IntegrityFlag,
  ReplayState,
  SanityResult,
  SanityViolation,
  VerificationChecks,
  VerificationReason,
  VerificationResult,
  VerifierOptions,
} from './types.js';
import {
  DEFAULT_VERIFIER_OPTIONS,
  MAX_PLAYERS_SANITY,
  MAX_TPS_MILLIS,
  MIN_TPS_MILLIS,
  REASON_SEVERITY,
} from './types.js';
import { canonicalPayloadBytes, computePayloadHash, hashesMatch } from './canonical.js';
import { verifyEd25519 } from './keys.js';

// ---------------------------------------------------------------------------
// Verifier
// ---------------------------------------------------------------------------

export class IntegrityVerifier {
  private readonly options: VerifierOptions;

  constructor(options: Partial<VerifierOptions> = {}) {
    this.options = { ...DEFAULT_VERIFIER_OPTIONS, ...options };
  }

  /**
   * Run the full pipeline.
   *
   * @param expectedPublicKey - Current key from the resolver, null if unknown
   * @param now - Validator wall-clock time (ms)
   * @param replay - Last accepted counter / nonces for this entity
   */
  verify(
    report: Report,
    expectedPublicKey: string | null,
    now: number,
    replay: ReplayState = { lastCounter: null },
  ): VerificationResult {
    const notes: string[] = [];
    const checks: VerificationChecks = {
      sanity: false,
      hash: false,
      signature: false,
      replay: false,
      clock: false,
    };
    const flags: IntegrityFlag[] = [];

    // 1. Sanity
    const sanity = checkSanity(report);
    if (!sanity.ok) {
      notes.push(`Sanity: REJECTED — ${sanity.message}`);
      return {
        ok: false,
        reason: 'MalformedReport',
        checks,
        flags,
        sanityViolations: [],
        report,
        notes,
      };
    }
    checks.sanity = true;
    if (sanity.violations.length === 0) {
      notes.push('Sanity: all fields in range');
    } else {
      for (const v of sanity.violations) {
        notes.push(`Sanity: ${v.field}=${v.received} clamped to ${v.clampedTo}`);
      }
    }

    // 2. Hash binding
    checks.hash = this.verifyHash(report, notes);
    if (!checks.hash) flags.push('IntegrityFailure');

    // 3. Signature
    checks.signature = this.verifySignature(report, expectedPublicKey, notes);
    if (!checks.signature) flags.push('SignatureFailure');

    // 4. Replay
    checks.replay = checkReplay(report, replay);
    if (!checks.replay) {
      notes.push(
        `Replay: REJECTED — counter ${report.counter} not above ${replay.lastCounter ?? 'none'}` +
        (report.nonce && replay.seenNonces?.has(report.nonce) ? ' or nonce already used' : ''),
      );
      return {
        ok: false,
        reason: 'ReplayDetected',
        checks,
        flags,
        sanityViolations: sanity.violations,
        report: sanity.report,
        notes,
      };
    }
    notes.push(`Replay: counter ${report.counter} accepted`);

    // 5. Clock drift
    checks.clock = checkClockDrift(report.createdAt, now, this.options.maxClockDriftMs);
    if (checks.clock) {
      notes.push('Clock: within tolerance');
    } else {
      const driftMin = Math.round(Math.abs(now - report.createdAt) / 60_000);
      notes.push(`Clock: DRIFT of ~${driftMin}m exceeds ${this.options.maxClockDriftMs / 60_000}m tolerance`);
      flags.push('ClockDrift');
    }

    return {
      ok: true,
      reason: mostSevere(flags),
      checks,
      flags,
      sanityViolations: sanity.violations,
      report: sanity.report,
      notes,
    };
  }

  // -----------------------------------------------------------------------
  // Step 2: Hash Binding
  // -----------------------------------------------------------------------

  private verifyHash(report: Report, notes: string[]): boolean {
    if (!report.payloadHash) {
      notes.push('Hash: none supplied — nothing to bind');
      return true;
    }

    const valid = checkPayloadHash(report);
    if (valid) {
      notes.push(`Hash: MATCH (${report.payloadHash.slice(0, 12)}...)`);
    } else {
      notes.push(`Hash: MISMATCH — payload does not hash to ${report.payloadHash.slice(0, 12)}...`);
    }
    return valid;
  }

  // -----------------------------------------------------------------------
  // Step 3: Signature
  // -----------------------------------------------------------------------

  private verifySignature(report: Report, publicKey: string | null, notes: string[]): boolean {
    if (!report.signature && this.options.allowUnsigned) {
      notes.push('Signature: absent, accepted (unsigned reports allowed)');
      return true;
    }
    if (!report.signature) {
      notes.push('Signature: MISSING');
      return false;
    }
    if (!publicKey) {
      notes.push(`Signature: no public key known for ${report.entityId}`);
      return false;
    }

    const valid = checkSignature(report, publicKey);
    notes.push(valid ? 'Signature: valid (Ed25519)' : 'Signature: INVALID — cryptographic verification failed');
    return valid;
  }
}

// ---------------------------------------------------------------------------
// Individual checks
// ---------------------------------------------------------------------------

/**
 * Clamp out-of-range values; reject negatives, which no honest server emits.
 */
export function checkSanity(report: Report): SanityResult {
  const p = report.payload;
  const memories = [p.memory, p.systemInfo.memory].filter((m): m is MemoryInfo => m !== undefined);

  const negatives: string[] = [];
  if (report.counter < 0) negatives.push('counter');
  if (p.tpsMillis < 0) negatives.push('tps_millis');
  if (p.maxPlayers < 0) negatives.push('max_players');
  if (p.systemInfo.uptimeMs < 0) negatives.push('uptime_ms');
  for (const m of memories) {
    if (m.freeBytes < 0 || m.usedBytes < 0 || m.totalBytes < 0) {
      negatives.push('memory_ram_info');
      break;
    }
  }
  if (negatives.length > 0) {
    return {
      ok: false,
      reason: 'MalformedReport',
      message: `negative value in ${negatives.join(', ')}`,
    };
  }

  const violations: SanityViolation[] = [];
  const tpsMillis = clampField('tps_millis', p.tpsMillis, MIN_TPS_MILLIS, MAX_TPS_MILLIS, violations);
  const maxPlayers = clampField('max_players', p.maxPlayers, 0, MAX_PLAYERS_SANITY, violations);

  if (violations.length === 0) return { ok: true, report, violations };

  return {
    ok: true,
    report: { ...report, payload: { ...p, tpsMillis, maxPlayers } },
    violations,
  };
}

/** True when the report's payload_hash matches its canonical payload */
export function checkPayloadHash(report: Report): boolean {
  if (!report.payloadHash) return true;
  try {
    return hashesMatch(report.payloadHash, computePayloadHash(report.rawPayload));
  } catch {
    return false;
  }
}

/** True when the report carries a valid signature for `publicKey` */
export function checkSignature(report: Report, publicKey: string): boolean {
  if (!report.signature) return false;
  try {
    return verifyEd25519(canonicalPayloadBytes(report.rawPayload), report.signature, publicKey);
  } catch {
    return false;
  }
}

/** True unless the counter regressed or the nonce was seen before */
export function checkReplay(report: Report, state: ReplayState): boolean {
  if (state.lastCounter !== null && report.counter <= state.lastCounter) return false;
  if (report.nonce && state.seenNonces?.has(report.nonce)) return false;
  return true;
}

export function checkClockDrift(createdAt: number, now: number, toleranceMs: number): boolean {
  return Math.abs(now - createdAt) <= toleranceMs;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function clampField(
  field: string,
  value: number,
  min: number,
  max: number,
  violations: SanityViolation[],
): number {
  const clamped = Math.max(min, Math.min(max, value));
  if (clamped !== value) {
    violations.push({ kind: 'SanityViolation', field, received: value, clampedTo: clamped });
  }
  return clamped;
}

function mostSevere(flags: IntegrityFlag[]): VerificationReason | null {
  for (const reason of REASON_SEVERITY) {
    if (flags.some((flag) => flag === reason)) return reason;
  }
  return null;
}
