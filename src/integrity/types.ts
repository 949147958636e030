/**
 * TickScore — Integrity Types
 *
 * Outcome types for the report verification pipeline:
 *   sanity → hash binding → signature → replay → clock drift
 */

import type { Report } from '../reports/types.js';

// ---------------------------------------------------------------------------
// Sanity limits
// ---------------------------------------------------------------------------

/** Shortest plausible tick (100 TPS) */
export const MIN_TPS_MILLIS = 10;
/** Longest plausible tick (0.04 TPS) */
export const MAX_TPS_MILLIS = 25_000;
/** max_players is clamped to this */
export const MAX_PLAYERS_SANITY = 10_000;
/** Default clock drift tolerance (15 minutes) */
export const DEFAULT_MAX_CLOCK_DRIFT_MS = 15 * 60_000;

// ---------------------------------------------------------------------------
// Reasons
// ---------------------------------------------------------------------------

/** Problems that stop a report from being scored at all */
export type RejectionReason = 'MalformedReport' | 'ReplayDetected';

/** Problems that let scoring continue under a penalty */
export type IntegrityFlag = 'IntegrityFailure' | 'SignatureFailure' | 'ClockDrift';

export type VerificationReason = RejectionReason | IntegrityFlag;

/** Most severe first; used to pick the single reported reason */
export const REASON_SEVERITY: readonly VerificationReason[] = [
  'MalformedReport',
  'ReplayDetected',
  'SignatureFailure',
  'IntegrityFailure',
  'ClockDrift',
];

export function isRejection(reason: VerificationReason | null): reason is RejectionReason {
  return reason === 'MalformedReport' || reason === 'ReplayDetected';
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** A numeric field that was out of range and clamped */
export interface SanityViolation {
  kind: 'SanityViolation';
  field: string;
  received: number;
  clampedTo: number;
}

export type SanityResult =
  | { ok: true; report: Report; violations: SanityViolation[] }
  | { ok: false; reason: 'MalformedReport'; message: string };

export interface VerificationChecks {
  sanity: boolean;
  hash: boolean;
  signature: boolean;
  replay: boolean;
  clock: boolean;
}

export interface VerificationResult {
  /** False only when the report must not be scored (rejection) */
  ok: boolean;
  /** Most severe problem found, or null when everything passed */
  reason: VerificationReason | null;
  checks: VerificationChecks;
  /** Penalty-grade problems to hand to the scorer */
  flags: IntegrityFlag[];
  sanityViolations: SanityViolation[];
  /** The sanitized report to score (clamped values) */
  report: Report;
  /** Human-readable verification notes */
  notes: string[];
}

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

/** Caller-supplied replay context for one entity */
export interface ReplayState {
  /** Counter of the last accepted report, null if none yet */
  lastCounter: number | null;
  /** Nonces already accepted for this entity */
  seenNonces?: ReadonlySet<string>;
}

export interface VerifierOptions {
  maxClockDriftMs: number;
  /** Accept reports that carry no signature at all */
  allowUnsigned: boolean;
}

export const DEFAULT_VERIFIER_OPTIONS: VerifierOptions = {
  maxClockDriftMs: DEFAULT_MAX_CLOCK_DRIFT_MS,
  allowUnsigned: false,
};
