/**
 * TickScore — Integrity module barrel export
 */

export type {
  RejectionReason,
  IntegrityFlag,
  VerificationReason,
  SanityViolation,
  SanityResult,
  VerificationChecks,
  VerificationResult,
  ReplayState,
  VerifierOptions,
} from './types.js';
export {
  MIN_TPS_MILLIS,
  MAX_TPS_MILLIS,
  MAX_PLAYERS_SANITY,
  DEFAULT_MAX_CLOCK_DRIFT_MS,
  REASON_SEVERITY,
  DEFAULT_VERIFIER_OPTIONS,
  isRejection,
} from './types.js';

export {
  canonicalPayloadJson,
  canonicalPayloadBytes,
  computePayloadHash,
  hashesMatch,
} from './canonical.js';
export { decodeKeyMaterial, toPublicKey, verifyEd25519, ReportSigner } from './keys.js';
export {
  IntegrityVerifier,
  checkSanity,
  checkPayloadHash,
  checkSignature,
  checkReplay,
  checkClockDrift,
} from './verifier.js';
export type { ReplayGuardStats, ReplaySnapshot } from './replay.js';
export { ReplayGuard, DEFAULT_NONCE_RETENTION_MS } from './replay.js';
