/**
 * TickScore — Ed25519 Keys & Signatures
 *
 * Servers sign the canonical payload with an Ed25519 key registered with
 * the Collector. Public keys arrive either as raw 32-byte keys or as DER
 * SPKI, hex or base64url encoded; signatures are base64url.
 *
 * ReportSigner plays the server's side. The validator never signs, but the
 * preview script and tests need well-formed signed reports.
 */

import {
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify,
  type KeyObject,
} from 'node:crypto';
import type { WirePayload, WireReport } from '../reports/types.js';
import { canonicalPayloadBytes, computePayloadHash } from './canonical.js';

/** DER prefix that turns a raw 32-byte Ed25519 key into SPKI */
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');
const RAW_KEY_LENGTH = 32;

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/** Decode hex (even length, hex digits only) or base64/base64url key material */
export function decodeKeyMaterial(encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (trimmed.length % 2 === 0 && /^[0-9a-fA-F]+$/.test(trimmed)) {
    return Buffer.from(trimmed, 'hex');
  }
  return Buffer.from(trimmed, 'base64url');
}

/**
 * Build a public KeyObject from an encoded key. Returns null for anything
 * that is not a usable Ed25519 key.
 */
export function toPublicKey(encoded: string): KeyObject | null {
  const bytes = decodeKeyMaterial(encoded);
  if (bytes.length === 0) return null;

  const der = bytes.length === RAW_KEY_LENGTH
    ? Buffer.concat([ED25519_SPKI_PREFIX, bytes])
    : bytes;

  try {
    const key = createPublicKey({ key: der, format: 'der', type: 'spki' });
    return key.asymmetricKeyType === 'ed25519' ? key : null;
  } catch {
    return null;
  }
}

/**
 * Verify a base64url Ed25519 signature over `message`.
 */
export function verifyEd25519(message: Buffer, signature: string, publicKey: string): boolean {
  const key = toPublicKey(publicKey);
  if (!key) return false;

  const signatureBytes = Buffer.from(signature.trim(), 'base64url');
  if (signatureBytes.length !== 64) return false;

  try {
    return verify(null, message, key, signatureBytes);
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Server-side signer
// ---------------------------------------------------------------------------

export class ReportSigner {
  private readonly privateKey: KeyObject;
  /** Raw 32-byte public key, hex */
  readonly publicKeyHex: string;

  constructor() {
    const keypair = generateKeyPairSync('ed25519');
    this.privateKey = keypair.privateKey;
    const spki = keypair.publicKey.export({ type: 'spki', format: 'der' });
    this.publicKeyHex = spki.subarray(ED25519_SPKI_PREFIX.length).toString('hex');
  }

  /** Sign the canonical form of a payload; returns base64url */
  signPayload(payload: WirePayload): string {
    return sign(null, canonicalPayloadBytes(toRecord(payload)), this.privateKey).toString('base64url');
  }

  /**
   * Return a copy of the report with `payload_hash` and `signature` filled
   * in for its current payload.
   */
  signReport(report: WireReport): WireReport {
    return {
      ...report,
      payload_hash: computePayloadHash(toRecord(report.payload)),
      signature: this.signPayload(report.payload),
    };
  }
}

function toRecord(payload: WirePayload): Record<string, unknown> {
  return { ...payload };
}
