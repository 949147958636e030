/**
 * TickScore — Canonical Payload Serialization
 *
 * Servers and validators must agree byte-for-byte on what gets hashed and
 * signed. The payload is serialized with RFC 8785 (JSON Canonicalization
 * Scheme) after sorting the two order-insensitive arrays: active players
 * and plugins.
 */

import { createHash } from 'node:crypto';
import canonicalize from 'canonicalize';

/**
 * Canonical JSON string of a report payload as received on the wire.
 * Throws when the payload holds values JSON cannot represent.
 */
export function canonicalPayloadJson(payload: Readonly<Record<string, unknown>>): string {
  const normalized: Record<string, unknown> = { ...payload };

  if (Array.isArray(payload.active_players)) {
    normalized.active_players = sortCanonically(payload.active_players);
  }
  if (Array.isArray(payload.plugins)) {
    normalized.plugins = sortCanonically(payload.plugins);
  }

  const json = canonicalize(normalized);
  if (json === undefined) throw new Error('Failed to canonicalize payload');
  return json;
}

/** UTF-8 bytes of the canonical payload, i.e. the signed message */
export function canonicalPayloadBytes(payload: Readonly<Record<string, unknown>>): Buffer {
  return Buffer.from(canonicalPayloadJson(payload), 'utf-8');
}

/**
 * SHA-256 of the canonical payload, base64url without padding.
 */
export function computePayloadHash(payload: Readonly<Record<string, unknown>>): string {
  return createHash('sha256').update(canonicalPayloadBytes(payload)).digest('base64url');
}

/** Compare hashes ignoring base64 padding */
export function hashesMatch(expected: string, actual: string): boolean {
  return stripPadding(expected) === stripPadding(actual);
}

function stripPadding(value: string): string {
  return value.trim().replace(/=+$/, '');
}

function sortCanonically(items: unknown[]): unknown[] {
  return items
    .map((item) => ({ item, key: canonicalize(item) ?? '' }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ item }) => item);
}
