/**
 * TickScore — Report Types
 *
 * Telemetry reports as submitted by a Minecraft server plugin and relayed
 * by the Collector. The wire form is snake_case JSON; everything past the
 * schema parser works with the camelCase shapes below.
 */

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

export interface ActivePlayer {
  name: string;
  uuid: string;
}

export interface MemoryInfo {
  freeBytes: number;
  usedBytes: number;
  totalBytes: number;
}

export interface SystemInfo {
  cpuCores?: number;
  cpuModel?: string;
  javaVersion?: string;
  osName?: string;
  osVersion?: string;
  osArch?: string;
  /** Process uptime reported by the server (ms) */
  uptimeMs: number;
  memory?: MemoryInfo;
}

export interface ReportPayload {
  activePlayers: ActivePlayer[];
  maxPlayers: number;
  /** Milliseconds per tick (50 = 20 TPS) */
  tpsMillis: number;
  memory?: MemoryInfo;
  plugins: string[];
  systemInfo: SystemInfo;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

/**
 * One signed telemetry submission. Immutable once parsed; the verifier
 * returns a sanitized copy rather than editing the original.
 */
export interface Report {
  id: string;
  /** Owning server identifier */
  entityId: string;
  /** Strictly increasing per entity across accepted reports */
  counter: number;
  nonce: string;
  /** Unix timestamp (ms) the server created the report */
  createdAt: number;
  /** base64url SHA-256 of the canonical payload, when the report carries one */
  payloadHash?: string;
  /** base64url Ed25519 signature over the canonical payload */
  signature?: string;
  payload: ReportPayload;
  /**
   * The payload exactly as received on the wire. Hashes and signatures are
   * computed over this (unknown fields included), never over the parsed form.
   */
  rawPayload: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Wire form
// ---------------------------------------------------------------------------

export interface WireMemoryInfo {
  free_memory_bytes?: number;
  used_memory_bytes?: number;
  total_memory_bytes?: number;
}

export interface WireSystemInfo {
  cpu_cores?: number;
  cpu_model?: string;
  java_version?: string;
  os_name?: string;
  os_version?: string;
  os_arch?: string;
  uptime_ms?: number;
  memory_ram_info?: WireMemoryInfo;
}

export interface WirePayload {
  active_players?: Array<string | { name?: string; uuid?: string }>;
  max_players: number;
  tps_millis: number;
  memory_ram_info?: WireMemoryInfo;
  plugins?: string[] | string;
  system_info?: WireSystemInfo;
  uptime_ms?: number;
}

export interface WireReport {
  id: string;
  server_id: string;
  counter: number;
  nonce?: string;
  client_timestamp_ms?: number;
  created_at?: string;
  payload_hash?: string;
  signature?: string;
  payload: WirePayload;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Placeholder UUID some server builds send for offline-mode players */
export const ZERO_UUID = '00000000-0000-0000-0000-000000000000';

/** Actual ticks per second for a tick duration in milliseconds */
export function tpsFromMillis(tpsMillis: number): number {
  if (tpsMillis <= 0) return 0;
  return 1000 / tpsMillis;
}

/** Reported memory, preferring the payload-level block over system info */
export function reportMemory(payload: ReportPayload): MemoryInfo | undefined {
  if (payload.memory && payload.memory.totalBytes > 0) return payload.memory;
  return payload.systemInfo.memory ?? payload.memory;
}
