/**
 * TickScore — Report Schema
 *
 * Parses untrusted Collector JSON into a typed Report. Unknown fields are
 * ignored; required fields that are missing or mistyped produce a
 * MalformedReport instead of a thrown error.
 *
 * Range checks (negative values, tick-duration bounds) are not
 * done here: those belong to the verifier's sanity stage, which clamps
 * rather than rejects most of them.
 */

import { z } from 'zod';
import type {
  ActivePlayer,
  MemoryInfo,
  Report,
  ReportPayload,
  SystemInfo,
} from './types.js';
import { ZERO_UUID } from './types.js';

// ---------------------------------------------------------------------------
// Wire schema
// ---------------------------------------------------------------------------

const num = z.number().finite();

const memorySchema = z.object({
  free_memory_bytes: num.nullish(),
  used_memory_bytes: num.nullish(),
  total_memory_bytes: num.nullish(),
});

const playerSchema = z.union([
  z.string(),
  z.object({
    name: z.string().nullish(),
    uuid: z.string().nullish(),
  }),
]);

const systemInfoSchema = z.object({
  cpu_cores: num.nullish(),
  cpu_model: z.string().nullish(),
  java_version: z.string().nullish(),
  os_name: z.string().nullish(),
  os_version: z.string().nullish(),
  os_arch: z.string().nullish(),
  uptime_ms: num.nullish(),
  memory_ram_info: memorySchema.nullish(),
});

const payloadSchema = z.object({
  active_players: z.array(playerSchema).nullish(),
  max_players: num,
  tps_millis: num,
  memory_ram_info: memorySchema.nullish(),
  plugins: z.union([z.array(z.string()), z.string()]).nullish(),
  system_info: systemInfoSchema.nullish(),
  uptime_ms: num.nullish(),
});

export const wireReportSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
  server_id: z.string().min(1),
  counter: z.number().int(),
  nonce: z.string().nullish(),
  client_timestamp_ms: num.nullish(),
  created_at: z.string().nullish(),
  payload_hash: z.string().nullish(),
  signature: z.string().nullish(),
  payload: payloadSchema,
});

export type ParsedWireReport = z.infer<typeof wireReportSchema>;

// ---------------------------------------------------------------------------
// Parse result
// ---------------------------------------------------------------------------

export interface MalformedReport {
  kind: 'MalformedReport';
  message: string;
  issues: string[];
}

export type ParseResult =
  | { ok: true; report: Report }
  | { ok: false; error: MalformedReport };

function malformed(message: string, issues: string[] = []): ParseResult {
  return { ok: false, error: { kind: 'MalformedReport', message, issues } };
}

/**
 * Parse a single Collector report object.
 */
export function parseReport(input: unknown): ParseResult {
  const parsed = wireReportSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join('.') || '(root)'}: ${i.message}`,
    );
    return malformed('Report does not match the telemetry schema', issues);
  }

  const wire = parsed.data;
  const createdAt = resolveCreatedAt(wire);
  if (createdAt === null) {
    return malformed('Report carries no usable timestamp', [
      'client_timestamp_ms: required when created_at is absent or unparseable',
    ]);
  }

  const rawPayload = isRecord(input) && isRecord(input.payload) ? input.payload : {};

  return {
    ok: true,
    report: {
      id: wire.id,
      entityId: wire.server_id,
      counter: wire.counter,
      nonce: wire.nonce ?? '',
      createdAt,
      payloadHash: wire.payload_hash || undefined,
      signature: wire.signature || undefined,
      payload: toPayload(wire.payload),
      rawPayload,
    },
  };
}

/**
 * Parse a JSON string. Invalid JSON is a MalformedReport like any other.
 */
export function parseReportJson(text: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return malformed('Report is not valid JSON', [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  return parseReport(data);
}

/**
 * Parse a batch, keeping the good ones and counting the rest.
 * Order is preserved.
 */
export function parseReports(items: unknown[]): { reports: Report[]; malformed: MalformedReport[] } {
  const reports: Report[] = [];
  const bad: MalformedReport[] = [];
  for (const item of items) {
    const result = parseReport(item);
    if (result.ok) reports.push(result.report);
    else bad.push(result.error);
  }
  return { reports, malformed: bad };
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

type WirePayloadParsed = ParsedWireReport['payload'];
type WireMemoryParsed = z.infer<typeof memorySchema>;

function resolveCreatedAt(wire: ParsedWireReport): number | null {
  if (wire.client_timestamp_ms !== undefined && wire.client_timestamp_ms !== null) {
    return wire.client_timestamp_ms;
  }
  if (wire.created_at) {
    const ms = Date.parse(wire.created_at);
    if (!Number.isNaN(ms)) return ms;
  }
  return null;
}

function toPayload(p: WirePayloadParsed): ReportPayload {
  const systemInfo: SystemInfo = {
    cpuCores: p.system_info?.cpu_cores ?? undefined,
    cpuModel: p.system_info?.cpu_model ?? undefined,
    javaVersion: p.system_info?.java_version ?? undefined,
    osName: p.system_info?.os_name ?? undefined,
    osVersion: p.system_info?.os_version ?? undefined,
    osArch: p.system_info?.os_arch ?? undefined,
    uptimeMs: p.system_info?.uptime_ms ?? p.uptime_ms ?? 0,
    memory: toMemory(p.system_info?.memory_ram_info),
  };

  return {
    activePlayers: (p.active_players ?? []).map(toPlayer),
    maxPlayers: p.max_players,
    tpsMillis: p.tps_millis,
    memory: toMemory(p.memory_ram_info),
    plugins: toPlugins(p.plugins),
    systemInfo,
  };
}

function toMemory(m: WireMemoryParsed | null | undefined): MemoryInfo | undefined {
  if (!m) return undefined;
  return {
    freeBytes: m.free_memory_bytes ?? 0,
    usedBytes: m.used_memory_bytes ?? 0,
    totalBytes: m.total_memory_bytes ?? 0,
  };
}

function toPlayer(p: string | { name?: string | null; uuid?: string | null }): ActivePlayer {
  if (typeof p === 'string') return { name: p, uuid: ZERO_UUID };
  const uuid = p.uuid ?? '';
  const wellFormed = uuid.length === 36 && uuid.split('-').length === 5;
  return {
    name: p.name ?? 'Unknown',
    uuid: wellFormed ? uuid.toLowerCase() : ZERO_UUID,
  };
}

function toPlugins(plugins: string[] | string | null | undefined): string[] {
  if (!plugins) return [];
  const list = typeof plugins === 'string' ? [plugins] : plugins;
  return list.map((p) => p.trim()).filter((p) => p.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
