/**
 * TickScore — Reports module barrel export
 */

export type {
  ActivePlayer,
  MemoryInfo,
  SystemInfo,
  ReportPayload,
  Report,
  WireReport,
  WirePayload,
  WireMemoryInfo,
  WireSystemInfo,
} from './types.js';
export { ZERO_UUID, tpsFromMillis, reportMemory } from './types.js';

export type { MalformedReport, ParseResult, ParsedWireReport } from './schema.js';
export { parseReport, parseReportJson, parseReports, wireReportSchema } from './schema.js';

export type { WeightedReport } from './history.js';
export {
  HistoryWindow,
  freshnessWeight,
  DEFAULT_HISTORY_CAPACITY,
  MIN_FRESHNESS_WEIGHT,
} from './history.js';
