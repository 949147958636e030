/**
 * TickScore — History Window
 *
 * Fixed-capacity ring buffer of past reports for one entity. Inserting past
 * capacity evicts the oldest report. Views are returned most-recent-first
 * unless stated otherwise.
 *
 * The caller owns one window per entity; the scoring engine only reads it.
 */

import type { Report } from './types.js';

/** Default per-entity history capacity */
export const DEFAULT_HISTORY_CAPACITY = 60;

/** Lower bound on a stale report's freshness weight */
export const MIN_FRESHNESS_WEIGHT = 0.1;

export interface WeightedReport {
  report: Report;
  /** 1.0 for fresh reports, decaying toward MIN_FRESHNESS_WEIGHT with age */
  weight: number;
}

export class HistoryWindow {
  readonly capacity: number;
  private readonly slots: Array<Report | undefined>;
  /** Index the next push writes to */
  private head = 0;
  private size = 0;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<Report | undefined>(capacity).fill(undefined);
  }

  /**
   * Build a window from reports ordered most-recent-first, as the Collector
   * returns them. Anything past capacity is dropped from the old end.
   */
  static from(reports: readonly Report[], capacity: number = DEFAULT_HISTORY_CAPACITY): HistoryWindow {
    const window = new HistoryWindow(capacity);
    for (let i = Math.min(reports.length, capacity) - 1; i >= 0; i--) {
      window.push(reports[i]);
    }
    return window;
  }

  get length(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Append a report as the newest entry. Returns the evicted report when
   * the window was already full.
   */
  push(report: Report): Report | undefined {
    const evicted = this.size === this.capacity ? this.slots[this.head] : undefined;
    this.slots[this.head] = report;
    this.head = (this.head + 1) % this.capacity;
    if (this.size < this.capacity) this.size++;
    return evicted;
  }

  /** The report `offset` positions back from the newest (0 = newest). */
  at(offset: number): Report | undefined {
    if (offset < 0 || offset >= this.size) return undefined;
    const index = (this.head - 1 - offset + this.capacity * 2) % this.capacity;
    return this.slots[index];
  }

  /** All reports, most-recent-first */
  toArray(): Report[] {
    return this.recent(this.size);
  }

  /** Up to `count` newest reports, most-recent-first */
  recent(count: number): Report[] {
    const n = Math.max(0, Math.min(count, this.size));
    const out: Report[] = [];
    for (let i = 0; i < n; i++) {
      const report = this.at(i);
      if (report) out.push(report);
    }
    return out;
  }

  /** Up to `count` newest reports, oldest-first */
  chronological(count: number = this.size): Report[] {
    return this.recent(count).reverse();
  }

  /**
   * Newest `count` reports with a freshness weight relative to `now`.
   * Stale reports are down-weighted, never dropped.
   */
  freshnessWeighted(now: number, cutoffMs: number, count: number = this.size): WeightedReport[] {
    return this.recent(count).map((report) => ({
      report,
      weight: freshnessWeight(now - report.createdAt, cutoffMs),
    }));
  }
}

/**
 * Weight for a report of the given age. Reports at or under the cutoff
 * count fully; older ones fall off as cutoff/age, floored.
 */
export function freshnessWeight(ageMs: number, cutoffMs: number): number {
  if (ageMs <= cutoffMs || cutoffMs <= 0) return 1.0;
  return Math.max(MIN_FRESHNESS_WEIGHT, cutoffMs / ageMs);
}
