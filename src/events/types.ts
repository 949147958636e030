/**
 * TickScore — Event Types
 *
 * Events that flow through the internal EventEmitter and are broadcast to
 * connected WebSocket clients.
 */

import type { Classification, PenaltyKind } from '../scoring/types.js';
import type { RejectionReason } from '../integrity/types.js';

// ---------------------------------------------------------------------------
// Event type discriminators
// ---------------------------------------------------------------------------

export type WSEventType =
  | 'score:updated'
  | 'score:rejected'
  | 'score:zeroed'
  | 'cycle:completed'
  | 'weights:published'
  | 'connection:init';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface ScoreUpdatedEvent {
  type: 'score:updated';
  payload: {
    entityId: string;
    score: number;
    rawScore: number;
    previousScore: number | null;
    classification: Classification;
    penalty: PenaltyKind | null;
    reportId: string;
    timestamp: number;
  };
}

export interface ScoreRejectedEvent {
  type: 'score:rejected';
  payload: {
    entityId: string;
    reportId: string;
    reason: RejectionReason;
    timestamp: number;
  };
}

export interface ScoreZeroedEvent {
  type: 'score:zeroed';
  payload: {
    entityId: string;
    reason: 'no_reports' | 'reports_stale';
    previousScore: number | null;
    timestamp: number;
  };
}

export interface CycleCompletedEvent {
  type: 'cycle:completed';
  payload: {
    cycle: number;
    entities: number;
    scored: number;
    rejected: number;
    zeroed: number;
    failed: number;
    durationMs: number;
  };
}

export interface WeightsPublishedEvent {
  type: 'weights:published';
  payload: {
    submitted: number;
    skipped: number;
    txHash: string | null;
    timestamp: number;
  };
}

export interface ConnectionInitEvent {
  type: 'connection:init';
  payload: {
    serverTime: number;
    connectedClients: number;
    /** Scoring cycles completed since the validator started */
    cycles: number;
    /** Servers currently holding a published score */
    scoredEntities: number;
  };
}

// ---------------------------------------------------------------------------
// Union type
// ---------------------------------------------------------------------------

export type WSEvent =
  | ScoreUpdatedEvent
  | ScoreRejectedEvent
  | ScoreZeroedEvent
  | CycleCompletedEvent
  | WeightsPublishedEvent
  | ConnectionInitEvent;

// ---------------------------------------------------------------------------
// Internal emitter event map
// ---------------------------------------------------------------------------

export interface TickScoreEvents {
  'score:updated': [ScoreUpdatedEvent];
  'score:rejected': [ScoreRejectedEvent];
  'score:zeroed': [ScoreZeroedEvent];
  'cycle:completed': [CycleCompletedEvent];
  'weights:published': [WeightsPublishedEvent];
}
