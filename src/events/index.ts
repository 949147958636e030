export { tickScoreEmitter, TickScoreEmitter } from './emitter.js';
export { initWebSocketServer, broadcast, getConnectedClientCount, closeWebSocketServer } from './ws-server.js';
export type { ValidatorStatus } from './ws-server.js';
export type {
  WSEvent,
  WSEventType,
  TickScoreEvents,
  ScoreUpdatedEvent,
  ScoreRejectedEvent,
  ScoreZeroedEvent,
  CycleCompletedEvent,
  WeightsPublishedEvent,
} from './types.js';
