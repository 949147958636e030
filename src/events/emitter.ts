/**
 * TickScore — Singleton EventEmitter
 *
 * Central event bus. The scoring cycle emits here and the WebSocket server
 * subscribes to forward events to connected clients.
 */

import { EventEmitter } from 'node:events';
import type { TickScoreEvents } from './types.js';

export class TickScoreEmitter extends EventEmitter {
  /**
   * Type-safe emit wrapper.
   */
  emitEvent<K extends keyof TickScoreEvents>(
    eventName: K,
    ...args: TickScoreEvents[K]
  ): boolean {
    return this.emit(eventName, ...args);
  }

  /**
   * Type-safe listener wrapper.
   */
  onEvent<K extends keyof TickScoreEvents>(
    eventName: K,
    listener: (...args: TickScoreEvents[K]) => void,
  ): this {
    return this.on(eventName, listener);
  }
}

/** Singleton instance — import this everywhere */
export const tickScoreEmitter = new TickScoreEmitter();
tickScoreEmitter.setMaxListeners(50);
