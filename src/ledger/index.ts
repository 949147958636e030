/**
 * TickScore — Ledger module barrel export
 */

export { getProvider, getSigner, closeClient } from './client.js';

export type { WeightEntry, PublishResult, WeightPublisher, SetWeightsCall } from './weights.js';
export {
  U16_MAX,
  entityIdToHash,
  toUint16Weights,
  LedgerWeightPublisher,
  LogOnlyWeightPublisher,
  createLedgerWeightPublisher,
} from './weights.js';
