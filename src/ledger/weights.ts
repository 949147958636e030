/**
 * TickScore — Weight Publisher
 *
 * Hands each entity's normalized weight (score / MAX_SCORE) to the ledger.
 * The weights contract takes parallel arrays of entity hashes and uint16
 * weights; zero weights are left out of the call.
 */

import { ethers } from 'ethers';
import { getSigner } from './client.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WeightEntry {
  entityId: string;
  /** Normalized weight in [0, 1] */
  weight: number;
}

export interface PublishResult {
  /** Entries sent to the ledger */
  submitted: number;
  /** Entries dropped because their weight rounded to 0 */
  skipped: number;
  txHash: string | null;
}

export interface WeightPublisher {
  publish(entries: readonly WeightEntry[]): Promise<PublishResult>;
}

export const U16_MAX = 65535;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/** Convert entity id to bytes32 keccak hash (matches contract) */
export function entityIdToHash(entityId: string): string {
  return ethers.id(entityId);
}

/**
 * Weights → contract arguments. Throws RangeError on a weight outside [0, 1].
 */
export function toUint16Weights(entries: readonly WeightEntry[]): {
  ids: string[];
  values: number[];
  skipped: number;
} {
  const ids: string[] = [];
  const values: number[] = [];
  let skipped = 0;

  for (const { entityId, weight } of entries) {
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new RangeError(`Weight for ${entityId} must be within [0, 1], got ${weight}`);
    }
    const value = Math.round(weight * U16_MAX);
    if (value === 0) {
      skipped++;
      continue;
    }
    ids.push(entityIdToHash(entityId));
    values.push(value);
  }

  return { ids, values, skipped };
}

// ---------------------------------------------------------------------------
// Ledger publisher
// ---------------------------------------------------------------------------

const WEIGHTS_ABI = [
  'function setWeights(bytes32[] entityIds, uint16[] weights) external',
  'event WeightsSet(address indexed validator, uint256 count)',
];

/** The one contract call the publisher needs */
export type SetWeightsCall = (
  ids: string[],
  values: number[],
) => Promise<{ hash: string; wait: () => Promise<unknown> }>;

export class LedgerWeightPublisher implements WeightPublisher {
  constructor(private readonly setWeights: SetWeightsCall) {}

  async publish(entries: readonly WeightEntry[]): Promise<PublishResult> {
    const { ids, values, skipped } = toUint16Weights(entries);
    if (ids.length === 0) {
      console.log('[ledger] All weights are zero, nothing to set');
      return { submitted: 0, skipped, txHash: null };
    }

    const tx = await this.setWeights(ids, values);
    await tx.wait();
    console.log(`[ledger] setWeights: ${ids.length} entities (tx: ${tx.hash})`);
    return { submitted: ids.length, skipped, txHash: tx.hash };
  }
}

/**
 * Publisher bound to the deployed weights contract, or null when no
 * contract address is configured.
 */
export function createLedgerWeightPublisher(
  contractAddress: string = process.env.TICKSCORE_WEIGHTS_CONTRACT || '',
): LedgerWeightPublisher | null {
  if (!contractAddress) return null;
  const contract = new ethers.Contract(contractAddress, WEIGHTS_ABI, getSigner());
  const setWeights = contract.getFunction('setWeights');
  return new LedgerWeightPublisher((ids, values) => setWeights(ids, values));
}

/** Publisher for local runs without a ledger: logs what it would send */
export class LogOnlyWeightPublisher implements WeightPublisher {
  async publish(entries: readonly WeightEntry[]): Promise<PublishResult> {
    const { ids, skipped } = toUint16Weights(entries);
    console.log(`[ledger] (log only) would set ${ids.length} weight(s), ${skipped} zero`);
    return { submitted: 0, skipped, txHash: null };
  }
}
