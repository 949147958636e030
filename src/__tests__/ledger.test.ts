import { afterEach, describe, it, expect, vi } from 'vitest';
import { ethers } from 'ethers';
import {
  LedgerWeightPublisher,
  LogOnlyWeightPublisher,
  U16_MAX,
  entityIdToHash,
  toUint16Weights,
} from '../ledger/weights.js';
import type { SetWeightsCall } from '../ledger/weights.js';
import { closeClient, getProvider, getSigner } from '../ledger/client.js';

describe('toUint16Weights', () => {
  it('scales weights to uint16 and hashes entity ids', () => {
    const result = toUint16Weights([
      { entityId: 'srv-1', weight: 1 },
      { entityId: 'srv-2', weight: 0.5 },
      { entityId: 'srv-3', weight: 0 },
    ]);
    expect(result.ids).toEqual([ethers.id('srv-1'), ethers.id('srv-2')]);
    expect(result.values).toEqual([U16_MAX, 32768]);
    expect(result.skipped).toBe(1);
  });

  it('skips weights that round to zero', () => {
    expect(toUint16Weights([{ entityId: 'srv-1', weight: 0.000001 }]).skipped).toBe(1);
  });

  it('rejects weights outside [0, 1]', () => {
    expect(() => toUint16Weights([{ entityId: 'srv-1', weight: 1.5 }])).toThrow(RangeError);
    expect(() => toUint16Weights([{ entityId: 'srv-1', weight: Number.NaN }])).toThrow(
      'Weight for srv-1 must be within [0, 1], got NaN',
    );
  });

  it('hashes ids as keccak256 of their UTF-8 bytes', () => {
    expect(entityIdToHash('srv-1')).toBe(ethers.keccak256(ethers.toUtf8Bytes('srv-1')));
  });
});

describe('LedgerWeightPublisher', () => {
  it('sends non-zero weights in one call and waits for the receipt', async () => {
    const wait = vi.fn(async () => ({ status: 1 }));
    const setWeights = vi.fn<SetWeightsCall>(async () => ({ hash: '0xabc', wait }));
    const publisher = new LedgerWeightPublisher(setWeights);

    const result = await publisher.publish([
      { entityId: 'srv-1', weight: 0.869 },
      { entityId: 'srv-2', weight: 0 },
    ]);

    expect(setWeights).toHaveBeenCalledOnce();
    expect(setWeights).toHaveBeenCalledWith([ethers.id('srv-1')], [Math.round(0.869 * U16_MAX)]);
    expect(wait).toHaveBeenCalledOnce();
    expect(result).toEqual({ submitted: 1, skipped: 1, txHash: '0xabc' });
  });

  it('does not call the contract when every weight is zero', async () => {
    const setWeights = vi.fn<SetWeightsCall>(async () => ({ hash: '0x0', wait: async () => null }));
    const result = await new LedgerWeightPublisher(setWeights).publish([{ entityId: 'srv-1', weight: 0 }]);
    expect(setWeights).not.toHaveBeenCalled();
    expect(result).toEqual({ submitted: 0, skipped: 1, txHash: null });
  });

  it('propagates contract errors', async () => {
    const setWeights = vi.fn<SetWeightsCall>(async () => {
      throw new Error('execution reverted');
    });
    await expect(
      new LedgerWeightPublisher(setWeights).publish([{ entityId: 'srv-1', weight: 1 }]),
    ).rejects.toThrow('execution reverted');
  });
});

describe('LogOnlyWeightPublisher', () => {
  it('reports what it would have sent without a transaction', async () => {
    const result = await new LogOnlyWeightPublisher().publish([
      { entityId: 'srv-1', weight: 1 },
      { entityId: 'srv-2', weight: 0 },
    ]);
    expect(result).toEqual({ submitted: 0, skipped: 1, txHash: null });
  });
});

describe('ledger client', () => {
  afterEach(() => {
    closeClient();
    vi.unstubAllEnvs();
  });

  it('reuses one provider until closed', () => {
    const first = getProvider();
    expect(getProvider()).toBe(first);
    closeClient();
    expect(getProvider()).not.toBe(first);
  });

  it('requires the operator key before signing', () => {
    vi.stubEnv('TICKSCORE_LEDGER_PRIVATE_KEY', '');
    expect(() => getSigner()).toThrow(/^Missing TICKSCORE_LEDGER_PRIVATE_KEY/);
  });

  it('builds the signer from the operator key on the shared provider', () => {
    const wallet = ethers.Wallet.createRandom();
    vi.stubEnv('TICKSCORE_LEDGER_PRIVATE_KEY', wallet.privateKey);
    const signer = getSigner();
    expect(signer.address).toBe(wallet.address);
    expect(signer.provider).toBe(getProvider());
    expect(getSigner()).toBe(signer);
  });
});
