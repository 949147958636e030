/**
 * TickScore — Ledger Client
 *
 * Singleton ethers.js provider and signer for the chain that weights are
 * published to. Reads the RPC endpoint and operator key from the
 * environment.
 *
 * Usage:
 *   import { getProvider, getSigner } from './client.js';
 *   const signer = getSigner();
 */

import { ethers } from 'ethers';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LEDGER_RPC_URL = process.env.TICKSCORE_LEDGER_RPC_URL || 'http://127.0.0.1:8545';

// ---------------------------------------------------------------------------
// Singleton instances
// ---------------------------------------------------------------------------

let _provider: ethers.JsonRpcProvider | null = null;
let _signer: ethers.Wallet | null = null;

export function getProvider(): ethers.JsonRpcProvider {
  if (!_provider) {
    _provider = new ethers.JsonRpcProvider(LEDGER_RPC_URL);
  }
  return _provider;
}

/**
 * Get (or create) the signer used to submit weights.
 * Reads TICKSCORE_LEDGER_PRIVATE_KEY from environment.
 */
export function getSigner(): ethers.Wallet {
  if (_signer) return _signer;

  const privateKey = process.env.TICKSCORE_LEDGER_PRIVATE_KEY;
  if (!privateKey) {
    throw new Error(
      'Missing TICKSCORE_LEDGER_PRIVATE_KEY environment variable.\n' +
        'Add the validator wallet private key to .env',
    );
  }

  _signer = new ethers.Wallet(privateKey, getProvider());
  return _signer;
}

/**
 * Close / reset the provider and signer. Call on shutdown.
 */
export function closeClient(): void {
  if (_provider) {
    _provider.destroy();
    _provider = null;
  }
  _signer = null;
}
