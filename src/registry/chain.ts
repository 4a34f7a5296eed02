/**
 * Chain lookup over JSON-RPC.
 *
 * @module registry/chain
 */

import { Connection, PublicKey } from '@solana/web3.js';

import { log } from '../debug/index.js';
import type { ChainLookup } from './collision.js';

/**
 * ChainLookup backed by `getAccountInfo`. Connections are reused per RPC URL.
 */
export function createRpcChainLookup(): ChainLookup {
  const connections = new Map<string, Connection>();
  return async (pubkey, rpcUrl) => {
    let connection = connections.get(rpcUrl);
    if (!connection) {
      connection = new Connection(rpcUrl, 'confirmed');
      connections.set(rpcUrl, connection);
    }
    const info = await connection.getAccountInfo(new PublicKey(pubkey));
    log.debug('Registry', `${pubkey} on ${rpcUrl}: ${info ? `${info.data.length} bytes` : 'absent'}`);
    return info !== null;
  };
}
