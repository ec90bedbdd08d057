import { ethers } from 'ethers';
import { stripHexPrefix } from '../hex.js';
import type { CreationCodeSource } from '../batch.js';

/** The slice of an ethers provider needed to read a deployment transaction. */
export interface TransactionLookup {
  getTransaction(hash: string): Promise<{ data: string; to: string | null } | null>;
}

export function createProvider(rpcUrl: string, chainId?: number): ethers.JsonRpcProvider {
  return chainId === undefined
    ? new ethers.JsonRpcProvider(rpcUrl)
    : new ethers.JsonRpcProvider(rpcUrl, chainId, { staticNetwork: true });
}

/** Creation bytecode is the input of the transaction that deployed the contract. */
export async function fetchCreationCodeFromTx(txHash: string, lookup: TransactionLookup): Promise<string> {
  const tx = await lookup.getTransaction(txHash);
  if (!tx) throw new Error(`Transaction ${txHash} not found`);
  if (tx.to !== null) throw new Error(`Transaction ${txHash} is not a contract deployment`);
  if (!tx.data || tx.data === '0x') throw new Error(`Transaction ${txHash} has empty creation code`);
  return stripHexPrefix(tx.data);
}

export function createRpcSource(lookup: TransactionLookup): CreationCodeSource {
  return {
    name: 'RPC',
    async fetch(row) {
      if (!row.txHash) throw new Error(`No deployment tx_hash for ${row.address}`);
      return fetchCreationCodeFromTx(row.txHash, lookup);
    },
  };
}
