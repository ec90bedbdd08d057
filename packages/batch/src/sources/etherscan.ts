import { stripHexPrefix } from '../hex.js';
import type { CreationCodeSource } from '../batch.js';

// Etherscan V2 unified API: one key for every chain, chain selected by chainid
const ETHERSCAN_V2_API = 'https://api.etherscan.io/v2/api';

/** getcontractcreation takes at most this many addresses per call. */
export const MAX_ADDRESSES_PER_CALL = 5;

interface ContractCreationItem {
  contractAddress?: string;
  creationBytecode?: string;
}

interface EtherscanResponse {
  status: string;
  message: string;
  result: ContractCreationItem[] | string;
}

export function buildCreationUrl(addresses: string[], chainId: number, apiKey: string): string {
  const q = new URLSearchParams({
    chainid: String(chainId),
    module: 'contract',
    action: 'getcontractcreation',
    contractaddresses: addresses.join(','),
    apikey: apiKey,
  });
  return `${ETHERSCAN_V2_API}?${q}`;
}

/**
 * Look up creation bytecode for up to five contracts. Addresses Etherscan does
 * not know map to null; an error status from the API throws so callers can retry.
 */
export async function fetchCreationCodes(
  addresses: string[],
  chainId: number,
  apiKey: string,
  fetchFn: typeof fetch = fetch,
): Promise<Map<string, string | null>> {
  if (addresses.length > MAX_ADDRESSES_PER_CALL) {
    throw new Error(`Etherscan accepts at most ${MAX_ADDRESSES_PER_CALL} addresses per call, got ${addresses.length}`);
  }

  const res = await fetchFn(buildCreationUrl(addresses, chainId, apiKey), { signal: AbortSignal.timeout(30_000) });
  if (!res.ok) throw new Error(`Etherscan returned HTTP ${res.status}`);

  const data = await res.json() as EtherscanResponse;
  if (data.status !== '1' || data.message !== 'OK' || !Array.isArray(data.result)) {
    const detail = typeof data.result === 'string' ? data.result : data.message;
    throw new Error(`Etherscan API error: ${detail}`);
  }

  const codes = new Map<string, string | null>(addresses.map(a => [a.toLowerCase(), null]));
  for (const item of data.result) {
    const address = item.contractAddress?.toLowerCase();
    if (address && item.creationBytecode) {
      codes.set(address, stripHexPrefix(item.creationBytecode));
    }
  }
  return codes;
}

export function createEtherscanSource(apiKey: string, fetchFn: typeof fetch = fetch): CreationCodeSource {
  return {
    name: 'Etherscan',
    async fetch(row, chainId) {
      const codes = await fetchCreationCodes([row.address], chainId, apiKey, fetchFn);
      return codes.get(row.address.toLowerCase()) ?? null;
    },
  };
}
