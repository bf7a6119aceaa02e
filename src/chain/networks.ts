export interface NetworkPreset {
  key: string;
  name: string;
  chainId: number;
  rpcUrl: string;
  symbol: string;
}

export const NETWORKS: Record<string, NetworkPreset> = {
  'flare-coston': {
    key: 'flare-coston',
    name: 'Flare Coston',
    chainId: 16,
    rpcUrl: 'https://coston-api.flare.network/ext/bc/C/rpc',
    symbol: 'CFLR',
  },
  songbird: {
    key: 'songbird',
    name: 'Songbird',
    chainId: 19,
    rpcUrl: 'https://songbird-api.flare.network/ext/C/rpc',
    symbol: 'SGB',
  },
  flare: {
    key: 'flare',
    name: 'Flare',
    chainId: 14,
    rpcUrl: 'https://flare-api.flare.network/ext/C/rpc',
    symbol: 'FLR',
  },
};

export const DEFAULT_NETWORK = 'flare-coston';

const CHAIN_NAMES: Record<number, { name: string; symbol: string }> = {
  14: { name: 'Flare', symbol: 'FLR' },
  16: { name: 'Flare Coston', symbol: 'CFLR' },
  19: { name: 'Songbird', symbol: 'SGB' },
  114: { name: 'Flare Coston2', symbol: 'C2FLR' },
};

export function findNetwork(name: string): NetworkPreset | undefined {
  return NETWORKS[name.trim().toLowerCase()];
}

export const UNKNOWN_CHAIN = { name: 'Unknown', symbol: 'ETH' };

export function describeChain(chainId: number): { name: string; symbol: string } {
  return CHAIN_NAMES[chainId] ?? UNKNOWN_CHAIN;
}
