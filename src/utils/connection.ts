import { Address, createPublicClient, erc20Abi, http } from 'viem';

/** The slice of a JSON-RPC node the chain client needs. */
export interface ChainReader {
  getChainId(): Promise<number>;
  getBlockNumber(): Promise<bigint>;
  getGasPrice(): Promise<bigint>;
  getBalance(address: Address): Promise<bigint>;
  readErc20(token: Address, owner: Address): Promise<{ raw: bigint; decimals: number; symbol: string }>;
}

export type ChainReaderFactory = (rpcUrl: string, timeoutMs: number) => ChainReader;

/** One round trip per call: viem's transport retries are switched off. */
export const createConnection: ChainReaderFactory = (rpcUrl, timeoutMs) => {
  const client = createPublicClient({
    transport: http(rpcUrl, { timeout: timeoutMs, retryCount: 0 }),
  });

  return {
    getChainId: () => client.getChainId(),
    getBlockNumber: () => client.getBlockNumber({ cacheTime: 0 }),
    getGasPrice: () => client.getGasPrice(),
    getBalance: (address) => client.getBalance({ address }),
    async readErc20(token, owner) {
      const [raw, decimals, symbol] = await Promise.all([
        client.readContract({ address: token, abi: erc20Abi, functionName: 'balanceOf', args: [owner] }),
        client.readContract({ address: token, abi: erc20Abi, functionName: 'decimals' }),
        client.readContract({ address: token, abi: erc20Abi, functionName: 'symbol' }),
      ]);
      return { raw, decimals, symbol };
    },
  };
};
