/**
 * ChainClient.ts
 * Read-only access to one EVM network at a time.
 *
 *  - connect() swaps the active network and proves the node answers
 *  - status() reports the cached network info refreshed with the latest block
 *  - balance()/tokenBalance() validate addresses before touching the node
 */

import { Address, formatUnits, getAddress, isAddress } from 'viem';
import { ChainReader, ChainReaderFactory, createConnection } from '../utils/connection';
import { ConnectionError, InvalidAddressError, InvalidInputError, RpcError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { SerialQueue } from '../utils/SerialQueue';
import { metrics } from '../metrics/Metrics';
import { DEFAULT_NETWORK, NETWORKS, UNKNOWN_CHAIN, describeChain, findNetwork } from './networks';

export interface NetworkStatus {
  connected: boolean;
  name: string;
  chainId: number | null;
  latestBlock: string | null;
  gasPrice: string | null;
  rpcUrl: string | null;
  latencyMs: number | null;
}

export interface Balance {
  address: string;
  balance: string;
  balanceWei: string;
  symbol: string;
  network: string;
}

export interface TokenBalance {
  address: string;
  tokenAddress: string;
  balance: string;
  raw: string;
  symbol: string;
  decimals: number;
}

export interface ChainClientOptions {
  /** Used by connect() when it is given neither a network nor a URL. */
  defaultRpcUrl?: string;
  timeoutMs?: number;
  createReader?: ChainReaderFactory;
}

const DISPLAY_DECIMALS = 6;

/** Rounds half-up to DISPLAY_DECIMALS fractional digits. */
export function formatAmount(raw: bigint, decimals: number, precision = DISPLAY_DECIMALS): string {
  if (decimals <= precision) return formatUnits(raw, decimals);
  const factor = 10n ** BigInt(decimals - precision);
  return formatUnits((raw + factor / 2n) / factor, precision);
}

export class ChainClient {
  private reader: ChainReader | null = null;
  private connected = false;
  private name = UNKNOWN_CHAIN.name;
  private symbol = UNKNOWN_CHAIN.symbol;
  private chainId: number | null = null;
  private latestBlock: bigint | null = null;
  private gasPrice: bigint | null = null;
  private rpcUrl: string | null = null;
  private latencyMs: number | null = null;
  private queue = new SerialQueue();
  private readonly defaultRpcUrl: string;
  private readonly timeoutMs: number;
  private readonly createReader: ChainReaderFactory;

  constructor(options: ChainClientOptions = {}) {
    this.defaultRpcUrl = options.defaultRpcUrl || NETWORKS[DEFAULT_NETWORK].rpcUrl;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.createReader = options.createReader ?? createConnection;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Points the client at a preset network or an explicit RPC URL. The
   * previous connection is dropped even when the new one fails. Connects and
   * status refreshes run one at a time so the reported URL always belongs to
   * the reader in use.
   */
  async connect(network?: string, rpcUrl?: string): Promise<NetworkStatus> {
    const preset = network ? findNetwork(network) : undefined;
    if (network && !preset && !rpcUrl) {
      throw new InvalidInputError(`Unknown network "${network}"; pass rpc_url for custom networks`);
    }
    const url = rpcUrl || preset?.rpcUrl || this.defaultRpcUrl;
    const named = preset && !rpcUrl ? preset : undefined;

    return this.queue.run(async () => {
      this.reset(url);
      const reader = this.createReader(url, this.timeoutMs);
      const started = Date.now();
      let chainId: number;
      try {
        metrics.incRpc();
        chainId = await reader.getChainId();
      } catch (err) {
        metrics.incRpcError();
        logger.warn(`[Chain] Cannot reach ${url}: ${errorMessage(err)}`);
        throw new ConnectionError(`Cannot connect to RPC endpoint ${url}`, { cause: err });
      }

      const known = named ?? describeChain(chainId);
      this.reader = reader;
      this.connected = true;
      this.chainId = chainId;
      this.latencyMs = Date.now() - started;
      this.name = known.name;
      this.symbol = known.symbol;
      logger.info(`[Chain] Connected to ${this.name} (chain ${chainId}) via ${url} in ${this.latencyMs}ms`);

      const status = await this.refresh();
      if (!status.connected) {
        throw new ConnectionError(`RPC endpoint ${url} stopped answering after connect`);
      }
      return status;
    });
  }

  /** Never throws: a failed refresh marks the client disconnected. */
  async status(): Promise<NetworkStatus> {
    return this.queue.run(() => this.refresh());
  }

  async balance(address: string): Promise<Balance> {
    const target = this.parseAddress(address);
    const reader = this.requireReader();
    const { symbol, name } = this;
    let wei: bigint;
    try {
      metrics.incRpc();
      wei = await reader.getBalance(target);
    } catch (err) {
      metrics.incRpcError();
      throw new RpcError(`Failed to get balance for ${target}: ${errorMessage(err)}`, { cause: err });
    }
    return {
      address: target,
      balance: formatAmount(wei, 18),
      balanceWei: wei.toString(),
      symbol,
      network: name,
    };
  }

  async tokenBalance(tokenAddress: string, walletAddress: string): Promise<TokenBalance> {
    const token = this.parseAddress(tokenAddress);
    const owner = this.parseAddress(walletAddress);
    const reader = this.requireReader();
    try {
      metrics.incRpc(3);
      const { raw, decimals, symbol } = await reader.readErc20(token, owner);
      return {
        address: owner,
        tokenAddress: token,
        balance: formatAmount(raw, decimals),
        raw: raw.toString(),
        symbol,
        decimals,
      };
    } catch (err) {
      metrics.incRpcError();
      throw new RpcError(`Failed to get token balance of ${owner} for ${token}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async refresh(): Promise<NetworkStatus> {
    if (this.reader && this.connected) {
      try {
        metrics.incRpc(2);
        const [block, gas] = await Promise.all([this.reader.getBlockNumber(), this.reader.getGasPrice()]);
        this.latestBlock = block;
        this.gasPrice = gas;
      } catch (err) {
        metrics.incRpcError();
        logger.warn(`[Chain] Status refresh failed, marking disconnected: ${errorMessage(err)}`);
        this.connected = false;
      }
    }
    return {
      connected: this.connected,
      name: this.name,
      chainId: this.chainId,
      latestBlock: this.latestBlock?.toString() ?? null,
      gasPrice: this.gasPrice?.toString() ?? null,
      rpcUrl: this.rpcUrl,
      latencyMs: this.latencyMs,
    };
  }

  private parseAddress(address: string): Address {
    const trimmed = address.trim();
    if (!isAddress(trimmed)) throw new InvalidAddressError(address);
    return getAddress(trimmed);
  }

  private requireReader(): ChainReader {
    if (!this.reader || !this.connected) {
      throw new ConnectionError('Not connected to any EVM network');
    }
    return this.reader;
  }

  private reset(rpcUrl: string): void {
    this.reader = null;
    this.connected = false;
    this.rpcUrl = rpcUrl;
    this.chainId = null;
    this.latestBlock = null;
    this.gasPrice = null;
    this.latencyMs = null;
    this.name = UNKNOWN_CHAIN.name;
    this.symbol = UNKNOWN_CHAIN.symbol;
  }
}
