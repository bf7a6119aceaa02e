/**
 * status.ts
 * Prints the reachability and head of every known EVM network.
 *
 * Run: npm run status
 */

import * as dotenv from 'dotenv';
dotenv.config();

import chalk from 'chalk';
import Table from 'cli-table3';
import { ChainClient, NetworkStatus } from '../chain/ChainClient';
import { NETWORKS } from '../chain/networks';
import { errorMessage } from '../utils/errors';

const TIMEOUT_MS = parseInt(process.env.RPC_TIMEOUT_MS || '10000');

async function probe(network: string): Promise<NetworkStatus | string> {
  const client = new ChainClient({ timeoutMs: TIMEOUT_MS });
  try {
    return await client.connect(network);
  } catch (err) {
    return errorMessage(err);
  }
}

async function main() {
  console.log(chalk.cyan('\n🌐 EVM network status'));
  console.log(chalk.gray(`Checked at: ${new Date().toLocaleTimeString()}\n`));

  const table = new Table({
    head: [
      chalk.white('Network'),
      chalk.white('Chain ID'),
      chalk.white('Latest Block'),
      chalk.white('Gas Price (gwei)'),
      chalk.white('Latency'),
    ],
    colWidths: [16, 10, 16, 18, 10],
    style: { border: ['gray'], head: [] },
  });

  const keys = Object.keys(NETWORKS);
  const results = await Promise.all(keys.map((k) => probe(k)));
  results.forEach((result, i) => {
    const preset = NETWORKS[keys[i]];
    if (typeof result === 'string' || !result.connected) {
      table.push([chalk.yellow(preset.name), chalk.red('offline'), '—', '—', '—']);
      return;
    }
    const gwei = result.gasPrice ? (Number(result.gasPrice) / 1e9).toFixed(2) : '—';
    table.push([
      chalk.yellow(result.name),
      chalk.cyan(String(result.chainId)),
      chalk.white(result.latestBlock ?? '—'),
      chalk.green(gwei),
      chalk.gray(`${result.latencyMs}ms`),
    ]);
  });

  console.log(table.toString());
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
