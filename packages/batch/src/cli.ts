#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { readContractsCsv } from './csv.js';
import { CreationCodeStore } from './store.js';
import { createApiClient } from './client.js';
import { runBatch, DEFAULT_BATCH_OPTIONS, type CreationCodeSource } from './batch.js';
import { createEtherscanSource } from './sources/etherscan.js';
import { createRpcSource, createProvider, fetchCreationCodeFromTx } from './sources/rpc.js';

interface RunOptions {
  chainId: number;
  csv: string;
  testCase: string;
  source: 'etherscan' | 'rpc';
  apiKey?: string;
  rpcUrl?: string;
  apiUrl: string;
  results: string;
  db: string;
  idPrefix: string;
  delay: number;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Not a non-negative integer.');
  return n;
}

function parseSource(value: string): 'etherscan' | 'rpc' {
  if (value === 'etherscan' || value === 'rpc') return value;
  throw new InvalidArgumentError('Must be "etherscan" or "rpc".');
}

function parseIdPrefix(value: string): string {
  if (!/^[A-Za-z0-9_]*$/.test(value)) throw new InvalidArgumentError('Only letters, digits and underscores.');
  return value;
}

function buildSource(opts: RunOptions): CreationCodeSource {
  if (opts.source === 'rpc') {
    const rpcUrl = opts.rpcUrl ?? process.env[`RPC_URL_${opts.chainId}`];
    if (!rpcUrl) throw new Error(`No RPC URL for chain ${opts.chainId} (use --rpc-url or RPC_URL_${opts.chainId})`);
    return createRpcSource(createProvider(rpcUrl, opts.chainId));
  }
  const apiKey = opts.apiKey ?? process.env['ETHERSCAN_API_KEY'];
  if (!apiKey) throw new Error('ETHERSCAN_API_KEY is not set (use --api-key)');
  return createEtherscanSource(apiKey);
}

const program = new Command();

program
  .name('symtest-batch')
  .description('Run symbolic tests for every contract listed in a CSV file')
  .version('1.0.0');

program
  .command('run')
  .description('Fetch creation code for each CSV address and submit it to the test runner')
  .requiredOption('--chain-id <id>', 'chain id (1 = Ethereum, 56 = BSC, 137 = Polygon)', parsePositiveInt)
  .requiredOption('--csv <file>', "CSV with an 'address' column ('tx_hash' too for --source rpc)")
  .option('--test-case <name>', 'template to run', DEFAULT_BATCH_OPTIONS.testCase)
  .option('--source <source>', 'where to get creation code: etherscan | rpc', parseSource, 'etherscan')
  .option('--api-key <key>', 'Etherscan API key (default: ETHERSCAN_API_KEY)')
  .option('--rpc-url <url>', 'archive node RPC URL (default: RPC_URL_<chainId>)')
  .option('--api-url <url>', 'test runner base URL', process.env['SYMTEST_API_URL'] ?? 'http://localhost:8005')
  .option('--results <dir>', 'directory for result files', DEFAULT_BATCH_OPTIONS.resultsDir)
  .option('--db <file>', 'SQLite file caching creation code', 'creation_codes.db')
  .option('--id-prefix <prefix>', 'prefix for generated test ids', parseIdPrefix, DEFAULT_BATCH_OPTIONS.idPrefix)
  .option('--delay <ms>', 'pause between contracts', parsePositiveInt, DEFAULT_BATCH_OPTIONS.delayMs)
  .action(async (opts: RunOptions) => {
    const source = buildSource(opts);
    const rows = await readContractsCsv(opts.csv, { requireTxHash: opts.source === 'rpc' });
    if (rows.length === 0) throw new Error(`No addresses found in ${opts.csv}`);

    const store = new CreationCodeStore(opts.db);
    try {
      console.log(`[batch] chain ${opts.chainId}, ${rows.length} contracts, test case ${opts.testCase}`);
      console.log(`[batch] runner ${opts.apiUrl}, creation code from ${source.name}, cache ${resolve(opts.db)} (${store.count()} entries)`);

      const summary = await runBatch(rows, {
        ...DEFAULT_BATCH_OPTIONS,
        chainId: opts.chainId,
        testCase: opts.testCase,
        resultsDir: opts.results,
        idPrefix: opts.idPrefix,
        delayMs: opts.delay,
      }, {
        store,
        source,
        submit: createApiClient(opts.apiUrl),
      });

      console.log(`[batch] Done: ${summary.total} contracts`);
      console.log(`[batch]   creation code found: ${summary.fetched}/${summary.total}`);
      console.log(`[batch]   tests passed: ${summary.passed}/${summary.fetched}`);
      console.log(`[batch]   results in ${resolve(opts.results)}`);
    } finally {
      store.close();
    }
  });

program
  .command('creation-code')
  .description('Print the creation code of a deployment transaction')
  .argument('<txHash>', 'deployment transaction hash')
  .requiredOption('--rpc-url <url>', 'archive node RPC URL')
  .option('--chain-id <id>', 'chain id of the RPC endpoint', parsePositiveInt)
  .action(async (txHash: string, opts: { rpcUrl: string; chainId?: number }) => {
    const provider = createProvider(opts.rpcUrl, opts.chainId);
    try {
      console.log(await fetchCreationCodeFromTx(txHash, provider));
    } finally {
      provider.destroy();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`[batch] Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
