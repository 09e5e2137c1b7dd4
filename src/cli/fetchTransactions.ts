#!/usr/bin/env node
// CLI: fetch every transaction touching a contract and print it in the sentinel wire format
import { config } from '../config/index.js';
import { TransactionFetcher, type FetchResult } from '../fetcher/TransactionFetcher.js';
import {
  encodePayload,
  formatBlockSummaries,
  isOutputFormat,
  wrapTransactionData,
  type OutputFormat,
} from '../parser/wireFormat.js';
import { RpcClient } from '../rpc/RpcClient.js';
import { isValidAddress } from '../utils/Address.js';
import { errorMessage } from '../utils/logger.js';
import {
  CliUsageError,
  isEntryPoint,
  parseArgs,
  parseIntegerOption,
  requireValue,
} from './args.js';

export const FETCH_USAGE = `Usage: fetch-transactions --rpc-url <url> --target-contract <address> --start-block <n> --end-block <n> [options]

Options:
  --rpc-url <url>              Archive RPC endpoint
  --target-contract <address>  Contract whose transactions are collected
  --start-block <n>            First block (inclusive)
  --end-block <n>              Last block (inclusive)
  --batch-size <n>             Blocks per batch (default: 10)
  --max-concurrent <n>         Blocks in flight per batch (default: 5)
  --output-format <format>     simple | json (default: simple)
  --detailed-blocks            Append per-block summary lines
  -h, --help                   Show this help`;

export interface FetchCliOptions {
  rpcUrl: string;
  targetContract: string;
  startBlock: number;
  endBlock: number;
  batchSize: number;
  maxConcurrent: number;
  outputFormat: OutputFormat;
  detailedBlocks: boolean;
}

/**
 * @throws CliUsageError before any network call when arguments are invalid
 */
export function parseFetchArgs(argv: readonly string[]): FetchCliOptions | 'help' {
  const args = parseArgs(argv, {
    values: ['rpc-url', 'target-contract', 'start-block', 'end-block', 'batch-size', 'max-concurrent', 'output-format'],
    switches: ['detailed-blocks'],
  });
  if (args.help) return 'help';

  const targetContract = requireValue(args, 'target-contract');
  if (!isValidAddress(targetContract)) {
    throw new CliUsageError(`--target-contract is not a valid address: ${targetContract}`);
  }

  const startBlock = parseIntegerOption(requireValue(args, 'start-block'), 'start-block');
  const endBlock = parseIntegerOption(requireValue(args, 'end-block'), 'end-block');
  if (startBlock > endBlock) {
    throw new CliUsageError(`--start-block (${startBlock}) must not exceed --end-block (${endBlock})`);
  }

  const batchSize = parseIntegerOption(args.values.get('batch-size') ?? '10', 'batch-size');
  const maxConcurrent = parseIntegerOption(args.values.get('max-concurrent') ?? '5', 'max-concurrent');
  if (batchSize < 1 || maxConcurrent < 1) {
    throw new CliUsageError('--batch-size and --max-concurrent must be at least 1');
  }

  const outputFormat = args.values.get('output-format') ?? 'simple';
  if (!isOutputFormat(outputFormat)) {
    throw new CliUsageError(`--output-format must be "simple" or "json", got "${outputFormat}"`);
  }

  return {
    rpcUrl: requireValue(args, 'rpc-url'),
    targetContract,
    startBlock,
    endBlock,
    batchSize,
    maxConcurrent,
    outputFormat,
    detailedBlocks: args.switches.has('detailed-blocks'),
  };
}

/**
 * Render fetch results as the CLI's stdout
 */
export function formatFetchOutput(result: FetchResult, format: OutputFormat, detailedBlocks: boolean): string {
  const sections = [wrapTransactionData(encodePayload(result.transactions, format))];
  if (detailedBlocks) {
    sections.push(
      formatBlockSummaries(
        result.blocks.map(block => ({
          blockNumber: block.blockNumber,
          triggered: block.matchedTransactions,
          total: block.totalTransactions,
          skipped: block.status === 'skipped' ? (block.error ?? 'unknown error') : undefined,
        }))
      )
    );
  }
  return sections.join('\n');
}

export async function runFetchTransactions(options: FetchCliOptions, client?: RpcClient): Promise<string> {
  const rpc = client ?? new RpcClient(options.rpcUrl, {
    timeoutMs: config.rpcTimeoutMs,
    maxRetries: config.rpcMaxRetries,
  });
  const fetcher = new TransactionFetcher(rpc, options.targetContract);
  const result = await fetcher.fetch({
    startBlock: options.startBlock,
    endBlock: options.endBlock,
    batchSize: options.batchSize,
    maxConcurrent: options.maxConcurrent,
  });
  return formatFetchOutput(result, options.outputFormat, options.detailedBlocks);
}

async function main(): Promise<number> {
  let options: FetchCliOptions | 'help';
  try {
    options = parseFetchArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`ERROR: ${errorMessage(error)}\n`);
    console.error(FETCH_USAGE);
    return 1;
  }

  if (options === 'help') {
    console.log(FETCH_USAGE);
    return 0;
  }

  console.log(await runFetchTransactions(options));
  return 0;
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
