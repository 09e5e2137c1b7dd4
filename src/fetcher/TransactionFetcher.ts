/**
 * TransactionFetcher: collects every transaction in a block range that calls
 * the target contract, directly or through a nested call.
 *
 * Blocks are fetched in sequential batches; within a batch at most
 * `maxConcurrent` blocks are in flight. A failing block is skipped with a
 * warning (no retries) and the run continues.
 */

import { TraceCapability, type TransactionRecord } from '../backtest/types.js';
import {
  fetchedBlocksTotal,
  fetchedTransactionsTotal,
  selectedTraceCapability,
} from '../metrics/index.js';
import { RpcClient, toBlockTag } from '../rpc/RpcClient.js';
import { fullBlockSchema, type RpcBlock, type RpcTransaction } from '../rpc/types.js';
import {
  createInternalCallDetector,
  type InternalCallDetector,
} from '../trace/InternalCallDetector.js';
import {
  resolveTraceCapability,
  type TraceProbe,
  TRACE_PROBES,
} from '../trace/TraceCapabilityProber.js';
import { addressesEqual, parseAddress } from '../utils/Address.js';
import { parseOptionalUint, parseSafeNumber, parseUint } from '../utils/bigint.js';
import { partitionRange, runWithConcurrency } from '../utils/concurrency.js';
import { createComponentLogger, errorMessage, maskUrl, type Logger } from '../utils/logger.js';

const ZERO_HASH_PATTERN = /^0x0*$/;

export interface FetchOptions {
  startBlock: number;
  endBlock: number;
  batchSize: number;
  maxConcurrent: number;
  /** false skips probing and uses direct matches only (default true) */
  detectInternalCalls?: boolean;
}

export interface BlockFetchSummary {
  blockNumber: number;
  status: 'ok' | 'skipped';
  totalTransactions: number;
  matchedTransactions: number;
  internalMatches: number;
  error?: string;
}

export interface FetchStats {
  durationMs: number;
  blocksProcessed: number;
  blocksSkipped: number;
  transactionsFound: number;
  blocksPerSecond: number;
}

export interface FetchResult {
  transactions: TransactionRecord[];
  capability: TraceCapability;
  blocks: BlockFetchSummary[];
  stats: FetchStats;
}

interface BlockUnitResult {
  summary: BlockFetchSummary;
  transactions: TransactionRecord[];
}

export interface TransactionFetcherOptions {
  logger?: Logger;
  probes?: readonly TraceProbe[];
}

export class TransactionFetcher {
  private readonly target: string;
  private readonly logger: Logger;
  private readonly probes: readonly TraceProbe[];

  constructor(
    private readonly client: RpcClient,
    targetContract: string,
    options: TransactionFetcherOptions = {}
  ) {
    this.target = parseAddress(targetContract);
    this.logger = options.logger ?? createComponentLogger('fetcher');
    this.probes = options.probes ?? TRACE_PROBES;
  }

  /**
   * Fetch all matching transactions in [startBlock, endBlock], ordered by
   * (blockNumber, transactionIndex)
   */
  async fetch(options: FetchOptions): Promise<FetchResult> {
    const { startBlock, endBlock, batchSize, maxConcurrent } = options;
    if (!Number.isInteger(startBlock) || !Number.isInteger(endBlock) || startBlock < 0 || startBlock > endBlock) {
      throw new Error(`Invalid block range: ${startBlock}..${endBlock}`);
    }

    const startedAt = Date.now();
    this.logger.info(
      `Fetching transactions for ${this.target} in blocks ${startBlock}-${endBlock} from ${maskUrl(this.client.url)}`
    );

    const capability = await this.selectCapability(startBlock, options.detectInternalCalls ?? true);
    const detector = createInternalCallDetector(capability, this.client, this.target, this.logger);

    const batches = partitionRange(startBlock, endBlock, batchSize);
    const blocks: BlockFetchSummary[] = [];
    const transactions: TransactionRecord[] = [];

    for (const [batchIndex, batch] of batches.entries()) {
      this.logger.info(`Processing batch ${batchIndex + 1}/${batches.length}: blocks ${batch.start} to ${batch.end}`);

      const blockNumbers = Array.from({ length: batch.end - batch.start + 1 }, (_, i) => batch.start + i);
      const settled = await runWithConcurrency(blockNumbers, maxConcurrent, blockNumber =>
        this.fetchBlock(blockNumber, detector)
      );

      settled.forEach((result, i) => {
        const blockNumber = blockNumbers[i];
        if (result.status === 'fulfilled') {
          blocks.push(result.value.summary);
          transactions.push(...result.value.transactions);
          fetchedBlocksTotal.inc({ status: 'ok' });
          return;
        }

        const reason = errorMessage(result.reason);
        this.logger.warn(`Skipping block ${blockNumber}: ${reason}`);
        fetchedBlocksTotal.inc({ status: 'skipped' });
        blocks.push({
          blockNumber,
          status: 'skipped',
          totalTransactions: 0,
          matchedTransactions: 0,
          internalMatches: 0,
          error: reason,
        });
      });
    }

    transactions.sort((a, b) => {
      if (a.blockNumber !== b.blockNumber) {
        return a.blockNumber - b.blockNumber;
      }
      return a.transactionIndex - b.transactionIndex;
    });

    const durationMs = Date.now() - startedAt;
    const blocksProcessed = blocks.filter(b => b.status === 'ok').length;
    const stats: FetchStats = {
      durationMs,
      blocksProcessed,
      blocksSkipped: blocks.length - blocksProcessed,
      transactionsFound: transactions.length,
      blocksPerSecond: durationMs > 0 ? (blocksProcessed * 1000) / durationMs : blocksProcessed,
    };

    this.logger.info(
      `Fetch complete: ${stats.transactionsFound} transactions from ${stats.blocksProcessed} blocks ` +
      `(${stats.blocksSkipped} skipped) in ${(durationMs / 1000).toFixed(2)}s, ${stats.blocksPerSecond.toFixed(2)} blocks/sec`
    );

    return { transactions, capability, blocks, stats };
  }

  /**
   * Pick the trace capability for this fetch by probing `blockNumber`
   */
  async selectCapability(blockNumber: number, detectInternalCalls = true): Promise<TraceCapability> {
    let capability = TraceCapability.DirectCallsOnly;

    if (detectInternalCalls) {
      const resolution = await resolveTraceCapability(
        { client: this.client, blockNumber, targetContract: this.target },
        this.probes
      );
      for (const report of resolution.reports) {
        this.logger.debug(`Probe ${report.method}: ${report.status}${report.detail ? ` (${report.detail})` : ''}`);
      }
      capability = resolution.capability;
    }

    selectedTraceCapability.reset();
    selectedTraceCapability.set({ capability }, 1);

    if (capability === TraceCapability.DirectCallsOnly) {
      this.logger.warn(
        detectInternalCalls
          ? 'No trace method supported by this RPC endpoint; only direct calls to the target will be found'
          : 'Internal call detection disabled; only direct calls to the target will be found'
      );
    } else {
      this.logger.info(`Using ${capability} for internal call detection`);
    }
    return capability;
  }

  private async fetchBlock(blockNumber: number, detector: InternalCallDetector): Promise<BlockUnitResult> {
    const block = await this.client.call('eth_getBlockByNumber', [toBlockTag(blockNumber), true], fullBlockSchema);
    if (!block) {
      throw new Error(`Block ${blockNumber} not found`);
    }

    const direct: RpcTransaction[] = [];
    const others: RpcTransaction[] = [];
    for (const tx of block.transactions) {
      (addressesEqual(tx.to, this.target) ? direct : others).push(tx);
    }

    let internal = new Set<string>();
    if (others.length > 0) {
      try {
        internal = await detector.findInternalCalls(block, others);
      } catch (error) {
        this.logger.warn(
          `Trace via ${detector.capability} failed for block ${blockNumber}, using direct calls only: ${errorMessage(error)}`
        );
      }
    }

    const internalMatches = others.filter(tx => internal.has(tx.hash.toLowerCase()));
    const matched = [...direct, ...internalMatches];
    const transactions = this.toRecords(block, matched);

    fetchedTransactionsTotal.inc({ match: 'direct' }, direct.length);
    fetchedTransactionsTotal.inc({ match: 'internal' }, internalMatches.length);

    if (transactions.length > 0) {
      this.logger.info(
        `Block ${blockNumber}: found ${transactions.length} transaction(s) (${internalMatches.length} via internal calls)`
      );
    }

    return {
      summary: {
        blockNumber,
        status: 'ok',
        totalTransactions: block.transactions.length,
        matchedTransactions: transactions.length,
        internalMatches: internalMatches.length,
      },
      transactions,
    };
  }

  private toRecords(block: RpcBlock, matched: readonly RpcTransaction[]): TransactionRecord[] {
    const blockNumber = parseSafeNumber(block.number);
    const records: TransactionRecord[] = [];
    for (const tx of matched) {
      if (ZERO_HASH_PATTERN.test(tx.hash)) {
        this.logger.warn(`Ignoring transaction with zero hash in block ${blockNumber}`);
        continue;
      }
      records.push(toTransactionRecord(tx, blockNumber));
    }
    return records;
  }
}

/**
 * Normalize an RPC transaction object into a TransactionRecord
 */
export function toTransactionRecord(tx: RpcTransaction, blockNumber: number): TransactionRecord {
  return {
    hash: tx.hash.toLowerCase(),
    from: parseAddress(tx.from),
    to: parseAddress(tx.to ?? ''),
    value: parseUint(tx.value),
    data: tx.input === '' ? '0x' : tx.input,
    blockNumber,
    transactionIndex: parseSafeNumber(tx.transactionIndex),
    gasPrice: parseOptionalUint(tx.gasPrice),
    gasLimit: parseOptionalUint(tx.gas),
    maxFeePerGas: parseOptionalUint(tx.maxFeePerGas),
    maxPriorityFeePerGas: parseOptionalUint(tx.maxPriorityFeePerGas),
  };
}
