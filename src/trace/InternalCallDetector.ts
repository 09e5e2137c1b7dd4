/**
 * Internal-call detectors, one per trace capability.
 *
 * Each detector returns the (lowercased) hashes of transactions in a block
 * whose execution reaches the target contract through a nested call.
 */

import { TraceCapability } from '../backtest/types.js';
import { RpcClient, toBlockTag } from '../rpc/RpcClient.js';
import {
  blockTraceSchema,
  callFrameSchema,
  filterTraceSchema,
  type RpcBlock,
  type RpcTransaction,
} from '../rpc/types.js';
import { addressesEqual } from '../utils/Address.js';
import { parseSafeNumber } from '../utils/bigint.js';
import { createComponentLogger, errorMessage, type Logger } from '../utils/logger.js';
import { frameCallsAddress } from './callFrames.js';

const CALL_TRACER = { tracer: 'callTracer' } as const;

export interface InternalCallDetector {
  readonly capability: TraceCapability;
  /**
   * @param candidates - block transactions that do not call the target directly
   */
  findInternalCalls(block: RpcBlock, candidates: readonly RpcTransaction[]): Promise<Set<string>>;
}

export class TraceFilterDetector implements InternalCallDetector {
  readonly capability = TraceCapability.TraceFilter;

  constructor(private readonly client: RpcClient, private readonly target: string) {}

  async findInternalCalls(block: RpcBlock): Promise<Set<string>> {
    const blockTag = toBlockTag(parseSafeNumber(block.number));
    const traces = await this.client.call(
      'trace_filter',
      [{ fromBlock: blockTag, toBlock: blockTag, toAddress: [this.target] }],
      filterTraceSchema
    );

    const hashes = new Set<string>();
    for (const trace of traces) {
      if (!addressesEqual(trace.action.to, this.target)) continue;

      const hash = trace.transactionHash
        ?? (trace.transactionPosition != null ? block.transactions[trace.transactionPosition]?.hash : undefined);
      if (hash) {
        hashes.add(hash.toLowerCase());
      }
    }
    return hashes;
  }
}

export class BlockTracerDetector implements InternalCallDetector {
  readonly capability = TraceCapability.DebugTraceBlockByNumber;

  constructor(private readonly client: RpcClient, private readonly target: string) {}

  async findInternalCalls(block: RpcBlock): Promise<Set<string>> {
    const entries = await this.client.call(
      'debug_traceBlockByNumber',
      [toBlockTag(parseSafeNumber(block.number)), CALL_TRACER],
      blockTraceSchema
    );

    const hashes = new Set<string>();
    entries.forEach((entry, position) => {
      if (!entry.result || !frameCallsAddress(entry.result, this.target)) return;

      // Entries line up with the block's transactions when txHash is absent
      const hash = entry.txHash ?? block.transactions[position]?.hash;
      if (hash) {
        hashes.add(hash.toLowerCase());
      }
    });
    return hashes;
  }
}

export class TransactionTracerDetector implements InternalCallDetector {
  readonly capability = TraceCapability.DebugTraceTransaction;

  constructor(
    private readonly client: RpcClient,
    private readonly target: string,
    private readonly logger: Logger
  ) {}

  async findInternalCalls(block: RpcBlock, candidates: readonly RpcTransaction[]): Promise<Set<string>> {
    const hashes = new Set<string>();
    for (const tx of candidates) {
      try {
        const frame = await this.client.call('debug_traceTransaction', [tx.hash, CALL_TRACER], callFrameSchema);
        if (frameCallsAddress(frame, this.target)) {
          hashes.add(tx.hash.toLowerCase());
        }
      } catch (error) {
        this.logger.warn(`Trace failed for tx ${tx.hash} in block ${parseSafeNumber(block.number)}: ${errorMessage(error)}`);
      }
    }
    return hashes;
  }
}

export class DirectCallsOnlyDetector implements InternalCallDetector {
  readonly capability = TraceCapability.DirectCallsOnly;

  async findInternalCalls(): Promise<Set<string>> {
    return new Set();
  }
}

export function createInternalCallDetector(
  capability: TraceCapability,
  client: RpcClient,
  target: string,
  logger: Logger = createComponentLogger('fetcher')
): InternalCallDetector {
  switch (capability) {
    case TraceCapability.TraceFilter:
      return new TraceFilterDetector(client, target);
    case TraceCapability.DebugTraceBlockByNumber:
      return new BlockTracerDetector(client, target);
    case TraceCapability.DebugTraceTransaction:
      return new TransactionTracerDetector(client, target, logger);
    case TraceCapability.DirectCallsOnly:
      return new DirectCallsOnlyDetector();
  }
}
