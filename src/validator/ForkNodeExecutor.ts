/**
 * ForkNodeExecutor: AssertionExecutor backed by a local assertion-enabled
 * fork node that speaks the anvil JSON-RPC dialect.
 *
 * Historical data (transaction lookups, earlier transactions of a block) is
 * read from the upstream archive RPC; state changes go to the fork node.
 */

import { ZeroAddress, toQuantity } from 'ethers';
import { z } from 'zod';

import { RpcClient, toBlockTag } from '../rpc/RpcClient.js';
import {
  callFrameSchema,
  fullBlockSchema,
  hashBlockSchema,
  rpcTransactionSchema,
  type CallFrame,
  type JsonRpcErrorObject,
  type RpcTransaction,
} from '../rpc/types.js';
import { addressesEqual } from '../utils/Address.js';
import { parseOptionalUint, parseSafeNumber, parseUint } from '../utils/bigint.js';
import { createComponentLogger, type Logger } from '../utils/logger.js';
import { RevertDecoder } from '../parser/RevertDecoder.js';
import type {
  AssertionExecutor,
  AssertionSpec,
  ExecutionRequest,
  ExecutionResult,
} from './AssertionExecutor.js';

export const DEFAULT_EXECUTOR_URL = 'http://127.0.0.1:8545';
export const DEFAULT_ASSERTION_ATTACH_METHOD = 'cl_assertion';

const CALL_TRACER = { tracer: 'callTracer' } as const;
const GENERIC_REVERT = /^execution reverted:?\s*/i;

const anyResult = z.unknown();
const hexResult = z.string();
const revertDataSchema = z.union([z.string(), z.object({ data: z.string() })]);

export interface ForkNodeExecutorOptions {
  /** Fork node (anvil-compatible, assertion-enabled) */
  forkClient: RpcClient;
  /** Archive node the fork is taken from */
  upstreamClient: RpcClient;
  /** JSON-RPC method that registers an assertion for the next execution */
  attachMethod?: string;
  logger?: Logger;
}

export class ForkNodeExecutor implements AssertionExecutor {
  private readonly fork: RpcClient;
  private readonly upstream: RpcClient;
  private readonly attachMethod: string;
  private readonly logger: Logger;

  constructor(options: ForkNodeExecutorOptions) {
    this.fork = options.forkClient;
    this.upstream = options.upstreamClient;
    this.attachMethod = options.attachMethod ?? DEFAULT_ASSERTION_ATTACH_METHOD;
    this.logger = options.logger ?? createComponentLogger('executor');
  }

  async forkBeforeTransaction(txHash: string): Promise<void> {
    const tx = await this.upstream.call('eth_getTransactionByHash', [txHash], rpcTransactionSchema.nullable());
    if (!tx || tx.blockNumber == null) {
      throw new Error(`Transaction ${txHash} not found or not yet mined`);
    }

    const blockNumber = parseSafeNumber(tx.blockNumber);
    const transactionIndex = parseSafeNumber(tx.transactionIndex);
    await this.resetTo(blockNumber - 1);

    if (transactionIndex === 0) {
      return;
    }

    const block = await this.upstream.call('eth_getBlockByNumber', [toBlockTag(blockNumber), true], fullBlockSchema);
    if (!block) {
      throw new Error(`Block ${blockNumber} not found`);
    }
    const earlier = block.transactions.filter(t => parseSafeNumber(t.transactionIndex) < transactionIndex);
    await this.applyTransactions(earlier);
  }

  async forkAtBlock(blockNumber: number): Promise<void> {
    await this.resetTo(blockNumber - 1);
  }

  async attachAssertion(assertion: AssertionSpec): Promise<void> {
    await this.fork.call(
      this.attachMethod,
      [{
        adopter: assertion.adopter,
        createData: assertion.creationCode,
        fnSelector: assertion.triggerSelector,
      }],
      anyResult
    );
  }

  async getBalance(address: string): Promise<bigint> {
    return parseUint(await this.fork.call('eth_getBalance', [address, 'latest'], hexResult));
  }

  async getBaseFee(): Promise<bigint> {
    const block = await this.fork.call('eth_getBlockByNumber', ['pending', false], hashBlockSchema);
    return parseOptionalUint(block?.baseFeePerGas);
  }

  async setBaseFee(baseFee: bigint): Promise<void> {
    await this.fork.call('anvil_setNextBlockBaseFeePerGas', [toQuantity(baseFee)], anyResult);
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const response = await this.fork.request('eth_call', [toCallObject(request), 'pending']);

    if (response.error) {
      // Reserved JSON-RPC codes (parse error .. invalid params, internal error) are node faults, not reverts
      if (response.error.code <= -32600 && response.error.code >= -32700) {
        throw RpcClient.fromRpcError('eth_call', response.error);
      }
      return revertResult(response.error);
    }

    const returnData = hexResult.safeParse(response.result);
    return { success: true, returnData: returnData.success ? returnData.data : '0x' };
  }

  async traceCall(request: ExecutionRequest): Promise<CallFrame> {
    return this.fork.call('debug_traceCall', [toCallObject(request), 'pending', CALL_TRACER], callFrameSchema);
  }

  private async resetTo(blockNumber: number): Promise<void> {
    await this.fork.call(
      'anvil_reset',
      [{ forking: { jsonRpcUrl: this.upstream.url, blockNumber: Math.max(0, blockNumber) } }],
      anyResult
    );
  }

  /**
   * Replay the given transactions as their original senders, one block per
   * transaction in transactionIndex order. Transactions that share a pending
   * block are mined by fee, not arrival.
   */
  private async applyTransactions(transactions: readonly RpcTransaction[]): Promise<void> {
    this.logger.debug(`Applying ${transactions.length} earlier transaction(s) of the block`);

    const ordered = [...transactions].sort(
      (a, b) => parseSafeNumber(a.transactionIndex) - parseSafeNumber(b.transactionIndex)
    );

    await this.fork.call('anvil_autoImpersonateAccount', [true], anyResult);
    await this.fork.call('evm_setAutomine', [false], anyResult);
    try {
      for (const tx of ordered) {
        await this.fork.call('eth_sendTransaction', [toSendObject(tx)], anyResult);
        await this.fork.call('evm_mine', [], anyResult);
      }
    } finally {
      await this.fork.call('evm_setAutomine', [true], anyResult);
    }
  }
}

function toCallObject(request: ExecutionRequest): Record<string, string> {
  const call: Record<string, string> = {
    from: request.from,
    value: toQuantity(request.value),
    data: request.data,
    gas: toQuantity(request.gasLimit),
    gasPrice: toQuantity(request.gasPrice),
  };
  if (!addressesEqual(request.to, ZeroAddress)) {
    call.to = request.to;
  }
  return call;
}

function toSendObject(tx: RpcTransaction): Record<string, string> {
  const send: Record<string, string> = {
    from: tx.from,
    value: tx.value,
    data: tx.input,
  };
  if (tx.to) send.to = tx.to;
  if (tx.gas) send.gas = tx.gas;
  if (tx.maxFeePerGas && tx.maxPriorityFeePerGas) {
    send.maxFeePerGas = tx.maxFeePerGas;
    send.maxPriorityFeePerGas = tx.maxPriorityFeePerGas;
  } else if (tx.gasPrice) {
    send.gasPrice = tx.gasPrice;
  }
  return send;
}

/**
 * Turn an eth_call error into a failed ExecutionResult. Error(string)
 * payloads win over the node's message; a bare "execution reverted" falls
 * back to the decoded revert data.
 */
export function revertResult(error: JsonRpcErrorObject): ExecutionResult {
  const parsed = revertDataSchema.safeParse(error.data);
  const returnData = parsed.success
    ? (typeof parsed.data === 'string' ? parsed.data : parsed.data.data)
    : '0x';

  const decoded = RevertDecoder.decode(returnData);
  const message = error.message.replace(GENERIC_REVERT, '');

  let revertMessage: string;
  if (decoded.kind === 'error' || message === '') {
    revertMessage = decoded.reason;
  } else {
    revertMessage = message;
  }

  return { success: false, returnData, revertMessage };
}
