/**
 * Assertion-executing EVM, as seen by the replay validator.
 *
 * Every fork call discards previous state; nothing carries over between
 * replays.
 */

import type { CallFrame } from '../rpc/types.js';

export interface AssertionSpec {
  /** Contract the assertion protects */
  adopter: string;
  /** Creation bytecode with constructor arguments appended */
  creationCode: string;
  /** 4-byte function selector that triggers the assertion */
  triggerSelector: string;
}

export interface ExecutionRequest {
  from: string;
  to: string;
  value: bigint;
  data: string;
  gasLimit: bigint;
  gasPrice: bigint;
}

export interface ExecutionResult {
  success: boolean;
  returnData: string;
  revertMessage?: string;
}

export interface AssertionExecutor {
  /** State immediately before the transaction, earlier transactions of its block applied */
  forkBeforeTransaction(txHash: string): Promise<void>;
  /** State at the start of the block (legacy block-boundary mode) */
  forkAtBlock(blockNumber: number): Promise<void>;
  /** Attach an assertion for the next execution only */
  attachAssertion(assertion: AssertionSpec): Promise<void>;
  getBalance(address: string): Promise<bigint>;
  getBaseFee(): Promise<bigint>;
  setBaseFee(baseFee: bigint): Promise<void>;
  execute(request: ExecutionRequest): Promise<ExecutionResult>;
  traceCall(request: ExecutionRequest): Promise<CallFrame>;
}
