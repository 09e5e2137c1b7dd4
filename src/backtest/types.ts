/**
 * Type definitions for assertion backtesting
 */

/**
 * One historical transaction relevant to the target contract.
 * `to` is the zero address for contract creation; gas fields are 0n when the
 * source carried none (legacy transactions, legacy wire records).
 */
export interface TransactionRecord {
  readonly hash: string;
  readonly from: string;
  readonly to: string;
  readonly value: bigint;
  readonly data: string;
  readonly blockNumber: number;
  readonly transactionIndex: number;
  readonly gasPrice: bigint;
  readonly gasLimit: bigint;
  readonly maxFeePerGas: bigint;
  readonly maxPriorityFeePerGas: bigint;
}

/**
 * Trace capabilities in rank order, best first.
 */
export enum TraceCapability {
  TraceFilter = 'trace_filter',
  DebugTraceBlockByNumber = 'debug_traceBlockByNumber',
  DebugTraceTransaction = 'debug_traceTransaction',
  DirectCallsOnly = 'direct_calls_only',
}

export const TRACE_CAPABILITY_RANK: readonly TraceCapability[] = [
  TraceCapability.TraceFilter,
  TraceCapability.DebugTraceBlockByNumber,
  TraceCapability.DebugTraceTransaction,
  TraceCapability.DirectCallsOnly,
];

export type ValidationOutcomeKind =
  | 'Success'
  | 'Skipped'
  | 'ReplayFailure'
  | 'AssertionFailed'
  | 'UnknownError';

export type ValidationOutcome =
  | { kind: 'AssertionFailed'; message?: string; isProtocolViolation: true }
  | { kind: Exclude<ValidationOutcomeKind, 'AssertionFailed'>; message?: string; isProtocolViolation: false };

export function makeOutcome(kind: ValidationOutcomeKind, message?: string): ValidationOutcome {
  if (kind === 'AssertionFailed') {
    return { kind, message, isProtocolViolation: true };
  }
  return { kind, message, isProtocolViolation: false };
}

export interface BacktestResults {
  totalTransactions: number;
  processedTransactions: number;
  successfulValidations: number;
  skippedTransactions: number;
  assertionFailures: number;
  replayFailures: number;
  unknownErrors: number;
}

export function emptyResults(): BacktestResults {
  return {
    totalTransactions: 0,
    processedTransactions: 0,
    successfulValidations: 0,
    skippedTransactions: 0,
    assertionFailures: 0,
    replayFailures: 0,
    unknownErrors: 0,
  };
}

/**
 * One classified transaction, as written to transactions.jsonl
 */
export interface ValidationRow {
  type: 'transaction';
  hash: string;
  blockNumber: number;
  transactionIndex: number;
  from: string;
  outcome: ValidationOutcomeKind;
  isProtocolViolation: boolean;
  message: string | null;
  durationMs: number;
}
