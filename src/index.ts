// Public API
export * from './backtest/types.js';
export {
  BACKTEST_CONFIG_VERSION,
  ConfigError,
  backtestConfigSchema,
  configInputFromEnv,
  createBacktestConfig,
  getAssertionCreateData,
  getStartBlock,
  validateBacktestConfig,
  type BacktestConfig,
  type BacktestConfigInput,
} from './backtest/BacktestConfig.js';
export { BacktestRunner, type BacktestReport, type BacktestRunnerDeps } from './backtest/BacktestRunner.js';
export { ResultAggregator, computeSuccessRate, type RunContext, type SummaryDocument } from './backtest/ResultAggregator.js';

export { RpcClient, RpcError, HttpJsonRpcTransport, type JsonRpcTransport, type RpcErrorType } from './rpc/RpcClient.js';
export type { CallFrame, JsonRpcRequest, JsonRpcResponse } from './rpc/types.js';

export {
  TRACE_PROBES,
  classifyProbeResponse,
  formatProbeReport,
  probeTraceSupport,
  resolveTraceCapability,
  type ProbeReport,
  type ProbeStatus,
  type TraceProbe,
} from './trace/TraceCapabilityProber.js';
export { createInternalCallDetector, type InternalCallDetector } from './trace/InternalCallDetector.js';

export { TransactionFetcher, toTransactionRecord, type FetchOptions, type FetchResult } from './fetcher/TransactionFetcher.js';

export {
  encodeJsonFormat,
  encodeSimpleFormat,
  extractDataLine,
  formatBlockSummaries,
  wrapTransactionData,
  type OutputFormat,
} from './parser/wireFormat.js';
export {
  TransactionParseError,
  parseFetcherOutput,
  parseJsonTransactions,
  parseMultipleTransactions,
} from './parser/transactionParser.js';
export { RevertDecoder, decodeRevertReason, type DecodedRevert } from './parser/RevertDecoder.js';

export type { AssertionExecutor, AssertionSpec, ExecutionRequest, ExecutionResult } from './validator/AssertionExecutor.js';
export { ForkNodeExecutor, type ForkNodeExecutorOptions } from './validator/ForkNodeExecutor.js';
export {
  DEFAULT_CLASSIFICATION_RULES,
  createOutcomeClassifier,
  parseClassificationRules,
  type ClassificationRule,
  type OutcomeClassifier,
} from './validator/OutcomeClassifier.js';
export { ReplayValidator, effectiveGasLimit, effectiveGasPrice, type ReplayValidatorOptions } from './validator/ReplayValidator.js';

export { parseAddress, addressesEqual } from './utils/Address.js';
export { parseUint } from './utils/bigint.js';
export { runWithConcurrency } from './utils/concurrency.js';
