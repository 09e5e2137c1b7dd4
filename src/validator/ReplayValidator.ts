/**
 * ReplayValidator: replays one historical transaction with the assertion
 * attached and classifies the result.
 */

import { makeOutcome, type TransactionRecord, type ValidationOutcome } from '../backtest/types.js';
import { minBigInt } from '../utils/bigint.js';
import { createComponentLogger, errorMessage, type Logger } from '../utils/logger.js';
import type { AssertionExecutor, ExecutionRequest } from './AssertionExecutor.js';
import { createOutcomeClassifier, type OutcomeClassifier } from './OutcomeClassifier.js';
import { renderCallTrace } from './traceRenderer.js';

/** 2^24, used when a record carries no gas limit */
export const DEFAULT_GAS_LIMIT = 16_777_216n;

export interface ReplayValidatorOptions {
  targetContract: string;
  /** Creation bytecode with constructor arguments appended */
  assertionCreationCode: string;
  assertionSelector: string;
  /** false replays from the block boundary (legacy, ignores earlier transactions of the block) */
  forkByTransactionHash?: boolean;
  defaultGasLimit?: bigint;
  traceOnFailure?: boolean;
  classifier?: OutcomeClassifier;
  logger?: Logger;
}

/**
 * maxFeePerGas when set (EIP-1559), otherwise the legacy gas price
 */
export function effectiveGasPrice(record: TransactionRecord): bigint {
  return record.maxFeePerGas !== 0n ? record.maxFeePerGas : record.gasPrice;
}

export function effectiveGasLimit(record: TransactionRecord, defaultGasLimit: bigint = DEFAULT_GAS_LIMIT): bigint {
  return record.gasLimit !== 0n ? record.gasLimit : defaultGasLimit;
}

export class ReplayValidator {
  private readonly forkByTransactionHash: boolean;
  private readonly defaultGasLimit: bigint;
  private readonly traceOnFailure: boolean;
  private readonly classify: OutcomeClassifier;
  private readonly logger: Logger;

  constructor(
    private readonly executor: AssertionExecutor,
    private readonly options: ReplayValidatorOptions
  ) {
    this.forkByTransactionHash = options.forkByTransactionHash ?? true;
    this.defaultGasLimit = options.defaultGasLimit ?? DEFAULT_GAS_LIMIT;
    this.traceOnFailure = options.traceOnFailure ?? true;
    this.classify = options.classifier ?? createOutcomeClassifier();
    this.logger = options.logger ?? createComponentLogger('validator');
  }

  async validate(record: TransactionRecord): Promise<ValidationOutcome> {
    const outcome = await this.replay(record);

    if (outcome.kind === 'AssertionFailed' && this.traceOnFailure) {
      await this.replayWithTrace(record);
    }
    return outcome;
  }

  private async replay(record: TransactionRecord): Promise<ValidationOutcome> {
    try {
      await this.forkFor(record);
      await this.executor.attachAssertion({
        adopter: this.options.targetContract,
        creationCode: this.options.assertionCreationCode,
        triggerSelector: this.options.assertionSelector,
      });

      const request = this.buildRequest(record);
      await this.capBaseFee(record.from, request.gasLimit);

      const result = await this.executor.execute(request);
      return this.classify(result.success, result.revertMessage ?? '');
    } catch (error) {
      this.logger.warn(`Replay of ${record.hash} aborted: ${errorMessage(error)}`);
      return makeOutcome('UnknownError', errorMessage(error));
    }
  }

  /**
   * Fork again without the assertion and log the full call trace
   */
  private async replayWithTrace(record: TransactionRecord): Promise<void> {
    try {
      await this.forkFor(record);
      const request = this.buildRequest(record);
      await this.capBaseFee(record.from, request.gasLimit);
      const trace = await this.executor.traceCall(request);
      this.logger.info(`Call trace for ${record.hash}:\n${renderCallTrace(trace).join('\n')}`);
    } catch (error) {
      this.logger.warn(`Trace replay of ${record.hash} failed: ${errorMessage(error)}`);
    }
  }

  private async forkFor(record: TransactionRecord): Promise<void> {
    if (this.forkByTransactionHash) {
      await this.executor.forkBeforeTransaction(record.hash);
    } else {
      await this.executor.forkAtBlock(record.blockNumber);
    }
  }

  private buildRequest(record: TransactionRecord): ExecutionRequest {
    return {
      from: record.from,
      to: record.to,
      value: record.value,
      data: record.data,
      gasLimit: effectiveGasLimit(record, this.defaultGasLimit),
      gasPrice: effectiveGasPrice(record),
    };
  }

  /**
   * The sender must afford gasLimit * baseFee; lower the base fee when it cannot
   */
  private async capBaseFee(sender: string, gasLimit: bigint): Promise<void> {
    const balance = await this.executor.getBalance(sender);
    const baseFee = await this.executor.getBaseFee();
    const capped = minBigInt(baseFee, balance / gasLimit);

    if (capped !== baseFee) {
      this.logger.debug(`Capping base fee ${baseFee} -> ${capped} for sender ${sender}`);
      await this.executor.setBaseFee(capped);
    }
  }
}
