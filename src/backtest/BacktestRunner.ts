// BacktestRunner: fetch, replay and classify every transaction in the configured range
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';

import { renderMetrics } from '../metrics/index.js';
import { parseFetcherOutput } from '../parser/transactionParser.js';
import type { TransactionFetcher } from '../fetcher/TransactionFetcher.js';
import { createComponentLogger, maskUrl, type Logger } from '../utils/logger.js';
import type { ReplayValidator } from '../validator/ReplayValidator.js';
import { getStartBlock, validateBacktestConfig, type BacktestConfig } from './BacktestConfig.js';
import { ResultAggregator, type RunContext } from './ResultAggregator.js';
import type { BacktestResults, TransactionRecord } from './types.js';

export interface BacktestRunnerDeps {
  fetcher: TransactionFetcher;
  validator: ReplayValidator;
  logger?: Logger;
  /** Summary sink, stdout by default */
  print?: (text: string) => void;
}

export interface BacktestReport {
  results: BacktestResults;
  successRate: number;
  hasProtocolViolations: boolean;
  context: RunContext;
}

/**
 * BacktestRunner drives one run: obtain the transactions (fetcher or saved
 * fetcher output), validate each one sequentially, then report.
 */
export class BacktestRunner {
  private readonly logger: Logger;
  private readonly print: (text: string) => void;

  constructor(
    private readonly config: BacktestConfig,
    private readonly deps: BacktestRunnerDeps
  ) {
    this.logger = deps.logger ?? createComponentLogger('backtest');
    this.print = deps.print ?? (text => process.stdout.write(text + '\n'));
  }

  async run(): Promise<BacktestReport> {
    const startedAt = Date.now();
    const startBlock = getStartBlock(this.config);
    const context: RunContext = {
      targetContract: this.config.targetContract,
      startBlock,
      endBlock: this.config.endBlock,
    };

    this.logConfig(startBlock);

    const transactions = await this.loadTransactions(startBlock, context);

    const aggregator = new ResultAggregator();
    aggregator.setTotalTransactions(transactions.length);

    for (const [i, record] of transactions.entries()) {
      const txStartedAt = Date.now();
      const outcome = await this.deps.validator.validate(record);
      const durationMs = Date.now() - txStartedAt;
      aggregator.record(outcome, record, durationMs);

      const label = `[${i + 1}/${transactions.length}] ${record.hash} (block ${record.blockNumber}, index ${record.transactionIndex})`;
      if (outcome.isProtocolViolation) {
        this.logger.error(`${label}: PROTOCOL VIOLATION - ${outcome.message ?? 'assertion failed'}`);
      } else if (outcome.message) {
        this.logger.info(`${label}: ${outcome.kind} - ${outcome.message}`);
      } else {
        this.logger.info(`${label}: ${outcome.kind}`);
      }
    }

    context.durationMs = Date.now() - startedAt;
    this.print(aggregator.renderSummary(context));

    if (this.config.exportDir) {
      const { summaryPath, transactionsPath } = await aggregator.writeArtifacts(this.config.exportDir, context);
      const metricsPath = join(this.config.exportDir, 'metrics.prom');
      await writeFile(metricsPath, await renderMetrics());
      this.logger.info(`Wrote ${summaryPath}, ${transactionsPath} and ${metricsPath}`);
    }

    return {
      results: aggregator.getResults(),
      successRate: aggregator.successRate(),
      hasProtocolViolations: aggregator.hasProtocolViolations(),
      context,
    };
  }

  private async loadTransactions(startBlock: number, context: RunContext): Promise<TransactionRecord[]> {
    if (this.config.transactionsFile) {
      const output = await readFile(this.config.transactionsFile, 'utf8');
      const records = parseFetcherOutput(output);
      this.logger.info(`Loaded ${records.length} transaction(s) from ${this.config.transactionsFile}`);
      return records;
    }

    const result = await this.deps.fetcher.fetch({
      startBlock,
      endBlock: this.config.endBlock,
      batchSize: this.config.batchSize,
      maxConcurrent: this.config.maxConcurrent,
      detectInternalCalls: this.config.detectInternalCalls,
    });
    context.traceCapability = result.capability;
    return result.transactions;
  }

  private logConfig(startBlock: number): void {
    const c = this.config;
    this.logger.info(`Backtesting assertion on ${c.targetContract}`);
    this.logger.info(`Blocks ${startBlock} - ${c.endBlock} (range ${c.blockRange}) via ${maskUrl(c.rpcUrl)}`);
    this.logger.info(
      `Trigger selector ${c.assertionSelector}, fork mode ${c.forkByTransactionHash ? 'transaction' : 'block'}, ` +
      `internal calls ${c.detectInternalCalls ? 'on' : 'off'}, batch ${c.batchSize}, concurrency ${c.maxConcurrent}`
    );
    for (const warning of validateBacktestConfig(c)) {
      this.logger.warn(warning);
    }
  }
}
