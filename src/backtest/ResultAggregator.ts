/**
 * ResultAggregator - counts validation outcomes and writes run artifacts
 *
 * Outputs two files:
 * - summary.json: counters, success rate and run context
 * - transactions.jsonl: one row per classified transaction
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

import { validationOutcomesTotal } from '../metrics/index.js';
import {
  emptyResults,
  type BacktestResults,
  type TransactionRecord,
  type ValidationOutcome,
  type ValidationRow,
} from './types.js';

export interface RunContext {
  targetContract?: string;
  startBlock?: number;
  endBlock?: number;
  traceCapability?: string;
  durationMs?: number;
}

export interface SummaryDocument extends BacktestResults {
  type: 'summary';
  successRate: number;
  protocolViolations: number;
  context: RunContext;
}

/**
 * success / (success + assertionFailures + replayFailures + unknownErrors), as a percentage.
 * Skipped transactions are excluded; 0 when nothing counts.
 */
export function computeSuccessRate(results: BacktestResults): number {
  const denominator =
    results.successfulValidations +
    results.assertionFailures +
    results.replayFailures +
    results.unknownErrors;
  return denominator === 0 ? 0 : (results.successfulValidations * 100) / denominator;
}

export class ResultAggregator {
  private results: BacktestResults = emptyResults();
  private rows: ValidationRow[] = [];

  setTotalTransactions(total: number): void {
    this.results.totalTransactions = total;
  }

  /**
   * Count one outcome; exactly one category counter moves
   */
  record(outcome: ValidationOutcome, record?: TransactionRecord, durationMs = 0): void {
    this.results.processedTransactions++;
    validationOutcomesTotal.inc({ outcome: outcome.kind });

    switch (outcome.kind) {
      case 'Success':
        this.results.successfulValidations++;
        break;
      case 'Skipped':
        this.results.skippedTransactions++;
        break;
      case 'AssertionFailed':
        this.results.assertionFailures++;
        break;
      case 'ReplayFailure':
        this.results.replayFailures++;
        break;
      case 'UnknownError':
        this.results.unknownErrors++;
        break;
    }

    if (record) {
      this.rows.push({
        type: 'transaction',
        hash: record.hash,
        blockNumber: record.blockNumber,
        transactionIndex: record.transactionIndex,
        from: record.from,
        outcome: outcome.kind,
        isProtocolViolation: outcome.isProtocolViolation,
        message: outcome.message ?? null,
        durationMs,
      });
    }
  }

  getResults(): BacktestResults {
    return { ...this.results };
  }

  getRows(): readonly ValidationRow[] {
    return this.rows;
  }

  successRate(): number {
    return computeSuccessRate(this.results);
  }

  hasProtocolViolations(): boolean {
    return this.results.assertionFailures > 0;
  }

  /**
   * processed == sum of the category counters
   */
  isConsistent(): boolean {
    const r = this.results;
    return r.processedTransactions ===
      r.successfulValidations + r.skippedTransactions + r.assertionFailures + r.replayFailures + r.unknownErrors;
  }

  toSummary(context: RunContext = {}): SummaryDocument {
    return {
      type: 'summary',
      ...this.results,
      successRate: this.successRate(),
      protocolViolations: this.results.assertionFailures,
      context,
    };
  }

  renderSummary(context: RunContext = {}): string {
    const r = this.results;
    const lines: string[] = ['', '=== BACKTEST SUMMARY ==='];

    if (context.targetContract) {
      lines.push(`Target Contract: ${context.targetContract}`);
    }
    if (context.startBlock !== undefined && context.endBlock !== undefined) {
      lines.push(`Block Range: ${context.startBlock} - ${context.endBlock} (${context.endBlock - context.startBlock + 1} blocks)`);
    }
    if (context.traceCapability) {
      lines.push(`Trace Method: ${context.traceCapability}`);
    }

    lines.push(
      `Total Transactions: ${r.totalTransactions}`,
      `Processed: ${r.processedTransactions}`,
      `Successful Validations: ${r.successfulValidations}`,
      `Skipped (assertion not triggered): ${r.skippedTransactions}`,
      `Replay Failures: ${r.replayFailures}`,
      `Unknown Errors: ${r.unknownErrors}`,
      `Assertion Failures: ${r.assertionFailures}`,
      `Success Rate: ${this.successRate().toFixed(2)}%`
    );

    if (context.durationMs !== undefined) {
      lines.push(`Duration: ${(context.durationMs / 1000).toFixed(1)}s`);
    }

    if (r.assertionFailures > 0) {
      lines.push(
        '',
        '!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!',
        `!!! ${r.assertionFailures} PROTOCOL VIOLATION(S) DETECTED !!!`,
        '!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!!'
      );
    }

    lines.push('========================', '');
    return lines.join('\n');
  }

  /**
   * Write summary.json and transactions.jsonl under `outputDir`
   */
  async writeArtifacts(outputDir: string, context: RunContext = {}): Promise<{ summaryPath: string; transactionsPath: string }> {
    await mkdir(outputDir, { recursive: true });

    const transactionsPath = join(outputDir, 'transactions.jsonl');
    const content = this.rows.map(row => JSON.stringify(row)).join('\n');
    await writeFile(transactionsPath, this.rows.length > 0 ? content + '\n' : '');

    const summaryPath = join(outputDir, 'summary.json');
    await writeFile(summaryPath, JSON.stringify(this.toSummary(context), null, 2) + '\n');

    return { summaryPath, transactionsPath };
  }
}
