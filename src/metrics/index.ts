import { Counter, Gauge } from 'prom-client';

import { metricsRegistry } from './registry.js';

export const rpcCallsTotal = new Counter({
  name: 'backtest_rpc_calls_total',
  help: 'JSON-RPC calls by method and result status',
  labelNames: ['method', 'status'],
  registers: [metricsRegistry]
});

export const fetchedBlocksTotal = new Counter({
  name: 'backtest_fetched_blocks_total',
  help: 'Blocks fetched by the transaction fetcher, by status',
  labelNames: ['status'],
  registers: [metricsRegistry]
});

export const fetchedTransactionsTotal = new Counter({
  name: 'backtest_fetched_transactions_total',
  help: 'Transactions matched for the target contract, by match kind',
  labelNames: ['match'],
  registers: [metricsRegistry]
});

export const validationOutcomesTotal = new Counter({
  name: 'backtest_validation_outcomes_total',
  help: 'Replayed transactions by validation outcome',
  labelNames: ['outcome'],
  registers: [metricsRegistry]
});

export const selectedTraceCapability = new Gauge({
  name: 'backtest_trace_capability_selected',
  help: 'Trace capability selected for the current fetch (1 = selected)',
  labelNames: ['capability'],
  registers: [metricsRegistry]
});

export function recordRpcCall(method: string, status: string): void {
  rpcCallsTotal.inc({ method, status });
}

/**
 * Render all metrics in Prometheus text format
 */
export async function renderMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}
