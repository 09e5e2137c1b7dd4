import { z } from 'zod';

import { parseIntEnv } from './parseEnv.js';

export const rawEnvSchema = z.object({
  // Blank means unset, as for every other key
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).or(z.literal('')).optional(),

  // Archive RPC the transactions are fetched from
  RPC_URL: z.string().optional(),
  RPC_TIMEOUT_MS: z.string().optional(),
  RPC_MAX_RETRIES: z.string().optional(),

  // Backtest run (CLI flags override these)
  BACKTEST_TARGET_CONTRACT: z.string().optional(),
  BACKTEST_END_BLOCK: z.string().optional(),
  BACKTEST_BLOCK_RANGE: z.string().optional(),
  BACKTEST_ASSERTION_BYTECODE: z.string().optional(),
  BACKTEST_ASSERTION_ARGS: z.string().optional(),
  BACKTEST_ASSERTION_SELECTOR: z.string().optional(),
  BACKTEST_EXECUTOR_URL: z.string().optional(),
  BACKTEST_ASSERTION_ATTACH_METHOD: z.string().optional(),
  BACKTEST_FORK_BY_TX_HASH: z.string().optional(),
  BACKTEST_DETECT_INTERNAL_CALLS: z.string().optional(),
  BACKTEST_BATCH_SIZE: z.string().optional(),
  BACKTEST_MAX_CONCURRENT: z.string().optional(),
  BACKTEST_TRACE_ON_FAILURE: z.string().optional(),
  BACKTEST_DEFAULT_GAS_LIMIT: z.string().optional(),
  BACKTEST_EXPORT_DIR: z.string().optional(),
  BACKTEST_CLASSIFIER_RULES: z.string().optional(),
  BACKTEST_TRANSACTIONS_FILE: z.string().optional(),
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

export interface Env {
  logLevel: string;
  rpcTimeoutMs: number;
  rpcMaxRetries: number;
  raw: RawEnv;
}

/**
 * Parse process environment (or any string map) into typed settings.
 * Backtest-specific values stay raw here; BacktestConfig validates them.
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = rawEnvSchema.parse(source);
  return {
    logLevel: parsed.LOG_LEVEL || 'info',
    rpcTimeoutMs: parseIntEnv(parsed.RPC_TIMEOUT_MS, 30_000, 1_000, 600_000),
    rpcMaxRetries: parseIntEnv(parsed.RPC_MAX_RETRIES, 0, 0, 10),
    raw: parsed,
  };
}
