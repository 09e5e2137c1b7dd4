// BacktestConfig: single versioned configuration record for a backtest run
import { z } from 'zod';

import { parseBoolEnv, parseStrictInt } from '../config/parseEnv.js';
import type { RawEnv } from '../config/envSchema.js';
import { isValidAddress, parseAddress } from '../utils/Address.js';
import { errorMessage } from '../utils/logger.js';
import {
  DEFAULT_ASSERTION_ATTACH_METHOD,
  DEFAULT_EXECUTOR_URL,
} from '../validator/ForkNodeExecutor.js';
import {
  DEFAULT_CLASSIFICATION_RULES,
  classificationRulesSchema,
  parseClassificationRules,
} from '../validator/OutcomeClassifier.js';
import { DEFAULT_GAS_LIMIT } from '../validator/ReplayValidator.js';

export const BACKTEST_CONFIG_VERSION = 1;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const hexBytes = z.string().regex(/^0x([0-9a-fA-F]{2})*$/, 'must be 0x-prefixed hex bytes');

export const backtestConfigSchema = z.object({
  version: z.literal(BACKTEST_CONFIG_VERSION).default(BACKTEST_CONFIG_VERSION),

  targetContract: z.string()
    .refine(isValidAddress, 'must be a 20-byte hex address')
    .transform(parseAddress),
  endBlock: z.number().int().positive(),
  blockRange: z.number().int().positive().default(100),

  assertionCreationCode: hexBytes.refine(v => v.length > 2, 'must not be empty'),
  assertionConstructorArgs: hexBytes.default('0x'),
  assertionSelector: z.string().regex(/^0x[0-9a-fA-F]{8}$/, 'must be a 4-byte hex selector'),

  rpcUrl: z.string().url(),
  executorUrl: z.string().url().default(DEFAULT_EXECUTOR_URL),
  assertionAttachMethod: z.string().min(1).default(DEFAULT_ASSERTION_ATTACH_METHOD),

  forkByTransactionHash: z.boolean().default(true),
  detectInternalCalls: z.boolean().default(true),
  batchSize: z.number().int().min(1).max(1000).default(20),
  maxConcurrent: z.number().int().min(1).max(100).default(10),
  traceOnFailure: z.boolean().default(true),
  defaultGasLimit: z.bigint().positive().default(DEFAULT_GAS_LIMIT),

  classifierRules: classificationRulesSchema.default([...DEFAULT_CLASSIFICATION_RULES]),

  exportDir: z.string().min(1).optional(),
  transactionsFile: z.string().min(1).optional(),
}).strict();

export type BacktestConfigInput = z.input<typeof backtestConfigSchema>;
export type BacktestConfig = Readonly<z.output<typeof backtestConfigSchema>>;

/**
 * Validate and freeze a configuration record
 *
 * @throws ConfigError listing every invalid or unknown field
 */
export function createBacktestConfig(input: unknown): BacktestConfig {
  const parsed = backtestConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid backtest configuration: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * First block of the run; never below block 1
 */
export function getStartBlock(config: BacktestConfig): number {
  return Math.max(1, config.endBlock - config.blockRange + 1);
}

/**
 * Creation code with the constructor arguments appended
 */
export function getAssertionCreateData(config: BacktestConfig): string {
  return config.assertionCreationCode + config.assertionConstructorArgs.slice(2);
}

/**
 * Warnings for configurations that run but deserve attention
 */
export function validateBacktestConfig(config: BacktestConfig): string[] {
  const warnings: string[] = [];

  if (config.blockRange > 10_000) {
    warnings.push(`Large block range detected (${config.blockRange} blocks). Consider smaller ranges for initial testing.`);
  }

  if (!config.forkByTransactionHash) {
    warnings.push(
      'Forking at block boundaries ignores earlier transactions in the same block; outcomes for any transaction after the first in its block are unreliable.'
    );
  }

  if (!config.detectInternalCalls) {
    warnings.push('Internal call detection disabled: transactions reaching the target through other contracts will be missed.');
  }

  if (config.maxConcurrent > 20) {
    warnings.push(`maxConcurrent=${config.maxConcurrent} may be rate-limited by the RPC provider.`);
  }

  return warnings;
}

/**
 * Map BACKTEST_* / RPC_URL variables onto configuration fields.
 * Unset variables are left out so schema defaults apply.
 *
 * @throws ConfigError when a numeric, boolean or JSON variable is malformed
 */
export function configInputFromEnv(env: RawEnv): Partial<BacktestConfigInput> {
  try {
    const input: Partial<BacktestConfigInput> = {};
    const set = <K extends keyof BacktestConfigInput>(key: K, value: BacktestConfigInput[K] | undefined): void => {
      if (value !== undefined) input[key] = value;
    };
    const int = (value: string | undefined, name: string): number | undefined =>
      value ? parseStrictInt(value, name) : undefined;
    const bool = (value: string | undefined): boolean | undefined =>
      value ? parseBoolEnv(value, false) : undefined;

    set('rpcUrl', env.RPC_URL || undefined);
    set('targetContract', env.BACKTEST_TARGET_CONTRACT || undefined);
    set('endBlock', int(env.BACKTEST_END_BLOCK, 'BACKTEST_END_BLOCK'));
    set('blockRange', int(env.BACKTEST_BLOCK_RANGE, 'BACKTEST_BLOCK_RANGE'));
    set('assertionCreationCode', env.BACKTEST_ASSERTION_BYTECODE || undefined);
    set('assertionConstructorArgs', env.BACKTEST_ASSERTION_ARGS || undefined);
    set('assertionSelector', env.BACKTEST_ASSERTION_SELECTOR || undefined);
    set('executorUrl', env.BACKTEST_EXECUTOR_URL || undefined);
    set('assertionAttachMethod', env.BACKTEST_ASSERTION_ATTACH_METHOD || undefined);
    set('forkByTransactionHash', bool(env.BACKTEST_FORK_BY_TX_HASH));
    set('detectInternalCalls', bool(env.BACKTEST_DETECT_INTERNAL_CALLS));
    set('batchSize', int(env.BACKTEST_BATCH_SIZE, 'BACKTEST_BATCH_SIZE'));
    set('maxConcurrent', int(env.BACKTEST_MAX_CONCURRENT, 'BACKTEST_MAX_CONCURRENT'));
    set('traceOnFailure', bool(env.BACKTEST_TRACE_ON_FAILURE));
    set('exportDir', env.BACKTEST_EXPORT_DIR || undefined);
    set('transactionsFile', env.BACKTEST_TRANSACTIONS_FILE || undefined);

    if (env.BACKTEST_DEFAULT_GAS_LIMIT) {
      set('defaultGasLimit', BigInt(parseStrictInt(env.BACKTEST_DEFAULT_GAS_LIMIT, 'BACKTEST_DEFAULT_GAS_LIMIT')));
    }
    if (env.BACKTEST_CLASSIFIER_RULES) {
      set('classifierRules', parseClassificationRules(env.BACKTEST_CLASSIFIER_RULES));
    }

    return input;
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }
}
