#!/usr/bin/env node
// CLI entry point for assertion backtesting
import {
  ConfigError,
  configInputFromEnv,
  createBacktestConfig,
  getAssertionCreateData,
  type BacktestConfig,
  type BacktestConfigInput,
} from '../backtest/BacktestConfig.js';
import { BacktestRunner, type BacktestReport } from '../backtest/BacktestRunner.js';
import type { RawEnv } from '../config/envSchema.js';
import { config as envConfig } from '../config/index.js';
import { TransactionFetcher } from '../fetcher/TransactionFetcher.js';
import { RpcClient } from '../rpc/RpcClient.js';
import { createComponentLogger, errorMessage } from '../utils/logger.js';
import type { AssertionExecutor } from '../validator/AssertionExecutor.js';
import { ForkNodeExecutor } from '../validator/ForkNodeExecutor.js';
import { createOutcomeClassifier } from '../validator/OutcomeClassifier.js';
import { ReplayValidator } from '../validator/ReplayValidator.js';
import {
  CliUsageError,
  isEntryPoint,
  parseArgs,
  parseIntegerOption,
  type ParsedArgs,
} from './args.js';

const logger = createComponentLogger('backtest');

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_VIOLATIONS = 2;

export const BACKTEST_USAGE = `Usage: backtest [options]

Every option falls back to its environment variable (see .env.example).

Options:
  --rpc-url <url>                Archive RPC endpoint (RPC_URL)
  --target-contract <address>    Contract the assertion protects
  --end-block <n>                Last block of the run
  --block-range <n>              Blocks ending at --end-block (default: 100)
  --assertion-bytecode <hex>     Assertion creation bytecode
  --assertion-args <hex>         ABI-encoded constructor arguments (default: 0x)
  --assertion-selector <hex>     4-byte trigger selector
  --executor-url <url>           Assertion-enabled fork node (default: http://127.0.0.1:8545)
  --attach-method <name>         Fork node method that attaches the assertion (default: cl_assertion)
  --fork-by-block                Fork at block boundaries instead of before each transaction
  --no-internal-calls            Only direct calls to the target
  --no-trace-on-failure          Skip the traced re-replay of assertion failures
  --batch-size <n>               Blocks per fetch batch (default: 20)
  --max-concurrent <n>           Blocks in flight per batch (default: 10)
  --export-dir <dir>             Write summary.json, transactions.jsonl and metrics.prom
  --transactions-file <path>     Replay saved fetch-transactions output instead of fetching
  -h, --help                     Show this help`;

const VALUE_FLAGS = [
  'rpc-url',
  'target-contract',
  'end-block',
  'block-range',
  'assertion-bytecode',
  'assertion-args',
  'assertion-selector',
  'executor-url',
  'attach-method',
  'batch-size',
  'max-concurrent',
  'export-dir',
  'transactions-file',
] as const;

const SWITCHES = ['fork-by-block', 'no-internal-calls', 'no-trace-on-failure'] as const;

function flagsToInput(args: ParsedArgs): Partial<BacktestConfigInput> {
  const input: Partial<BacktestConfigInput> = {};
  const str = (name: string): string | undefined => args.values.get(name);
  const int = (name: string): number | undefined => {
    const value = args.values.get(name);
    return value === undefined ? undefined : parseIntegerOption(value, name);
  };
  const assign = <K extends keyof BacktestConfigInput>(key: K, value: BacktestConfigInput[K] | undefined): void => {
    if (value !== undefined) input[key] = value;
  };

  assign('rpcUrl', str('rpc-url'));
  assign('targetContract', str('target-contract'));
  assign('endBlock', int('end-block'));
  assign('blockRange', int('block-range'));
  assign('assertionCreationCode', str('assertion-bytecode'));
  assign('assertionConstructorArgs', str('assertion-args'));
  assign('assertionSelector', str('assertion-selector'));
  assign('executorUrl', str('executor-url'));
  assign('assertionAttachMethod', str('attach-method'));
  assign('batchSize', int('batch-size'));
  assign('maxConcurrent', int('max-concurrent'));
  assign('exportDir', str('export-dir'));
  assign('transactionsFile', str('transactions-file'));

  if (args.switches.has('fork-by-block')) input.forkByTransactionHash = false;
  if (args.switches.has('no-internal-calls')) input.detectInternalCalls = false;
  if (args.switches.has('no-trace-on-failure')) input.traceOnFailure = false;

  return input;
}

/**
 * Build the run configuration from flags over environment variables
 *
 * @throws CliUsageError | ConfigError before any network call
 */
export function resolveBacktestConfig(
  argv: readonly string[],
  env: RawEnv = envConfig.raw
): BacktestConfig | 'help' {
  const args = parseArgs(argv, { values: VALUE_FLAGS, switches: SWITCHES });
  if (args.help) return 'help';

  return createBacktestConfig({
    ...configInputFromEnv(env),
    ...flagsToInput(args),
  });
}

export interface BacktestServices {
  upstream?: RpcClient;
  executor?: AssertionExecutor;
}

export function createBacktestRunner(config: BacktestConfig, services: BacktestServices = {}): BacktestRunner {
  const upstream = services.upstream ?? new RpcClient(config.rpcUrl, {
    timeoutMs: envConfig.rpcTimeoutMs,
    maxRetries: envConfig.rpcMaxRetries,
  });
  const executor = services.executor ?? new ForkNodeExecutor({
    forkClient: new RpcClient(config.executorUrl, { timeoutMs: envConfig.rpcTimeoutMs }),
    upstreamClient: upstream,
    attachMethod: config.assertionAttachMethod,
  });

  const validator = new ReplayValidator(executor, {
    targetContract: config.targetContract,
    assertionCreationCode: getAssertionCreateData(config),
    assertionSelector: config.assertionSelector,
    forkByTransactionHash: config.forkByTransactionHash,
    defaultGasLimit: config.defaultGasLimit,
    traceOnFailure: config.traceOnFailure,
    classifier: createOutcomeClassifier(config.classifierRules),
  });

  return new BacktestRunner(config, {
    fetcher: new TransactionFetcher(upstream, config.targetContract),
    validator,
  });
}

export function exitCodeFor(report: BacktestReport): number {
  return report.hasProtocolViolations ? EXIT_VIOLATIONS : EXIT_OK;
}

async function main(): Promise<number> {
  let config: BacktestConfig | 'help';
  try {
    config = resolveBacktestConfig(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof ConfigError) {
      console.error(`ERROR: ${error.message}\n`);
      console.error(BACKTEST_USAGE);
      return EXIT_FATAL;
    }
    throw error;
  }

  if (config === 'help') {
    console.log(BACKTEST_USAGE);
    return EXIT_OK;
  }

  try {
    const report = await createBacktestRunner(config).run();
    return exitCodeFor(report);
  } catch (error) {
    logger.error(`Backtest failed: ${errorMessage(error)}`);
    return EXIT_FATAL;
  }
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = EXIT_FATAL;
    });
}
