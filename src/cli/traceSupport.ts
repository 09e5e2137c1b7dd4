#!/usr/bin/env node
// CLI: report which trace methods an RPC endpoint supports
import { config } from '../config/index.js';
import { RpcClient } from '../rpc/RpcClient.js';
import { formatProbeReport, probeTraceSupport, type ProbeReport } from '../trace/TraceCapabilityProber.js';
import { isValidAddress } from '../utils/Address.js';
import { errorMessage } from '../utils/logger.js';
import {
  CliUsageError,
  isEntryPoint,
  parseArgs,
  parseIntegerOption,
  requireValue,
} from './args.js';

export const TRACE_SUPPORT_USAGE = `Usage: trace-support --rpc-url <url> --block <number> [--target-contract <address>]

Options:
  --rpc-url <url>              RPC endpoint to probe
  --block <number>             Block used for the probes
  --target-contract <address>  Target for the trace_filter probe (skipped when omitted)
  -h, --help                   Show this help`;

export interface TraceSupportOptions {
  rpcUrl: string;
  blockNumber: number;
  targetContract?: string;
}

/**
 * @throws CliUsageError before any network call when arguments are invalid
 */
export function parseTraceSupportArgs(argv: readonly string[]): TraceSupportOptions | 'help' {
  const args = parseArgs(argv, { values: ['rpc-url', 'block', 'target-contract'], switches: [] });
  if (args.help) return 'help';

  const targetContract = args.values.get('target-contract');
  if (targetContract !== undefined && !isValidAddress(targetContract)) {
    throw new CliUsageError(`--target-contract is not a valid address: ${targetContract}`);
  }

  return {
    rpcUrl: requireValue(args, 'rpc-url'),
    blockNumber: parseIntegerOption(requireValue(args, 'block'), 'block'),
    targetContract,
  };
}

export function formatTraceSupportReport(blockNumber: number, reports: readonly ProbeReport[]): string {
  return [`Trace support check for block ${blockNumber}`, ...reports.map(formatProbeReport)].join('\n');
}

export async function runTraceSupport(options: TraceSupportOptions, client?: RpcClient): Promise<string> {
  const rpc = client ?? new RpcClient(options.rpcUrl, { timeoutMs: config.rpcTimeoutMs });
  const reports = await probeTraceSupport({
    client: rpc,
    blockNumber: options.blockNumber,
    targetContract: options.targetContract,
  });
  return formatTraceSupportReport(options.blockNumber, reports);
}

async function main(): Promise<number> {
  let options: TraceSupportOptions | 'help';
  try {
    options = parseTraceSupportArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`ERROR: ${errorMessage(error)}\n`);
    console.error(TRACE_SUPPORT_USAGE);
    return 1;
  }

  if (options === 'help') {
    console.log(TRACE_SUPPORT_USAGE);
    return 0;
  }

  console.log(await runTraceSupport(options));
  return 0;
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
