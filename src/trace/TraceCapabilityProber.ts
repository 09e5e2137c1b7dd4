/**
 * TraceCapabilityProber: determines which trace methods an RPC endpoint supports.
 *
 * Probes are an ordered list of strategies, best capability first. The
 * prober evaluates all of them for a diagnostic report; the resolver
 * evaluates them lazily and stops at the first supported one.
 */

import { TraceCapability } from '../backtest/types.js';
import { RpcClient, RpcError, METHOD_NOT_FOUND_CODE, toBlockTag } from '../rpc/RpcClient.js';
import { hashBlockSchema, type JsonRpcResponse } from '../rpc/types.js';
import { errorMessage } from '../utils/logger.js';

export type ProbeStatus = 'supported' | 'unsupported' | 'error' | 'skipped';

export interface ProbeReport {
  capability: TraceCapability;
  method: string;
  status: ProbeStatus;
  detail?: string;
}

export interface ProbeContext {
  client: RpcClient;
  blockNumber: number;
  targetContract?: string;
}

export interface TraceProbe {
  readonly capability: TraceCapability;
  readonly method: string;
  probe(context: ProbeContext): Promise<ProbeReport>;
}

/** Error message fragments nodes use for methods they do not serve */
export const UNSUPPORTED_MESSAGE_PATTERNS: readonly string[] = [
  'method not found',
  'does not exist',
  'not available',
  'unknown method',
  'not supported',
];

/** Blocks scanned (the probe block included) for a sample transaction hash */
export const SAMPLE_TX_SCAN_DEPTH = 5;

const CALL_TRACER = { tracer: 'callTracer' } as const;

/**
 * Classify a JSON-RPC response to a probe request
 */
export function classifyProbeResponse(response: JsonRpcResponse): { status: ProbeStatus; detail?: string } {
  if (!response.error) {
    return { status: 'supported' };
  }

  const { code, message } = response.error;
  const detail = `${message} (code ${code})`;
  if (code === METHOD_NOT_FOUND_CODE) {
    return { status: 'unsupported', detail };
  }

  const lower = message.toLowerCase();
  if (UNSUPPORTED_MESSAGE_PATTERNS.some(pattern => lower.includes(pattern))) {
    return { status: 'unsupported', detail };
  }

  return { status: 'error', detail };
}

/**
 * Issue a probe request; transport failures (timeouts, refused connections)
 * are reported as errors rather than thrown.
 */
async function probeMethod(
  context: ProbeContext,
  capability: TraceCapability,
  method: string,
  params: unknown[]
): Promise<ProbeReport> {
  try {
    const response = await context.client.request(method, params);
    return { capability, method, ...classifyProbeResponse(response) };
  } catch (error) {
    return { capability, method, status: 'error', detail: errorMessage(error) };
  }
}

export const traceFilterProbe: TraceProbe = {
  capability: TraceCapability.TraceFilter,
  method: 'trace_filter',
  async probe(context) {
    if (!context.targetContract) {
      return {
        capability: this.capability,
        method: this.method,
        status: 'skipped',
        detail: 'no target contract provided',
      };
    }
    const blockTag = toBlockTag(context.blockNumber);
    return probeMethod(context, this.capability, this.method, [
      { fromBlock: blockTag, toBlock: blockTag, toAddress: [context.targetContract] },
    ]);
  },
};

export const debugTraceBlockProbe: TraceProbe = {
  capability: TraceCapability.DebugTraceBlockByNumber,
  method: 'debug_traceBlockByNumber',
  async probe(context) {
    return probeMethod(context, this.capability, this.method, [
      toBlockTag(context.blockNumber),
      CALL_TRACER,
    ]);
  },
};

export const debugTraceTransactionProbe: TraceProbe = {
  capability: TraceCapability.DebugTraceTransaction,
  method: 'debug_traceTransaction',
  async probe(context) {
    const sample = await findSampleTransaction(context.client, context.blockNumber);
    if (!sample.txHash) {
      if (sample.lastError) {
        return {
          capability: this.capability,
          method: this.method,
          status: 'error',
          detail: `could not fetch a sample transaction: ${sample.lastError}`,
        };
      }
      return {
        capability: this.capability,
        method: this.method,
        status: 'skipped',
        detail: 'no tx hash found in recent blocks',
      };
    }
    return probeMethod(context, this.capability, this.method, [sample.txHash, CALL_TRACER]);
  },
};

/** Probe order is capability rank order */
export const TRACE_PROBES: readonly TraceProbe[] = [
  traceFilterProbe,
  debugTraceBlockProbe,
  debugTraceTransactionProbe,
];

/**
 * Scan the block and up to SAMPLE_TX_SCAN_DEPTH - 1 preceding blocks
 * for the first transaction hash.
 */
export async function findSampleTransaction(
  client: RpcClient,
  blockNumber: number
): Promise<{ txHash?: string; lastError?: string }> {
  let lastError: string | undefined;

  for (let i = 0; i < SAMPLE_TX_SCAN_DEPTH; i++) {
    const candidate = blockNumber - i;
    if (candidate < 0) break;

    try {
      const block = await client.call('eth_getBlockByNumber', [toBlockTag(candidate), false], hashBlockSchema);
      const txHash = block?.transactions[0];
      if (txHash) {
        return { txHash };
      }
    } catch (error) {
      lastError = error instanceof RpcError ? error.message : errorMessage(error);
    }
  }

  return { lastError };
}

/**
 * Evaluate every probe, in order, for a full diagnostic report
 */
export async function probeTraceSupport(
  context: ProbeContext,
  probes: readonly TraceProbe[] = TRACE_PROBES
): Promise<ProbeReport[]> {
  const reports: ProbeReport[] = [];
  for (const probe of probes) {
    reports.push(await probe.probe(context));
  }
  return reports;
}

export interface CapabilityResolution {
  capability: TraceCapability;
  reports: ProbeReport[];
}

/**
 * Evaluate probes lazily and select the first supported capability.
 * Falls back to DirectCallsOnly when none is supported.
 */
export async function resolveTraceCapability(
  context: ProbeContext,
  probes: readonly TraceProbe[] = TRACE_PROBES
): Promise<CapabilityResolution> {
  const reports: ProbeReport[] = [];
  for (const probe of probes) {
    const report = await probe.probe(context);
    reports.push(report);
    if (report.status === 'supported') {
      return { capability: probe.capability, reports };
    }
  }
  return { capability: TraceCapability.DirectCallsOnly, reports };
}

/**
 * Render one report line, e.g. "trace_filter: supported"
 */
export function formatProbeReport(report: ProbeReport): string {
  switch (report.status) {
    case 'supported':
    case 'unsupported':
      return `${report.method}: ${report.status}`;
    case 'error':
      return `${report.method}: error (${report.detail ?? 'see response for details'})`;
    case 'skipped':
      return `${report.method}: skipped (${report.detail ?? 'not probed'})`;
  }
}
