import { describe, it, expect } from 'vitest';

import { TraceCapability } from '../../../src/backtest/types.js';
import { RpcClient } from '../../../src/rpc/RpcClient.js';
import {
  classifyProbeResponse,
  formatProbeReport,
  probeTraceSupport,
  resolveTraceCapability,
  traceFilterProbe,
} from '../../../src/trace/TraceCapabilityProber.js';
import { blockNumberParam, FakeRpcNode, hex, RpcFailure, txHash } from '../../helpers/FakeRpcNode.js';
import { TARGET } from '../../helpers/records.js';

const clientFor = (node: FakeRpcNode) => new RpcClient(node.url, { transport: node });

/** eth_getBlockByNumber(tag, false) serving `hashesByBlock` */
function serveHashBlocks(node: FakeRpcNode, hashesByBlock: Record<number, string[]>): FakeRpcNode {
  return node.on('eth_getBlockByNumber', params => {
    const number = blockNumberParam(params);
    return { number: hex(number), transactions: hashesByBlock[number] ?? [] };
  });
}

describe('TraceCapabilityProber', () => {
  describe('resolveTraceCapability', () => {
    it('selects trace_filter without probing further', async () => {
      const node = new FakeRpcNode().on('trace_filter', () => []);
      const resolution = await resolveTraceCapability({ client: clientFor(node), blockNumber: 100, targetContract: TARGET });

      expect(resolution.capability).toBe(TraceCapability.TraceFilter);
      expect(node.calls).toEqual([
        { method: 'trace_filter', params: [{ fromBlock: '0x64', toBlock: '0x64', toAddress: [TARGET] }] },
      ]);
    });

    it('falls back to debug_traceBlockByNumber', async () => {
      const node = new FakeRpcNode().on('debug_traceBlockByNumber', () => []);
      const resolution = await resolveTraceCapability({ client: clientFor(node), blockNumber: 100, targetContract: TARGET });

      expect(resolution.capability).toBe(TraceCapability.DebugTraceBlockByNumber);
      expect(resolution.reports.map(r => r.status)).toEqual(['unsupported', 'supported']);
      expect(node.callsTo('debug_traceBlockByNumber')[0].params).toEqual(['0x64', { tracer: 'callTracer' }]);
    });

    it('probes debug_traceTransaction with a hash from a recent block', async () => {
      const sample = txHash(99, 0);
      const node = serveHashBlocks(new FakeRpcNode(), { 99: [sample] })
        .on('debug_traceTransaction', () => ({ type: 'CALL', from: TARGET }));
      const resolution = await resolveTraceCapability({ client: clientFor(node), blockNumber: 100, targetContract: TARGET });

      expect(resolution.capability).toBe(TraceCapability.DebugTraceTransaction);
      expect(node.callsTo('eth_getBlockByNumber').map(c => c.params)).toEqual([
        ['0x64', false],
        ['0x63', false],
      ]);
      expect(node.callsTo('debug_traceTransaction')[0].params).toEqual([sample, { tracer: 'callTracer' }]);
    });

    it('returns DirectCallsOnly when nothing is supported', async () => {
      const node = serveHashBlocks(new FakeRpcNode(), {});
      const resolution = await resolveTraceCapability({ client: clientFor(node), blockNumber: 100, targetContract: TARGET });

      expect(resolution.capability).toBe(TraceCapability.DirectCallsOnly);
      expect(resolution.reports.map(r => r.status)).toEqual(['unsupported', 'unsupported', 'skipped']);
      expect(resolution.reports[2].detail).toBe('no tx hash found in recent blocks');
      expect(node.callsTo('eth_getBlockByNumber')).toHaveLength(5);
    });
  });

  describe('probeTraceSupport', () => {
    it('skips trace_filter without a target contract', async () => {
      const node = serveHashBlocks(new FakeRpcNode(), {}).on('debug_traceBlockByNumber', () => []);
      const reports = await probeTraceSupport({ client: clientFor(node), blockNumber: 50 });

      expect(reports[0]).toEqual({
        capability: TraceCapability.TraceFilter,
        method: 'trace_filter',
        status: 'skipped',
        detail: 'no target contract provided',
      });
      expect(node.callsTo('trace_filter')).toHaveLength(0);
    });

    it('evaluates every probe even after a supported one', async () => {
      const node = serveHashBlocks(new FakeRpcNode(), { 50: [txHash(50, 0)] })
        .on('trace_filter', () => [])
        .on('debug_traceBlockByNumber', () => [])
        .on('debug_traceTransaction', () => ({ type: 'CALL', from: TARGET }));
      const reports = await probeTraceSupport({ client: clientFor(node), blockNumber: 50, targetContract: TARGET });

      expect(reports.map(r => r.status)).toEqual(['supported', 'supported', 'supported']);
    });

    it('reports transport failures as errors', async () => {
      const refuse = () => {
        throw new Error('connect ECONNREFUSED');
      };
      const node = new FakeRpcNode()
        .on('trace_filter', refuse)
        .on('debug_traceBlockByNumber', refuse)
        .on('eth_getBlockByNumber', refuse);
      const reports = await probeTraceSupport({ client: clientFor(node), blockNumber: 50, targetContract: TARGET });

      expect(reports.map(formatProbeReport)).toEqual([
        'trace_filter: error (Network error: connect ECONNREFUSED)',
        'debug_traceBlockByNumber: error (Network error: connect ECONNREFUSED)',
        'debug_traceTransaction: error (could not fetch a sample transaction: Network error: connect ECONNREFUSED)',
      ]);
    });

    it('stops the sample scan at block 0', async () => {
      const node = serveHashBlocks(new FakeRpcNode(), {});
      await probeTraceSupport({ client: clientFor(node), blockNumber: 2 });

      expect(node.callsTo('eth_getBlockByNumber').map(c => c.params[0])).toEqual(['0x2', '0x1', '0x0']);
    });
  });

  describe('classifyProbeResponse', () => {
    it('treats a successful response as supported', () => {
      expect(classifyProbeResponse({ jsonrpc: '2.0', id: 1, result: [] })).toEqual({ status: 'supported' });
    });

    it('treats "not supported" messages as unsupported regardless of code', () => {
      const response = { jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'Method Not Supported' } };
      expect(classifyProbeResponse(response)).toEqual({
        status: 'unsupported',
        detail: 'Method Not Supported (code -32000)',
      });
    });

    it('treats other node errors as probe errors', () => {
      const response = { jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'header not found' } };
      expect(classifyProbeResponse(response)).toEqual({ status: 'error', detail: 'header not found (code -32000)' });
    });
  });

  it('renders skipped probes with their reason', () => {
    expect(formatProbeReport({
      capability: TraceCapability.DebugTraceTransaction,
      method: 'debug_traceTransaction',
      status: 'skipped',
      detail: 'no tx hash found in recent blocks',
    })).toBe('debug_traceTransaction: skipped (no tx hash found in recent blocks)');
  });

  it('reports a node error from a probe request', async () => {
    const node = new FakeRpcNode().on('trace_filter', () => new RpcFailure(-32000, 'trace_filter is disabled'));
    const [report] = await probeTraceSupport(
      { client: clientFor(node), blockNumber: 1, targetContract: TARGET },
      [traceFilterProbe]
    );

    expect(formatProbeReport(report)).toBe('trace_filter: error (trace_filter is disabled (code -32000))');
  });
});
