import { describe, it, expect } from 'vitest';

import { parseTraceSupportArgs, runTraceSupport } from '../../../src/cli/traceSupport.js';
import { RpcClient } from '../../../src/rpc/RpcClient.js';
import { FakeRpcNode, hex, blockNumberParam } from '../../helpers/FakeRpcNode.js';
import { TARGET } from '../../helpers/records.js';

describe('trace-support CLI', () => {
  it('parses the block and optional target', () => {
    expect(parseTraceSupportArgs(['--rpc-url', 'http://fake-rpc.test', '--block', '100'])).toEqual({
      rpcUrl: 'http://fake-rpc.test',
      blockNumber: 100,
      targetContract: undefined,
    });
  });

  it('rejects a malformed target before probing', () => {
    expect(() => parseTraceSupportArgs(['--rpc-url', 'http://x.test', '--block', '1', '--target-contract', 'nope'])).toThrow(
      '--target-contract is not a valid address: nope'
    );
  });

  it('requires a block', () => {
    expect(() => parseTraceSupportArgs(['--rpc-url', 'http://x.test'])).toThrow('Missing required option --block');
  });

  it('reports every probe', async () => {
    const node = new FakeRpcNode()
      .on('trace_filter', () => [])
      .on('eth_getBlockByNumber', params => ({ number: hex(blockNumberParam(params)), transactions: [] }));

    const output = await runTraceSupport(
      { rpcUrl: node.url, blockNumber: 100, targetContract: TARGET },
      new RpcClient(node.url, { transport: node })
    );

    expect(output).toBe([
      'Trace support check for block 100',
      'trace_filter: supported',
      'debug_traceBlockByNumber: unsupported',
      'debug_traceTransaction: skipped (no tx hash found in recent blocks)',
    ].join('\n'));
  });
});
