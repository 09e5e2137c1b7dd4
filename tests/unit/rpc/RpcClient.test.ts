import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { RpcClient, RpcError, toBlockTag } from '../../../src/rpc/RpcClient.js';
import { FakeRpcNode, RpcFailure } from '../../helpers/FakeRpcNode.js';

const stringResult = z.string();

function clientFor(node: FakeRpcNode, maxRetries = 0): RpcClient {
  return new RpcClient(node.url, { transport: node, maxRetries, baseBackoffMs: 1, maxBackoffMs: 2 });
}

async function captureError(promise: Promise<unknown>): Promise<RpcError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RpcError) return error;
    throw error;
  }
  throw new Error('expected the call to fail');
}

describe('RpcClient', () => {
  it('returns the validated result', async () => {
    const node = new FakeRpcNode().on('eth_chainId', () => '0x1');
    const client = clientFor(node);

    await expect(client.call('eth_chainId', [], stringResult)).resolves.toBe('0x1');
    expect(node.calls).toEqual([{ method: 'eth_chainId', params: [] }]);
  });

  it('classifies an unknown method as method_not_found', async () => {
    const client = clientFor(new FakeRpcNode());
    const error = await captureError(client.call('trace_filter', [], stringResult));

    expect(error.type).toBe('method_not_found');
    expect(error.message).toBe('trace_filter failed: the method trace_filter does not exist/is not available (code -32601)');
    expect(error.rpcError?.code).toBe(-32601);
  });

  it('classifies other node errors as rpc_error', async () => {
    const node = new FakeRpcNode().on('eth_call', () => new RpcFailure(3, 'execution reverted', '0xdeadbeef'));
    const error = await captureError(clientFor(node).call('eth_call', [], stringResult));

    expect(error.type).toBe('rpc_error');
    expect(error.rpcError?.data).toBe('0xdeadbeef');
  });

  it('returns node errors from request without throwing', async () => {
    const node = new FakeRpcNode().on('eth_call', () => new RpcFailure(3, 'execution reverted'));
    const response = await clientFor(node).request('eth_call', []);

    expect(response.error).toEqual({ code: 3, message: 'execution reverted' });
  });

  it('rejects results that do not match the schema', async () => {
    const node = new FakeRpcNode().on('eth_chainId', () => 42);
    const error = await captureError(clientFor(node).call('eth_chainId', [], stringResult));

    expect(error.type).toBe('invalid_response');
  });

  it('classifies refused connections as network errors', async () => {
    const node = new FakeRpcNode().on('eth_blockNumber', () => {
      throw new Error('connect ECONNREFUSED');
    });
    const error = await captureError(clientFor(node).call('eth_blockNumber', [], stringResult));

    expect(error.type).toBe('network');
    expect(error.message).toBe('Network error: connect ECONNREFUSED');
  });

  it('classifies timeouts', async () => {
    const node = new FakeRpcNode().on('eth_blockNumber', () => {
      throw new Error('request timeout');
    });
    const error = await captureError(clientFor(node).call('eth_blockNumber', [], stringResult));

    expect(error.type).toBe('timeout');
  });

  it('does not retry rate limits by default', async () => {
    const node = new FakeRpcNode().on('eth_blockNumber', () => {
      throw new Error('HTTP 429 Too Many Requests');
    });
    const error = await captureError(clientFor(node).call('eth_blockNumber', [], stringResult));

    expect(error.type).toBe('429_rate_limit');
    expect(node.calls).toHaveLength(1);
  });

  it('retries rate limits when retries are enabled', async () => {
    let attempts = 0;
    const node = new FakeRpcNode().on('eth_blockNumber', () => {
      attempts++;
      if (attempts < 3) throw new Error('HTTP 429 Too Many Requests');
      return '0x10';
    });

    await expect(clientFor(node, 2).call('eth_blockNumber', [], stringResult)).resolves.toBe('0x10');
    expect(attempts).toBe(3);
  });

  it('formats block tags as hex quantities', () => {
    expect(toBlockTag(0)).toBe('0x0');
    expect(toBlockTag(255)).toBe('0xff');
  });
});
