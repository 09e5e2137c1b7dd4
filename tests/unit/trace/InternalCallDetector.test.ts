import { describe, it, expect } from 'vitest';

import { TraceCapability } from '../../../src/backtest/types.js';
import { RpcClient } from '../../../src/rpc/RpcClient.js';
import { fullBlockSchema, type CallFrame, type RpcBlock } from '../../../src/rpc/types.js';
import { frameCallsAddress } from '../../../src/trace/callFrames.js';
import {
  BlockTracerDetector,
  createInternalCallDetector,
  TraceFilterDetector,
  TransactionTracerDetector,
} from '../../../src/trace/InternalCallDetector.js';
import { createComponentLogger } from '../../../src/utils/logger.js';
import { fakeBlock, FakeRpcNode, RpcFailure, txHash } from '../../helpers/FakeRpcNode.js';
import { OTHER, ROUTER, SENDER, TARGET } from '../../helpers/records.js';

const clientFor = (node: FakeRpcNode) => new RpcClient(node.url, { transport: node });
const logger = createComponentLogger('test', 'error');

const nested: CallFrame = {
  type: 'CALL',
  from: SENDER,
  to: ROUTER,
  calls: [
    { type: 'STATICCALL', from: ROUTER, to: OTHER },
    {
      type: 'CALL',
      from: ROUTER,
      to: OTHER,
      calls: [{ type: 'DELEGATECALL', from: OTHER, to: TARGET }],
    },
  ],
};

function block7(): RpcBlock {
  const block = fullBlockSchema.parse(fakeBlock(7, [
    { hash: txHash(7, 0), from: SENDER, to: ROUTER, index: 0 },
    { hash: txHash(7, 1), from: SENDER, to: OTHER, index: 1 },
  ]));
  if (!block) throw new Error('fake block did not parse');
  return block;
}

describe('callFrames', () => {
  it('finds the target at any depth, ignoring casing', () => {
    expect(frameCallsAddress(nested, TARGET)).toBe(true);
    expect(frameCallsAddress(nested, SENDER)).toBe(false);
    expect(frameCallsAddress(
      { type: 'CALL', from: SENDER, to: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd' },
      '0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD'
    )).toBe(true);
  });
});

describe('InternalCallDetector', () => {
  it('TraceFilterDetector resolves hashes by position when the node omits them', async () => {
    const node = new FakeRpcNode().on('trace_filter', () => [
      { action: { to: TARGET }, blockNumber: 7, transactionHash: null, transactionPosition: 1, type: 'call' },
      { action: { to: OTHER }, blockNumber: 7, transactionHash: txHash(7, 0), type: 'call' },
    ]);
    const block = block7();
    const hashes = await new TraceFilterDetector(clientFor(node), TARGET).findInternalCalls(block);

    expect([...hashes]).toEqual([txHash(7, 1)]);
    expect(node.calls[0].params).toEqual([{ fromBlock: '0x7', toBlock: '0x7', toAddress: [TARGET] }]);
  });

  it('BlockTracerDetector aligns entries without txHash to block positions', async () => {
    const node = new FakeRpcNode().on('debug_traceBlockByNumber', () => [
      { result: nested },
      { result: { type: 'CALL', from: SENDER, to: OTHER } },
    ]);
    const hashes = await new BlockTracerDetector(clientFor(node), TARGET).findInternalCalls(block7());

    expect([...hashes]).toEqual([txHash(7, 0)]);
  });

  it('TransactionTracerDetector skips transactions whose trace fails', async () => {
    const failing = txHash(7, 1);
    const node = new FakeRpcNode().on('debug_traceTransaction', params =>
      params[0] === failing ? new RpcFailure(-32000, 'transaction not found') : nested
    );
    const block = block7();
    const detector = new TransactionTracerDetector(clientFor(node), TARGET, logger);
    const hashes = await detector.findInternalCalls(block, block.transactions);

    expect([...hashes]).toEqual([txHash(7, 0)]);
    expect(node.callsTo('debug_traceTransaction')).toHaveLength(2);
  });

  it('DirectCallsOnly makes no requests', async () => {
    const node = new FakeRpcNode();
    const detector = createInternalCallDetector(TraceCapability.DirectCallsOnly, clientFor(node), TARGET, logger);
    const block = block7();

    expect((await detector.findInternalCalls(block, block.transactions)).size).toBe(0);
    expect(node.calls).toHaveLength(0);
  });
});
