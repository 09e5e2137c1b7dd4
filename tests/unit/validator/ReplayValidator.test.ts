import { describe, it, expect } from 'vitest';

import { createComponentLogger } from '../../../src/utils/logger.js';
import {
  DEFAULT_GAS_LIMIT,
  ReplayValidator,
  effectiveGasLimit,
  effectiveGasPrice,
  type ReplayValidatorOptions,
} from '../../../src/validator/ReplayValidator.js';
import { FakeAssertionExecutor } from '../../helpers/FakeAssertionExecutor.js';
import { makeRecord, SENDER, TARGET } from '../../helpers/records.js';

const logger = createComponentLogger('test', 'error');
const NOT_TRIGGERED = 'Expected 1 assertion to be executed, but 0 were executed';

function validatorFor(executor: FakeAssertionExecutor, overrides: Partial<ReplayValidatorOptions> = {}) {
  return new ReplayValidator(executor, {
    targetContract: TARGET,
    assertionCreationCode: '0x6080',
    assertionSelector: '0x12345678',
    logger,
    ...overrides,
  });
}

describe('ReplayValidator', () => {
  it('forks before the transaction, attaches the assertion and executes', async () => {
    const executor = new FakeAssertionExecutor();
    const record = makeRecord();

    const outcome = await validatorFor(executor).validate(record);

    expect(outcome.kind).toBe('Success');
    expect(executor.ops()).toEqual(['forkBeforeTransaction', 'attachAssertion', 'execute']);
    expect(executor.calls[0]).toEqual({ op: 'forkBeforeTransaction', txHash: record.hash });
    expect(executor.calls[1]).toEqual({
      op: 'attachAssertion',
      assertion: { adopter: TARGET, creationCode: '0x6080', triggerSelector: '0x12345678' },
    });
    expect(executor.calls[2]).toEqual({
      op: 'execute',
      request: {
        from: SENDER,
        to: TARGET,
        value: 0n,
        data: '0xa9059cbb',
        gasLimit: 100_000n,
        gasPrice: 2_000_000_000n,
      },
    });
  });

  it('forks at the block boundary when hash forking is off', async () => {
    const executor = new FakeAssertionExecutor();
    await validatorFor(executor, { forkByTransactionHash: false }).validate(makeRecord({ blockNumber: 321 }));

    expect(executor.calls[0]).toEqual({ op: 'forkAtBlock', blockNumber: 321 });
  });

  it('lowers the base fee to what the sender can afford', async () => {
    const executor = new FakeAssertionExecutor();
    executor.balance = 50_000_000n;

    await validatorFor(executor).validate(makeRecord({ gasLimit: 100_000n }));

    expect(executor.calls).toContainEqual({ op: 'setBaseFee', baseFee: 500n });
    expect(executor.ops()).toEqual(['forkBeforeTransaction', 'attachAssertion', 'setBaseFee', 'execute']);
  });

  it('leaves an affordable base fee untouched', async () => {
    const executor = new FakeAssertionExecutor();
    await validatorFor(executor).validate(makeRecord());

    expect(executor.ops()).not.toContain('setBaseFee');
  });

  it('classifies an untriggered assertion as Skipped without tracing', async () => {
    const executor = new FakeAssertionExecutor();
    executor.defaultResult = { success: false, returnData: '0x', revertMessage: NOT_TRIGGERED };

    const outcome = await validatorFor(executor).validate(makeRecord());

    expect(outcome).toEqual({ kind: 'Skipped', message: NOT_TRIGGERED, isProtocolViolation: false });
    expect(executor.ops()).not.toContain('traceCall');
  });

  it('re-replays a violation with tracing and keeps the outcome', async () => {
    const executor = new FakeAssertionExecutor();
    const record = makeRecord();
    executor.results.set(record.hash, { success: false, returnData: '0x', revertMessage: 'Invariant broken' });

    const outcome = await validatorFor(executor).validate(record);

    expect(outcome).toEqual({ kind: 'AssertionFailed', message: 'Invariant broken', isProtocolViolation: true });
    expect(executor.ops()).toEqual([
      'forkBeforeTransaction',
      'attachAssertion',
      'execute',
      'forkBeforeTransaction',
      'traceCall',
    ]);
  });

  it('ignores a failing trace replay', async () => {
    const executor = new FakeAssertionExecutor();
    executor.defaultResult = { success: false, returnData: '0x', revertMessage: 'Invariant broken' };
    executor.failTrace = new Error('debug_traceCall not available');

    const outcome = await validatorFor(executor).validate(makeRecord());

    expect(outcome.kind).toBe('AssertionFailed');
  });

  it('skips the trace replay when disabled', async () => {
    const executor = new FakeAssertionExecutor();
    executor.defaultResult = { success: false, returnData: '0x', revertMessage: 'Invariant broken' };

    await validatorFor(executor, { traceOnFailure: false }).validate(makeRecord());

    expect(executor.ops()).toEqual(['forkBeforeTransaction', 'attachAssertion', 'execute']);
  });

  it('reports executor exceptions as UnknownError', async () => {
    const executor = new FakeAssertionExecutor();
    executor.failFork = new Error('fork node unreachable');

    const outcome = await validatorFor(executor).validate(makeRecord());

    expect(outcome).toEqual({ kind: 'UnknownError', message: 'fork node unreachable', isProtocolViolation: false });
    expect(executor.ops()).toEqual(['forkBeforeTransaction']);
  });

  it('uses the configured classifier', async () => {
    const executor = new FakeAssertionExecutor();
    executor.defaultResult = { success: false, returnData: '0x', revertMessage: 'Oracle stale' };

    const outcome = await validatorFor(executor, {
      classifier: (success, message) => ({ kind: 'Skipped', message, isProtocolViolation: false }),
    }).validate(makeRecord());

    expect(outcome.kind).toBe('Skipped');
  });
});

describe('gas parameters', () => {
  it('prefers maxFeePerGas over gasPrice', () => {
    expect(effectiveGasPrice(makeRecord({ gasPrice: 5n, maxFeePerGas: 9n }))).toBe(9n);
    expect(effectiveGasPrice(makeRecord({ gasPrice: 5n, maxFeePerGas: 0n }))).toBe(5n);
  });

  it('falls back to the default gas limit', () => {
    expect(effectiveGasLimit(makeRecord({ gasLimit: 0n }))).toBe(DEFAULT_GAS_LIMIT);
    expect(effectiveGasLimit(makeRecord({ gasLimit: 0n }), 30_000_000n)).toBe(30_000_000n);
    expect(effectiveGasLimit(makeRecord({ gasLimit: 42_000n }))).toBe(42_000n);
  });
});
