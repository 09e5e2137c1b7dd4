import { describe, it, expect } from 'vitest';

import {
  createOutcomeClassifier,
  parseClassificationRules,
} from '../../../src/validator/OutcomeClassifier.js';

describe('OutcomeClassifier', () => {
  const classify = createOutcomeClassifier();

  it('classifies success regardless of message', () => {
    expect(classify(true, 'anything')).toEqual({ kind: 'Success', message: undefined, isProtocolViolation: false });
  });

  it('maps replay problems to ReplayFailure', () => {
    expect(classify(false, 'Mock Transaction Reverted: out of gas').kind).toBe('ReplayFailure');
    expect(classify(false, 'Assertion Executor Error: ForkTxExecutionError(nonce too low)').kind).toBe('ReplayFailure');
  });

  it('maps an untriggered assertion to Skipped', () => {
    const outcome = classify(false, 'Expected 1 assertion to be executed, but 0 were executed');
    expect(outcome).toEqual({
      kind: 'Skipped',
      message: 'Expected 1 assertion to be executed, but 0 were executed',
      isProtocolViolation: false,
    });
  });

  it('treats any other failure as a protocol violation', () => {
    expect(classify(false, 'Health factor below threshold')).toEqual({
      kind: 'AssertionFailed',
      message: 'Health factor below threshold',
      isProtocolViolation: true,
    });
    expect(classify(false, '').kind).toBe('AssertionFailed');
  });

  it('matches prefixes only at the start of the message', () => {
    expect(classify(false, 'Error: Mock Transaction Reverted: x').kind).toBe('AssertionFailed');
  });

  it('applies the first matching rule of a custom table', () => {
    const custom = createOutcomeClassifier([
      { prefix: 'Oracle', outcome: 'UnknownError' },
      { prefix: 'Oracle stale', outcome: 'Skipped' },
    ]);
    expect(custom(false, 'Oracle stale price').kind).toBe('UnknownError');
    expect(custom(false, 'Mock Transaction Reverted: x').kind).toBe('AssertionFailed');
  });

  describe('parseClassificationRules', () => {
    it('parses a JSON rule table', () => {
      expect(parseClassificationRules('[{"prefix":"Reverted","outcome":"ReplayFailure"}]')).toEqual([
        { prefix: 'Reverted', outcome: 'ReplayFailure' },
      ]);
    });

    it('rejects malformed JSON', () => {
      expect(() => parseClassificationRules('[{')).toThrow('Classifier rules are not valid JSON');
    });

    it('rejects unknown outcomes and empty prefixes', () => {
      expect(() => parseClassificationRules('[{"prefix":"x","outcome":"Success"}]')).toThrow();
      expect(() => parseClassificationRules('[{"prefix":"","outcome":"Skipped"}]')).toThrow();
    });
  });
});
