/**
 * OutcomeClassifier: maps an execution result to a ValidationOutcome.
 *
 * The executor reports replay problems (reverted pre-state, fork errors,
 * assertion not triggered) through revert messages. Those messages are
 * matched by prefix against an ordered rule table; first match wins and an
 * unmatched failure is a protocol violation.
 */

import { z } from 'zod';

import { makeOutcome, type ValidationOutcome } from '../backtest/types.js';
import { errorMessage } from '../utils/logger.js';

export const classificationRuleSchema = z.object({
  prefix: z.string().min(1),
  outcome: z.enum(['Skipped', 'ReplayFailure', 'AssertionFailed', 'UnknownError']),
}).strict();

export const classificationRulesSchema = z.array(classificationRuleSchema);

export type ClassificationRule = z.infer<typeof classificationRuleSchema>;

export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { prefix: 'Mock Transaction Reverted:', outcome: 'ReplayFailure' },
  { prefix: 'Assertion Executor Error: ForkTxExecutionError', outcome: 'ReplayFailure' },
  { prefix: 'Expected 1 assertion to be executed, but 0', outcome: 'Skipped' },
];

export type OutcomeClassifier = (success: boolean, revertMessage: string) => ValidationOutcome;

export function createOutcomeClassifier(
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES
): OutcomeClassifier {
  const table = [...rules];

  return (success, revertMessage) => {
    if (success) {
      return makeOutcome('Success');
    }

    const rule = table.find(r => revertMessage.startsWith(r.prefix));
    return makeOutcome(rule?.outcome ?? 'AssertionFailed', revertMessage);
  };
}

/**
 * Parse a JSON rule table (BACKTEST_CLASSIFIER_RULES)
 *
 * @throws Error when the JSON is malformed or a rule is invalid
 */
export function parseClassificationRules(json: string): ClassificationRule[] {
  let body: unknown;
  try {
    body = JSON.parse(json);
  } catch (error) {
    throw new Error(`Classifier rules are not valid JSON: ${errorMessage(error)}`);
  }
  return classificationRulesSchema.parse(body);
}
