/**
 * Causal Chain Engine
 * Evaluates the rule table against one station's counters and timeline
 */

import {
  compareSeverityDesc,
  createChildLogger,
  RuleEvaluationError,
} from '@chargetrace/shared';
import type { TimelineEvent } from '../events/types.js';
import type { MetricReader } from '../metrics/types.js';
import { CAUSAL_RULES } from './rules.js';
import { TemporalIndex } from './temporal-index.js';
import type {
  CausalChain,
  CausalRule,
  CausalStep,
  EngineResult,
  PrecedenceResult,
  StepKind,
} from './types.js';

const STEP_ORDER: Record<StepKind, number> = { CAUSE: 0, EFFECT: 1, ROOT: 2 };

/**
 * Stable CAUSE → EFFECT → ROOT ordering; a chain must end in exactly one ROOT
 */
export function orderSteps(ruleId: string, steps: CausalStep[]): CausalStep[] {
  const roots = steps.filter((step) => step.kind === 'ROOT').length;
  if (roots !== 1) {
    throw new RuleEvaluationError(ruleId, `expected exactly one ROOT step, got ${roots}`);
  }
  return [...steps].sort((a, b) => STEP_ORDER[a.kind] - STEP_ORDER[b.kind]);
}

type RuleOutcome =
  | { status: 'quiet' }
  | { status: 'suppressed'; preconditionId: string }
  | { status: 'fired'; chain: CausalChain };

export class CausalChainEngine {
  private logger = createChildLogger({ component: 'CausalChainEngine' });

  constructor(private rules: readonly CausalRule[] = CAUSAL_RULES) {}

  /**
   * Evaluate every rule once. A failing rule is skipped and reported; the run continues.
   */
  evaluate(metrics: MetricReader, timeline: readonly TimelineEvent[]): EngineResult {
    const index = new TemporalIndex(timeline);
    const result: EngineResult = { chains: [], evaluated: 0, fired: 0, suppressed: 0, skipped: [] };

    for (const rule of this.rules) {
      result.evaluated++;

      let outcome: RuleOutcome;
      try {
        outcome = this.evaluateRule(rule, metrics, index);
      } catch (error) {
        const failure =
          error instanceof RuleEvaluationError
            ? error
            : new RuleEvaluationError(rule.id, error instanceof Error ? error.message : String(error), {
                originalError: error instanceof Error ? error.name : typeof error,
              });
        result.skipped.push({ ruleId: rule.id, error: failure });
        this.logger.warn({ ruleId: rule.id, error: failure.message }, 'Causal rule skipped');
        continue;
      }

      if (outcome.status === 'suppressed') {
        result.suppressed++;
        this.logger.debug(
          { ruleId: rule.id, precondition: outcome.preconditionId },
          'Causal chain suppressed by contradicted temporal order'
        );
      } else if (outcome.status === 'fired') {
        result.fired++;
        result.chains.push(outcome.chain);
      }
    }

    // Stable: rule-table order is kept within a severity
    result.chains.sort((a, b) => compareSeverityDesc(a.severity, b.severity));

    this.logger.debug(
      { fired: result.fired, suppressed: result.suppressed, skipped: result.skipped.length },
      'Causal rules evaluated'
    );
    return result;
  }

  private evaluateRule(rule: CausalRule, metrics: MetricReader, index: TemporalIndex): RuleOutcome {
    if (!rule.trigger(metrics)) {
      return { status: 'quiet' };
    }

    const precedence: Record<string, PrecedenceResult> = {};
    for (const condition of rule.preconditions ?? []) {
      const resolved = index.precedes(condition);
      precedence[condition.id] = resolved;
      if (condition.mode === 'require' && !resolved.holds) {
        return { status: 'suppressed', preconditionId: condition.id };
      }
    }

    const steps = orderSteps(rule.id, rule.steps({ metrics, precedence }));
    return {
      status: 'fired',
      chain: { ruleId: rule.id, name: rule.name, severity: rule.severity, steps },
    };
  }
}
