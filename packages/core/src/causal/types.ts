/**
 * Causal Chain Types
 * Declarative rules evaluated against station counters and timeline order
 */

import type { RuleEvaluationError, Severity } from '@chargetrace/shared';
import type { MetricReader } from '../metrics/types.js';

// ===========================================
// Chains
// ===========================================

export type StepKind = 'CAUSE' | 'EFFECT' | 'ROOT';

export interface CausalStep {
  kind: StepKind;
  text: string;
}

export interface CausalChain {
  ruleId: string;
  name: string;
  severity: Severity;
  // CAUSE(s), then EFFECT(s), then exactly one ROOT
  steps: CausalStep[];
}

// ===========================================
// Temporal Preconditions
// ===========================================

/**
 * annotate: only adds a confirmation note. require: a contradicted order suppresses the chain.
 */
export type PrecedenceMode = 'annotate' | 'require';

export interface TemporalPrecondition {
  id: string;
  before: RegExp;
  after: RegExp;
  mode: PrecedenceMode;
  measureGap?: boolean;
}

export interface PrecedenceResult {
  holds: boolean;
  // true only when both patterns matched and the order held
  confirmed: boolean;
  vacuous: boolean;
  // Minutes from the first `before` match to the first `after` match; 0 when undeterminable
  gapMinutes: number;
}

// ===========================================
// Rules
// ===========================================

export interface RuleContext {
  metrics: MetricReader;
  precedence: Readonly<Record<string, PrecedenceResult>>;
}

export interface CausalRule {
  id: string;
  name: string;
  severity: Severity;
  trigger: (metrics: MetricReader) => boolean;
  preconditions?: readonly TemporalPrecondition[];
  steps: (context: RuleContext) => CausalStep[];
}

// ===========================================
// Engine Result
// ===========================================

export interface SkippedRule {
  ruleId: string;
  error: RuleEvaluationError;
}

export interface EngineResult {
  chains: CausalChain[];
  evaluated: number;
  fired: number;
  suppressed: number;
  skipped: SkippedRule[];
}
