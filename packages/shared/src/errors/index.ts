/**
 * Custom error hierarchy for ChargeTrace
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'INGESTION'
  | 'TIMELINE'
  | 'CAUSAL'
  | 'FLEET'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  entityId?: string;
  [key: string]: unknown;
}

/**
 * Base error class for ChargeTrace
 */
export class ChargeTraceError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'ChargeTraceError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (caller input, counter values, options)
 */
export class ValidationError extends ChargeTraceError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      ...context,
    });
    this.name = 'ValidationError';
  }
}

export type MalformedLineReason =
  | 'invalid_timestamp'
  | 'unrecoverable_timestamp'
  | 'unknown_severity';

/**
 * A single input tuple that cannot become a timeline event.
 * Always recovered locally: the line is dropped and counted.
 */
export class MalformedLineError extends ChargeTraceError {
  public readonly reason: MalformedLineReason;

  constructor(reason: MalformedLineReason, message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'INGESTION',
      severity: 'LOW',
      reason,
      ...context,
    });
    this.name = 'MalformedLineError';
    this.reason = reason;
  }
}

/**
 * A causal rule whose trigger or template failed; the rule is skipped for the run
 */
export class RuleEvaluationError extends ChargeTraceError {
  public readonly ruleId: string;

  constructor(ruleId: string, message: string, context: Partial<ErrorContext> = {}) {
    super(`Rule '${ruleId}' failed: ${message}`, 'E3001', {
      category: 'CAUSAL',
      severity: 'MEDIUM',
      ruleId,
      ...context,
    });
    this.name = 'RuleEvaluationError';
    this.ruleId = ruleId;
  }
}

/**
 * A station pipeline that failed during a fleet run
 */
export class StationAnalysisError extends ChargeTraceError {
  constructor(entityId: string, message: string, context: Partial<ErrorContext> = {}) {
    super(`Station '${entityId}' analysis failed: ${message}`, 'E4001', {
      category: 'FLEET',
      severity: 'HIGH',
      entityId,
      ...context,
    });
    this.name = 'StationAnalysisError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ChargeTraceError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): ChargeTraceError {
  if (error instanceof ChargeTraceError) {
    return error;
  }

  if (error instanceof Error) {
    return new ChargeTraceError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      originalError: error.name,
      ...context,
    });
  }

  return new ChargeTraceError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    ...context,
  });
}
