import type { RuleId } from './analyzer/types';

/** A scan rule threw; the rule is dropped for the rest of the scan. */
export class ScanRuleError extends Error {
  constructor(
    readonly ruleId: RuleId,
    readonly cause: unknown,
  ) {
    super(`Rule ${ruleId} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'ScanRuleError';
  }
}

export type ExplanationErrorKind = 'timeout' | 'cancelled' | 'transport' | 'authentication' | 'empty-response';

/** Failure of the outbound explanation call. Never crosses the requester boundary. */
export class ExplanationRequestError extends Error {
  constructor(
    readonly kind: ExplanationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ExplanationRequestError';
  }
}

/** Required configuration is missing; only the explanation step is blocked. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
