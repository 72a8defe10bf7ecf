/**
 * Per-rule correction outcomes, accumulated in rule order.
 */

export const OUTCOME_TAGS = [
  "updated",
  "created",
  "skipped_condition",
  "skipped_no_value",
  "skipped_no_parent",
  "failed",
] as const;

export type OutcomeTag = (typeof OUTCOME_TAGS)[number];

export interface CorrectionOutcome {
  rule: string;
  tag: OutcomeTag;
  /** Value written or about to be written; absent when none was resolved */
  value?: string;
  group?: string;
  /** Diagnostic for failed rules */
  message?: string;
}
