import type { CorrectionOutcome, OutcomeTag } from "./outcome.js";

export interface OutcomeSummary {
  total: number;
  counts: Record<OutcomeTag, number>;
  /** updated + created */
  applied: number;
  failures: Array<{ rule: string; message: string }>;
  /** True when no rule failed */
  ok: boolean;
}

export function summarizeOutcomes(outcomes: ReadonlyArray<CorrectionOutcome>): OutcomeSummary {
  const counts: Record<OutcomeTag, number> = {
    updated: 0,
    created: 0,
    skipped_condition: 0,
    skipped_no_value: 0,
    skipped_no_parent: 0,
    failed: 0,
  };
  const failures: OutcomeSummary["failures"] = [];

  for (const outcome of outcomes) {
    counts[outcome.tag]++;
    if (outcome.tag === "failed") {
      failures.push({ rule: outcome.rule, message: outcome.message ?? "failed" });
    }
  }

  return {
    total: outcomes.length,
    counts,
    applied: counts.updated + counts.created,
    failures,
    ok: failures.length === 0,
  };
}

const TAG_LABELS: Record<OutcomeTag, string> = {
  updated: "updated",
  created: "created",
  skipped_condition: "skipped (condition not met)",
  skipped_no_value: "skipped (no value)",
  skipped_no_parent: "skipped (parent not found)",
  failed: "FAILED",
};

/**
 * One line per outcome, e.g. `numero_commande: created "FU70001236"`.
 */
export function formatOutcomeLines(outcomes: ReadonlyArray<CorrectionOutcome>): string[] {
  return outcomes.map(outcome => {
    let line = `${outcome.rule}: ${TAG_LABELS[outcome.tag]}`;
    if (outcome.tag === "failed") {
      line += ` - ${outcome.message ?? "unknown error"}`;
    } else if (outcome.value !== undefined && outcome.tag !== "skipped_no_parent") {
      line += ` "${outcome.value}"`;
    }
    return line;
  });
}
