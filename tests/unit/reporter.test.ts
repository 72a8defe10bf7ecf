import { describe, it, expect } from "vitest";
import { formatOutcomeLines, summarizeOutcomes } from "../../src/engine/reporter.js";
import type { CorrectionOutcome } from "../../src/engine/outcome.js";

const OUTCOMES: CorrectionOutcome[] = [
  { rule: "numero_commande", tag: "created", value: "FU70001236" },
  { rule: "emploi_cc_position_code", tag: "updated", value: "10A3071" },
  { rule: "categorie_socio_position_level", tag: "skipped_no_value" },
  { rule: "centre_analyse_cost_center_name", tag: "skipped_no_parent", value: "9310 - MRS" },
  { rule: "worksite_conditional", tag: "skipped_condition" },
  { rule: "broken", tag: "failed", value: "x", message: 'Invalid locator "A": must start with "/" or "//"' },
];

describe("summarizeOutcomes", () => {
  it("counts every tag", () => {
    expect(summarizeOutcomes(OUTCOMES)).toEqual({
      total: 6,
      counts: {
        updated: 1,
        created: 1,
        skipped_condition: 1,
        skipped_no_value: 1,
        skipped_no_parent: 1,
        failed: 1,
      },
      applied: 2,
      failures: [{ rule: "broken", message: 'Invalid locator "A": must start with "/" or "//"' }],
      ok: false,
    });
  });

  it("is ok when nothing failed", () => {
    const summary = summarizeOutcomes(OUTCOMES.slice(0, 2));

    expect(summary.ok).toBe(true);
    expect(summary.applied).toBe(2);
    expect(summary.failures).toEqual([]);
  });

  it("handles an empty run", () => {
    const summary = summarizeOutcomes([]);

    expect(summary.total).toBe(0);
    expect(summary.ok).toBe(true);
  });
});

describe("formatOutcomeLines", () => {
  it("writes one line per outcome", () => {
    expect(formatOutcomeLines(OUTCOMES)).toEqual([
      'numero_commande: created "FU70001236"',
      'emploi_cc_position_code: updated "10A3071"',
      "categorie_socio_position_level: skipped (no value)",
      "centre_analyse_cost_center_name: skipped (parent not found)",
      "worksite_conditional: skipped (condition not met)",
      'broken: FAILED - Invalid locator "A": must start with "/" or "//"',
    ]);
  });
});
