/**
 * Rule Set resolution and linting.
 *
 * The built-in rules describe where each order field lives in an HR-XML
 * assignment document. Orders files may ship their own table, which then
 * replaces the built-in one entirely.
 */

import { childLabelFor, parseLocator, type Locator } from "../document/locator.js";
import { LocatorParseError } from "../document/errors.js";
import type { CorrectionRuleT, RuleSetT } from "../schemas/rules.js";

export const DEFAULT_RULES: RuleSetT = Object.freeze([
  {
    name: "numero_commande",
    description: "Customer order number",
    target_location: "//ReferenceInformation/OrderId/IdValue",
    source_key: "order_id",
    parent_location: "//ReferenceInformation/OrderId",
    group: "ReferenceInformation",
  },
  {
    name: "emploi_cc_position_code",
    description: "Job code from the collective agreement",
    target_location: "//PositionCharacteristics/PositionStatus/Code",
    source_key: "emploi_cc",
    parent_location: "//PositionCharacteristics/PositionStatus",
    group: "PositionCharacteristics",
  },
  {
    name: "categorie_socio_position_level",
    description: "Socio-professional category",
    target_location: "//PositionCharacteristics/PositionLevel",
    source_key: "categorie_socio",
    parent_location: "//PositionCharacteristics",
    group: "PositionCharacteristics",
  },
  {
    name: "classement_cc_coefficient",
    description: "Collective agreement classification",
    target_location: "//PositionCharacteristics/PositionCoefficient",
    source_key: "classement_cc",
    parent_location: "//PositionCharacteristics",
    group: "PositionCharacteristics",
  },
  {
    name: "centre_analyse_cost_center_name",
    description: "Full analysis centre label",
    target_location: "//CustomerReportingRequirements/CostCenterName",
    source_key: "centre_analyse",
    parent_location: "//CustomerReportingRequirements",
    group: "CustomerReportingRequirements",
  },
  {
    name: "centre_analyse_department_code",
    description: "Analysis centre code as department",
    target_location: "//CustomerReportingRequirements/DepartmentCode",
    source_key: "centre_analyse_prefix",
    parent_location: "//CustomerReportingRequirements",
    group: "CustomerReportingRequirements",
  },
  {
    name: "centre_analyse_cost_center_code",
    description: "Analysis centre code as cost centre",
    target_location: "//CustomerReportingRequirements/CostCenterCode",
    source_key: "centre_analyse_prefix",
    parent_location: "//CustomerReportingRequirements",
    group: "CustomerReportingRequirements",
  },
  {
    name: "worksite_conditional",
    description: "Worksite name, only for missions outside Gemenos",
    target_location: "//WorkSite/WorkSiteName",
    source_key: "centre_analyse",
    condition: "site_not_gemenos",
    parent_location: "//WorkSite",
    group: "ContractInformation",
  },
] satisfies CorrectionRuleT[]);

/** Rules every production rule table is expected to carry. */
export const EXPECTED_RULE_NAMES: ReadonlyArray<string> = [
  "numero_commande",
  "emploi_cc_position_code",
  "categorie_socio_position_level",
  "classement_cc_coefficient",
  "centre_analyse_cost_center_name",
];

/**
 * Pick the active rule set. An externally supplied table always wins, even
 * when it is empty; the built-in rules apply only when none was supplied.
 */
export function resolveRuleSet(external?: RuleSetT | null): RuleSetT {
  if (external === undefined || external === null) {
    return DEFAULT_RULES;
  }
  return Object.freeze([...external]);
}

export type RuleLintIssue = {
  level: "BLOCKER" | "IMPROVEMENT" | "OBSERVATION";
  note: string;
  target?: string;
};

function locatorProblem(text: string): string | undefined {
  try {
    parseLocator(text);
    return undefined;
  } catch (error) {
    if (error instanceof LocatorParseError) {
      return error.message;
    }
    throw error;
  }
}

/**
 * Whether an element created under `parent` can be matched by `target`.
 * Only definite conflicts count: differing step names at the same depth from
 * the created element, or depths the anchors make impossible.
 */
function createdChildIsReachable(target: Locator, parent: Locator): boolean {
  const expected = target.steps.slice(0, -1);
  const actual = parent.steps;

  if (target.anchor === "root") {
    if (expected.length === 0) return false;
    if (parent.anchor === "root" && actual.length !== expected.length) return false;
    if (parent.anchor === "descendant" && actual.length > expected.length) return false;
  } else if (parent.anchor === "root" && expected.length > actual.length) {
    return false;
  }

  const overlap = Math.min(expected.length, actual.length);
  for (let i = 1; i <= overlap; i++) {
    const want = expected[expected.length - i];
    const have = actual[actual.length - i];
    if (!want.wildcard && !have.wildcard && want.localName !== have.localName) {
      return false;
    }
  }
  return true;
}

/**
 * Lint a rule set without rejecting it.
 *
 * - BLOCKER: the rule fails on every document (malformed locator, a
 *   target whose last step cannot name a new element, or a parent under
 *   which the target can never match)
 * - IMPROVEMENT: the rule can update but never create (no parent_location)
 * - OBSERVATION: an expected rule is missing from the table
 */
export function lintRuleSet(
  rules: RuleSetT,
  expected: ReadonlyArray<string> = EXPECTED_RULE_NAMES
): RuleLintIssue[] {
  const issues: RuleLintIssue[] = [];

  for (const rule of rules) {
    const targetProblem = locatorProblem(rule.target_location);
    if (targetProblem) {
      issues.push({ level: "BLOCKER", note: targetProblem, target: rule.name });
    }

    if (rule.parent_location === undefined) {
      issues.push({
        level: "IMPROVEMENT",
        note: `Rule '${rule.name}' has no parent_location and cannot create a missing target`,
        target: rule.name,
      });
      continue;
    }

    const parentProblem = locatorProblem(rule.parent_location);
    if (parentProblem) {
      issues.push({ level: "BLOCKER", note: parentProblem, target: rule.name });
    }

    if (!targetProblem) {
      const target = parseLocator(rule.target_location);
      try {
        childLabelFor(target);
      } catch (error) {
        if (!(error instanceof LocatorParseError)) throw error;
        issues.push({ level: "BLOCKER", note: error.message, target: rule.name });
      }

      if (!parentProblem && !createdChildIsReachable(target, parseLocator(rule.parent_location))) {
        issues.push({
          level: "BLOCKER",
          note: `Rule '${rule.name}': an element created under "${rule.parent_location}" is not matched by "${rule.target_location}"`,
          target: rule.name,
        });
      }
    }
  }

  const names = new Set(rules.map(rule => rule.name));
  for (const name of expected) {
    if (!names.has(name)) {
      issues.push({
        level: "OBSERVATION",
        note: `Expected rule '${name}' is missing`,
        target: name,
      });
    }
  }

  return issues;
}
