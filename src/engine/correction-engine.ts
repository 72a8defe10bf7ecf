/**
 * Correction Engine
 *
 * Applies a Rule Set to one document in declared order. Each rule is
 * isolated: a broken locator fails that rule only, and no rule sees the
 * result of another. The engine performs no I/O and keeps no state between
 * calls.
 */

import { XmlDocument } from "../document/xml-document.js";
import { childLabelFor, parseLocator } from "../document/locator.js";
import { LocatorParseError } from "../document/errors.js";
import { getFlag, resolveFact, type FactRecord } from "../facts/fact-record.js";
import type { CorrectionRuleT, RuleSetT } from "../schemas/rules.js";
import type { CorrectionOutcome } from "./outcome.js";

export const NO_PARENT_LOCATION_MESSAGE = "Target not found and the rule has no parent_location";

/** A child created under parent_location would not be found by target_location on the next run. */
export const UNREACHABLE_CHILD_MESSAGE = "Target not found and target_location does not match a child of parent_location";

function applyRule(document: XmlDocument, record: FactRecord, rule: CorrectionRuleT): CorrectionOutcome {
  const base = rule.group === undefined ? { rule: rule.name } : { rule: rule.name, group: rule.group };

  if (rule.condition !== undefined && getFlag(record, rule.condition) !== true) {
    return { ...base, tag: "skipped_condition" };
  }

  const value = resolveFact(record, rule.source_key);
  if (value === undefined) {
    return { ...base, tag: "skipped_no_value" };
  }

  try {
    const target = parseLocator(rule.target_location);
    const existing = document.find(target);
    if (existing !== undefined) {
      document.setText(existing, value);
      return { ...base, tag: "updated", value };
    }

    if (rule.parent_location === undefined) {
      return { ...base, tag: "failed", value, message: NO_PARENT_LOCATION_MESSAGE };
    }

    const parent = parseLocator(rule.parent_location);
    const created = document.createChild(parent, childLabelFor(target), value, target);
    if (created.ok) {
      return { ...base, tag: "created", value };
    }
    if (created.reason === "NotMatchedByTarget") {
      return { ...base, tag: "failed", value, message: UNREACHABLE_CHILD_MESSAGE };
    }
    return { ...base, tag: "skipped_no_parent", value };
  } catch (error) {
    if (error instanceof LocatorParseError) {
      return { ...base, tag: "failed", value, message: error.message };
    }
    throw error;
  }
}

/**
 * Apply every rule to an already parsed document, mutating it in place.
 * Returns one outcome per rule, in rule order.
 */
export function applyCorrections(
  document: XmlDocument,
  record: FactRecord,
  rules: RuleSetT
): CorrectionOutcome[] {
  return rules.map(rule => applyRule(document, record, rule));
}

export interface CorrectXmlResult {
  xml: string;
  outcomes: CorrectionOutcome[];
  /** False when the output is byte-identical to the input */
  changed: boolean;
}

/**
 * Parse, correct and render a document.
 *
 * @throws DocumentParseError before any rule runs when the input is not
 *   well-formed
 */
export function correctXml(xmlText: string, record: FactRecord, rules: RuleSetT): CorrectXmlResult {
  const document = XmlDocument.parse(xmlText);
  const outcomes = applyCorrections(document, record, rules);
  const xml = document.render();
  return { xml, outcomes, changed: xml !== xmlText };
}
