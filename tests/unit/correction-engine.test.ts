import { describe, it, expect } from "vitest";
import {
  applyCorrections,
  correctXml,
  NO_PARENT_LOCATION_MESSAGE,
  UNREACHABLE_CHILD_MESSAGE,
} from "../../src/engine/correction-engine.js";
import { DEFAULT_RULES } from "../../src/engine/rule-set.js";
import { OUTCOME_TAGS } from "../../src/engine/outcome.js";
import { buildFactRecord } from "../../src/facts/fact-record.js";
import { XmlDocument } from "../../src/document/xml-document.js";
import { DocumentParseError } from "../../src/document/errors.js";
import type { RuleSetT } from "../../src/schemas/rules.js";

const ASSIGNMENT = [
  "<Assignment>",
  "  <ReferenceInformation>",
  '    <OrderId validFrom="2025-01-01">',
  "      <IdOwner>AGENCY</IdOwner>",
  "    </OrderId>",
  "  </ReferenceInformation>",
  "  <WorkSite>",
  "    <WorkSiteName>OLD SITE</WorkSiteName>",
  "  </WorkSite>",
  "</Assignment>",
].join("\n");

const RULES: RuleSetT = [
  {
    name: "numero_commande",
    target_location: "//ReferenceInformation/OrderId/IdValue",
    source_key: "order_id",
    parent_location: "//ReferenceInformation/OrderId",
  },
  {
    name: "worksite_conditional",
    target_location: "//WorkSite/WorkSiteName",
    source_key: "site_mission",
    condition: "site_not_gemenos",
    parent_location: "//WorkSite",
  },
];

const FACTS = buildFactRecord({
  order_id: "FU70001236",
  emploi_cc: "10A3071",
  site_mission: "LYON",
  site_not_gemenos: true,
});

describe("correctXml", () => {
  it("creates missing targets and updates existing ones", () => {
    const result = correctXml(ASSIGNMENT, FACTS, RULES);

    expect(result.outcomes).toEqual([
      { rule: "numero_commande", tag: "created", value: "FU70001236" },
      { rule: "worksite_conditional", tag: "updated", value: "LYON" },
    ]);
    expect(result.changed).toBe(true);
    expect(result.xml).toBe(
      [
        "<Assignment>",
        "  <ReferenceInformation>",
        '    <OrderId validFrom="2025-01-01">',
        "      <IdOwner>AGENCY</IdOwner>",
        "      <IdValue>FU70001236</IdValue>",
        "    </OrderId>",
        "  </ReferenceInformation>",
        "  <WorkSite>",
        "    <WorkSiteName>LYON</WorkSiteName>",
        "  </WorkSite>",
        "</Assignment>",
      ].join("\n")
    );
  });

  it("is idempotent", () => {
    const first = correctXml(ASSIGNMENT, FACTS, RULES);
    const second = correctXml(first.xml, FACTS, RULES);

    expect(second.xml).toBe(first.xml);
    expect(second.changed).toBe(false);
    expect(second.outcomes.map(outcome => outcome.tag)).toEqual(["updated", "updated"]);
  });

  it("skips rules whose condition flag is not true", () => {
    const record = buildFactRecord({ order_id: "FU70001236", site_mission: "GEMENOS" });
    const result = correctXml(ASSIGNMENT, record, RULES);

    expect(result.outcomes[1]).toEqual({ rule: "worksite_conditional", tag: "skipped_condition" });
    expect(result.xml).toContain("<WorkSiteName>OLD SITE</WorkSiteName>");
  });

  it("treats a flag missing from the facts as not true", () => {
    const rules: RuleSetT = [
      { name: "urgent_only", target_location: "//WorkSite/WorkSiteName", source_key: "order_id", condition: "urgent" },
    ];
    const result = correctXml(ASSIGNMENT, FACTS, rules);

    expect(result.outcomes).toEqual([{ rule: "urgent_only", tag: "skipped_condition" }]);
    expect(result.changed).toBe(false);
  });

  it("checks the condition before creating a missing target", () => {
    const document = "<Assignment><WorkSite/></Assignment>";
    const record = buildFactRecord({ order_id: "FU70001236", site_mission: "THALES GEMENOS" });
    const result = correctXml(document, record, RULES);

    expect(result.outcomes[1]).toEqual({ rule: "worksite_conditional", tag: "skipped_condition" });
    expect(result.xml).toBe(document);
  });

  it("skips rules without a value", () => {
    const record = buildFactRecord({ site_mission: "LYON" });
    const result = correctXml(ASSIGNMENT, record, RULES);

    expect(result.outcomes[0]).toEqual({ rule: "numero_commande", tag: "skipped_no_value" });
    expect(result.xml).not.toContain("IdValue");
  });

  it("reports a missing parent without changing the document", () => {
    const rules: RuleSetT = [
      { name: "level", target_location: "//PositionLevel", source_key: "order_id", parent_location: "//Missing" },
    ];
    const result = correctXml(ASSIGNMENT, FACTS, rules);

    expect(result.outcomes).toEqual([{ rule: "level", tag: "skipped_no_parent", value: "FU70001236" }]);
    expect(result.xml).toBe(ASSIGNMENT);
    expect(result.changed).toBe(false);
  });

  it("fails update-only rules whose target is missing", () => {
    const rules: RuleSetT = [{ name: "update_only", target_location: "//PositionLevel", source_key: "order_id" }];

    expect(correctXml(ASSIGNMENT, FACTS, rules).outcomes).toEqual([
      { rule: "update_only", tag: "failed", value: "FU70001236", message: NO_PARENT_LOCATION_MESSAGE },
    ]);
  });

  it("isolates a malformed locator to its own rule", () => {
    const rules: RuleSetT = [
      { name: "broken", target_location: "WorkSite", source_key: "order_id", group: "Broken" },
      ...RULES,
    ];
    const result = correctXml(ASSIGNMENT, FACTS, rules);

    expect(result.outcomes[0]).toEqual({
      rule: "broken",
      group: "Broken",
      tag: "failed",
      value: "FU70001236",
      message: 'Invalid locator "WorkSite": must start with "/" or "//"',
    });
    expect(result.outcomes.slice(1).map(outcome => outcome.tag)).toEqual(["created", "updated"]);
  });

  it("isolates a malformed parent locator to its own rule", () => {
    const rules: RuleSetT = [
      {
        name: "bad_parent",
        target_location: "//PositionLevel",
        source_key: "order_id",
        parent_location: "PositionCharacteristics",
      },
      ...RULES,
    ];
    const result = correctXml(ASSIGNMENT, FACTS, rules);

    expect(result.outcomes[0]).toEqual({
      rule: "bad_parent",
      tag: "failed",
      value: "FU70001236",
      message: 'Invalid locator "PositionCharacteristics": must start with "/" or "//"',
    });
    expect(result.outcomes.slice(1).map(outcome => outcome.tag)).toEqual(["created", "updated"]);
  });

  it("refuses to create an element its own target cannot find", () => {
    const document = "<Assignment><Position/></Assignment>";
    const rules: RuleSetT = [
      { name: "code", target_location: "//Position/Code", source_key: "order_id", parent_location: "//Assignment" },
    ];

    const first = correctXml(document, FACTS, rules);
    const second = correctXml(first.xml, FACTS, rules);

    expect(first.outcomes).toEqual([
      { rule: "code", tag: "failed", value: "FU70001236", message: UNREACHABLE_CHILD_MESSAGE },
    ]);
    expect(first.xml).toBe(document);
    expect(second.xml).toBe(document);
  });

  it("returns no outcomes for an empty rule set", () => {
    const result = correctXml(ASSIGNMENT, FACTS, []);

    expect(result).toEqual({ xml: ASSIGNMENT, outcomes: [], changed: false });
  });

  it("rejects a malformed document before any rule runs", () => {
    expect(() => correctXml("<Assignment>", FACTS, RULES)).toThrow(DocumentParseError);
  });

  it("only ever produces known outcome tags", () => {
    const result = correctXml(ASSIGNMENT, FACTS, DEFAULT_RULES);

    expect(result.outcomes).toHaveLength(DEFAULT_RULES.length);
    for (const outcome of result.outcomes) {
      expect(OUTCOME_TAGS).toContain(outcome.tag);
    }
  });
});

describe("applyCorrections", () => {
  it("mutates the parsed document in place", () => {
    const document = XmlDocument.parse(ASSIGNMENT);
    applyCorrections(document, FACTS, RULES);

    expect(document.textOf(document.find("//OrderId/IdValue") ?? document.root)).toBe("FU70001236");
  });

  it("lets a later rule see an element created by an earlier one", () => {
    const document = XmlDocument.parse("<Root><Parent/></Root>");
    const rules: RuleSetT = [
      { name: "create", target_location: "//Parent/Code", source_key: "order_id", parent_location: "//Parent" },
      { name: "update", target_location: "//Parent/Code", source_key: "emploi_cc", parent_location: "//Parent" },
    ];

    const outcomes = applyCorrections(document, FACTS, rules);

    expect(outcomes.map(outcome => outcome.tag)).toEqual(["created", "updated"]);
    expect(document.render()).toBe("<Root><Parent><Code>10A3071</Code></Parent></Root>");
  });
});
