import { describe, it, expect } from "vitest";
import { validateOrdersFile } from "../../src/orders/validate.js";
import { computeOrderStatistics } from "../../src/orders/statistics.js";
import { detectOrderId } from "../../src/orders/order-id.js";
import { OrdersFile } from "../../src/schemas/orders.js";
import { FIXTURE_NOW, fixtureOrders, fixtureOrdersFile } from "../helpers/orders-fixture.js";

const OPTIONS = { clientName: "THALES", now: FIXTURE_NOW };

function cloneFixture(): Record<string, unknown> {
  return JSON.parse(JSON.stringify(fixtureOrdersFile()));
}

describe("computeOrderStatistics", () => {
  it("aggregates agencies, codes and categories", () => {
    expect(computeOrderStatistics(fixtureOrders(), FIXTURE_NOW)).toEqual({
      total_orders: 3,
      unique_agency_codes: ["MRS", "AIX"],
      unique_job_codes: ["10A3071", "20B1000"],
      unique_socio_categories: ["ETAM", "CADRE"],
      unique_classifications: ["B2"],
      orders_per_agency: { MRS: 2, AIX: 1 },
      updated_at: "2025-05-01T10:00:00.000Z",
    });
  });

  it("handles no orders", () => {
    const stats = computeOrderStatistics([], FIXTURE_NOW);

    expect(stats.total_orders).toBe(0);
    expect(stats.orders_per_agency).toEqual({});
  });
});

describe("validateOrdersFile", () => {
  it("accepts a complete file", () => {
    const result = validateOrdersFile(cloneFixture(), OPTIONS);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.report).toEqual({
      validated_at: "2025-05-01T10:00:00.000Z",
      summary: { total_orders: 3, total_rules: 8, agency_codes: 2, job_codes: 2, socio_categories: 2 },
      details: {
        agency_codes: ["MRS", "AIX"],
        job_codes: ["10A3071", "20B1000"],
        socio_categories: ["ETAM", "CADRE"],
        orders_per_agency: { MRS: 2, AIX: 1 },
      },
      data_quality: { with_job_code: 3, with_cost_centre: 2, with_dates: 2 },
    });
  });

  it("reports schema problems with their path", () => {
    const result = validateOrdersFile({ metadata: {}, orders: [] }, OPTIONS);

    expect(result.valid).toBe(false);
    expect(result.errors).toContain("metadata.client: Required");
    expect(result.report).toBeUndefined();
  });

  it("reports missing fields and foreign clients", () => {
    const data = cloneFixture();
    const file = OrdersFile.parse(data);
    delete file.orders[1].emploi_cc;
    file.orders[2].client = "OTHER";

    const result = validateOrdersFile(file, OPTIONS);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Order at index 1 (order_id: FU70001237): missing fields emploi_cc",
      'Order at index 2 (order_id: FU70001238): client is "OTHER", expected "THALES"',
    ]);
  });

  it("checks the file's client", () => {
    const result = validateOrdersFile(cloneFixture(), { ...OPTIONS, clientName: "ACME" });

    expect(result.errors[0]).toBe('metadata.client is "THALES", expected "ACME"');
  });

  it("warns about unusual and duplicate order numbers", () => {
    const file = fixtureOrdersFile();
    file.orders.push({ ...file.orders[0] }, { ...file.orders[0], order_id: "TMP-1" });
    file.statistics = computeOrderStatistics(file.orders, FIXTURE_NOW);

    const result = validateOrdersFile(file, OPTIONS);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "Duplicate order number: FU70001236 (the last occurrence is used)",
      "Unusual order number: TMP-1",
    ]);
  });

  it("reads legacy section names and treats lint findings by level", () => {
    const result = validateOrdersFile(
      {
        metadata: { last_updated: "2025-05-01", version: "1.0.0", client: "THALES", source: "sheet" },
        commandes: fixtureOrders(),
        regles_xml: [
          {
            name: "numero_commande",
            xpath: "//ReferenceInformation/OrderId/IdValue",
            source_field: "order_id",
          },
        ],
      },
      OPTIONS
    );

    expect(result.file?.rules?.[0].target_location).toBe("//ReferenceInformation/OrderId/IdValue");
    expect(result.errors).toEqual([
      "Rule emploi_cc_position_code: Expected rule 'emploi_cc_position_code' is missing",
      "Rule categorie_socio_position_level: Expected rule 'categorie_socio_position_level' is missing",
      "Rule classement_cc_coefficient: Expected rule 'classement_cc_coefficient' is missing",
      "Rule centre_analyse_cost_center_name: Expected rule 'centre_analyse_cost_center_name' is missing",
    ]);
    expect(result.warnings).toEqual([
      "Rule numero_commande: Rule 'numero_commande' has no parent_location and cannot create a missing target",
      "No statistics section",
    ]);
  });

  it("distinguishes an empty rule table from a missing one", () => {
    const withEmpty = cloneFixture();
    withEmpty.rules = [];
    const withoutRules = cloneFixture();
    delete withoutRules.rules;

    expect(validateOrdersFile(withEmpty, OPTIONS).errors).toEqual(["Rule set is empty"]);
    expect(validateOrdersFile(withoutRules, OPTIONS).warnings).toEqual([
      "No rules section; the built-in rules apply",
    ]);
  });

  it("warns when statistics are stale", () => {
    const file = fixtureOrdersFile();
    file.orders.pop();

    expect(validateOrdersFile(file, OPTIONS).warnings).toEqual([
      "statistics.total_orders is 3 but the file holds 2 orders",
    ]);
  });

  it("warns about an empty file", () => {
    const file = fixtureOrdersFile();
    file.orders = [];
    file.statistics = computeOrderStatistics([], FIXTURE_NOW);

    expect(validateOrdersFile(file, OPTIONS).warnings).toEqual(["No orders found"]);
  });
});

describe("detectOrderId", () => {
  it("prefers carrier elements", () => {
    const xml = "<Assignment><Note>was FU10000000</Note><hr:IdValue>fu70001236</hr:IdValue></Assignment>";
    expect(detectOrderId(xml)).toBe("FU70001236");
  });

  it("falls back to the whole text", () => {
    expect(detectOrderId("<Assignment><Note>order FU70001237</Note></Assignment>")).toBe("FU70001237");
  });

  it("works on text that is not well-formed", () => {
    expect(detectOrderId("<Assignment><CustomerJobCode>FU70001238</CustomerJobCode>")).toBe("FU70001238");
  });

  it("returns null when nothing matches", () => {
    expect(detectOrderId("<Assignment/>")).toBeNull();
  });

  it("takes a custom pattern", () => {
    expect(detectOrderId("<OrderId>AB-123</OrderId>", "AB-\\d{3}")).toBe("AB-123");
  });
});
