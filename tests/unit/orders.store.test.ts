import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildOrdersFile, ORDERS_FILE_VERSION, OrdersStore } from "../../src/orders/store.js";
import { OrdersFileError } from "../../src/orders/errors.js";
import { DEFAULT_RULES } from "../../src/engine/rule-set.js";
import { setTestSink } from "../../src/utils/telemetry.js";
import { FIXTURE_NOW, fixtureOrders, fixtureOrdersFile } from "../helpers/orders-fixture.js";

async function loadError(path: string): Promise<OrdersFileError> {
  try {
    await OrdersStore.load(path);
  } catch (error) {
    if (error instanceof OrdersFileError) return error;
    throw error;
  }
  throw new Error("expected OrdersFileError");
}

describe("buildOrdersFile", () => {
  it("wraps orders with metadata, rules and statistics", () => {
    const file = buildOrdersFile(fixtureOrders(), { clientName: "THALES", source: "sheet.csv", now: FIXTURE_NOW });

    expect(file.metadata).toEqual({
      last_updated: "2025-05-01T10:00:00.000Z",
      version: ORDERS_FILE_VERSION,
      client: "THALES",
      source: "sheet.csv",
    });
    expect(file.rules).toEqual([...DEFAULT_RULES]);
    expect(file.statistics?.total_orders).toBe(3);
  });

  it("persists the given rules", () => {
    const rules = [{ name: "only", target_location: "//A", source_key: "order_id" }];
    const file = buildOrdersFile([], { clientName: "THALES", source: "x", rules, now: FIXTURE_NOW });

    expect(file.rules).toEqual(rules);
  });
});

describe("OrdersStore", () => {
  let dir: string;
  const events: Array<{ name: string; data: Record<string, unknown> }> = [];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "orders-store-"));
    events.length = 0;
    setTestSink((name, data) => events.push({ name, data }));
  });

  afterEach(async () => {
    setTestSink(null);
    await rm(dir, { recursive: true, force: true });
  });

  it("indexes orders by number", () => {
    const store = new OrdersStore(join(dir, "orders.json"), fixtureOrdersFile());

    expect(store.size).toBe(3);
    expect(store.get("FU70001237")?.site_mission).toBe("THALES GEMENOS");
    expect(store.get("FU00000000")).toBeUndefined();
  });

  it("builds fact records for known orders", () => {
    const store = new OrdersStore(join(dir, "orders.json"), fixtureOrdersFile());
    const record = store.factsFor("FU70001236");

    expect(record?.facts.emploi_cc).toBe("10A3071");
    expect(record?.flags.site_not_gemenos).toBe(true);
    expect(store.factsFor("FU00000000")).toBeUndefined();
  });

  it("falls back to the built-in rules and computed statistics", () => {
    const file = fixtureOrdersFile();
    delete file.rules;
    delete file.statistics;
    const store = new OrdersStore(join(dir, "orders.json"), file);

    expect(store.rules()).toBe(DEFAULT_RULES);
    expect(store.statistics().total_orders).toBe(3);
  });

  it("round-trips through save and load", async () => {
    const path = join(dir, "nested", "orders.json");
    await new OrdersStore(path, fixtureOrdersFile()).save();

    const text = await readFile(path, "utf-8");
    expect(text.endsWith("}\n")).toBe(true);

    const loaded = await OrdersStore.load(path);
    expect(loaded.toJSON()).toEqual(fixtureOrdersFile());
    expect(events).toEqual([
      { name: "orders.loaded", data: { path, orders: 3, rules: 8, custom_rules: true } },
    ]);
  });

  it("replaces its contents", () => {
    const store = new OrdersStore(join(dir, "orders.json"), fixtureOrdersFile());
    store.replace(buildOrdersFile([], { clientName: "THALES", source: "x", now: FIXTURE_NOW }));

    expect(store.size).toBe(0);
    expect(store.get("FU70001236")).toBeUndefined();
  });

  it("reports a missing file", async () => {
    const error = await loadError(join(dir, "missing.json"));
    expect(error.reason).toBe("not_found");
  });

  it("reports invalid JSON", async () => {
    const path = join(dir, "orders.json");
    await writeFile(path, "{ not json", "utf-8");

    expect((await loadError(path)).reason).toBe("invalid_json");
  });

  it("reports a file that is not an orders file", async () => {
    const path = join(dir, "orders.json");
    await writeFile(path, JSON.stringify({ metadata: { client: "THALES" } }), "utf-8");

    const error = await loadError(path);
    expect(error.reason).toBe("invalid_shape");
    expect(error.message).toBe(`Orders file ${path}: metadata.last_updated: Required`);
  });
});
