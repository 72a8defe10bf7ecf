/**
 * Orders Store
 *
 * The orders file on disk plus an index by order number. One instance is
 * created at startup (or per script run) and passed to whoever needs it.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { OrdersFile, type OrderRecordT, type OrderStatisticsT, type OrdersFileT } from "../schemas/orders.js";
import type { RuleSetT } from "../schemas/rules.js";
import { DEFAULT_RULES, resolveRuleSet } from "../engine/rule-set.js";
import { buildFactRecord, pickRawFacts, type FactRecord } from "../facts/fact-record.js";
import { computeOrderStatistics } from "./statistics.js";
import { OrdersFileError } from "./errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";

export const ORDERS_FILE_VERSION = "1.0.0";

export interface BuildOrdersFileOptions {
  clientName: string;
  source: string;
  /** Rules to persist; the built-in rules when omitted */
  rules?: RuleSetT;
  now?: Date;
}

/**
 * Assemble a complete orders file around freshly imported orders.
 */
export function buildOrdersFile(orders: OrderRecordT[], options: BuildOrdersFileOptions): OrdersFileT {
  const now = options.now ?? new Date();
  return {
    metadata: {
      last_updated: now.toISOString(),
      version: ORDERS_FILE_VERSION,
      client: options.clientName,
      source: options.source,
    },
    orders,
    rules: [...(options.rules ?? DEFAULT_RULES)],
    statistics: computeOrderStatistics(orders, now),
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function indexOrders(orders: ReadonlyArray<OrderRecordT>): Map<string, OrderRecordT> {
  return new Map(orders.map(order => [order.order_id, order]));
}

export class OrdersStore {
  private file: OrdersFileT;
  private index: Map<string, OrderRecordT>;

  constructor(readonly path: string, file: OrdersFileT) {
    this.file = file;
    this.index = indexOrders(file.orders);
  }

  /**
   * @throws OrdersFileError when the file is missing, unreadable, not JSON or
   *   not an orders file
   */
  static async load(path: string): Promise<OrdersStore> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new OrdersFileError(path, "not_found", "file does not exist");
      }
      throw new OrdersFileError(path, "unreadable", error instanceof Error ? error.message : String(error));
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new OrdersFileError(path, "invalid_json", error instanceof Error ? error.message : String(error));
    }

    const parsed = OrdersFile.safeParse(data);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first.path.length > 0 ? `${first.path.join(".")}: ` : "";
      throw new OrdersFileError(path, "invalid_shape", `${where}${first.message}`);
    }

    const store = new OrdersStore(path, parsed.data);
    emit(TelemetryEvents.OrdersLoaded, {
      path,
      orders: store.size,
      rules: store.rules().length,
      custom_rules: parsed.data.rules !== undefined,
    });
    return store;
  }

  get size(): number {
    return this.index.size;
  }

  get metadata(): OrdersFileT["metadata"] {
    return this.file.metadata;
  }

  get(orderId: string): OrderRecordT | undefined {
    return this.index.get(orderId);
  }

  factsFor(orderId: string): FactRecord | undefined {
    const order = this.get(orderId);
    return order === undefined ? undefined : buildFactRecord(pickRawFacts(order));
  }

  /** Rules stored in the file, or the built-in rules when it has none. */
  rules(): RuleSetT {
    return resolveRuleSet(this.file.rules);
  }

  statistics(): OrderStatisticsT {
    return this.file.statistics ?? computeOrderStatistics(this.file.orders);
  }

  orders(): ReadonlyArray<OrderRecordT> {
    return this.file.orders;
  }

  replace(file: OrdersFileT): void {
    this.file = file;
    this.index = indexOrders(file.orders);
  }

  toJSON(): OrdersFileT {
    return this.file;
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(this.file, null, 2)}\n`, "utf-8");
  }
}
