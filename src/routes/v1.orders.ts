/**
 * Orders file endpoints
 *
 * - GET  /v1/orders/stats     aggregates of the loaded orders file
 * - GET  /v1/orders/:orderId  one order and the facts built from it
 * - POST /v1/orders/import    rebuild the orders file from a spreadsheet CSV export
 *
 * An import keeps the rule table of the current file and persists the
 * result before answering.
 */

import type { FastifyInstance } from "fastify";
import { OrderIdParams, OrdersImportBody } from "../schemas/api.js";
import { parseOrdersCsv } from "../facts/sheet-import.js";
import { factRecordToJson } from "../facts/fact-record.js";
import { buildOrdersFile, type OrdersStore } from "../orders/store.js";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { config } from "../config/index.js";

export interface OrdersRouteDeps {
  store: OrdersStore;
}

export default async function route(app: FastifyInstance, deps: OrdersRouteDeps) {
  const { store } = deps;

  app.get("/v1/orders/stats", async (_req, reply) => {
    reply.code(200);
    return reply.send({
      schema: "orders-stats.v1",
      metadata: store.metadata,
      statistics: store.statistics(),
      rule_count: store.rules().length,
    });
  });

  app.get("/v1/orders/:orderId", async (req, reply) => {
    const params = OrderIdParams.safeParse(req.params);
    if (!params.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(params.error, req.id));
    }

    const { orderId } = params.data;
    const order = store.get(orderId);
    const facts = store.factsFor(orderId);
    if (order === undefined || facts === undefined) {
      reply.code(404);
      return reply.send(
        buildErrorV1("NOT_FOUND", `Order ${orderId} is not in the orders file`, { order_id: orderId }, req.id)
      );
    }

    reply.code(200);
    return reply.send({
      schema: "order.v1",
      order_id: orderId,
      order,
      facts: factRecordToJson(facts),
    });
  });

  app.post("/v1/orders/import", async (req, reply) => {
    const parsed = OrdersImportBody.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }

    const clientName = config.orders.clientName;
    const imported = parseOrdersCsv(parsed.data.csv, { clientName });
    for (const skipped of imported.skipped) {
      emit(TelemetryEvents.OrdersImportRowSkipped, { row: skipped.row, reason: skipped.reason });
    }

    if (imported.orders.length === 0) {
      reply.code(422);
      return reply.send(
        buildErrorV1(
          "UNPROCESSABLE",
          "No orders found in the CSV export",
          { skipped_rows: imported.skipped.length, ignored_columns: imported.ignoredColumns },
          req.id
        )
      );
    }

    const file = buildOrdersFile(imported.orders, {
      clientName,
      source: parsed.data.source ?? "CSV import",
      rules: store.toJSON().rules,
    });
    store.replace(file);
    await store.save();

    emit(TelemetryEvents.OrdersImported, {
      request_id: req.id,
      orders: imported.orders.length,
      skipped_rows: imported.skipped.length,
      ignored_columns: imported.ignoredColumns.length,
    });

    reply.code(200);
    return reply.send({
      schema: "orders-import.v1",
      imported: imported.orders.length,
      skipped: imported.skipped,
      ignored_columns: imported.ignoredColumns,
      statistics: file.statistics,
    });
  });
}
