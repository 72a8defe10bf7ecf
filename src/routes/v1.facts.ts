import type { FastifyInstance } from "fastify";
import { EmailExtractBody } from "../schemas/api.js";
import { extractFactsFromEmail } from "../facts/email-extract.js";
import { resolveFact } from "../facts/fact-record.js";
import type { OrdersStore } from "../orders/store.js";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { config } from "../config/index.js";

export interface FactsRouteDeps {
  store: OrdersStore;
}

/**
 * POST /v1/facts/extract-email
 *
 * Reads order facts from an email body. 422 when no order number is present.
 */
export default async function route(app: FastifyInstance, deps: FactsRouteDeps) {
  app.post("/v1/facts/extract-email", async (req, reply) => {
    const parsed = EmailExtractBody.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }

    const record = extractFactsFromEmail(parsed.data.text, { orderIdPattern: config.orders.orderIdPattern });
    if (record === null) {
      emit(TelemetryEvents.EmailFactsMissing, { request_id: req.id, length: parsed.data.text.length });
      reply.code(422);
      return reply.send(buildErrorV1("UNPROCESSABLE", "No order number found in the email", undefined, req.id));
    }

    const orderId = resolveFact(record, "order_id") ?? null;
    emit(TelemetryEvents.EmailFactsExtracted, {
      request_id: req.id,
      order_id: orderId,
      fields: Object.keys(record.facts).length,
    });

    reply.code(200);
    return reply.send({
      schema: "email-facts.v1",
      order_id: orderId,
      known_order: orderId !== null && deps.store.get(orderId) !== undefined,
      facts: record.facts,
      flags: record.flags,
    });
  });
}
