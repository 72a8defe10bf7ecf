// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import correctionsRoute from "./routes/v1.corrections.js";
import ordersRoute from "./routes/v1.orders.js";
import factsRoute from "./routes/v1.facts.js";
import { OrdersStore, buildOrdersFile } from "./orders/store.js";
import { OrdersFileError } from "./orders/errors.js";
import { CorrectionService } from "./services/correction-service.js";
import { SERVICE_VERSION } from "./version.js";
import { REQUEST_ID_HEADER, requestIdFromHeaders } from "./utils/request-id.js";
import { toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { config, isProduction } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { log } from "./utils/telemetry.js";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins ?? DEFAULT_ORIGINS;
  if (isProduction() && origins.includes("*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }
  return origins;
}

/**
 * Open the configured orders file. A missing file starts the service with
 * no orders (an import creates it); any other problem is fatal.
 */
async function openOrdersStore(): Promise<OrdersStore> {
  const path = config.orders.path;
  try {
    return await OrdersStore.load(path);
  } catch (error) {
    if (error instanceof OrdersFileError && error.reason === "not_found") {
      log.warn({ path }, "Orders file not found, starting with no orders");
      return new OrdersStore(path, buildOrdersFile([], { clientName: config.orders.clientName, source: "empty" }));
    }
    throw error;
  }
}

export interface BuildOptions {
  /** Use this store instead of opening ORDERS_PATH */
  ordersStore?: OrdersStore;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}) {
  const store = options.ordersStore ?? (await openOrdersStore());
  const corrections = new CorrectionService(store, {
    orderIdPattern: config.orders.orderIdPattern,
    requireKnownOrder: config.orders.requireKnownOrder,
    correctedSuffix: config.corrections.correctedSuffix,
  });

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    requestIdHeader: false,
    genReqId: (req) => requestIdFromHeaders(req.headers),
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  await app.register(helmet, {
    contentSecurityPolicy: false, // Not relevant for JSON API
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  const rateLimitRpm = config.rateLimits.defaultRpm;
  await app.register(rateLimit, {
    global: true,
    max: rateLimitRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      app.log.warn({ event: "rate_limit_hit", max: rateLimitRpm, request_id: req.id }, "Rate limit exceeded");
      // thrown by the plugin; the error handler turns it into error.v1
      return Object.assign(new Error(`Rate limit exceeded, retry in ${context.after}`), { statusCode: 429 });
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      app.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: "order-xml-corrector",
    version: SERVICE_VERSION,
    orders_loaded: store.size,
    rule_count: store.rules().length,
    client: store.metadata.client,
  }));

  await correctionsRoute(app, { corrections });
  await ordersRoute(app, { store });
  await factsRoute(app, { store });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const port = config.server.port;

  build()
    .then(async (app) => {
      app.log.info({
        service: "order-xml-corrector",
        version: SERVICE_VERSION,
        orders_path: config.orders.path,
        client: config.orders.clientName,
        rate_limit_rpm: config.rateLimits.defaultRpm,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        require_known_order: config.orders.requireKnownOrder,
      }, "Order XML corrector starting");

      await app.listen({ port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
