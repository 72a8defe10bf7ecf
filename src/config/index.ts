/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to every environment variable the service
 * reads. Parsed lazily on first access so tests can stub the environment
 * before anything touches it.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Regular expression source, rejected at startup when it does not compile
 */
const regexSource = z.string().refine(
  (val) => {
    try {
      new RegExp(val);
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" },
);

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    version: z.string().optional(),
    bodyLimitBytes: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    allowedOrigins: z
      .string()
      .transform((val) => val.split(",").map((o) => o.trim()).filter((o) => o.length > 0))
      .optional(),
  }),

  orders: z.object({
    path: z.string().default("data/orders.json"),
    clientName: z.string().min(1).default("THALES"),
    orderIdPattern: regexSource.default("FU\\d{8}"),
    requireKnownOrder: booleanString.default(true),
  }),

  corrections: z.object({
    correctedSuffix: z.string().default("_corrected"),
    maxDocumentsPerRequest: z.coerce.number().int().positive().default(50),
  }),

  rateLimits: z.object({
    defaultRpm: z.coerce.number().int().positive().default(120),
  }),

  testing: z.object({
    isVitest: booleanString.default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      version: env.SERVICE_VERSION,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    orders: {
      path: env.ORDERS_PATH,
      clientName: env.CLIENT_NAME,
      orderIdPattern: env.ORDER_ID_PATTERN,
      requireKnownOrder: env.REQUIRE_KNOWN_ORDER,
    },
    corrections: {
      correctedSuffix: env.CORRECTED_SUFFIX,
      maxDocumentsPerRequest: env.MAX_DOCUMENTS_PER_REQUEST,
    },
    rateLimits: {
      defaultRpm: env.RATE_LIMIT_RPM,
    },
    testing: {
      isVitest: env.VITEST,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Lazy-initialized configuration.
 *
 * ```
 * import { config } from './config/index.js';
 * const path = config.orders.path;
 * ```
 */
export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}

export function isTest(): boolean {
  return config.server.nodeEnv === "test" || config.testing.isVitest;
}
