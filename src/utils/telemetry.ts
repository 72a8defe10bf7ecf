import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths live in src/utils/logger-config.ts so the Fastify and
 * standalone loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

type TestSink = (eventName: string, data: TelemetryShape) => void;

let testSink: TestSink | null = null;

/**
 * Capture emitted events in tests. Throws outside a test environment.
 */
export function setTestSink(sink: TestSink | null): void {
  // Direct env check: config imports would be circular during module init
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating log-based dashboards
 */
export const TelemetryEvents = {
  CorrectionStarted: "correction.started",
  CorrectionCompleted: "correction.completed",
  CorrectionFailed: "correction.failed",
  CorrectionSkipped: "correction.skipped",
  RuleFailed: "correction.rule_failed",
  BatchCompleted: "correction.batch_completed",

  OrdersLoaded: "orders.loaded",
  OrdersImported: "orders.imported",
  OrdersImportRowSkipped: "orders.import_row_skipped",
  OrdersValidated: "orders.validated",

  EmailFactsExtracted: "facts.email_extracted",
  EmailFactsMissing: "facts.email_missing",

  RuleSetLintWarning: "rules.lint_warning",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(value);
  }

  // functions, symbols, bigints
  return undefined;
}

function sanitizeTelemetryData(data: object): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit a telemetry event (structured log line + optional test sink)
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }
  log.info({ event, ...eventData });
}
