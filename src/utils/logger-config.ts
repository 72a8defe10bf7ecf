/**
 * Pino options shared by the Fastify request logger (server.ts) and the
 * telemetry logger (telemetry.ts).
 *
 * Order facts identify the client company and its contacts, and raw
 * documents repeat them, so neither is ever written to the log as is.
 */

export const REDACT_PATHS = [
  // Credentials in headers or configuration dumps
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.headers.authorization",
  "*.headers.cookie",

  // Client identifiers from the orders file, email extracts and request facts
  "*.siret_client",
  "*.facts.siret_client",
  "*.email",
  "*.phone",

  // Document bodies: XML in and out, CSV exports
  "*.xml",
  "*.corrected_xml",
  "*.csv",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createLoggerConfig(level: string) {
  return {
    level,
    redact: { paths: [...REDACT_PATHS], censor: REDACT_CENSOR },
  };
}
