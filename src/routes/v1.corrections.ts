import type { FastifyInstance } from "fastify";
import { BatchCorrectionRequestBody, CorrectionRequestBody } from "../schemas/api.js";
import { lintRuleSet } from "../engine/rule-set.js";
import type { CorrectionResult, CorrectionService } from "../services/correction-service.js";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { config } from "../config/index.js";

export interface CorrectionRouteDeps {
  corrections: CorrectionService;
}

function serializeResult(result: CorrectionResult) {
  return {
    order_id: result.orderId,
    file_name: result.fileName,
    corrected_xml: result.xml,
    changed: result.changed,
    outcomes: result.outcomes,
    summary: result.summary,
  };
}

/**
 * POST /v1/corrections        one document
 * POST /v1/corrections/batch  several documents, each independent
 */
export default async function route(app: FastifyInstance, deps: CorrectionRouteDeps) {
  app.post("/v1/corrections", async (req, reply) => {
    const parsed = CorrectionRequestBody.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }
    const body = parsed.data;

    const ruleWarnings = body.rules ? lintRuleSet(body.rules, []) : [];
    if (ruleWarnings.length > 0) {
      emit(TelemetryEvents.RuleSetLintWarning, {
        request_id: req.id,
        issues: ruleWarnings.length,
        blockers: ruleWarnings.filter(issue => issue.level === "BLOCKER").length,
      });
    }

    // DocumentParseError and order lookup errors go to the error handler
    const result = deps.corrections.correctDocument({
      xml: body.xml,
      fileName: body.file_name,
      orderId: body.order_id,
      facts: body.facts,
      rules: body.rules,
    });

    reply.code(200);
    return reply.send({
      schema: "correction.v1",
      ...serializeResult(result),
      ...(body.rules ? { rule_warnings: ruleWarnings } : {}),
    });
  });

  app.post("/v1/corrections/batch", async (req, reply) => {
    const parsed = BatchCorrectionRequestBody.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }

    const max = config.corrections.maxDocumentsPerRequest;
    if (parsed.data.documents.length > max) {
      reply.code(400);
      return reply.send(
        buildErrorV1(
          "BAD_INPUT",
          `Too many documents: ${parsed.data.documents.length} (max ${max})`,
          { max_documents: max },
          req.id
        )
      );
    }

    const batch = deps.corrections.correctBatch(
      parsed.data.documents.map(document => ({ fileName: document.file_name, xml: document.xml })),
      { agency: parsed.data.agency }
    );

    reply.code(200);
    return reply.send({
      schema: "correction-batch.v1",
      totals: batch.totals,
      results: batch.results.map(item =>
        item.status === "corrected"
          ? { source_file_name: item.fileName, status: item.status, ...serializeResult(item.result) }
          : { source_file_name: item.fileName, status: item.status, order_id: item.orderId, reason: item.reason }
      ),
    });
  });
}
