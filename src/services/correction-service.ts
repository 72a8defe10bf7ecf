/**
 * Correction Service
 *
 * Ties order detection, fact lookup and the correction engine together for
 * the HTTP routes and the CLI. Each document gets its own parsed tree and
 * Fact Record; nothing is shared between documents.
 */

import { correctXml, type CorrectXmlResult } from "../engine/correction-engine.js";
import { summarizeOutcomes, type OutcomeSummary } from "../engine/reporter.js";
import type { CorrectionOutcome } from "../engine/outcome.js";
import { DocumentParseError } from "../document/errors.js";
import { buildFactRecord, type FactRecord, type RawFactValue } from "../facts/fact-record.js";
import type { RuleSetT } from "../schemas/rules.js";
import { detectOrderId } from "../orders/order-id.js";
import { OrderIdMissingError, OrderNotFoundError } from "../orders/errors.js";
import type { OrdersStore } from "../orders/store.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

export interface CorrectionServiceOptions {
  orderIdPattern: string;
  /** Reject documents whose order is not in the orders file */
  requireKnownOrder: boolean;
  correctedSuffix: string;
}

export interface CorrectionRequest {
  xml: string;
  fileName?: string;
  orderId?: string;
  /** Explicit facts bypass the orders file */
  facts?: Readonly<Record<string, RawFactValue>>;
  /** Explicit rules bypass the stored rule set */
  rules?: RuleSetT;
}

export interface CorrectionResult {
  orderId: string | null;
  fileName: string;
  xml: string;
  changed: boolean;
  outcomes: CorrectionOutcome[];
  summary: OutcomeSummary;
}

export interface BatchDocument {
  fileName: string;
  xml: string;
}

export type BatchItemResult =
  | { fileName: string; status: "corrected"; orderId: string; result: CorrectionResult }
  | { fileName: string; status: "skipped"; orderId: string; reason: string }
  | { fileName: string; status: "failed"; orderId: string | null; reason: string };

export interface BatchResult {
  results: BatchItemResult[];
  totals: { corrected: number; skipped: number; failed: number };
}

/**
 * "order.xml" -> "order_corrected.xml"; an unnamed document is named after
 * its order.
 */
export function correctedFileName(fileName: string | undefined, suffix: string, orderId: string | null): string {
  const base = fileName ? fileName.replace(/\.xml$/i, "") : (orderId ?? "document");
  return `${base}${suffix}.xml`;
}

function explicitOrderId(facts: Readonly<Record<string, RawFactValue>>): string | undefined {
  const value = facts.order_id;
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export class CorrectionService {
  constructor(
    private readonly store: OrdersStore,
    private readonly options: CorrectionServiceOptions,
  ) {}

  private resolveFacts(request: CorrectionRequest): { orderId: string | null; record: FactRecord } {
    if (request.facts !== undefined) {
      const orderId =
        request.orderId ?? explicitOrderId(request.facts) ?? detectOrderId(request.xml, this.options.orderIdPattern);
      return { orderId, record: buildFactRecord(request.facts) };
    }

    const orderId = request.orderId ?? detectOrderId(request.xml, this.options.orderIdPattern);
    if (orderId === null) {
      throw new OrderIdMissingError();
    }
    const record = this.store.factsFor(orderId);
    if (record !== undefined) {
      return { orderId, record };
    }
    if (this.options.requireKnownOrder) {
      throw new OrderNotFoundError(orderId);
    }
    // only the order number itself can be corrected
    return { orderId, record: buildFactRecord({ order_id: orderId }) };
  }

  /**
   * Correct one document.
   *
   * @throws OrderIdMissingError, OrderNotFoundError when no facts can be found
   * @throws DocumentParseError when the document is not well-formed
   */
  correctDocument(request: CorrectionRequest): CorrectionResult {
    const { orderId, record } = this.resolveFacts(request);
    const rules = request.rules ?? this.store.rules();
    const fileName = correctedFileName(request.fileName, this.options.correctedSuffix, orderId);

    emit(TelemetryEvents.CorrectionStarted, {
      order_id: orderId,
      file_name: request.fileName,
      rule_count: rules.length,
      custom_rules: request.rules !== undefined,
      custom_facts: request.facts !== undefined,
    });

    let corrected: CorrectXmlResult;
    try {
      corrected = correctXml(request.xml, record, rules);
    } catch (error) {
      if (error instanceof DocumentParseError) {
        emit(TelemetryEvents.CorrectionFailed, {
          order_id: orderId,
          file_name: request.fileName,
          line: error.line,
          column: error.column,
        });
      }
      throw error;
    }

    for (const outcome of corrected.outcomes) {
      if (outcome.tag === "failed") {
        emit(TelemetryEvents.RuleFailed, { order_id: orderId, rule: outcome.rule, message: outcome.message });
      }
    }

    const summary = summarizeOutcomes(corrected.outcomes);
    emit(TelemetryEvents.CorrectionCompleted, {
      order_id: orderId,
      file_name: request.fileName,
      changed: corrected.changed,
      applied: summary.applied,
      ...summary.counts,
    });

    return {
      orderId,
      fileName,
      xml: corrected.xml,
      changed: corrected.changed,
      outcomes: corrected.outcomes,
      summary,
    };
  }

  /**
   * Correct documents one by one. A document that cannot be attributed to a
   * known order, or fails to parse, is reported and the rest continue.
   * With `agency`, orders from other agencies are skipped.
   */
  correctBatch(documents: ReadonlyArray<BatchDocument>, options: { agency?: string } = {}): BatchResult {
    const results = documents.map(document => this.correctBatchItem(document, options.agency));
    const totals = { corrected: 0, skipped: 0, failed: 0 };
    for (const item of results) {
      totals[item.status]++;
    }
    emit(TelemetryEvents.BatchCompleted, { documents: documents.length, agency: options.agency, ...totals });
    return { results, totals };
  }

  private correctBatchItem(document: BatchDocument, agency: string | undefined): BatchItemResult {
    const { fileName } = document;
    const orderId = detectOrderId(document.xml, this.options.orderIdPattern);
    if (orderId === null) {
      return { fileName, status: "failed", orderId, reason: "No order number found in the document" };
    }

    const order = this.store.get(orderId);
    if (order === undefined) {
      return { fileName, status: "failed", orderId, reason: `Order ${orderId} is not in the orders file` };
    }

    if (agency !== undefined && order.code_agence !== agency) {
      emit(TelemetryEvents.CorrectionSkipped, { order_id: orderId, file_name: fileName, agency: order.code_agence });
      return {
        fileName,
        status: "skipped",
        orderId,
        reason: `Order belongs to agency ${order.code_agence ?? "(none)"}`,
      };
    }

    try {
      const result = this.correctDocument({ xml: document.xml, fileName, orderId });
      return { fileName, status: "corrected", orderId, result };
    } catch (error) {
      if (error instanceof DocumentParseError) {
        log.warn({ file_name: fileName, order_id: orderId, error: error.message }, "Skipping unparsable document");
        return { fileName, status: "failed", orderId, reason: error.message };
      }
      throw error;
    }
  }
}
