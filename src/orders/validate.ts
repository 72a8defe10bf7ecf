/**
 * Orders file validation
 *
 * Checks beyond the schema:
 * - required order fields and the client every order belongs to
 * - order numbers outside the usual pattern (warning)
 * - rule table lint (broken or missing expected rules are errors)
 * - statistics consistency (warning)
 *
 * Produces a data-quality report for the validation script.
 */

import { OrdersFile, type OrdersFileT } from "../schemas/orders.js";
import { lintRuleSet, resolveRuleSet } from "../engine/rule-set.js";
import { DEFAULT_ORDER_ID_PATTERN } from "../facts/email-extract.js";
import { computeOrderStatistics } from "./statistics.js";

export const REQUIRED_ORDER_FIELDS = ["order_id", "client", "emploi_cc", "code_agence"] as const;

const MAX_LISTED_JOB_CODES = 10;

export interface OrdersValidationReport {
  validated_at: string;
  summary: {
    total_orders: number;
    total_rules: number;
    agency_codes: number;
    job_codes: number;
    socio_categories: number;
  };
  details: {
    agency_codes: string[];
    job_codes: string[];
    socio_categories: string[];
    orders_per_agency: Record<string, number>;
  };
  data_quality: {
    with_job_code: number;
    with_cost_centre: number;
    with_dates: number;
  };
}

export interface OrdersValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Absent when the file does not match the schema */
  report?: OrdersValidationReport;
  file?: OrdersFileT;
}

export interface ValidateOrdersOptions {
  clientName: string;
  orderIdPattern?: string;
  now?: Date;
}

function describeOrder(index: number, orderId: string): string {
  return `Order at index ${index} (order_id: ${orderId})`;
}

export function buildValidationReport(file: OrdersFileT, now: Date = new Date()): OrdersValidationReport {
  const stats = computeOrderStatistics(file.orders, now);
  return {
    validated_at: now.toISOString(),
    summary: {
      total_orders: stats.total_orders,
      total_rules: resolveRuleSet(file.rules).length,
      agency_codes: stats.unique_agency_codes.length,
      job_codes: stats.unique_job_codes.length,
      socio_categories: stats.unique_socio_categories.length,
    },
    details: {
      agency_codes: stats.unique_agency_codes,
      job_codes: stats.unique_job_codes.slice(0, MAX_LISTED_JOB_CODES),
      socio_categories: stats.unique_socio_categories,
      orders_per_agency: stats.orders_per_agency,
    },
    data_quality: {
      with_job_code: file.orders.filter(order => order.emploi_cc).length,
      with_cost_centre: file.orders.filter(order => order.centre_analyse).length,
      with_dates: file.orders.filter(order => order.date_debut).length,
    },
  };
}

export function validateOrdersFile(data: unknown, options: ValidateOrdersOptions): OrdersValidationResult {
  const parsed = OrdersFile.safeParse(data);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
      warnings: [],
    };
  }

  const file = parsed.data;
  const errors: string[] = [];
  const warnings: string[] = [];
  const { clientName } = options;

  if (file.metadata.client !== clientName) {
    errors.push(`metadata.client is "${file.metadata.client}", expected "${clientName}"`);
  }

  if (file.orders.length === 0) {
    warnings.push("No orders found");
  }

  const usualId = new RegExp(`^(?:${options.orderIdPattern ?? DEFAULT_ORDER_ID_PATTERN})$`, "i");
  const seenIds = new Set<string>();
  file.orders.forEach((order, index) => {
    const missing = REQUIRED_ORDER_FIELDS.filter(field => !order[field]);
    if (missing.length > 0) {
      errors.push(`${describeOrder(index, order.order_id)}: missing fields ${missing.join(", ")}`);
    }
    if (order.client && order.client !== clientName) {
      errors.push(`${describeOrder(index, order.order_id)}: client is "${order.client}", expected "${clientName}"`);
    }
    if (!usualId.test(order.order_id)) {
      warnings.push(`Unusual order number: ${order.order_id}`);
    }
    if (seenIds.has(order.order_id)) {
      warnings.push(`Duplicate order number: ${order.order_id} (the last occurrence is used)`);
    }
    seenIds.add(order.order_id);
  });

  if (file.rules === undefined) {
    warnings.push("No rules section; the built-in rules apply");
  } else if (file.rules.length === 0) {
    errors.push("Rule set is empty");
  } else {
    for (const issue of lintRuleSet(file.rules)) {
      const line = issue.target ? `Rule ${issue.target}: ${issue.note}` : issue.note;
      if (issue.level === "IMPROVEMENT") {
        warnings.push(line);
      } else {
        errors.push(line);
      }
    }
  }

  if (file.statistics === undefined) {
    warnings.push("No statistics section");
  } else if (file.statistics.total_orders !== file.orders.length) {
    warnings.push(
      `statistics.total_orders is ${file.statistics.total_orders} but the file holds ${file.orders.length} orders`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    report: buildValidationReport(file, options.now),
    file,
  };
}
