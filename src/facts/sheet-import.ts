/**
 * Orders spreadsheet import.
 *
 * Reads the CSV export of the orders sheet (one row per order, French
 * column headers) into order records ready for the orders file.
 */

import Papa from "papaparse";
import { computeDerivedFlag, DEFAULT_DERIVED_FLAGS } from "./fact-record.js";
import { fieldForLabel, normalizeOrderFields } from "./order-fields.js";
import type { OrderRecordT } from "../schemas/orders.js";

export interface SkippedRow {
  /** Sheet row number; the header is row 1 */
  row: number;
  reason: string;
}

export interface SheetImportResult {
  orders: OrderRecordT[];
  skipped: SkippedRow[];
  /** Unknown headers, ignored */
  ignoredColumns: string[];
}

export interface SheetImportOptions {
  clientName: string;
  now?: Date;
}

export function parseOrdersCsv(text: string, options: SheetImportOptions): SheetImportResult {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header: string) => header.trim(),
  });
  const headers = parsed.meta.fields ?? [];
  const keyByHeader = new Map<string, string>();
  const ignoredColumns: string[] = [];
  for (const header of headers) {
    const key = fieldForLabel(header);
    if (key === undefined) {
      ignoredColumns.push(header);
    } else {
      keyByHeader.set(header, key);
    }
  }

  const lastUpdated = (options.now ?? new Date()).toISOString();
  const orders: OrderRecordT[] = [];
  const skipped: SkippedRow[] = [];

  parsed.data.forEach((row, index) => {
    const raw: Record<string, string> = {};
    for (const [header, key] of keyByHeader) {
      raw[key] = row[header] ?? "";
    }
    const fields = normalizeOrderFields(raw);
    const orderId = fields.order_id;
    if (orderId === undefined) {
      skipped.push({ row: index + 2, reason: "missing order number" });
      return;
    }

    const order: OrderRecordT = { order_id: orderId, client: options.clientName };
    for (const [key, value] of Object.entries(fields)) {
      if (key !== "order_id") order[key] = value;
    }
    for (const spec of DEFAULT_DERIVED_FLAGS) {
      order[spec.name] = computeDerivedFlag(spec, fields);
    }
    order.last_updated = lastUpdated;
    orders.push(order);
  });

  return { orders, skipped, ignoredColumns };
}
