/**
 * Fact extraction from business emails.
 *
 * Order emails carry one "Label : value" pair per line, sometimes inside an
 * HTML body. Labels are matched without regard to case or accents. The order
 * number is the one required marker: without it there is no record.
 */

import { buildFactRecord, type FactRecord } from "./fact-record.js";
import { fieldForLabel, normalizeOrderFields } from "./order-fields.js";

export const DEFAULT_ORDER_ID_PATTERN = "FU\\d{8}";

const LABEL_LINE = /^\s*([^:\n]{2,60}?)\s*:\s*(.*?)\s*$/;

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  "&nbsp;": " ",
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

export function looksLikeHtml(text: string): boolean {
  return /<(html|body|div|p|br|table|span)\b[^>]*>/i.test(text);
}

export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|tr|li|h[1-6])>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(nbsp|amp|lt|gt|quot|#39);/g, entity => HTML_ENTITIES[entity] ?? entity);
}

export interface EmailExtractOptions {
  orderIdPattern?: string;
}

/**
 * Raw field values found in the email, before normalization.
 */
export function readLabelledFields(text: string): Record<string, string> {
  const body = looksLikeHtml(text) ? htmlToText(text) : text;
  const raw: Record<string, string> = {};
  for (const line of body.split(/\r?\n/)) {
    const match = LABEL_LINE.exec(line);
    if (!match) continue;
    const key = fieldForLabel(match[1]);
    // first occurrence wins; replies quote the original below
    if (key !== undefined && !(key in raw) && match[2].length > 0) {
      raw[key] = match[2];
    }
  }
  return raw;
}

/**
 * Build a Fact Record from an email body, or null when no order number can
 * be found either as a labelled field or as a bare token.
 */
export function extractFactsFromEmail(text: string, options: EmailExtractOptions = {}): FactRecord | null {
  const raw = readLabelledFields(text);
  const pattern = new RegExp(options.orderIdPattern ?? DEFAULT_ORDER_ID_PATTERN, "i");

  const labelled = raw.order_id?.match(pattern);
  if (labelled) {
    raw.order_id = labelled[0].toUpperCase();
  } else {
    const body = looksLikeHtml(text) ? htmlToText(text) : text;
    const bare = body.match(pattern);
    if (!bare) {
      return null;
    }
    raw.order_id = bare[0].toUpperCase();
  }

  return buildFactRecord(normalizeOrderFields(raw));
}
