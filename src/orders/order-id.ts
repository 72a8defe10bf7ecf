/**
 * Order number detection in raw XML text.
 *
 * Elements that conventionally carry the customer order number are searched
 * first, then the whole document. Works on the raw text so that a document
 * too broken to parse can still be attributed to its order.
 */

import { DEFAULT_ORDER_ID_PATTERN } from "../facts/email-extract.js";

const CARRIER_ELEMENTS = ["IdValue", "CustomerJobCode", "OrderId"] as const;

function elementContents(xml: string, localName: string): string[] {
  const re = new RegExp(
    `<(?:[A-Za-z_][\\w.-]*:)?${localName}\\b[^>]*>([\\s\\S]*?)</(?:[A-Za-z_][\\w.-]*:)?${localName}\\s*>`,
    "g"
  );
  return [...xml.matchAll(re)].map(match => match[1]);
}

export function detectOrderId(xml: string, pattern: string = DEFAULT_ORDER_ID_PATTERN): string | null {
  const re = new RegExp(pattern, "i");

  for (const name of CARRIER_ELEMENTS) {
    for (const content of elementContents(xml, name)) {
      const match = re.exec(content);
      if (match) return match[0].toUpperCase();
    }
  }

  const anywhere = re.exec(xml);
  return anywhere ? anywhere[0].toUpperCase() : null;
}
