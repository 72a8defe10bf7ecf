/**
 * Lossless XML node model.
 *
 * Every node keeps the exact source text it was parsed from, so rendering an
 * untouched tree reproduces the input byte for byte. Only nodes created or
 * rewritten by a correction are serialized from their decoded value.
 */

export interface XmlText {
  kind: "text";
  /** Source text, entities still encoded */
  raw: string;
  /** Decoded character data */
  value: string;
}

export interface XmlCData {
  kind: "cdata";
  raw: string;
  value: string;
}

export interface XmlComment {
  kind: "comment";
  raw: string;
}

export interface XmlProcessingInstruction {
  kind: "pi";
  raw: string;
}

export interface XmlElement {
  kind: "element";
  /** Qualified name as written, e.g. "hr:OrderId" */
  name: string;
  localName: string;
  /** Start tag source, including attributes and the closing ">" or "/>" */
  openTag: string;
  /** End tag source; empty while the element is self-closing */
  closeTag: string;
  selfClosing: boolean;
  children: XmlNode[];
  parent: XmlElement | null;
}

export type XmlNode = XmlElement | XmlText | XmlCData | XmlComment | XmlProcessingInstruction;

const ENTITY_REF = /&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z_][A-Za-z0-9._-]*);/g;

const PREDEFINED_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/**
 * Decode character and predefined entity references. References to entities
 * declared in a DTD are left as written.
 */
export function decodeEntities(raw: string): string {
  return raw.replace(/\r\n?/g, "\n").replace(ENTITY_REF, (match, ref: string) => {
    if (ref.startsWith("#x")) {
      return String.fromCodePoint(parseInt(ref.slice(2), 16));
    }
    if (ref.startsWith("#")) {
      return String.fromCodePoint(parseInt(ref.slice(1), 10));
    }
    return PREDEFINED_ENTITIES[ref] ?? match;
  });
}

export function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function createText(value: string): XmlText {
  return { kind: "text", raw: escapeText(value), value };
}

/**
 * Whitespace text taken verbatim (indentation copied from a sibling).
 */
export function createWhitespace(raw: string): XmlText {
  return { kind: "text", raw, value: raw };
}

export function createElement(name: string, text: string): XmlElement {
  const colon = name.indexOf(":");
  const element: XmlElement = {
    kind: "element",
    name,
    localName: colon === -1 ? name : name.slice(colon + 1),
    openTag: `<${name}>`,
    closeTag: `</${name}>`,
    selfClosing: false,
    children: [],
    parent: null,
  };
  if (text.length > 0) {
    element.children.push(createText(text));
  }
  return element;
}

export function isWhitespaceText(node: XmlNode | undefined): node is XmlText {
  return node !== undefined && node.kind === "text" && node.raw.trim().length === 0;
}

/**
 * Turn `<Name attr="x"/>` into `<Name attr="x">` + `</Name>` so children can
 * be added.
 */
export function expandSelfClosing(element: XmlElement): void {
  if (!element.selfClosing) {
    return;
  }
  element.openTag = element.openTag.replace(/\s*\/>$/, ">");
  element.closeTag = `</${element.name}>`;
  element.selfClosing = false;
}

export function serializeNode(node: XmlNode, out: string[]): void {
  if (node.kind !== "element") {
    out.push(node.raw);
    return;
  }
  out.push(node.openTag);
  if (node.selfClosing) {
    return;
  }
  for (const child of node.children) {
    serializeNode(child, out);
  }
  out.push(node.closeTag);
}
