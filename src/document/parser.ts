/**
 * Strict, lossless XML scanner.
 *
 * Builds the node model in nodes.ts while keeping every source fragment.
 * Well-formedness errors (unclosed or mismatched tags, content outside the
 * root element, broken references, unterminated markup) raise
 * DocumentParseError with the line and column of the offending character.
 * DTD internal subsets are kept as raw prolog text and not interpreted.
 */

import { DocumentParseError } from "./errors.js";
import { decodeEntities, type XmlElement, type XmlNode } from "./nodes.js";

export interface ParsedXml {
  prolog: string;
  root: XmlElement;
  epilog: string;
}

const NAME_START = /[A-Za-z_:\u00C0-\uFFFF]/;
const NAME_CHAR = /[A-Za-z0-9_:.\-\u00B7\u00C0-\uFFFF]/;
const WHITESPACE = /[ \t\r\n]/;
const REFERENCE = /^&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z_][A-Za-z0-9._-]*);/;

class Scanner {
  pos = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  startsWith(token: string): boolean {
    return this.text.startsWith(token, this.pos);
  }

  fail(message: string, at: number = this.pos): never {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < at && i < this.text.length; i++) {
      if (this.text[i] === "\n") {
        line++;
        lineStart = i + 1;
      }
    }
    throw new DocumentParseError(message, line, at - lineStart + 1);
  }

  skipWhitespace(): void {
    while (!this.done && WHITESPACE.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  /** Consume through `terminator`, returning the consumed source. */
  readThrough(terminator: string, what: string): string {
    const start = this.pos;
    const end = this.text.indexOf(terminator, this.pos);
    if (end === -1) {
      this.fail(`Unterminated ${what}`, start);
    }
    this.pos = end + terminator.length;
    return this.text.slice(start, this.pos);
  }

  readName(): string {
    const start = this.pos;
    if (this.done || !NAME_START.test(this.text[this.pos])) {
      this.fail("Expected a name");
    }
    this.pos++;
    while (!this.done && NAME_CHAR.test(this.text[this.pos])) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }
}

function checkReferences(scanner: Scanner, raw: string, offset: number): void {
  let index = raw.indexOf("&");
  while (index !== -1) {
    const match = REFERENCE.exec(raw.slice(index));
    if (!match) {
      scanner.fail("Malformed entity reference", offset + index);
    }
    const ref = match[1];
    if (ref.startsWith("#")) {
      const codePoint = ref.startsWith("#x") ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      if (codePoint === 0 || codePoint > 0x10ffff) {
        scanner.fail("Invalid character reference", offset + index);
      }
    }
    index = raw.indexOf("&", index + match[0].length);
  }
}

function readDoctype(scanner: Scanner): string {
  const start = scanner.pos;
  let depth = 0;
  while (!scanner.done) {
    const ch = scanner.text[scanner.pos];
    scanner.pos++;
    if (ch === "[") depth++;
    else if (ch === "]") depth--;
    else if (ch === ">" && depth <= 0) {
      return scanner.text.slice(start, scanner.pos);
    }
  }
  return scanner.fail("Unterminated DOCTYPE", start);
}

/**
 * Markup allowed outside the root element: whitespace, comments and PIs.
 * Returns false when the next thing is something else.
 */
function readMisc(scanner: Scanner, out: string[]): boolean {
  const start = scanner.pos;
  scanner.skipWhitespace();
  if (scanner.pos > start) {
    out.push(scanner.text.slice(start, scanner.pos));
    return true;
  }
  if (scanner.startsWith("<!--")) {
    out.push(scanner.readThrough("-->", "comment"));
    return true;
  }
  if (scanner.startsWith("<?")) {
    out.push(scanner.readThrough("?>", "processing instruction"));
    return true;
  }
  return false;
}

function readStartTag(scanner: Scanner, parent: XmlElement | null): XmlElement {
  const start = scanner.pos;
  scanner.pos++; // "<"
  const name = scanner.readName();
  const seen = new Set<string>();

  for (;;) {
    const beforeSpace = scanner.pos;
    scanner.skipWhitespace();
    const hadSpace = scanner.pos > beforeSpace;

    if (scanner.done) {
      scanner.fail(`Unterminated start tag <${name}>`, start);
    }
    if (scanner.startsWith("/>") || scanner.startsWith(">")) {
      const selfClosing = scanner.startsWith("/>");
      scanner.pos += selfClosing ? 2 : 1;
      const colon = name.indexOf(":");
      return {
        kind: "element",
        name,
        localName: colon === -1 ? name : name.slice(colon + 1),
        openTag: scanner.text.slice(start, scanner.pos),
        closeTag: "",
        selfClosing,
        children: [],
        parent,
      };
    }
    if (!hadSpace) {
      scanner.fail(`Expected whitespace before attribute in <${name}>`);
    }

    const attrName = scanner.readName();
    if (seen.has(attrName)) {
      scanner.fail(`Duplicate attribute "${attrName}" in <${name}>`);
    }
    seen.add(attrName);

    scanner.skipWhitespace();
    if (!scanner.startsWith("=")) {
      scanner.fail(`Expected "=" after attribute "${attrName}"`);
    }
    scanner.pos++;
    scanner.skipWhitespace();

    const quote = scanner.text[scanner.pos];
    if (quote !== '"' && quote !== "'") {
      scanner.fail(`Expected quoted value for attribute "${attrName}"`);
    }
    const valueStart = scanner.pos + 1;
    const valueEnd = scanner.text.indexOf(quote, valueStart);
    if (valueEnd === -1) {
      scanner.fail(`Unterminated value for attribute "${attrName}"`, valueStart);
    }
    const value = scanner.text.slice(valueStart, valueEnd);
    const lt = value.indexOf("<");
    if (lt !== -1) {
      scanner.fail(`"<" not allowed in attribute "${attrName}"`, valueStart + lt);
    }
    checkReferences(scanner, value, valueStart);
    scanner.pos = valueEnd + 1;
  }
}

function readEndTag(scanner: Scanner, open: XmlElement): string {
  const start = scanner.pos;
  scanner.pos += 2; // "</"
  const name = scanner.readName();
  scanner.skipWhitespace();
  if (!scanner.startsWith(">")) {
    scanner.fail(`Unterminated end tag </${name}>`, start);
  }
  scanner.pos++;
  if (name !== open.name) {
    scanner.fail(`Mismatched end tag: expected </${open.name}>, found </${name}>`, start);
  }
  return scanner.text.slice(start, scanner.pos);
}

function readText(scanner: Scanner): XmlNode {
  const start = scanner.pos;
  const next = scanner.text.indexOf("<", start);
  scanner.pos = next === -1 ? scanner.text.length : next;
  const raw = scanner.text.slice(start, scanner.pos);
  checkReferences(scanner, raw, start);
  return { kind: "text", raw, value: decodeEntities(raw) };
}

/**
 * Parse a complete document. Throws DocumentParseError on any
 * well-formedness violation.
 */
export function parseXml(text: string): ParsedXml {
  const scanner = new Scanner(text);
  const prolog: string[] = [];

  if (scanner.startsWith("\uFEFF")) {
    prolog.push("\uFEFF");
    scanner.pos++;
  }

  for (;;) {
    if (readMisc(scanner, prolog)) continue;
    if (scanner.startsWith("<!DOCTYPE")) {
      prolog.push(readDoctype(scanner));
      continue;
    }
    break;
  }

  if (scanner.done) {
    scanner.fail("Document is empty");
  }
  if (!scanner.startsWith("<") || scanner.startsWith("</") || scanner.startsWith("<!")) {
    scanner.fail("Content is not allowed in prolog");
  }

  const root = readStartTag(scanner, null);
  const stack: XmlElement[] = root.selfClosing ? [] : [root];

  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    if (scanner.done) {
      scanner.fail(`Premature end of data in tag <${current.name}>`);
    }

    if (scanner.startsWith("</")) {
      current.closeTag = readEndTag(scanner, current);
      stack.pop();
    } else if (scanner.startsWith("<!--")) {
      current.children.push({ kind: "comment", raw: scanner.readThrough("-->", "comment") });
    } else if (scanner.startsWith("<![CDATA[")) {
      const raw = scanner.readThrough("]]>", "CDATA section");
      current.children.push({ kind: "cdata", raw, value: raw.slice(9, -3) });
    } else if (scanner.startsWith("<?")) {
      current.children.push({ kind: "pi", raw: scanner.readThrough("?>", "processing instruction") });
    } else if (scanner.startsWith("<!")) {
      scanner.fail("Unexpected markup declaration inside element");
    } else if (scanner.startsWith("<")) {
      const child = readStartTag(scanner, current);
      current.children.push(child);
      if (!child.selfClosing) {
        stack.push(child);
      }
    } else {
      current.children.push(readText(scanner));
    }
  }

  const epilog: string[] = [];
  while (!scanner.done) {
    if (!readMisc(scanner, epilog)) {
      scanner.fail("Extra content at the end of the document");
    }
  }

  return { prolog: prolog.join(""), root, epilog: epilog.join("") };
}
