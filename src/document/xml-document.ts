import { parseXml } from "./parser.js";
import { parseLocator, stepMatches, type Locator } from "./locator.js";
import {
  createElement,
  createText,
  createWhitespace,
  expandSelfClosing,
  isWhitespaceText,
  serializeNode,
  type XmlElement,
} from "./nodes.js";

export type CreateChildResult =
  | { ok: true; node: XmlElement }
  | { ok: false; reason: "ParentNotFound" | "NotMatchedByTarget" };

function toLocator(locator: string | Locator): Locator {
  return typeof locator === "string" ? parseLocator(locator) : locator;
}

/**
 * Walk the element chain upwards from `element`, matching the locator's steps
 * from last to first.
 */
function matchesLocator(element: XmlElement, locator: Locator): boolean {
  let current: XmlElement | null = element;
  for (let i = locator.steps.length - 1; i >= 0; i--) {
    if (current === null || !stepMatches(locator.steps[i], current.name, current.localName)) {
      return false;
    }
    current = current.parent;
  }
  // root-anchored: the first step must have been the document element
  return locator.anchor === "descendant" || current === null;
}

/**
 * Index of the first node that is not part of the element's leading text.
 */
function leadingTextEnd(element: XmlElement): number {
  let i = 0;
  while (i < element.children.length) {
    const kind = element.children[i].kind;
    if (kind !== "text" && kind !== "cdata") break;
    i++;
  }
  return i;
}

/**
 * Mutable in-memory XML document.
 *
 * Lookups resolve to the first element in document order. Mutations are
 * limited to replacing an element's leading text and appending a new leaf
 * element, and rendering reproduces every untouched byte of the input.
 */
export class XmlDocument {
  private constructor(
    private readonly prolog: string,
    readonly root: XmlElement,
    private readonly epilog: string,
  ) {}

  /**
   * @throws DocumentParseError when the text is not well-formed XML
   */
  static parse(text: string): XmlDocument {
    const parsed = parseXml(text);
    return new XmlDocument(parsed.prolog, parsed.root, parsed.epilog);
  }

  /** Elements in document order (pre-order). */
  *elements(): IterableIterator<XmlElement> {
    const stack: XmlElement[] = [this.root];
    while (stack.length > 0) {
      const element = stack.pop();
      if (element === undefined) break;
      yield element;
      for (let i = element.children.length - 1; i >= 0; i--) {
        const child = element.children[i];
        if (child.kind === "element") {
          stack.push(child);
        }
      }
    }
  }

  /**
   * First element matching the locator, or undefined.
   *
   * @throws LocatorParseError when given a malformed locator string
   */
  find(locator: string | Locator): XmlElement | undefined {
    const parsed = toLocator(locator);
    for (const element of this.elements()) {
      if (matchesLocator(element, parsed)) {
        return element;
      }
    }
    return undefined;
  }

  /**
   * Decoded leading text of an element (text before its first child element).
   */
  textOf(element: XmlElement): string {
    const end = leadingTextEnd(element);
    let text = "";
    for (let i = 0; i < end; i++) {
      const child = element.children[i];
      if (child.kind === "text" || child.kind === "cdata") {
        text += child.value;
      }
    }
    return text;
  }

  /**
   * Replace the element's leading text. Returns false, leaving the source
   * untouched, when the element already holds exactly this text.
   */
  setText(element: XmlElement, text: string): boolean {
    if (this.textOf(element) === text) {
      return false;
    }
    const end = leadingTextEnd(element);
    const replacement = text.length > 0 ? [createText(text)] : [];
    if (replacement.length > 0) {
      expandSelfClosing(element);
    }
    element.children.splice(0, end, ...replacement);
    return true;
  }

  /**
   * Append a new leaf element as the last child of the first element matching
   * `parentLocator`. When the parent's children are laid out on separate
   * lines, the indentation in front of its last child element is repeated.
   *
   * With `matchedBy`, nothing is inserted unless that locator would match the
   * new element.
   *
   * @throws LocatorParseError when given a malformed locator string
   */
  createChild(
    parentLocator: string | Locator,
    label: string,
    text: string,
    matchedBy?: string | Locator,
  ): CreateChildResult {
    const parent = this.find(parentLocator);
    if (parent === undefined) {
      return { ok: false, reason: "ParentNotFound" };
    }

    const node = createElement(label, text);
    node.parent = parent;
    if (matchedBy !== undefined && !matchesLocator(node, toLocator(matchedBy))) {
      return { ok: false, reason: "NotMatchedByTarget" };
    }

    if (parent.selfClosing) {
      expandSelfClosing(parent);
      parent.children.push(node);
      return { ok: true, node };
    }

    const children = parent.children;
    const trailing = children[children.length - 1];
    if (!isWhitespaceText(trailing)) {
      children.push(node);
      return { ok: true, node };
    }

    let lastElement = -1;
    for (let i = children.length - 1; i >= 0; i--) {
      if (children[i].kind === "element") {
        lastElement = i;
        break;
      }
    }
    const indent = lastElement > 0 ? children[lastElement - 1] : undefined;
    if (isWhitespaceText(indent) && indent.raw.includes("\n")) {
      children.splice(children.length - 1, 0, createWhitespace(indent.raw), node);
    } else {
      children.splice(children.length - 1, 0, node);
    }
    return { ok: true, node };
  }

  /** Serialize the current tree. */
  render(): string {
    const out: string[] = [this.prolog];
    serializeNode(this.root, out);
    out.push(this.epilog);
    return out.join("");
  }
}
