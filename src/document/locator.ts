/**
 * Locator grammar
 *
 *   locator := ("//" | "/") step ("/" step)*
 *   step    := name | prefix ":" name | "*"
 *
 * "//" anchors the first step anywhere in the tree, "/" anchors it at the
 * document root. Every following step is a direct child. Predicates, axes,
 * attributes and functions are not part of the grammar.
 */

import { LocatorParseError } from "./errors.js";

export type LocatorAnchor = "descendant" | "root";

export interface LocatorStep {
  /** Full step text, e.g. "hr:OrderId" or "OrderId" */
  name: string;
  prefix?: string;
  localName: string;
  wildcard: boolean;
}

export interface Locator {
  source: string;
  anchor: LocatorAnchor;
  steps: ReadonlyArray<LocatorStep>;
}

const NCNAME = /^[A-Za-z_\u00C0-\uFFFF][A-Za-z0-9_.\-\u00B7\u00C0-\uFFFF]*$/;

function parseStep(source: string, step: string): LocatorStep {
  if (step === "*") {
    return { name: step, localName: step, wildcard: true };
  }

  const parts = step.split(":");
  if (parts.length > 2) {
    throw new LocatorParseError(source, `step "${step}" has more than one prefix`);
  }
  for (const part of parts) {
    if (!NCNAME.test(part)) {
      throw new LocatorParseError(source, `unsupported step "${step}"`);
    }
  }

  if (parts.length === 2) {
    return { name: step, prefix: parts[0], localName: parts[1], wildcard: false };
  }
  return { name: step, localName: step, wildcard: false };
}

export function parseLocator(source: string): Locator {
  const text = source.trim();
  if (text.length === 0) {
    throw new LocatorParseError(source, "empty locator");
  }

  let anchor: LocatorAnchor;
  let rest: string;
  if (text.startsWith("//")) {
    anchor = "descendant";
    rest = text.slice(2);
  } else if (text.startsWith("/")) {
    anchor = "root";
    rest = text.slice(1);
  } else {
    throw new LocatorParseError(source, 'must start with "/" or "//"');
  }

  const rawSteps = rest.split("/");
  const steps: LocatorStep[] = [];
  for (const raw of rawSteps) {
    if (raw.length === 0) {
      throw new LocatorParseError(source, "empty path step");
    }
    steps.push(parseStep(source, raw));
  }

  return { source, anchor, steps };
}

/**
 * Element name created for a locator that resolved to nothing: its last step.
 */
export function childLabelFor(locator: Locator): string {
  const last = locator.steps[locator.steps.length - 1];
  if (last.wildcard) {
    throw new LocatorParseError(locator.source, "cannot create an element from a wildcard step");
  }
  return last.name;
}

/**
 * Step test: unprefixed steps compare local names, prefixed steps compare the
 * qualified name as written in the document.
 */
export function stepMatches(step: LocatorStep, qualifiedName: string, localName: string): boolean {
  if (step.wildcard) {
    return true;
  }
  if (step.prefix !== undefined) {
    return step.name === qualifiedName;
  }
  return step.localName === localName;
}
