/**
 * Raised when an input document cannot be parsed. Fatal for the whole
 * correction run: no rule is applied to a partially parsed tree.
 */
export class DocumentParseError extends Error {
  readonly code = "DOCUMENT_PARSE_ERROR";

  constructor(
    message: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = "DocumentParseError";
  }
}

/**
 * Raised for a locator string outside the supported path grammar.
 * This is a rule configuration error, reported per rule.
 */
export class LocatorParseError extends Error {
  readonly code = "LOCATOR_PARSE_ERROR";

  constructor(
    readonly locator: string,
    reason: string,
  ) {
    super(`Invalid locator "${locator}": ${reason}`);
    this.name = "LocatorParseError";
  }
}
