/**
 * Fact Record
 *
 * Normalized key/value facts for one order plus boolean flags derived once
 * at construction time. Records are frozen: the correction engine only reads
 * them.
 */

export interface FactRecord {
  readonly facts: Readonly<Record<string, string>>;
  readonly flags: Readonly<Record<string, boolean>>;
}

/**
 * Flag `name` is true when the upper-cased value of `field` does not contain
 * `marker`. A missing field counts as not containing it.
 */
export interface DerivedFlagSpec {
  name: string;
  field: string;
  marker: string;
}

export const DEFAULT_DERIVED_FLAGS: ReadonlyArray<DerivedFlagSpec> = [
  { name: "site_not_gemenos", field: "site_mission", marker: "GEMENOS" },
];

/** Values that spreadsheets and exports write in place of "no value". */
const PLACEHOLDER_VALUES = new Set(["nan", "missing", "none", "null", "n/a", "undefined"]);

export type RawFactValue = string | number | boolean | null | undefined;

export interface BuildFactRecordOptions {
  derivedFlags?: ReadonlyArray<DerivedFlagSpec>;
}

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export function normalizeFactValue(value: RawFactValue): string | undefined {
  if (value === null || value === undefined || typeof value === "boolean") {
    return undefined;
  }
  const text = String(value).trim();
  if (text.length === 0 || PLACEHOLDER_VALUES.has(text.toLowerCase())) {
    return undefined;
  }
  return text;
}

export function computeDerivedFlag(spec: DerivedFlagSpec, facts: Readonly<Record<string, string>>): boolean {
  const value = hasOwn(facts, spec.field) ? facts[spec.field] : "";
  return !value.toUpperCase().includes(spec.marker.toUpperCase());
}

/**
 * Build a Fact Record from raw pairs of any origin.
 *
 * Strings are trimmed, numbers stringified, empty and placeholder values
 * dropped. Booleans in the input become flags as given; every derived flag
 * the input does not already carry is computed from the cleaned facts.
 */
export function buildFactRecord(
  raw: Readonly<Record<string, RawFactValue>>,
  options: BuildFactRecordOptions = {}
): FactRecord {
  const facts: Record<string, string> = {};
  const flags: Record<string, boolean> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "boolean") {
      flags[key] = value;
      continue;
    }
    const normalized = normalizeFactValue(value);
    if (normalized !== undefined) {
      facts[key] = normalized;
    }
  }

  for (const spec of options.derivedFlags ?? DEFAULT_DERIVED_FLAGS) {
    if (!hasOwn(flags, spec.name)) {
      flags[spec.name] = computeDerivedFlag(spec, facts);
    }
  }

  return Object.freeze({
    facts: Object.freeze(facts),
    flags: Object.freeze(flags),
  });
}

export function getFlag(record: FactRecord, name: string): boolean | undefined {
  return hasOwn(record.flags, name) ? record.flags[name] : undefined;
}

/**
 * Resolve a rule's source key. Raw facts and flags share one namespace; a
 * true flag resolves to "true", a false or unknown one to nothing.
 */
export function resolveFact(record: FactRecord, key: string): string | undefined {
  if (hasOwn(record.facts, key)) {
    return record.facts[key];
  }
  return getFlag(record, key) === true ? "true" : undefined;
}

/**
 * Flat view used for persistence and API responses.
 */
export function factRecordToJson(record: FactRecord): Record<string, string | boolean> {
  return { ...record.facts, ...record.flags };
}

/**
 * Keep the scalar entries of a loosely typed object (a stored order, a
 * request body) as raw fact input.
 */
export function pickRawFacts(input: Readonly<Record<string, unknown>>): Record<string, RawFactValue> {
  const raw: Record<string, RawFactValue> = {};
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      raw[key] = value;
    }
  }
  return raw;
}
