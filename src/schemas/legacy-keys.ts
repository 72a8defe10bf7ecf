/**
 * Older orders files use French section names and rule fields named after
 * the path language they started from. These preprocessors rename such keys
 * before validation; a canonical key wins when both spellings are present.
 */
export function renameLegacyKeys(aliases: Readonly<Record<string, string>>) {
  return (input: unknown): unknown => {
    if (typeof input !== "object" || input === null || Array.isArray(input)) {
      return input;
    }
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const canonical = Object.prototype.hasOwnProperty.call(aliases, key) ? aliases[key] : key;
      if (canonical === key || !(canonical in out)) {
        out[canonical] = value;
      }
    }
    return out;
  };
}
