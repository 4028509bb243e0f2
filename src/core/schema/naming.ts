/**
 * Label Sanitization
 *
 * Every type, attribute and role label that reaches a TypeQL statement goes
 * through `sanitizeName`, so a proposed name maps to the same safe label in
 * the generator, the planner and the inserter.
 *
 * @module
 */

// =============================================================================
// Reserved Words
// =============================================================================

/**
 * TypeQL keywords an analyzer tends to propose as labels, with their rewrites
 */
export const RESERVED_KEYWORDS: ReadonlyMap<string, string> = new Map([
  ["in", "contained_in"],
  ["or", "logical_or"],
  ["and", "logical_and"],
  ["not", "logical_not"],
  ["match", "pattern_match"],
  ["define", "schema_define"],
  ["insert", "data_insert"],
  ["delete", "data_delete"],
  ["undefine", "schema_undefine"],
]);

const INVALID_LABEL_CHARS = /[^A-Za-z0-9_-]/g;
const VALID_LABEL_START = /^[A-Za-z_]/;

/**
 * Turns a proposed name into a safe TypeQL label.
 *
 * Characters outside [A-Za-z0-9_-] become "_", labels that would not start
 * with a letter or underscore get a "t_" prefix, and reserved words are
 * rewritten. Idempotent: sanitizeName(sanitizeName(x)) === sanitizeName(x).
 *
 * @example
 * ```typescript
 * sanitizeName("in");          // "contained_in"
 * sanitizeName("coffee mug");  // "coffee_mug"
 * ```
 */
export function sanitizeName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === "") return "";

  let label = trimmed.replace(INVALID_LABEL_CHARS, "_");
  if (!VALID_LABEL_START.test(label)) {
    label = `t_${label}`;
  }

  return RESERVED_KEYWORDS.get(label) ?? label;
}

/**
 * Sanitizes a scoped label such as `holds:holder` part by part. Empty when
 * any part is empty.
 */
export function sanitizeScopedLabel(label: string): string {
  const parts = label.split(":").map((part) => sanitizeName(part));
  return parts.includes("") ? "" : parts.join(":");
}

// =============================================================================
// Value Types
// =============================================================================

export type TypeQLValueType = "string" | "integer" | "double" | "boolean" | "datetime" | "date";

/**
 * Synonyms an analyzer may use for value types
 */
export const VALUE_TYPE_MAP: ReadonlyMap<string, TypeQLValueType> = new Map([
  ["string", "string"],
  ["str", "string"],
  ["integer", "integer"],
  ["int", "integer"],
  ["double", "double"],
  ["float", "double"],
  ["boolean", "boolean"],
  ["bool", "boolean"],
  ["datetime", "datetime"],
  ["date", "date"],
]);

/**
 * Maps a proposed value type to a TypeQL one; unknown types become string
 */
export function normalizeValueType(raw: string | undefined): TypeQLValueType {
  if (!raw) return "string";
  return VALUE_TYPE_MAP.get(raw.trim().toLowerCase()) ?? "string";
}
