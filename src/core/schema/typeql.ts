/**
 * TypeQL Rendering
 *
 * Pure functions from typed records to TypeQL text. String literals are
 * escaped here and nowhere else; labels are sanitized on the way in.
 *
 * @module
 */

import { normalizeValueType, sanitizeName, sanitizeScopedLabel } from "./naming.js";

// =============================================================================
// Literals
// =============================================================================

/**
 * Escapes backslashes, double quotes and line breaks for a TypeQL string literal
 */
export function escapeString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
}

export function quote(value: string): string {
  return `"${escapeString(value)}"`;
}

/**
 * Formats an attribute value as a TypeQL literal.
 *
 * Strings are quoted, booleans and finite numbers are bare, anything else is
 * serialized and quoted. Returns null for null/undefined (nothing to assign).
 */
export function formatValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return quote(value);
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "object") return quote(JSON.stringify(value));
  return quote(String(value));
}

// =============================================================================
// Schema Declarations
// =============================================================================

/**
 * Joins a declaration head with its comma-separated constraints
 */
function declaration(head: string, constraints: readonly string[]): string {
  return [head, ...constraints].join(", ");
}

/** `attribute <name> value <type>` */
export function renderAttributeType(name: string, valueType?: string): string {
  return `attribute ${sanitizeName(name)} value ${normalizeValueType(valueType)}`;
}

export interface EntityDeclaration {
  name: string;
  /** Omitted from the statement when undefined */
  parent?: string;
  owns?: readonly string[];
  plays?: readonly string[];
}

/** `entity <name>, sub <parent>, owns <a>, plays <r>` */
export function renderEntityType(entity: EntityDeclaration): string {
  const constraints: string[] = [];
  if (entity.parent) constraints.push(`sub ${sanitizeName(entity.parent)}`);
  for (const attr of entity.owns ?? []) constraints.push(`owns ${sanitizeName(attr)}`);
  for (const role of entity.plays ?? []) constraints.push(`plays ${sanitizeScopedLabel(role)}`);
  return declaration(`entity ${sanitizeName(entity.name)}`, constraints);
}

export interface RelationDeclaration {
  name: string;
  parent?: string;
  roles?: readonly string[];
}

/** `relation <name>, sub <parent>, relates <role>` */
export function renderRelationType(relation: RelationDeclaration): string {
  const constraints: string[] = [];
  if (relation.parent) constraints.push(`sub ${sanitizeName(relation.parent)}`);
  for (const role of relation.roles ?? []) constraints.push(`relates ${sanitizeName(role)}`);
  return declaration(`relation ${sanitizeName(relation.name)}`, constraints);
}

/** `<type> owns <attr>` */
export function renderOwns(typeName: string, attribute: string): string {
  return `${sanitizeName(typeName)} owns ${sanitizeName(attribute)}`;
}

/** `<type> plays <role>`, where role may be scoped (`relation:role`) */
export function renderPlays(typeName: string, role: string): string {
  return `${sanitizeName(typeName)} plays ${sanitizeScopedLabel(role)}`;
}

/**
 * Wraps declarations into one `define` query, one declaration per line
 */
export function renderDefineBlock(declarations: readonly string[]): string {
  return ["define", ...declarations.map((decl) => `  ${decl};`)].join("\n");
}

/**
 * A single-declaration define statement: `define <decl>;`
 */
export function renderDefine(decl: string): string {
  return `define ${decl};`;
}
