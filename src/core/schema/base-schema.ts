/**
 * Base Schema
 *
 * The fixed types every scene graph starts from: a root `physical_object`
 * entity owning the descriptive attributes, and a root `spatial_relation`
 * with seven named subtypes.
 *
 * @module
 */

import {
  renderAttributeType,
  renderDefineBlock,
  renderEntityType,
  renderPlays,
  renderRelationType,
} from "./typeql.js";
import { sanitizeName } from "./naming.js";

// =============================================================================
// Names
// =============================================================================

export const ROOT_ENTITY = "physical_object";
export const ROOT_RELATION = "spatial_relation";

export const DEFAULT_FROM_ROLE = "subject";
export const DEFAULT_TO_ROLE = "reference";

export const NAME_ATTRIBUTE = "name";
export const SCENE_ID_ATTRIBUTE = "scene_id";

/**
 * Descriptive attributes owned by the root entity
 */
export const DESCRIPTIVE_ATTRIBUTES = [
  "color",
  "material",
  "shape",
  "size",
  "position_description",
] as const;

/**
 * Everything `physical_object` owns. Subtypes inherit these and must not
 * redeclare them.
 */
export const INHERITED_ATTRIBUTES: ReadonlySet<string> = new Set([
  NAME_ATTRIBUTE,
  ...DESCRIPTIVE_ATTRIBUTES,
  SCENE_ID_ATTRIBUTE,
]);

export const BASE_ATTRIBUTES: readonly string[] = [...INHERITED_ATTRIBUTES];

export const BASE_SPATIAL_RELATIONS = [
  "on",
  "under",
  "next_to",
  "in_front_of",
  "behind",
  "inside",
  "contains",
] as const;

export const BASE_ENTITIES: readonly string[] = [ROOT_ENTITY];
export const BASE_RELATIONS: readonly string[] = [ROOT_RELATION, ...BASE_SPATIAL_RELATIONS];

/**
 * Parent labels an analyzer uses to mean "top-level entity"
 */
export const GENERIC_ENTITY_PARENTS: ReadonlySet<string> = new Set(["entity", "thing"]);

/**
 * Compares the sanitized, lower-cased parent against the generic roots
 */
export function isGenericEntityParent(parent: string): boolean {
  return GENERIC_ENTITY_PARENTS.has(sanitizeName(parent).toLowerCase());
}
export const GENERIC_RELATION_PARENT = "relation";

// =============================================================================
// Declarations
// =============================================================================

export function baseSchemaDeclarations(): string[] {
  return [
    ...BASE_ATTRIBUTES.map((name) => renderAttributeType(name, "string")),
    renderEntityType({ name: ROOT_ENTITY, owns: BASE_ATTRIBUTES }),
    renderRelationType({ name: ROOT_RELATION, roles: [DEFAULT_FROM_ROLE, DEFAULT_TO_ROLE] }),
    ...BASE_SPATIAL_RELATIONS.map((name) => renderRelationType({ name, parent: ROOT_RELATION })),
    renderPlays(ROOT_ENTITY, `${ROOT_RELATION}:${DEFAULT_FROM_ROLE}`),
    renderPlays(ROOT_ENTITY, `${ROOT_RELATION}:${DEFAULT_TO_ROLE}`),
  ];
}

/**
 * The base schema as a standalone define query
 */
export const BASE_SCHEMA = renderDefineBlock(baseSchemaDeclarations());
