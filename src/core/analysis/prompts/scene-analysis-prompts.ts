/**
 * LLM Prompts for Scene Analysis
 *
 * @module
 */

export const NO_SCHEMA_PLACEHOLDER =
  "No existing schema (this is the first scene). Define every type the scene needs.";

// =============================================================================
// Scene Analysis Prompt
// =============================================================================

const RESPONSE_SHAPE = `{
  "new_data": {
    "entities": [
      {"id": "desk_main", "type": "existing_type", "attributes": {"color": "brown", "material": "wood"}}
    ],
    "relations": [
      {"type": "existing_relation", "from": "entity_id", "to": "entity_id"}
    ]
  },
  "schema_changes": {
    "new_entity_types": [
      {"name": "type_name", "parent": "physical_object", "owns": ["attr_name"]}
    ],
    "new_attribute_types": [
      {"name": "attr_name", "value_type": "string"}
    ],
    "new_relation_types": [
      {"name": "relation_name", "parent": "spatial_relation"}
    ],
    "modified_types": [
      {"name": "existing_type", "add_owns": ["attr_name"], "add_plays": ["relation_name:role"]}
    ]
  },
  "data_requiring_schema_change": {
    "entities": [
      {"id": "entity_id", "type": "new_type", "attributes": {}}
    ],
    "relations": [
      {"type": "new_relation_type", "from": "entity_id", "to": "entity_id"}
    ]
  }
}`;

/**
 * Builds the analysis prompt around the current schema text
 */
export function generateSceneAnalysisPrompt(schema: string | null): string {
  const schemaText = schema && schema.trim() ? schema : NO_SCHEMA_PLACEHOLDER;

  return `You are building a TypeDB knowledge graph of the objects in a scene and how they are arranged.

CURRENT SCHEMA:
${schemaText}

TASK:
1. List every object you can clearly see.
   - Objects that fit an existing type go under "new_data".
   - Objects that need a new type or a schema change go under "data_requiring_schema_change",
     with the change itself under "schema_changes".
2. Attributes: reuse existing attribute types (name, color, material, shape, size,
   position_description). Propose a new attribute type only when none fits.
3. Spatial relations are required, not optional. For every pair of related objects give
   the relation type, "from" (the subject entity id) and "to" (the reference entity id).
   Base relation types: on, under, next_to, in_front_of, behind, inside, contains.
   A new relation type must be declared in "schema_changes" as a subtype of spatial_relation,
   which gives it the subject and reference roles.
   Examples:
   - {"type": "on", "from": "laptop_1", "to": "desk_main"}
   - {"type": "next_to", "from": "monitor_1", "to": "monitor_2"}
4. Entity ids are short and descriptive: "chair_1", "table_main", "lamp_desk".
   Each id is unique within the scene.

Reply with JSON of exactly this shape:
${RESPONSE_SHAPE}

Only include objects and relations you can identify with confidence, and prefer existing
types over new ones. Reply with the JSON object only.`;
}

/**
 * Label placed after each image when several frames are sent
 */
export function frameLabel(index: number, timestampSec: number): string {
  return `[Frame ${index + 1} at ${timestampSec.toFixed(1)}s]`;
}
