/**
 * Scene Analysis Models
 *
 * Entities, relations and proposed schema changes produced by the vision
 * analyzer. Consumed by the schema generator, the migration planner and the
 * data inserter; never mutated after parsing.
 *
 * @module
 */

// =============================================================================
// Scene Data
// =============================================================================

/**
 * Attribute values as they arrive from the analyzer. Strings, numbers and
 * booleans are the expected scalars; anything else is stringified on insert.
 */
export type AttributeValue = unknown;

/**
 * One observed object instance
 */
export interface EntityData {
  /** Caller-assigned, unique within a batch; stored as the `name` attribute */
  readonly id: string;
  /** Entity type label */
  readonly type: string;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
}

export interface RelationRoles {
  readonly from?: string;
  readonly to?: string;
}

/**
 * A typed edge between two entities of the same batch (or earlier ones)
 */
export interface RelationData {
  readonly type: string;
  /** Must match some EntityData.id; only checked at insertion time */
  readonly fromEntity: string;
  readonly toEntity: string;
  readonly roles: RelationRoles;
}

// =============================================================================
// Schema Changes
// =============================================================================

export type SchemaChangeType =
  | "new_attribute_type"
  | "new_entity_type"
  | "new_relation_type"
  | "modified_type";

export interface AttributeTypeDefinition {
  readonly name: string;
  /** Raw value type as proposed (e.g. "str", "float"); normalized when rendered */
  readonly valueType: string;
}

export interface EntityTypeDefinition {
  readonly name: string;
  readonly parent?: string;
  readonly owns: readonly string[];
  readonly plays: readonly string[];
}

export interface RoleDefinition {
  readonly name: string;
  /** Entity types declared as players of this role */
  readonly players: readonly string[];
}

export interface RelationTypeDefinition {
  readonly name: string;
  readonly parent?: string;
  readonly roles: readonly RoleDefinition[];
}

export interface TypeModificationDefinition {
  readonly name: string;
  readonly addOwns: readonly string[];
  readonly addPlays: readonly string[];
}

/**
 * A proposed, not-yet-applied schema delta. Ordering across changes is the
 * planner's job; a change carries none.
 */
export type SchemaChange =
  | { readonly changeType: "new_attribute_type"; readonly definition: AttributeTypeDefinition }
  | { readonly changeType: "new_entity_type"; readonly definition: EntityTypeDefinition }
  | { readonly changeType: "new_relation_type"; readonly definition: RelationTypeDefinition }
  | { readonly changeType: "modified_type"; readonly definition: TypeModificationDefinition };

/**
 * Schema changes grouped by category, each group in input order
 */
export interface PartitionedChanges {
  attributes: AttributeTypeDefinition[];
  entities: EntityTypeDefinition[];
  relations: RelationTypeDefinition[];
  modifications: TypeModificationDefinition[];
}

/**
 * Splits changes into the four categories, keeping input order within each.
 */
export function partitionSchemaChanges(changes: readonly SchemaChange[]): PartitionedChanges {
  const partitioned: PartitionedChanges = {
    attributes: [],
    entities: [],
    relations: [],
    modifications: [],
  };

  for (const change of changes) {
    switch (change.changeType) {
      case "new_attribute_type":
        partitioned.attributes.push(change.definition);
        break;
      case "new_entity_type":
        partitioned.entities.push(change.definition);
        break;
      case "new_relation_type":
        partitioned.relations.push(change.definition);
        break;
      case "modified_type":
        partitioned.modifications.push(change.definition);
        break;
      default: {
        const unreachable: never = change;
        throw new Error(`Unknown schema change: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  return partitioned;
}

// =============================================================================
// Analysis Result
// =============================================================================

/**
 * Everything the analyzer proposed for one scene.
 *
 * `newEntities`/`newRelations` fit the current schema; the pending ones need
 * `schemaChanges` applied first.
 */
export interface AnalysisResult {
  readonly newEntities: readonly EntityData[];
  readonly newRelations: readonly RelationData[];
  readonly schemaChanges: readonly SchemaChange[];
  readonly pendingEntities: readonly EntityData[];
  readonly pendingRelations: readonly RelationData[];
  /** Parsed JSON reply, or { error, text } when parsing failed */
  readonly rawResponse?: Readonly<Record<string, unknown>>;
  /** Set when the analyzer reply could not be parsed */
  readonly parseError?: string;
}

export function createEmptyAnalysisResult(
  overrides: Partial<AnalysisResult> = {}
): AnalysisResult {
  return {
    newEntities: [],
    newRelations: [],
    schemaChanges: [],
    pendingEntities: [],
    pendingRelations: [],
    ...overrides,
  };
}

/**
 * All entities in insertion order: data fitting the schema first, then pending
 */
export function allEntities(analysis: AnalysisResult): EntityData[] {
  return [...analysis.newEntities, ...analysis.pendingEntities];
}

export function allRelations(analysis: AnalysisResult): RelationData[] {
  return [...analysis.newRelations, ...analysis.pendingRelations];
}

/**
 * Counts for reporting
 */
export function summarizeAnalysis(analysis: AnalysisResult): {
  entities: number;
  relations: number;
  schemaChanges: number;
  entityTypes: Map<string, number>;
} {
  const entityTypes = new Map<string, number>();
  for (const entity of allEntities(analysis)) {
    entityTypes.set(entity.type, (entityTypes.get(entity.type) ?? 0) + 1);
  }

  return {
    entities: analysis.newEntities.length + analysis.pendingEntities.length,
    relations: analysis.newRelations.length + analysis.pendingRelations.length,
    schemaChanges: analysis.schemaChanges.length,
    entityTypes,
  };
}
