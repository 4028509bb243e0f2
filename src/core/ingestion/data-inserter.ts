/**
 * Data Inserter
 *
 * Writes analyzed entities, then relations, into a schema that already fits
 * them. A failing item is recorded and the batch moves on.
 *
 * @module
 */

import type { AnalysisResult, EntityData, RelationData } from "../analysis/models.js";
import { allEntities, allRelations } from "../analysis/models.js";
import { errorMessage } from "../errors.js";
import type { ISceneGraphStore } from "../graph/interfaces/ISceneGraphStore.js";
import {
  DEFAULT_FROM_ROLE,
  DEFAULT_TO_ROLE,
  NAME_ATTRIBUTE,
  ROOT_ENTITY,
  SCENE_ID_ATTRIBUTE,
} from "../schema/base-schema.js";
import { sanitizeName } from "../schema/naming.js";
import { formatValue, quote } from "../schema/typeql.js";
import { createChildLogger, createLogger } from "../../utils/logger.js";

const logger = createLogger("data-inserter");

// =============================================================================
// Types
// =============================================================================

export interface InsertResult {
  success: boolean;
  entitiesInserted: number;
  relationsInserted: number;
  errors: string[];
}

export interface DeleteSceneResult {
  success: boolean;
  /** Entities carrying the scene id before deletion */
  entitiesDeleted: number;
  errors: string[];
}

// =============================================================================
// Query Rendering
// =============================================================================

/**
 * `$var isa physical_object, has name "<id>"`
 */
function entityPattern(variable: string, entityId: string): string {
  return `${variable} isa ${ROOT_ENTITY}, has ${NAME_ATTRIBUTE} ${quote(entityId)}`;
}

/**
 * Insert query for one entity. `name` carries the entity id; attributes
 * named `name` or `scene_id` and null values are left out.
 */
export function renderEntityInsert(entity: EntityData, sceneId?: string): string {
  const parts = [
    `$e isa ${sanitizeName(entity.type)}`,
    `has ${NAME_ATTRIBUTE} ${quote(entity.id)}`,
  ];
  if (sceneId) {
    parts.push(`has ${SCENE_ID_ATTRIBUTE} ${quote(sceneId)}`);
  }

  for (const [key, value] of Object.entries(entity.attributes)) {
    const attribute = sanitizeName(key);
    if (!attribute || attribute === NAME_ATTRIBUTE || attribute === SCENE_ID_ATTRIBUTE) continue;
    const literal = formatValue(value);
    if (literal === null) continue;
    parts.push(`has ${attribute} ${literal}`);
  }

  return `insert\n  ${parts.join(",\n  ")};`;
}

/**
 * Match-insert query binding both endpoints by name, across all scenes
 */
export function renderRelationInsert(relation: RelationData): string {
  const fromRole = sanitizeName(relation.roles.from ?? DEFAULT_FROM_ROLE);
  const toRole = sanitizeName(relation.roles.to ?? DEFAULT_TO_ROLE);

  return [
    "match",
    `  ${entityPattern("$from", relation.fromEntity)};`,
    `  ${entityPattern("$to", relation.toEntity)};`,
    "insert",
    `  (${fromRole}: $from, ${toRole}: $to) isa ${sanitizeName(relation.type)};`,
  ].join("\n");
}

/**
 * Read query used to check that an endpoint resolves to exactly one entity
 */
export function renderEntityLookup(entityId: string): string {
  return `match ${entityPattern("$e", entityId)}; fetch { "${NAME_ATTRIBUTE}": $e.${NAME_ATTRIBUTE} };`;
}

function sceneEntitiesPattern(sceneId: string): string {
  return `$e isa ${ROOT_ENTITY}, has ${SCENE_ID_ATTRIBUTE} ${quote(sceneId)}`;
}

// =============================================================================
// Inserter
// =============================================================================

export class DataInserter {
  constructor(private readonly store: ISceneGraphStore) {}

  /**
   * Inserts every entity (fitting, then pending) and then every relation.
   */
  async insertAnalysisResult(analysis: AnalysisResult, sceneId?: string): Promise<InsertResult> {
    const entities = await this.insertEntitiesBatch(allEntities(analysis), sceneId);
    const relations = await this.insertRelationsBatch(allRelations(analysis), sceneId);

    const errors = [...entities.errors, ...relations.errors];
    return {
      success: errors.length === 0,
      entitiesInserted: entities.entitiesInserted,
      relationsInserted: relations.relationsInserted,
      errors,
    };
  }

  async insertEntitiesBatch(entities: readonly EntityData[], sceneId?: string): Promise<InsertResult> {
    const log = createChildLogger(logger, { sceneId });
    const result: InsertResult = { success: true, entitiesInserted: 0, relationsInserted: 0, errors: [] };

    for (const entity of entities) {
      try {
        await this.store.executeWrite(renderEntityInsert(entity, sceneId));
        result.entitiesInserted++;
      } catch (error) {
        const message = `Failed to insert entity ${entity.id}: ${errorMessage(error)}`;
        log.warn({ entity: entity.id }, message);
        result.errors.push(message);
      }
    }

    result.success = result.errors.length === 0;
    return result;
  }

  /**
   * Each endpoint must resolve to exactly one entity by name before the
   * relation is written; a name shared across scenes is ambiguous.
   */
  async insertRelationsBatch(relations: readonly RelationData[], sceneId?: string): Promise<InsertResult> {
    const log = createChildLogger(logger, { sceneId });
    const result: InsertResult = { success: true, entitiesInserted: 0, relationsInserted: 0, errors: [] };

    for (const relation of relations) {
      try {
        await this.resolveEndpoint(relation.fromEntity);
        await this.resolveEndpoint(relation.toEntity);
        await this.store.executeWrite(renderRelationInsert(relation));
        result.relationsInserted++;
      } catch (error) {
        const message =
          `Failed to insert relation ${relation.type} (${relation.fromEntity} -> ${relation.toEntity}): ` +
          errorMessage(error);
        log.warn({ relation: relation.type }, message);
        result.errors.push(message);
      }
    }

    result.success = result.errors.length === 0;
    return result;
  }

  /**
   * Deletes the scene's relations, then its entities.
   */
  async deleteScene(sceneId: string): Promise<DeleteSceneResult> {
    const result: DeleteSceneResult = { success: true, entitiesDeleted: 0, errors: [] };
    const pattern = sceneEntitiesPattern(sceneId);

    try {
      const existing = await this.store.executeRead(
        `match ${pattern}; fetch { "${NAME_ATTRIBUTE}": $e.${NAME_ATTRIBUTE} };`
      );
      result.entitiesDeleted = existing.length;
    } catch (error) {
      result.errors.push(`Failed to count entities of scene ${sceneId}: ${errorMessage(error)}`);
    }

    try {
      await this.store.executeWrite(`match\n  ${pattern};\n  $r links ($e);\ndelete\n  $r;`);
    } catch (error) {
      result.errors.push(`Failed to delete relations of scene ${sceneId}: ${errorMessage(error)}`);
    }

    try {
      await this.store.executeWrite(`match\n  ${pattern};\ndelete\n  $e;`);
    } catch (error) {
      result.errors.push(`Failed to delete entities of scene ${sceneId}: ${errorMessage(error)}`);
      result.entitiesDeleted = 0;
    }

    result.success = result.errors.length === 0;
    logger.info({ sceneId, entities: result.entitiesDeleted }, "Scene deleted");
    return result;
  }

  private async resolveEndpoint(entityId: string): Promise<void> {
    const matches = await this.store.executeRead(renderEntityLookup(entityId));
    if (matches.length === 0) {
      throw new Error(`no entity named "${entityId}"`);
    }
    if (matches.length > 1) {
      throw new Error(`${matches.length} entities named "${entityId}"`);
    }
  }
}
