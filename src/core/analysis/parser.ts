/**
 * Analyzer Response Parser
 *
 * Turns the model's reply into an AnalysisResult. Malformed replies never
 * throw past this module: they become an empty result carrying the error
 * and the original text.
 *
 * @module
 */

import { AnalysisError, ErrorCode, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import {
  AnalysisPayloadSchema,
  formatZodError,
  safeValidate,
  type AnalysisPayload,
  type EntityPayload,
  type RelationPayload,
} from "../../utils/validation.js";
import {
  createEmptyAnalysisResult,
  partitionSchemaChanges,
  type AnalysisResult,
  type EntityData,
  type RelationData,
  type SchemaChange,
} from "./models.js";

const logger = createLogger("analysis-parser");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// JSON Extraction
// =============================================================================

/**
 * Parses the reply directly, or else the span from its first `{` to its
 * last `}`.
 *
 * @throws AnalysisError when neither parses
 */
export function extractJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (directError) {
    const start = text.indexOf("{");
    const end = text.lastIndexOf("}");
    if (start < 0 || end <= start) {
      throw new AnalysisError(`No valid JSON found: ${errorMessage(directError)}`, ErrorCode.ANALYSIS_PARSE_FAILED, {
        rawText: text,
      });
    }

    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch (spanError) {
      throw new AnalysisError(`Invalid JSON in response: ${errorMessage(spanError)}`, ErrorCode.ANALYSIS_PARSE_FAILED, {
        rawText: text,
      });
    }
  }
}

// =============================================================================
// Payload Conversion
// =============================================================================

function toEntity(payload: EntityPayload): EntityData {
  return {
    id: payload.id,
    type: payload.type,
    attributes: payload.attributes ?? {},
  };
}

function toRelation(payload: RelationPayload): RelationData {
  const roles: { from?: string; to?: string } = {};
  if (payload.roles?.from) roles.from = payload.roles.from;
  if (payload.roles?.to) roles.to = payload.roles.to;

  return {
    type: payload.type,
    fromEntity: payload.from,
    toEntity: payload.to,
    roles,
  };
}

function toSchemaChanges(payload: AnalysisPayload["schema_changes"]): SchemaChange[] {
  if (!payload) return [];
  const changes: SchemaChange[] = [];

  for (const entity of payload.new_entity_types ?? []) {
    changes.push({
      changeType: "new_entity_type",
      definition: {
        name: entity.name ?? "",
        parent: entity.parent ?? undefined,
        owns: entity.owns ?? [],
        plays: entity.plays ?? [],
      },
    });
  }

  for (const attribute of payload.new_attribute_types ?? []) {
    changes.push({
      changeType: "new_attribute_type",
      definition: { name: attribute.name ?? "", valueType: attribute.value_type ?? "string" },
    });
  }

  for (const relation of payload.new_relation_types ?? []) {
    changes.push({
      changeType: "new_relation_type",
      definition: {
        name: relation.name ?? "",
        parent: relation.parent ?? undefined,
        roles: (relation.roles ?? []).map((role) =>
          typeof role === "string" ? { name: role, players: [] } : { name: role.name, players: role.players ?? [] }
        ),
      },
    });
  }

  for (const modification of payload.modified_types ?? []) {
    changes.push({
      changeType: "modified_type",
      definition: {
        name: modification.name ?? "",
        addOwns: modification.add_owns ?? [],
        addPlays: modification.add_plays ?? [],
      },
    });
  }

  return changes;
}

/**
 * Builds an AnalysisResult from an already-validated payload
 */
export function buildAnalysisResult(
  payload: AnalysisPayload,
  rawResponse?: Record<string, unknown>
): AnalysisResult {
  const pending = payload.data_requiring_schema_change;
  // A bare list is the older entities-only form
  const pendingEntities = Array.isArray(pending) ? pending : (pending?.entities ?? []);
  const pendingRelations = Array.isArray(pending) ? [] : (pending?.relations ?? []);

  return {
    newEntities: (payload.new_data?.entities ?? []).map(toEntity),
    newRelations: (payload.new_data?.relations ?? []).map(toRelation),
    schemaChanges: toSchemaChanges(payload.schema_changes),
    pendingEntities: pendingEntities.map(toEntity),
    pendingRelations: pendingRelations.map(toRelation),
    rawResponse,
  };
}

// =============================================================================
// Serialization
// =============================================================================

function fromEntity(entity: EntityData): EntityPayload {
  return { id: entity.id, type: entity.type, attributes: { ...entity.attributes } };
}

function fromRelation(relation: RelationData): RelationPayload {
  return {
    type: relation.type,
    from: relation.fromEntity,
    to: relation.toEntity,
    roles: { from: relation.roles.from, to: relation.roles.to },
  };
}

/**
 * The reply shape `parseAnalysisResponse` reads, so a saved analysis can be
 * parsed again
 */
export function toAnalysisPayload(analysis: AnalysisResult): AnalysisPayload {
  const { attributes, entities, relations, modifications } = partitionSchemaChanges(analysis.schemaChanges);

  return {
    new_data: {
      entities: analysis.newEntities.map(fromEntity),
      relations: analysis.newRelations.map(fromRelation),
    },
    schema_changes: {
      new_entity_types: entities.map((entity) => ({
        name: entity.name,
        parent: entity.parent,
        owns: [...entity.owns],
        plays: [...entity.plays],
      })),
      new_attribute_types: attributes.map((attribute) => ({
        name: attribute.name,
        value_type: attribute.valueType,
      })),
      new_relation_types: relations.map((relation) => ({
        name: relation.name,
        parent: relation.parent,
        roles: relation.roles.map((role) => ({ name: role.name, players: [...role.players] })),
      })),
      modified_types: modifications.map((modification) => ({
        name: modification.name,
        add_owns: [...modification.addOwns],
        add_plays: [...modification.addPlays],
      })),
    },
    data_requiring_schema_change: {
      entities: analysis.pendingEntities.map(fromEntity),
      relations: analysis.pendingRelations.map(fromRelation),
    },
  };
}

// =============================================================================
// Entry Point
// =============================================================================

export function parseAnalysisResponse(text: string): AnalysisResult {
  try {
    const json = extractJson(text);
    const validated = safeValidate(AnalysisPayloadSchema, json);
    if (!validated.success) {
      throw new AnalysisError(
        `Unexpected analysis structure: ${formatZodError(validated.error).join("; ")}`,
        ErrorCode.ANALYSIS_PARSE_FAILED,
        { rawText: text }
      );
    }
    return buildAnalysisResult(validated.data, isRecord(json) ? json : undefined);
  } catch (error) {
    if (!(error instanceof AnalysisError)) throw error;

    logger.warn({ err: error.message }, "Could not parse analysis response");
    return createEmptyAnalysisResult({
      rawResponse: { error: error.message, text },
      parseError: error.message,
    });
  }
}
