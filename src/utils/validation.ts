/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and analyzer output at runtime.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Configuration Schema
// =============================================================================

export const DEFAULT_MODEL_ID = "claude-sonnet-4-20250514";

export const TypeDBConfigSchema = z.object({
  /** HTTP endpoint of the TypeDB server; a bare host:port gets http:// */
  address: z.string().min(1).default("http://localhost:8000"),
  username: z.string().min(1).default("admin"),
  password: z.string().default("password"),
  database: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "database names may only contain letters, digits, _ and -")
    .default("scene_graph"),
});

export const ModelConfigSchema = z.object({
  id: z.string().min(1).default(DEFAULT_MODEL_ID),
  /** Output budget for scene analysis */
  maxTokens: z.number().int().positive().default(4096),
  /** Output budget for query translation */
  queryMaxTokens: z.number().int().positive().default(1024),
});

export const FrameSamplingConfigSchema = z.object({
  fps: z.number().positive().default(0.5),
  maxFrames: z.number().int().positive().default(5),
});

export const SceneGraphConfigSchema = z.object({
  typedb: TypeDBConfigSchema.default({}),
  model: ModelConfigSchema.default({}),
  frames: FrameSamplingConfigSchema.default({}),
});

export type TypeDBConfig = z.infer<typeof TypeDBConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type FrameSamplingConfig = z.infer<typeof FrameSamplingConfigSchema>;
export type SceneGraphConfig = z.infer<typeof SceneGraphConfigSchema>;

// =============================================================================
// Analyzer Output Schemas (wire format, snake_case)
// =============================================================================

const labelList = z.array(z.string()).nullish();
const optionalName = z.string().nullish();

export const EntityPayloadSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  attributes: z.record(z.unknown()).nullish(),
});

export const RelationPayloadSchema = z.object({
  type: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
  roles: z
    .object({
      from: z.string().nullish(),
      to: z.string().nullish(),
    })
    .nullish(),
});

export const AttributeTypePayloadSchema = z.object({
  name: optionalName,
  value_type: z.string().nullish(),
});

export const EntityTypePayloadSchema = z.object({
  name: optionalName,
  parent: z.string().nullish(),
  owns: labelList,
  plays: labelList,
});

export const RolePayloadSchema = z.union([
  z.string(),
  z.object({
    name: z.string().min(1),
    players: labelList,
  }),
]);

export const RelationTypePayloadSchema = z.object({
  name: optionalName,
  parent: z.string().nullish(),
  roles: z.array(RolePayloadSchema).nullish(),
});

export const ModifiedTypePayloadSchema = z.object({
  name: optionalName,
  add_owns: labelList,
  add_plays: labelList,
});

export const SchemaChangesPayloadSchema = z.object({
  new_entity_types: z.array(EntityTypePayloadSchema).nullish(),
  new_attribute_types: z.array(AttributeTypePayloadSchema).nullish(),
  new_relation_types: z.array(RelationTypePayloadSchema).nullish(),
  modified_types: z.array(ModifiedTypePayloadSchema).nullish(),
});

/**
 * Pending data comes either as { entities, relations } or, from older
 * prompts, as a flat list of entities.
 */
export const PendingDataPayloadSchema = z.union([
  z.array(EntityPayloadSchema),
  z.object({
    entities: z.array(EntityPayloadSchema).nullish(),
    relations: z.array(RelationPayloadSchema).nullish(),
  }),
]);

export const AnalysisPayloadSchema = z.object({
  new_data: z
    .object({
      entities: z.array(EntityPayloadSchema).nullish(),
      relations: z.array(RelationPayloadSchema).nullish(),
    })
    .nullish(),
  schema_changes: SchemaChangesPayloadSchema.nullish(),
  data_requiring_schema_change: PendingDataPayloadSchema.nullish(),
});

export type EntityPayload = z.infer<typeof EntityPayloadSchema>;
export type RelationPayload = z.infer<typeof RelationPayloadSchema>;
export type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;

// =============================================================================
// Helpers
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
