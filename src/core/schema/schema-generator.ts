/**
 * Schema Generator
 *
 * Builds the first complete schema for an empty database: the base types
 * followed by every scene-specific type the first analysis implies.
 *
 * @module
 */

import {
  allEntities,
  partitionSchemaChanges,
  type AnalysisResult,
  type AttributeTypeDefinition,
  type EntityTypeDefinition,
  type RelationTypeDefinition,
  type TypeModificationDefinition,
} from "../analysis/models.js";
import { createLogger } from "../../utils/logger.js";
import {
  GENERIC_RELATION_PARENT,
  INHERITED_ATTRIBUTES,
  ROOT_ENTITY,
  baseSchemaDeclarations,
  isGenericEntityParent,
} from "./base-schema.js";
import { DefinitionContext, type DefinedNames } from "./definition-context.js";
import { sanitizeName, sanitizeScopedLabel } from "./naming.js";
import {
  renderAttributeType,
  renderDefineBlock,
  renderEntityType,
  renderOwns,
  renderPlays,
  renderRelationType,
} from "./typeql.js";

const logger = createLogger("schema-generator");

// =============================================================================
// Schema Generator
// =============================================================================

/**
 * Renders analyzer schema proposals into define declarations.
 *
 * Names already present in the context are skipped without a trace; an
 * entity's `owns` entry naming an undefined attribute is dropped.
 *
 * @example
 * ```typescript
 * const generator = new SchemaGenerator();
 * await store.executeSchema(generator.generateInitialSchema(analysis));
 * ```
 */
export class SchemaGenerator {
  /**
   * Base schema plus scene-specific declarations, as one define query.
   */
  generateInitialSchema(
    analysis: AnalysisResult,
    context: DefinitionContext = DefinitionContext.withBaseSchema()
  ): string {
    const declarations = this.renderDeclarations(analysis, context);
    logger.debug({ declarations: declarations.length }, "Generated initial schema");
    return renderDefineBlock([...baseSchemaDeclarations(), ...declarations]);
  }

  /**
   * Only the change-derived declarations, or null when there is nothing to add.
   */
  generateSchemaAdditions(
    analysis: AnalysisResult,
    context: DefinitionContext = DefinitionContext.withBaseSchema()
  ): string | null {
    if (analysis.schemaChanges.length === 0) return null;

    const declarations = this.renderDeclarations(analysis, context);
    return declarations.length > 0 ? renderDefineBlock(declarations) : null;
  }

  describe(context: DefinitionContext): DefinedNames {
    return context.describe();
  }

  // ===========================================================================
  // Declarations
  // ===========================================================================

  private renderDeclarations(analysis: AnalysisResult, context: DefinitionContext): string[] {
    const { attributes, entities, relations, modifications } = partitionSchemaChanges(
      analysis.schemaChanges
    );

    const declarations: string[] = [];
    for (const attribute of attributes) declarations.push(...this.attributeType(attribute, context));
    for (const entity of entities) declarations.push(...this.entityType(entity, context));
    for (const relation of relations) declarations.push(...this.relationType(relation, context));
    for (const modification of modifications) {
      declarations.push(...this.typeModification(modification, context));
    }

    if (declarations.length === 0) {
      declarations.push(...this.inferEntityTypes(analysis, context));
    }

    return declarations;
  }

  private attributeType(definition: AttributeTypeDefinition, context: DefinitionContext): string[] {
    const name = sanitizeName(definition.name);
    if (!name || !context.define("attribute", name)) return [];
    return [renderAttributeType(name, definition.valueType)];
  }

  private entityType(definition: EntityTypeDefinition, context: DefinitionContext): string[] {
    const name = sanitizeName(definition.name);
    if (!name || context.has("entity", name)) return [];

    const parent = resolveEntityParent(definition.parent);
    const owns = definition.owns
      .map((attr) => sanitizeName(attr))
      .filter((attr) => context.has("attribute", attr))
      .filter((attr) => !(parent === ROOT_ENTITY && INHERITED_ATTRIBUTES.has(attr)));

    const plays = definition.plays.map((role) => sanitizeScopedLabel(role)).filter(Boolean);

    context.define("entity", name);
    return [renderEntityType({ name, parent, owns, plays })];
  }

  private relationType(definition: RelationTypeDefinition, context: DefinitionContext): string[] {
    const name = sanitizeName(definition.name);
    if (!name || !context.define("relation", name)) return [];

    const parent = sanitizeName(definition.parent ?? "");
    const roles = definition.roles
      .map((role) => ({
        name: sanitizeName(role.name),
        players: role.players.map((player) => sanitizeName(player)).filter(Boolean),
      }))
      .filter((role) => role.name !== "");
    const players = roles.flatMap((role) =>
      role.players.map((player) => renderPlays(player, `${name}:${role.name}`))
    );

    return [
      renderRelationType({
        name,
        parent: parent && parent.toLowerCase() !== GENERIC_RELATION_PARENT ? parent : undefined,
        roles: roles.map((role) => role.name),
      }),
      ...players,
    ];
  }

  private typeModification(
    definition: TypeModificationDefinition,
    context: DefinitionContext
  ): string[] {
    const name = sanitizeName(definition.name);
    if (!name) return [];

    const declarations: string[] = [];
    for (const raw of definition.addOwns) {
      const attr = sanitizeName(raw);
      if (!context.has("attribute", attr) || INHERITED_ATTRIBUTES.has(attr)) continue;
      if (context.claimCapability(name, "owns", attr)) declarations.push(renderOwns(name, attr));
    }
    for (const raw of definition.addPlays) {
      const role = sanitizeScopedLabel(raw);
      if (!role) continue;
      if (context.claimCapability(name, "plays", role)) declarations.push(renderPlays(name, role));
    }
    return declarations;
  }

  /**
   * One `sub physical_object` declaration per distinct unseen entity type
   */
  private inferEntityTypes(analysis: AnalysisResult, context: DefinitionContext): string[] {
    const declarations: string[] = [];
    for (const entity of allEntities(analysis)) {
      const name = sanitizeName(entity.type);
      if (!name || !context.define("entity", name)) continue;
      declarations.push(renderEntityType({ name, parent: ROOT_ENTITY }));
    }
    return declarations;
  }
}

/**
 * Missing and generic parents become the root entity
 */
function resolveEntityParent(parent: string | undefined): string {
  const label = sanitizeName(parent ?? "");
  if (!label || isGenericEntityParent(label)) return ROOT_ENTITY;
  return label;
}
