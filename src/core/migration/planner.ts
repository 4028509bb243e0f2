/**
 * Migration Planner
 *
 * Turns proposed schema changes into an ordered plan against an existing
 * schema: attribute types, then entity types, then relation types, then
 * owns/plays additions. Input order is kept within each group.
 *
 * @module
 */

import {
  partitionSchemaChanges,
  type AnalysisResult,
  type AttributeTypeDefinition,
  type EntityTypeDefinition,
  type RelationTypeDefinition,
  type TypeModificationDefinition,
} from "../analysis/models.js";
import {
  GENERIC_RELATION_PARENT,
  INHERITED_ATTRIBUTES,
  ROOT_ENTITY,
  isGenericEntityParent,
} from "../schema/base-schema.js";
import { DefinitionContext } from "../schema/definition-context.js";
import { normalizeValueType, sanitizeName, sanitizeScopedLabel } from "../schema/naming.js";
import {
  renderAttributeType,
  renderDefine,
  renderEntityType,
  renderOwns,
  renderPlays,
  renderRelationType,
} from "../schema/typeql.js";
import { createLogger } from "../../utils/logger.js";
import { MigrationPlan, createOperation, type SchemaOperation } from "./types.js";

const logger = createLogger("migration-planner");

/**
 * Collects operations and warnings while a plan is built
 */
interface PlanBuilder {
  operations: SchemaOperation[];
  warnings: string[];
}

/**
 * Sanitizes labels and drops the ones left empty, with one warning per drop
 */
function cleanLabels(
  labels: readonly string[],
  sanitize: (label: string) => string,
  owner: string,
  kind: string,
  builder: PlanBuilder
): string[] {
  const cleaned: string[] = [];
  for (const raw of labels) {
    const label = sanitize(raw);
    if (label) {
      cleaned.push(label);
    } else {
      builder.warnings.push(`Skipped empty ${kind} on ${owner}`);
    }
  }
  return cleaned;
}

export class MigrationPlanner {
  /**
   * Builds the plan. The context starts with the base schema names, so a
   * proposal for a name the base already defines is skipped with a warning.
   */
  planMigration(
    analysis: AnalysisResult,
    context: DefinitionContext = DefinitionContext.withBaseSchema()
  ): MigrationPlan {
    if (analysis.schemaChanges.length === 0) {
      return new MigrationPlan();
    }

    const { attributes, entities, relations, modifications } = partitionSchemaChanges(
      analysis.schemaChanges
    );
    const builder: PlanBuilder = { operations: [], warnings: [] };

    for (const definition of attributes) this.planAttribute(definition, context, builder);
    for (const definition of entities) this.planEntity(definition, context, builder);
    for (const definition of relations) this.planRelation(definition, context, builder);
    for (const definition of modifications) this.planModification(definition, context, builder);

    logger.debug(
      { operations: builder.operations.length, warnings: builder.warnings.length },
      "Migration plan built"
    );
    return new MigrationPlan(builder.operations, builder.warnings);
  }

  // ===========================================================================
  // Per-category rendering
  // ===========================================================================

  private planAttribute(
    definition: AttributeTypeDefinition,
    context: DefinitionContext,
    builder: PlanBuilder
  ): void {
    const name = sanitizeName(definition.name);
    if (!name) {
      builder.warnings.push("Skipped attribute type without a name");
      return;
    }
    if (!context.define("attribute", name)) {
      builder.warnings.push(`Skipped duplicate attribute type: ${name}`);
      return;
    }

    const valueType = normalizeValueType(definition.valueType);
    builder.operations.push(
      createOperation(
        renderDefine(renderAttributeType(name, valueType)),
        `New attribute type: ${name} (${valueType})`
      )
    );
  }

  private planEntity(
    definition: EntityTypeDefinition,
    context: DefinitionContext,
    builder: PlanBuilder
  ): void {
    const name = sanitizeName(definition.name);
    if (!name) {
      builder.warnings.push("Skipped entity type without a name");
      return;
    }
    if (!context.define("entity", name)) {
      builder.warnings.push(`Skipped duplicate entity type: ${name}`);
      return;
    }

    const declaredParent = sanitizeName(definition.parent ?? "") || ROOT_ENTITY;
    const parent = isGenericEntityParent(declaredParent) ? undefined : declaredParent;
    const owns = cleanLabels(definition.owns, sanitizeName, name, "owns", builder).filter(
      (attr) => !(parent === ROOT_ENTITY && INHERITED_ATTRIBUTES.has(attr))
    );
    const plays = cleanLabels(definition.plays, sanitizeScopedLabel, name, "plays", builder);

    builder.operations.push(
      createOperation(
        renderDefine(renderEntityType({ name, parent, owns, plays })),
        `New entity type: ${name}` + (parent ? ` (sub ${parent})` : "")
      )
    );
  }

  private planRelation(
    definition: RelationTypeDefinition,
    context: DefinitionContext,
    builder: PlanBuilder
  ): void {
    const name = sanitizeName(definition.name);
    if (!name) {
      builder.warnings.push("Skipped relation type without a name");
      return;
    }
    if (!context.define("relation", name)) {
      builder.warnings.push(`Skipped duplicate relation type: ${name}`);
      return;
    }

    const parent = sanitizeName(definition.parent ?? "");
    const roles = definition.roles.flatMap((role) => {
      const roleName = sanitizeName(role.name);
      if (!roleName) {
        builder.warnings.push(`Skipped empty role on ${name}`);
        return [];
      }
      return [{ name: roleName, players: cleanLabels(role.players, sanitizeName, name, "player", builder) }];
    });
    let typeql = renderDefine(
      renderRelationType({
        name,
        parent: parent && parent.toLowerCase() !== GENERIC_RELATION_PARENT ? parent : undefined,
        roles: roles.map((role) => role.name),
      })
    );

    // Players go in the same operation, after the relation exists
    for (const role of roles) {
      for (const player of role.players) {
        typeql += `\n  ${renderPlays(player, `${name}:${role.name}`)};`;
      }
    }

    builder.operations.push(createOperation(typeql, `New relation type: ${name}`));
  }

  /**
   * One operation per owns/plays addition
   */
  private planModification(
    definition: TypeModificationDefinition,
    context: DefinitionContext,
    builder: PlanBuilder
  ): void {
    const name = sanitizeName(definition.name);
    if (!name) {
      builder.warnings.push("Skipped type modification without a name");
      return;
    }

    for (const raw of definition.addOwns) {
      const attr = sanitizeName(raw);
      if (!attr) {
        builder.warnings.push(`Skipped empty owns on ${name}`);
        continue;
      }
      if (INHERITED_ATTRIBUTES.has(attr)) continue;
      if (!context.claimCapability(name, "owns", attr)) {
        builder.warnings.push(`Skipped duplicate modification: ${name} owns ${attr}`);
        continue;
      }
      builder.operations.push(
        createOperation(renderDefine(renderOwns(name, attr)), `${name} owns ${attr} (additive)`)
      );
    }

    for (const raw of definition.addPlays) {
      const role = sanitizeScopedLabel(raw);
      if (!role) {
        builder.warnings.push(`Skipped empty plays on ${name}`);
        continue;
      }
      if (!context.claimCapability(name, "plays", role)) {
        builder.warnings.push(`Skipped duplicate modification: ${name} plays ${role}`);
        continue;
      }
      builder.operations.push(
        createOperation(renderDefine(renderPlays(name, role)), `${name} plays ${role} (additive)`)
      );
    }
  }
}
