/**
 * Migration Types
 *
 * @module
 */

// =============================================================================
// Operations
// =============================================================================

export type OperationType = "define" | "redefine" | "undefine";

/**
 * One independently committed schema change
 */
export interface SchemaOperation {
  readonly operation: OperationType;
  /** Schema query, run in its own schema transaction */
  readonly typeql: string;
  readonly description: string;
  /** Write queries run after the schema query commits */
  readonly migrationQueries: readonly string[];
}

export function requiresDataMigration(operation: SchemaOperation): boolean {
  return operation.migrationQueries.length > 0;
}

export function createOperation(
  typeql: string,
  description: string,
  options: { operation?: OperationType; migrationQueries?: readonly string[] } = {}
): SchemaOperation {
  return Object.freeze({
    operation: options.operation ?? "define",
    typeql,
    description,
    migrationQueries: Object.freeze([...(options.migrationQueries ?? [])]),
  });
}

// =============================================================================
// Plan
// =============================================================================

/**
 * Ordered operations plus advisory warnings. Immutable once built.
 */
export class MigrationPlan {
  readonly operations: readonly SchemaOperation[];
  readonly warnings: readonly string[];

  constructor(operations: readonly SchemaOperation[] = [], warnings: readonly string[] = []) {
    this.operations = Object.freeze([...operations]);
    this.warnings = Object.freeze([...warnings]);
    Object.freeze(this);
  }

  get hasChanges(): boolean {
    return this.operations.length > 0;
  }

  /**
   * Numbered preview of the plan
   */
  summary(): string {
    if (!this.hasChanges) {
      return "No schema changes required.";
    }

    const lines = [`Migration plan with ${this.operations.length} operations:`];
    this.operations.forEach((op, index) => {
      lines.push(`  ${index + 1}. [${op.operation.toUpperCase()}] ${op.description}`);
      if (requiresDataMigration(op)) {
        lines.push("      (requires data migration)");
      }
    });

    if (this.warnings.length > 0) {
      lines.push("", "Warnings:");
      for (const warning of this.warnings) {
        lines.push(`  - ${warning}`);
      }
    }

    return lines.join("\n");
  }
}

// =============================================================================
// Result
// =============================================================================

export type MigrationStage = "schema" | "data_migration";

export interface MigrationResult {
  success: boolean;
  /** Operations whose schema query and follow-ups all completed */
  executedOperations: SchemaOperation[];
  failedOperation?: SchemaOperation;
  failedStage?: MigrationStage;
  error?: string;
}
