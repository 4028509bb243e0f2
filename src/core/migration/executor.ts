/**
 * Migration Executor
 *
 * Applies a plan one operation at a time and stops at the first failure.
 * Operations committed before the failure stay committed.
 *
 * @module
 */

import { errorMessage } from "../errors.js";
import type { ISceneGraphStore } from "../graph/interfaces/ISceneGraphStore.js";
import { createLogger } from "../../utils/logger.js";
import { err, fromPromise, ok, type Result } from "../../types/result.js";
import type { MigrationPlan, MigrationResult, MigrationStage, SchemaOperation } from "./types.js";

const logger = createLogger("migration-executor");

export class MigrationExecutor {
  constructor(private readonly store: ISceneGraphStore) {}

  async executeMigration(plan: MigrationPlan): Promise<MigrationResult> {
    const executedOperations: SchemaOperation[] = [];

    for (const [index, operation] of plan.operations.entries()) {
      const failure = await this.runOperation(operation);

      if (failure) {
        logger.error(
          { step: index + 1, operation: operation.description, stage: failure.stage, err: failure.error },
          "Schema operation failed; remaining operations not attempted"
        );
        return {
          success: false,
          executedOperations,
          failedOperation: operation,
          failedStage: failure.stage,
          error: failure.error,
        };
      }

      executedOperations.push(operation);
      logger.info({ step: index + 1, total: plan.operations.length }, operation.description);
    }

    return { success: true, executedOperations };
  }

  /**
   * Runs one operation, follow-up writes included
   */
  async executeSingleOperation(operation: SchemaOperation): Promise<Result<void, Error>> {
    const failure = await this.runOperation(operation);
    return failure ? err(new Error(failure.error)) : ok(undefined);
  }

  /**
   * Returns the failing stage and message, or null when everything committed
   */
  private async runOperation(
    operation: SchemaOperation
  ): Promise<{ stage: MigrationStage; error: string } | null> {
    const schema = await fromPromise(this.store.executeSchema(operation.typeql));
    if (!schema.ok) {
      return { stage: "schema", error: errorMessage(schema.error) };
    }

    for (const query of operation.migrationQueries) {
      const write = await fromPromise(this.store.executeWrite(query));
      if (!write.ok) {
        return { stage: "data_migration", error: errorMessage(write.error) };
      }
    }

    return null;
  }
}
