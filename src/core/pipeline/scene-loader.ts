/**
 * Scene Loader
 *
 * Video in, graph out: extract frames, analyze them against the current
 * schema, create or migrate the schema, then insert the scene's data.
 * Insertion never starts unless the schema step succeeded.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import { allEntities, allRelations, type AnalysisResult } from "../analysis/models.js";
import { AnalysisError, ErrorCode, MigrationError, errorMessage } from "../errors.js";
import type { ISceneGraphStore } from "../graph/interfaces/ISceneGraphStore.js";
import { DataInserter, renderEntityInsert, renderRelationInsert, type InsertResult } from "../ingestion/data-inserter.js";
import { MigrationExecutor } from "../migration/executor.js";
import { MigrationPlanner } from "../migration/planner.js";
import type { MigrationPlan, MigrationResult } from "../migration/types.js";
import { SchemaGenerator } from "../schema/schema-generator.js";
import type { FrameData, FrameSamplingOptions } from "../video/frame-extractor.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("scene-loader");

// =============================================================================
// Collaborators
// =============================================================================

export interface FrameSource {
  extractFrames(filePath: string, options: FrameSamplingOptions): Promise<FrameData[]>;
}

export interface SceneAnalyzer {
  /** Fails on missing credentials; called before any store interaction */
  prepare(): Promise<void>;
  analyzeFrames(frames: readonly FrameData[], currentSchema: string | null): Promise<AnalysisResult>;
}

/**
 * Asked before a schema change is applied. Resolving false aborts the load.
 */
export type ConfirmFn = (question: string, details: string) => Promise<boolean>;

export type LoadStage = "extracting" | "connecting" | "analyzing" | "schema" | "migrating" | "inserting";

export interface SceneLoaderDeps {
  store: ISceneGraphStore;
  analyzer: SceneAnalyzer;
  frames: FrameSource;
}

// =============================================================================
// Outcomes
// =============================================================================

export type SchemaAction =
  | { kind: "none" }
  | { kind: "initial"; typeql: string }
  | { kind: "migration"; plan: MigrationPlan; result: MigrationResult };

interface OutcomeBase {
  sceneId: string;
  frameCount: number;
  analysis: AnalysisResult;
}

export type LoadOutcome =
  | (OutcomeBase & { status: "loaded"; createdDatabase: boolean; schema: SchemaAction; insert: InsertResult })
  | (OutcomeBase & { status: "aborted"; plan?: MigrationPlan; initialSchema?: string })
  | (OutcomeBase & { status: "migration_failed"; plan: MigrationPlan; migration: MigrationResult });

export interface PreviewOutcome extends OutcomeBase {
  hasSchema: boolean;
  initialSchema?: string;
  plan?: MigrationPlan;
  entityInserts: string[];
  relationInserts: string[];
}

export interface LoadOptions {
  sampling: FrameSamplingOptions;
  sceneId?: string;
  /** Defaults to approving every change */
  confirm?: ConfirmFn;
  onStage?: (stage: LoadStage) => void;
}

export function generateSceneId(): string {
  return `scene_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

// =============================================================================
// Loader
// =============================================================================

export class SceneLoader {
  private readonly generator = new SchemaGenerator();
  private readonly planner = new MigrationPlanner();
  private readonly executor: MigrationExecutor;
  private readonly inserter: DataInserter;

  constructor(private readonly deps: SceneLoaderDeps) {
    this.executor = new MigrationExecutor(deps.store);
    this.inserter = new DataInserter(deps.store);
  }

  /**
   * Frames and analysis only; the store is never touched
   */
  async analyzeVideo(
    videoPath: string,
    options: Pick<LoadOptions, "sampling" | "onStage">
  ): Promise<{ frameCount: number; analysis: AnalysisResult }> {
    await this.deps.analyzer.prepare();
    const frames = await this.extract(videoPath, options);
    options.onStage?.("analyzing");
    const analysis = await this.analyze(frames, null);
    return { frameCount: frames.length, analysis };
  }

  /**
   * Everything `load` would do, rendered but not applied
   */
  async previewScene(videoPath: string, options: LoadOptions): Promise<PreviewOutcome> {
    const sceneId = options.sceneId ?? generateSceneId();
    await this.deps.analyzer.prepare();
    const frames = await this.extract(videoPath, options);

    options.onStage?.("connecting");
    const exists = await this.deps.store.databaseExists();
    const currentSchema = exists ? await this.deps.store.getSchema() : "";
    const hasSchema = currentSchema.length > 0;

    options.onStage?.("analyzing");
    const analysis = await this.analyze(frames, hasSchema ? currentSchema : null);

    return {
      sceneId,
      frameCount: frames.length,
      analysis,
      hasSchema,
      initialSchema: hasSchema ? undefined : this.generator.generateInitialSchema(analysis),
      plan: hasSchema ? this.planner.planMigration(analysis) : undefined,
      entityInserts: allEntities(analysis).map((entity) => renderEntityInsert(entity, sceneId)),
      relationInserts: allRelations(analysis).map((relation) => renderRelationInsert(relation)),
    };
  }

  async loadScene(videoPath: string, options: LoadOptions): Promise<LoadOutcome> {
    const sceneId = options.sceneId ?? generateSceneId();
    const confirm: ConfirmFn = options.confirm ?? (async () => true);
    const log = logger.child({ sceneId });

    await this.deps.analyzer.prepare();
    const frames = await this.extract(videoPath, options);

    options.onStage?.("connecting");
    const createdDatabase = await this.deps.store.ensureDatabase();
    const currentSchema = await this.deps.store.getSchema();

    options.onStage?.("analyzing");
    const analysis = await this.analyze(frames, currentSchema || null);
    const base: OutcomeBase = { sceneId, frameCount: frames.length, analysis };

    let schema: SchemaAction = { kind: "none" };

    if (!currentSchema) {
      options.onStage?.("schema");
      const typeql = this.generator.generateInitialSchema(analysis);
      if (!(await confirm("Apply initial schema?", typeql))) {
        return { ...base, status: "aborted", initialSchema: typeql };
      }
      try {
        await this.deps.store.executeSchema(typeql);
      } catch (error) {
        throw new MigrationError(
          `Error applying initial schema: ${errorMessage(error)}`,
          ErrorCode.MIGRATION_INITIAL_SCHEMA_FAILED,
          { sceneId }
        );
      }
      log.info("Initial schema applied");
      schema = { kind: "initial", typeql };
    } else if (analysis.schemaChanges.length > 0) {
      const plan = this.planner.planMigration(analysis);
      if (plan.hasChanges) {
        if (!(await confirm("Proceed with migration?", plan.summary()))) {
          return { ...base, status: "aborted", plan };
        }
        options.onStage?.("migrating");
        const result = await this.executor.executeMigration(plan);
        if (!result.success) {
          return { ...base, status: "migration_failed", plan, migration: result };
        }
        schema = { kind: "migration", plan, result };
      }
    }

    options.onStage?.("inserting");
    const insert = await this.inserter.insertAnalysisResult(analysis, sceneId);
    log.info(
      { entities: insert.entitiesInserted, relations: insert.relationsInserted, errors: insert.errors.length },
      "Scene loaded"
    );

    return { ...base, status: "loaded", createdDatabase, schema, insert };
  }

  private async extract(
    videoPath: string,
    options: Pick<LoadOptions, "sampling" | "onStage">
  ): Promise<FrameData[]> {
    options.onStage?.("extracting");
    const frames = await this.deps.frames.extractFrames(videoPath, options.sampling);
    if (frames.length === 0) {
      throw new AnalysisError(`No frames extracted from ${videoPath}`, ErrorCode.ANALYSIS_NO_FRAMES);
    }
    return frames;
  }

  /**
   * A reply that could not be parsed stops the pipeline here
   */
  private async analyze(frames: readonly FrameData[], currentSchema: string | null): Promise<AnalysisResult> {
    const analysis = await this.deps.analyzer.analyzeFrames(frames, currentSchema);
    if (analysis.parseError) {
      throw new AnalysisError(`Analysis error: ${analysis.parseError}`, ErrorCode.ANALYSIS_PARSE_FAILED, {
        rawText: typeof analysis.rawResponse?.text === "string" ? analysis.rawResponse.text : undefined,
      });
    }
    return analysis;
  }
}
