/**
 * SceneLoader Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AnalysisResult, SchemaChange } from "../../analysis/models.js";
import { AnalysisError, ConfigurationError, ErrorCode, MigrationError } from "../../errors.js";
import { FakeSceneGraphStore, analysis, entity, relation } from "../../__tests__/fakes.js";
import type { FrameData, FrameSamplingOptions } from "../../video/frame-extractor.js";
import { SceneLoader, generateSceneId, type FrameSource, type LoadStage, type SceneAnalyzer } from "../scene-loader.js";

const SAMPLING: FrameSamplingOptions = { fps: 0.5, maxFrames: 5 };

class FakeFrames implements FrameSource {
  count = 2;

  async extractFrames(): Promise<FrameData[]> {
    return Array.from({ length: this.count }, (_, i) => ({
      frameNumber: i,
      timestampSec: i,
      imageBase64: "frame",
      width: 1,
      height: 1,
    }));
  }
}

class FakeAnalyzer implements SceneAnalyzer {
  readonly schemas: (string | null)[] = [];
  prepareError: Error | null = null;

  constructor(public result: AnalysisResult) {}

  async prepare(): Promise<void> {
    if (this.prepareError) throw this.prepareError;
  }

  async analyzeFrames(_frames: readonly FrameData[], currentSchema: string | null): Promise<AnalysisResult> {
    this.schemas.push(currentSchema);
    return this.result;
  }
}

const CHAIR_TYPE: SchemaChange = {
  changeType: "new_entity_type",
  definition: { name: "chair", parent: "physical_object", owns: [], plays: [] },
};

describe("SceneLoader", () => {
  let store: FakeSceneGraphStore;
  let frames: FakeFrames;
  let analyzer: FakeAnalyzer;
  let loader: SceneLoader;

  beforeEach(() => {
    store = new FakeSceneGraphStore();
    frames = new FakeFrames();
    analyzer = new FakeAnalyzer(
      analysis({
        schemaChanges: [CHAIR_TYPE],
        pendingEntities: [entity("chair_1", "chair"), entity("desk_1", "desk")],
        pendingRelations: [relation("next_to", "chair_1", "desk_1")],
      })
    );
    loader = new SceneLoader({ store, analyzer, frames });
  });

  it("generates scene ids of eight hex digits", () => {
    expect(generateSceneId()).toMatch(/^scene_[0-9a-f]{8}$/);
  });

  it("applies the initial schema to an empty database, then inserts", async () => {
    store.exists = false;
    const stages: LoadStage[] = [];

    const outcome = await loader.loadScene("clip.mp4", {
      sampling: SAMPLING,
      sceneId: "scene_1",
      onStage: (stage) => stages.push(stage),
    });

    expect(outcome.status).toBe("loaded");
    if (outcome.status !== "loaded") return;
    expect(outcome.createdDatabase).toBe(true);
    expect(outcome.schema.kind).toBe("initial");
    expect(outcome.insert).toEqual({ success: true, entitiesInserted: 2, relationsInserted: 1, errors: [] });
    expect(stages).toEqual(["extracting", "connecting", "analyzing", "schema", "inserting"]);
    expect(analyzer.schemas).toEqual([null]);
    expect(store.schemaQueries).toHaveLength(1);
    expect(store.schemaQueries[0]).toMatch(/^define\n  attribute name value string;/);
    expect(store.schemaQueries[0]).toContain("\n  entity chair, sub physical_object;");
  });

  it("plans and executes a migration against an existing schema", async () => {
    store.schema = "define entity physical_object;";
    const questions: string[] = [];

    const outcome = await loader.loadScene("clip.mp4", {
      sampling: SAMPLING,
      sceneId: "scene_2",
      confirm: async (question) => {
        questions.push(question);
        return true;
      },
    });

    expect(outcome.status).toBe("loaded");
    expect(questions).toEqual(["Proceed with migration?"]);
    expect(analyzer.schemas).toEqual(["define entity physical_object;"]);
    expect(store.schemaQueries).toEqual(["define entity chair, sub physical_object;"]);
    expect(store.writeQueries).toHaveLength(3);
  });

  it("stops before inserting when the migration fails", async () => {
    store.schema = "define entity physical_object;";
    store.failSchema = () => new Error("conflicting type");

    const outcome = await loader.loadScene("clip.mp4", { sampling: SAMPLING });

    expect(outcome.status).toBe("migration_failed");
    if (outcome.status !== "migration_failed") return;
    expect(outcome.migration.error).toBe("conflicting type");
    expect(outcome.migration.failedOperation?.description).toBe("New entity type: chair (sub physical_object)");
    expect(store.writeQueries).toEqual([]);
  });

  it("aborts cleanly when the change is declined", async () => {
    store.exists = false;

    const outcome = await loader.loadScene("clip.mp4", { sampling: SAMPLING, confirm: async () => false });

    expect(outcome.status).toBe("aborted");
    expect(store.schemaQueries).toEqual([]);
    expect(store.writeQueries).toEqual([]);
  });

  it("raises MigrationError when the initial schema is rejected", async () => {
    store.failSchema = () => new Error("syntax error");

    const failure = loader.loadScene("clip.mp4", { sampling: SAMPLING });

    await expect(failure).rejects.toBeInstanceOf(MigrationError);
    await expect(failure).rejects.toMatchObject({ code: ErrorCode.MIGRATION_INITIAL_SCHEMA_FAILED });
  });

  it("checks credentials before touching the store", async () => {
    analyzer.prepareError = new ConfigurationError("no key", ErrorCode.CONFIG_MISSING_CREDENTIALS);

    await expect(loader.loadScene("clip.mp4", { sampling: SAMPLING })).rejects.toBeInstanceOf(ConfigurationError);
    expect(store.calls).toEqual([]);
  });

  it("stops on an unparseable analysis", async () => {
    analyzer.result = analysis({ parseError: "No valid JSON found", rawResponse: { text: "hmm" } });

    await expect(loader.loadScene("clip.mp4", { sampling: SAMPLING })).rejects.toBeInstanceOf(AnalysisError);
    expect(store.schemaQueries).toEqual([]);
  });

  it("refuses a video without frames", async () => {
    frames.count = 0;

    await expect(loader.loadScene("clip.mp4", { sampling: SAMPLING })).rejects.toMatchObject({
      code: ErrorCode.ANALYSIS_NO_FRAMES,
    });
  });

  it("skips the migration when nothing new is proposed", async () => {
    store.schema = "define entity physical_object;";
    analyzer.result = analysis({ newEntities: [entity("cup_1", "cup")] });

    const outcome = await loader.loadScene("clip.mp4", { sampling: SAMPLING, confirm: async () => false });

    expect(outcome.status).toBe("loaded");
    if (outcome.status === "loaded") expect(outcome.schema).toEqual({ kind: "none" });
    expect(store.schemaQueries).toEqual([]);
  });

  it("analyzes without the store", async () => {
    const { frameCount } = await loader.analyzeVideo("clip.mp4", { sampling: SAMPLING });

    expect(frameCount).toBe(2);
    expect(store.calls).toEqual([]);
  });

  it("previews a migration without writing", async () => {
    store.schema = "define entity physical_object;";

    const preview = await loader.previewScene("clip.mp4", { sampling: SAMPLING, sceneId: "scene_p" });

    expect(preview.hasSchema).toBe(true);
    expect(preview.initialSchema).toBeUndefined();
    expect(preview.plan?.operations.map((op) => op.typeql)).toEqual(["define entity chair, sub physical_object;"]);
    expect(preview.entityInserts[0]).toBe('insert\n  $e isa chair,\n  has name "chair_1",\n  has scene_id "scene_p";');
    expect(preview.relationInserts).toHaveLength(1);
    expect(store.schemaQueries).toEqual([]);
    expect(store.writeQueries).toEqual([]);
  });

  it("previews the initial schema for a missing database", async () => {
    store.exists = false;

    const preview = await loader.previewScene("clip.mp4", { sampling: SAMPLING });

    expect(preview.hasSchema).toBe(false);
    expect(preview.initialSchema).toContain("entity chair, sub physical_object;");
    expect(store.calls).toEqual(["exists"]);
  });
});
