/**
 * Analysis Response Parser Tests
 */

import { describe, it, expect } from "vitest";
import { AnalysisError } from "../../errors.js";
import { analysis, entity, relation } from "../../__tests__/fakes.js";
import { extractJson, parseAnalysisResponse, toAnalysisPayload } from "../parser.js";

const REPLY = {
  new_data: {
    entities: [{ id: "desk_1", type: "desk", attributes: { color: "brown" } }],
    relations: [{ type: "on", from: "lamp_1", to: "desk_1" }],
  },
  schema_changes: {
    new_entity_types: [{ name: "lamp", parent: "physical_object", owns: ["wattage"] }],
    new_attribute_types: [{ name: "wattage", value_type: "int" }],
    new_relation_types: [{ name: "holds", roles: ["holder", { name: "held", players: ["cup"] }] }],
    modified_types: [{ name: "desk", add_owns: ["drawers"] }],
  },
  data_requiring_schema_change: {
    entities: [{ id: "lamp_1", type: "lamp", attributes: { wattage: 60 } }],
    relations: [{ type: "holds", from: "hand_1", to: "cup_1", roles: { from: "holder", to: "held" } }],
  },
};

describe("extractJson", () => {
  it("parses a bare JSON reply", () => {
    expect(extractJson('{"a": 1}')).toEqual({ a: 1 });
  });

  it("finds the object inside prose and code fences", () => {
    expect(extractJson('Here you go:\n```json\n{"a": {"b": 2}}\n```\nDone.')).toEqual({ a: { b: 2 } });
  });

  it("throws AnalysisError when there is no object", () => {
    expect(() => extractJson("no json here")).toThrow(AnalysisError);
    expect(() => extractJson("{ not: valid }")).toThrow(/Invalid JSON in response/);
  });
});

describe("parseAnalysisResponse", () => {
  it("converts every section of the reply", () => {
    const result = parseAnalysisResponse(JSON.stringify(REPLY));

    expect(result.parseError).toBeUndefined();
    expect(result.newEntities).toEqual([{ id: "desk_1", type: "desk", attributes: { color: "brown" } }]);
    expect(result.newRelations).toEqual([{ type: "on", fromEntity: "lamp_1", toEntity: "desk_1", roles: {} }]);
    expect(result.pendingEntities).toEqual([{ id: "lamp_1", type: "lamp", attributes: { wattage: 60 } }]);
    expect(result.pendingRelations).toEqual([
      { type: "holds", fromEntity: "hand_1", toEntity: "cup_1", roles: { from: "holder", to: "held" } },
    ]);
    expect(result.rawResponse).toEqual(REPLY);
  });

  it("lists schema changes as entity, attribute, relation, modification", () => {
    const result = parseAnalysisResponse(JSON.stringify(REPLY));

    expect(result.schemaChanges).toEqual([
      {
        changeType: "new_entity_type",
        definition: { name: "lamp", parent: "physical_object", owns: ["wattage"], plays: [] },
      },
      { changeType: "new_attribute_type", definition: { name: "wattage", valueType: "int" } },
      {
        changeType: "new_relation_type",
        definition: {
          name: "holds",
          parent: undefined,
          roles: [
            { name: "holder", players: [] },
            { name: "held", players: ["cup"] },
          ],
        },
      },
      { changeType: "modified_type", definition: { name: "desk", addOwns: ["drawers"], addPlays: [] } },
    ]);
  });

  it("accepts a flat list of pending entities", () => {
    const result = parseAnalysisResponse(
      JSON.stringify({ data_requiring_schema_change: [{ id: "mug_1", type: "mug" }] })
    );

    expect(result.pendingEntities).toEqual([{ id: "mug_1", type: "mug", attributes: {} }]);
    expect(result.pendingRelations).toEqual([]);
  });

  it("defaults a missing value type to string", () => {
    const result = parseAnalysisResponse('{"schema_changes": {"new_attribute_types": [{"name": "label"}]}}');

    expect(result.schemaChanges).toEqual([
      { changeType: "new_attribute_type", definition: { name: "label", valueType: "string" } },
    ]);
  });

  it("turns an unparseable reply into an empty result", () => {
    const result = parseAnalysisResponse("I cannot see any objects.");

    expect(result.newEntities).toEqual([]);
    expect(result.schemaChanges).toEqual([]);
    expect(result.parseError).toMatch(/^No valid JSON found/);
    expect(result.rawResponse?.text).toBe("I cannot see any objects.");
  });

  it("rejects replies with the wrong structure", () => {
    const result = parseAnalysisResponse('{"new_data": {"entities": [{"id": "x"}]}}');

    expect(result.parseError).toMatch(/^Unexpected analysis structure: new_data\.entities\.0\.type/);
    expect(result.newEntities).toEqual([]);
  });
});

describe("toAnalysisPayload", () => {
  it("writes the reply shape with from/to and snake-case definitions", () => {
    const payload = toAnalysisPayload(
      analysis({
        newEntities: [entity("cup_1", "cup")],
        newRelations: [relation("on", "cup_1", "desk_1", { from: "subject" })],
        schemaChanges: [{ changeType: "new_attribute_type", definition: { name: "volume", valueType: "double" } }],
      })
    );

    expect(payload).toEqual({
      new_data: {
        entities: [{ id: "cup_1", type: "cup", attributes: {} }],
        relations: [{ type: "on", from: "cup_1", to: "desk_1", roles: { from: "subject" } }],
      },
      schema_changes: {
        new_entity_types: [],
        new_attribute_types: [{ name: "volume", value_type: "double" }],
        new_relation_types: [],
        modified_types: [],
      },
      data_requiring_schema_change: { entities: [], relations: [] },
    });
  });

  it("parses back into the same result", () => {
    const parsed = parseAnalysisResponse(JSON.stringify(REPLY));
    const reparsed = parseAnalysisResponse(JSON.stringify(toAnalysisPayload(parsed)));

    expect({ ...reparsed, rawResponse: undefined }).toEqual({ ...parsed, rawResponse: undefined });
  });
});
