/**
 * Definition Context
 *
 * Names defined so far in one generation or planning run. Created per run
 * and passed explicitly; nothing here is shared across runs.
 *
 * @module
 */

import { BASE_ATTRIBUTES, BASE_ENTITIES, BASE_RELATIONS } from "./base-schema.js";

export type DefinitionKind = "attribute" | "entity" | "relation";
export type CapabilityKind = "owns" | "plays";

export interface DefinedNames {
  attributes: string[];
  entities: string[];
  relations: string[];
}

export class DefinitionContext {
  private readonly names: Record<DefinitionKind, Set<string>> = {
    attribute: new Set(),
    entity: new Set(),
    relation: new Set(),
  };
  private readonly capabilities = new Set<string>();

  /**
   * A context that already knows the base schema names
   */
  static withBaseSchema(): DefinitionContext {
    const context = new DefinitionContext();
    for (const name of BASE_ATTRIBUTES) context.define("attribute", name);
    for (const name of BASE_ENTITIES) context.define("entity", name);
    for (const name of BASE_RELATIONS) context.define("relation", name);
    return context;
  }

  has(kind: DefinitionKind, name: string): boolean {
    return this.names[kind].has(name);
  }

  /**
   * Records a name. Returns false when it was already defined.
   */
  define(kind: DefinitionKind, name: string): boolean {
    const names = this.names[kind];
    if (names.has(name)) return false;
    names.add(name);
    return true;
  }

  /**
   * Records an owns/plays addition. Returns false for a repeat.
   */
  claimCapability(typeName: string, kind: CapabilityKind, target: string): boolean {
    const key = `${typeName} ${kind} ${target}`;
    if (this.capabilities.has(key)) return false;
    this.capabilities.add(key);
    return true;
  }

  describe(): DefinedNames {
    return {
      attributes: [...this.names.attribute],
      entities: [...this.names.entity],
      relations: [...this.names.relation],
    };
  }
}
