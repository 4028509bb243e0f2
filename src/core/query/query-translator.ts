/**
 * Query Translator
 *
 * Natural-language questions to TypeQL read queries, checked only
 * superficially before they reach the store.
 *
 * @module
 */

import { ConfigurationError, QueryValidationError, errorMessage } from "../errors.js";
import type { ISceneGraphStore, QueryDocument } from "../graph/interfaces/ISceneGraphStore.js";
import type { IModelProvider } from "../models/interfaces/IModel.js";
import { createLogger } from "../../utils/logger.js";
import { FALLBACK_SCHEMA_HINT, generateQueryTranslationPrompt } from "./prompts/query-prompts.js";

const logger = createLogger("query-translator");

export const DIRECT_QUERY_LABEL = "(direct TypeQL)";

const STAGE_KEYWORD = /\b(match|fetch|select|reduce|sort|limit)\b/i;

// =============================================================================
// Types
// =============================================================================

export interface QueryResult {
  question: string;
  /** Kept even when execution failed */
  typeql: string;
  results: QueryDocument[];
  success: boolean;
  error?: string;
}

export interface QueryTranslatorOptions {
  modelId: string;
  maxTokens?: number;
}

// =============================================================================
// Text Cleanup & Validation
// =============================================================================

/**
 * Strips a surrounding markdown code fence
 */
export function cleanQueryText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;

  const lines = trimmed.split("\n").slice(1);
  if (lines.length > 0 && lines[lines.length - 1]?.trim() === "```") {
    lines.pop();
  }
  return lines.join("\n").trim();
}

/**
 * Non-empty, has a pipeline stage, and a match clause binds variables.
 *
 * @throws QueryValidationError
 */
export function validateQuery(typeql: string): void {
  if (!typeql.trim()) {
    throw new QueryValidationError("Generated query is empty", typeql);
  }
  if (!STAGE_KEYWORD.test(typeql)) {
    throw new QueryValidationError(`Generated text is not a TypeQL query:\n${typeql}`, typeql);
  }
  if (/\bmatch\b/i.test(typeql) && !typeql.includes("$")) {
    throw new QueryValidationError(
      `Generated query is missing variables (no $ found):\n${typeql}\n\n` +
        "Rephrase the question, or run a hand-written query with the execute command.",
      typeql
    );
  }
}

// =============================================================================
// Translator
// =============================================================================

export class QueryTranslator {
  constructor(
    private readonly store: ISceneGraphStore,
    private readonly provider: IModelProvider,
    private readonly options: QueryTranslatorOptions
  ) {}

  /**
   * @param schema - read from the store when omitted
   */
  async translate(question: string, schema?: string): Promise<string> {
    await this.provider.initialize();

    const schemaText = schema ?? (await this.schemaForPrompt());
    const prompt = generateQueryTranslationPrompt(question, schemaText);
    logger.debug({ modelId: this.options.modelId, question }, "Translating question");

    const response = await this.provider.complete(this.options.modelId, {
      prompt,
      parameters: { maxTokens: this.options.maxTokens ?? 1024 },
    });

    const typeql = cleanQueryText(response.content);
    logger.debug({ typeql }, "Generated TypeQL");
    validateQuery(typeql);
    return typeql;
  }

  /**
   * Translates and runs a question. Failures after the credentials check
   * are reported in the result.
   */
  async query(question: string): Promise<QueryResult> {
    let typeql = "";
    try {
      typeql = await this.translate(question);
      const results = await this.store.executeRead(typeql);
      return { question, typeql, results, success: true };
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      return { question, typeql, results: [], success: false, error: errorMessage(error) };
    }
  }

  async executeTypeql(typeql: string): Promise<QueryResult> {
    try {
      const results = await this.store.executeRead(typeql);
      return { question: DIRECT_QUERY_LABEL, typeql, results, success: true };
    } catch (error) {
      return { question: DIRECT_QUERY_LABEL, typeql, results: [], success: false, error: errorMessage(error) };
    }
  }

  formatResults(result: QueryResult): string {
    const lines = [`Question: ${result.question}`, `TypeQL: ${result.typeql}`, ""];

    if (!result.success) {
      lines.push(`Error: ${result.error ?? "unknown error"}`);
    } else if (result.results.length === 0) {
      lines.push("No results found.");
    } else {
      lines.push(`Results (${result.results.length}):`);
      result.results.forEach((doc, index) => {
        lines.push(`  ${index + 1}. ${JSON.stringify(doc, null, 2)}`);
      });
    }

    return lines.join("\n");
  }

  private async schemaForPrompt(): Promise<string> {
    try {
      const schema = await this.store.getSchema();
      return schema || FALLBACK_SCHEMA_HINT;
    } catch (error) {
      logger.warn({ err: errorMessage(error) }, "Schema unavailable; using base type hint");
      return FALLBACK_SCHEMA_HINT;
    }
  }
}
