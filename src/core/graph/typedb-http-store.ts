/**
 * TypeDB HTTP Store
 *
 * ISceneGraphStore over the TypeDB 3.x HTTP API. Each query is a one-shot
 * transaction (`POST /v1/query`) that commits on success.
 *
 * @module
 */

import { z } from "zod";
import { ErrorCode, GraphError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import type { TypeDBConfig } from "../../utils/validation.js";
import type { ISceneGraphStore, QueryDocument } from "./interfaces/ISceneGraphStore.js";

const logger = createLogger("typedb-store");

// =============================================================================
// Types
// =============================================================================

export type TransactionType = "read" | "write" | "schema";

export interface TypeDBHttpStoreOptions extends TypeDBConfig {
  /** Replaced in tests */
  fetchFn?: typeof fetch;
}

const SignInResponseSchema = z.object({ token: z.string().min(1) });

const QueryResponseSchema = z.object({
  queryType: z.string().optional(),
  answerType: z.string(),
  answers: z.array(z.record(z.unknown())).nullish(),
});

const ErrorResponseSchema = z.object({
  code: z.string().optional(),
  message: z.string(),
});

type QueryResponse = z.infer<typeof QueryResponseSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts `host:port` as well as full URLs
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * The `message` of a JSON error body, or null for plain-text bodies
 */
function serverMessage(body: string): string | null {
  try {
    const parsed = ErrorResponseSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.message : null;
  } catch {
    return null;
  }
}

/**
 * Documents come back as-is; concept rows are reduced to their bindings
 */
function toDocuments(response: QueryResponse): QueryDocument[] {
  const answers = response.answers ?? [];
  if (response.answerType !== "conceptRows") return answers;
  return answers.map((row) => (isRecord(row.data) ? row.data : row));
}

// =============================================================================
// Store
// =============================================================================

/**
 * @example
 * ```typescript
 * const store = new TypeDBHttpStore(config.typedb);
 * await store.ensureDatabase();
 * const rows = await store.executeRead('match $e isa chair; fetch { "name": $e.name };');
 * ```
 */
export class TypeDBHttpStore implements ISceneGraphStore {
  readonly databaseName: string;
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly fetchFn: typeof fetch;
  private token: string | null = null;

  constructor(options: TypeDBHttpStoreOptions) {
    this.databaseName = options.database;
    this.baseUrl = normalizeAddress(options.address);
    this.username = options.username;
    this.password = options.password;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  // ===========================================================================
  // Databases
  // ===========================================================================

  async databaseExists(): Promise<boolean> {
    const res = await this.request("GET", this.databasePath());
    if (res.status === 404) return false;
    await this.ensureOk(res, `check database ${this.databaseName}`);
    return true;
  }

  async createDatabase(): Promise<void> {
    const res = await this.request("POST", this.databasePath());
    await this.ensureOk(res, `create database ${this.databaseName}`);
    logger.info({ database: this.databaseName }, "Database created");
  }

  async ensureDatabase(): Promise<boolean> {
    if (await this.databaseExists()) return false;
    await this.createDatabase();
    return true;
  }

  async deleteDatabase(): Promise<void> {
    const res = await this.request("DELETE", this.databasePath());
    if (res.status === 404) {
      throw new GraphError(`Database ${this.databaseName} does not exist`, ErrorCode.GRAPH_DATABASE_NOT_FOUND, {
        status: 404,
      });
    }
    await this.ensureOk(res, `delete database ${this.databaseName}`);
    logger.info({ database: this.databaseName }, "Database deleted");
  }

  async getSchema(): Promise<string> {
    const res = await this.request("GET", `${this.databasePath()}/schema`);
    await this.ensureOk(res, `read schema of ${this.databaseName}`);
    return (await res.text()).trim();
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async executeSchema(query: string): Promise<void> {
    await this.query("schema", query);
  }

  async executeWrite(query: string): Promise<QueryDocument[]> {
    return toDocuments(await this.query("write", query));
  }

  async executeRead(query: string): Promise<QueryDocument[]> {
    return toDocuments(await this.query("read", query));
  }

  async close(): Promise<void> {
    this.token = null;
  }

  private async query(transactionType: TransactionType, query: string): Promise<QueryResponse> {
    logger.debug({ transactionType, query }, "Executing TypeQL");

    const res = await this.request("POST", "/v1/query", {
      databaseName: this.databaseName,
      transactionType,
      query,
      commit: transactionType !== "read",
    });
    await this.ensureOk(res, `${transactionType} query`, query);

    const parsed = QueryResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GraphError("Unexpected query response from TypeDB", ErrorCode.GRAPH_QUERY_FAILED, { query });
    }
    return parsed.data;
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private databasePath(): string {
    return `/v1/databases/${encodeURIComponent(this.databaseName)}`;
  }

  /**
   * Sends with the cached token; a 401 means it expired, so sign in again
   * and retry once.
   */
  private async request(method: string, path: string, body?: unknown): Promise<Response> {
    const res = await this.send(method, path, body, await this.signIn());
    if (res.status !== 401) return res;

    logger.debug({ path }, "Token rejected, signing in again");
    this.token = null;
    return this.send(method, path, body, await this.signIn());
  }

  private async send(method: string, path: string, body: unknown, token: string | null): Promise<Response> {
    const headers: Record<string, string> = {};
    if (token) headers.Authorization = `Bearer ${token}`;
    if (body !== undefined) headers["Content-Type"] = "application/json";

    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new GraphError(
        `Cannot reach TypeDB at ${this.baseUrl}: ${errorMessage(error)}`,
        ErrorCode.GRAPH_CONNECTION_FAILED
      );
    }
  }

  private async signIn(): Promise<string> {
    if (this.token) return this.token;

    const res = await this.send("POST", "/v1/signin", { username: this.username, password: this.password }, null);
    if (res.status === 401 || res.status === 403) {
      throw new GraphError(`Authentication failed for user ${this.username}`, ErrorCode.GRAPH_AUTH_FAILED, {
        status: res.status,
      });
    }
    await this.ensureOk(res, "sign in");

    const parsed = SignInResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GraphError("TypeDB sign-in returned no token", ErrorCode.GRAPH_AUTH_FAILED);
    }
    this.token = parsed.data.token;
    return this.token;
  }

  /**
   * Turns a non-2xx response into a GraphError carrying the server message
   */
  private async ensureOk(res: Response, action: string, query?: string): Promise<void> {
    if (res.ok) return;

    const text = await res.text();
    const message = serverMessage(text) ?? (text.trim() || res.statusText);

    throw new GraphError(`Failed to ${action}: ${message}`, ErrorCode.GRAPH_QUERY_FAILED, {
      status: res.status,
      query,
    });
  }
}
