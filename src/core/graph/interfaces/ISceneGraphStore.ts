/**
 * Scene Graph Store Interface
 *
 * The transaction boundary the planner, executor and inserter talk to.
 * Every call is one round trip; callers await each before issuing the next.
 *
 * @module
 */

/**
 * One answer from a read or write query: a fetched document, or a row
 * of variable bindings
 */
export type QueryDocument = Record<string, unknown>;

export interface ISceneGraphStore {
  readonly databaseName: string;

  databaseExists(): Promise<boolean>;

  createDatabase(): Promise<void>;

  /**
   * Creates the database when missing. Returns true when it was created.
   */
  ensureDatabase(): Promise<boolean>;

  deleteDatabase(): Promise<void>;

  /**
   * Runs a define/undefine/redefine query in one committed schema transaction.
   * Rejects on any failure.
   */
  executeSchema(query: string): Promise<void>;

  /**
   * Runs an insert/delete query in one committed write transaction
   */
  executeWrite(query: string): Promise<QueryDocument[]>;

  executeRead(query: string): Promise<QueryDocument[]>;

  /**
   * The current schema as define-query text; empty when nothing is defined
   */
  getSchema(): Promise<string>;

  close(): Promise<void>;
}
