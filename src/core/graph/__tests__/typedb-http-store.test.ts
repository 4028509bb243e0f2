/**
 * TypeDBHttpStore Tests
 *
 * Runs against a stubbed fetch; no server involved.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ErrorCode, GraphError } from "../../errors.js";
import { TypeDBHttpStore, normalizeAddress } from "../typedb-http-store.js";

interface RecordedRequest {
  method: string;
  url: string;
  authorization: string | null;
  body: unknown;
}

type Route = (request: RecordedRequest) => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("normalizeAddress", () => {
  it("adds a scheme and strips trailing slashes", () => {
    expect(normalizeAddress("localhost:8000")).toBe("http://localhost:8000");
    expect(normalizeAddress("https://db.example.test/")).toBe("https://db.example.test");
  });
});

describe("TypeDBHttpStore", () => {
  let requests: RecordedRequest[];
  let route: Route;
  let signInToken: string;
  let store: TypeDBHttpStore;

  const fetchFn: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    const body = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url: String(input),
      authorization: headers.get("Authorization"),
      body: typeof body === "string" ? JSON.parse(body) : undefined,
    };
    requests.push(request);
    if (request.url.endsWith("/v1/signin")) return json({ token: signInToken });
    return route(request);
  };

  beforeEach(() => {
    requests = [];
    signInToken = "test-token";
    route = () => json({ answerType: "ok", answers: [] });
    store = new TypeDBHttpStore({
      address: "localhost:8000",
      username: "admin",
      password: "test-secret",
      database: "scenes",
      fetchFn,
    });
  });

  it("signs in once and sends the token", async () => {
    await store.executeRead("match $x isa chair;");
    await store.executeRead("match $x isa desk;");

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "POST http://localhost:8000/v1/signin",
      "POST http://localhost:8000/v1/query",
      "POST http://localhost:8000/v1/query",
    ]);
    expect(requests[0]?.body).toEqual({ username: "admin", password: "test-secret" });
    expect(requests[1]?.authorization).toBe("Bearer test-token");
  });

  it("sends one-shot transactions that commit except reads", async () => {
    await store.executeSchema("define entity chair;");
    await store.executeRead("match $x isa chair;");

    expect(requests[1]?.body).toEqual({
      databaseName: "scenes",
      transactionType: "schema",
      query: "define entity chair;",
      commit: true,
    });
    expect(requests[2]?.body).toEqual({
      databaseName: "scenes",
      transactionType: "read",
      query: "match $x isa chair;",
      commit: false,
    });
  });

  it("returns fetched documents and concept row bindings", async () => {
    route = (request) =>
      JSON.stringify(request.body).includes("fetch")
        ? json({ answerType: "conceptDocuments", answers: [{ name: "chair_1" }] })
        : json({ answerType: "conceptRows", answers: [{ data: { count: { kind: "value", value: 3 } } }] });

    expect(await store.executeRead('match $e isa chair; fetch { "name": $e.name };')).toEqual([{ name: "chair_1" }]);
    expect(await store.executeRead("match $e isa chair; reduce $count = count;")).toEqual([
      { count: { kind: "value", value: 3 } },
    ]);
  });

  it("maps 404 to a missing database", async () => {
    route = () => new Response("not found", { status: 404 });

    expect(await store.databaseExists()).toBe(false);
    await expect(store.deleteDatabase()).rejects.toMatchObject({ code: ErrorCode.GRAPH_DATABASE_NOT_FOUND });
  });

  it("creates the database only when it is missing", async () => {
    route = (request) => (request.method === "GET" ? new Response("", { status: 404 }) : json({}));

    expect(await store.ensureDatabase()).toBe(true);
    expect(requests.slice(1).map((r) => `${r.method} ${r.url}`)).toEqual([
      "GET http://localhost:8000/v1/databases/scenes",
      "POST http://localhost:8000/v1/databases/scenes",
    ]);
  });

  it("reads the schema as trimmed text", async () => {
    route = () => new Response("define\n  entity chair;\n", { status: 200 });

    expect(await store.getSchema()).toBe("define\n  entity chair;");
    expect(requests[1]?.url).toBe("http://localhost:8000/v1/databases/scenes/schema");
  });

  it("raises GraphError with the server message", async () => {
    route = () => json({ code: "TYR1", message: "Type 'ghost' not found." }, 400);

    const failure = store.executeWrite("insert $x isa ghost;");

    await expect(failure).rejects.toBeInstanceOf(GraphError);
    await expect(failure).rejects.toMatchObject({
      message: "Failed to write query: Type 'ghost' not found.",
      status: 400,
      query: "insert $x isa ghost;",
    });
  });

  it("reports rejected credentials", async () => {
    const rejecting = new TypeDBHttpStore({
      address: "http://localhost:8000",
      username: "admin",
      password: "wrong",
      database: "scenes",
      fetchFn: async () => new Response("", { status: 401 }),
    });

    await expect(rejecting.databaseExists()).rejects.toMatchObject({ code: ErrorCode.GRAPH_AUTH_FAILED });
  });

  it("reports an unreachable server", async () => {
    const offline = new TypeDBHttpStore({
      address: "http://localhost:1",
      username: "admin",
      password: "test-secret",
      database: "scenes",
      fetchFn: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(offline.getSchema()).rejects.toMatchObject({
      code: ErrorCode.GRAPH_CONNECTION_FAILED,
      message: "Cannot reach TypeDB at http://localhost:1: fetch failed",
    });
  });

  it("signs in again after close", async () => {
    await store.executeRead("match $x isa chair;");
    await store.close();
    await store.executeRead("match $x isa chair;");

    expect(requests.filter((r) => r.url.endsWith("/v1/signin"))).toHaveLength(2);
  });

  it("signs in again and retries once when the token is rejected", async () => {
    await store.executeRead("match $x isa chair;");
    signInToken = "fresh-token";
    route = (request) =>
      request.authorization === "Bearer test-token"
        ? json({ code: "AUT3", message: "token expired" }, 401)
        : json({ answerType: "ok", answers: [] });

    await store.executeRead("match $x isa desk;");

    expect(requests.map((r) => `${r.url.replace("http://localhost:8000", "")} ${r.authorization ?? "-"}`)).toEqual([
      "/v1/signin -",
      "/v1/query Bearer test-token",
      "/v1/query Bearer test-token",
      "/v1/signin -",
      "/v1/query Bearer fresh-token",
    ]);
  });

  it("fails when the fresh token is rejected too", async () => {
    route = () => json({ message: "token expired" }, 401);

    await expect(store.executeRead("match $x isa chair;")).rejects.toBeInstanceOf(GraphError);
    expect(requests.map((r) => r.url.replace("http://localhost:8000", ""))).toEqual([
      "/v1/signin",
      "/v1/query",
      "/v1/signin",
      "/v1/query",
    ]);
  });
});
