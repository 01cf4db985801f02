import { buildApp } from "../src/app";
import { FastifyInstance } from "fastify";
import { UpstreamServiceError } from "../src/common/errors";
import type { ClientDirectory } from "../src/modules/clients/directory";

const statementUrl =
  "/movements/account-status?startDate=2024-01-01T00:00:00Z&endDate=2024-01-31T00:00:00Z&clientId=1";

describe("error handling", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  test("unknown route answers with NOT_FOUND", async () => {
    const response = await app.inject({ method: "GET", url: "/nope" });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: "NOT_FOUND",
      message: "Route GET /nope not found"
    });
  });

  test("non-numeric id is an invalid request", async () => {
    const response = await app.inject({ method: "GET", url: "/accounts/abc" });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("INVALID_REQUEST");
    expect(response.json().details[0].path).toBe("id");
  });

  test("malformed JSON is an invalid request", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/movements",
      headers: { "content-type": "application/json" },
      payload: "{\"accountId\":"
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("INVALID_REQUEST");
  });

  test("wrongly typed amount is an invalid request, not an invalid amount", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/movements",
      payload: { accountId: 1, valueCents: "ten" }
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("INVALID_REQUEST");
  });

  test("amount past the exact integer range is an invalid request", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/movements",
      headers: { "content-type": "application/json" },
      payload: "{\"accountId\":1,\"valueCents\":9007199254740992}"
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("INVALID_REQUEST");
  });

  test("ids beyond the INTEGER column range are invalid requests", async () => {
    const movementRes = await app.inject({
      method: "POST",
      url: "/movements",
      payload: { accountId: 3000000000, valueCents: 1 }
    });
    expect(movementRes.statusCode).toBe(400);
    expect(movementRes.json().error).toBe("INVALID_REQUEST");
    expect(movementRes.json().details[0].path).toBe("accountId");

    const accountRes = await app.inject({
      method: "POST",
      url: "/accounts",
      payload: {
        clientId: 1,
        accountNumber: "478758",
        accountTypeId: 3000000000,
        initialBalanceCents: 0
      }
    });
    expect(accountRes.statusCode).toBe(400);
    expect(accountRes.json().details[0].path).toBe("accountTypeId");

    const statementRes = await app.inject({
      method: "GET",
      url: "/movements/account-status?startDate=2024-01-01T00:00:00Z&endDate=2024-01-31T00:00:00Z&clientId=3000000000"
    });
    expect(statementRes.statusCode).toBe(400);
    expect(statementRes.json().error).toBe("INVALID_REQUEST");
  });

  test("every response carries a request id", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
    expect(response.headers["x-request-id"]).toBeDefined();
  });

  test("database health is skipped in memory mode", async () => {
    const response = await app.inject({ method: "GET", url: "/health/db" });
    expect(response.json()).toEqual({ status: "skipped" });
  });
});

describe("client directory failures", () => {
  function appWith(clientDirectory: ClientDirectory) {
    return buildApp({ clientDirectory });
  }

  test("upstream failure maps to 502", async () => {
    const app = appWith({
      getClientById: async () => {
        throw new UpstreamServiceError("Clients API responded with 503");
      }
    });
    await app.ready();

    const response = await app.inject({ method: "GET", url: statementUrl });
    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      error: "UPSTREAM_ERROR",
      message: "Clients API responded with 503"
    });
    await app.close();
  });

  test("unexpected failure maps to a generic 500", async () => {
    const app = appWith({
      getClientById: async () => {
        throw new Error("boom");
      }
    });
    await app.ready();

    const response = await app.inject({ method: "GET", url: statementUrl });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error"
    });
    await app.close();
  });

  test("client known only to the directory gets an empty statement", async () => {
    const app = appWith({
      getClientById: async (clientId) => ({ clientId, name: "Remote Name" })
    });
    await app.ready();

    const response = await app.inject({ method: "GET", url: statementUrl });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([]);
    await app.close();
  });
});
