import { readFileSync } from "fs";
import { join } from "path";
import type { FastifyInstance } from "fastify";

const databaseUrl = process.env.DATABASE_URL;
const shouldRun = Boolean(databaseUrl);

const describeMaybe = shouldRun ? describe : describe.skip;

describeMaybe("postgres integration", () => {
  let app: FastifyInstance;
  let nowValue = new Date("2024-02-01T10:00:00Z");
  const now = () => nowValue;
  const movementIds: number[] = [];
  let accountId = 0;
  let clientId = 0;

  beforeAll(async () => {
    process.env.REPO_PROVIDER = "postgres";
    process.env.DATABASE_URL = databaseUrl;

    const [{ buildApp }, { getPool }] = await Promise.all([
      import("../src/app"),
      import("../src/infra/postgres/pool")
    ]);

    await getPool().query(readFileSync(join(__dirname, "../db/schema.sql"), "utf8"));

    app = buildApp({ now, passwordHasher: { hash: async (plain) => `hashed:${plain}` } });
    await app.ready();
  }, 20000);

  afterAll(async () => {
    for (const movementId of movementIds) {
      await app.inject({ method: "DELETE", url: `/movements/${movementId}` });
    }
    if (accountId) {
      await app.inject({ method: "DELETE", url: `/accounts/${accountId}` });
    }
    if (clientId) {
      await app.inject({ method: "DELETE", url: `/clients/${clientId}` });
    }
    // onClose ends the pool
    await app.close();
  }, 20000);

  test("client, account, movements and statement", async () => {
    const clientRes = await app.inject({
      method: "POST",
      url: "/clients",
      payload: {
        name: "Integration Client",
        gender: "F",
        age: 28,
        identification: "it-0001",
        address: "Test street 1",
        phone: "000000",
        password: "test-secret"
      }
    });
    expect(clientRes.statusCode).toBe(201);
    clientId = clientRes.json().clientId;

    const accountRes = await app.inject({
      method: "POST",
      url: "/accounts",
      payload: {
        clientId,
        accountNumber: "IT-478758",
        accountTypeId: 1,
        initialBalanceCents: 10000
      }
    });
    expect(accountRes.statusCode).toBe(201);
    accountId = accountRes.json().accountId;

    nowValue = new Date("2024-02-01T10:00:00Z");
    const first = await app.inject({
      method: "POST",
      url: "/movements",
      payload: { accountId, valueCents: -3000 }
    });
    expect(first.statusCode).toBe(201);
    expect(first.json().balanceCents).toBe(7000);
    movementIds.push(first.json().movementId);

    nowValue = new Date("2024-02-02T10:00:00Z");
    const second = await app.inject({
      method: "POST",
      url: "/movements",
      payload: { accountId, valueCents: -5000 }
    });
    expect(second.json().balanceCents).toBe(2000);
    movementIds.push(second.json().movementId);

    nowValue = new Date("2024-02-03T10:00:00Z");
    const rejected = await app.inject({
      method: "POST",
      url: "/movements",
      payload: { accountId, valueCents: -2500 }
    });
    expect(rejected.statusCode).toBe(400);
    expect(rejected.json().error).toBe("INSUFFICIENT_FUNDS");

    const statement = await app.inject({
      method: "GET",
      url: `/movements/account-status?startDate=2024-02-01T00:00:00Z&endDate=2024-02-28T00:00:00Z&clientId=${clientId}`
    });
    expect(statement.statusCode).toBe(200);
    expect(
      statement
        .json()
        .map((row: { initialBalance: number; finalBalance: number }) => [
          row.initialBalance,
          row.finalBalance
        ])
    ).toEqual([
      [10000, 7000],
      [7000, 2000]
    ]);
    expect(statement.json()[0].date).toBe("2024-02-01T10:00:00.000Z");
  });
});
