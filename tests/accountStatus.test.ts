import { NotFoundError } from "../src/common/errors";
import type { Logger } from "../src/common/logger";
import type { Account } from "../src/modules/accounts/repository";
import type { AccountLookup } from "../src/modules/accounts/service";
import type { AccountTypeLookup } from "../src/modules/account-types/service";
import type { ClientDirectory } from "../src/modules/clients/directory";
import type { Movement } from "../src/modules/movements/repository";
import {
  AccountStatusService,
  buildStatementRows,
  groupMovementsByAccount
} from "../src/modules/account-status/service";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function movement(
  movementId: number,
  accountId: number,
  movementDate: string,
  valueCents: number,
  balanceCents: number
): Movement {
  return { movementId, accountId, movementDate, valueCents, balanceCents };
}

const savings: Account = {
  accountId: 10,
  clientId: 1,
  accountNumber: "A-10",
  accountTypeId: 1,
  initialBalanceCents: 0,
  status: true
};

const checking: Account = {
  accountId: 20,
  clientId: 1,
  accountNumber: "A-20",
  accountTypeId: 2,
  initialBalanceCents: 2000,
  status: false
};

const accountsById = new Map<number, Account>([
  [savings.accountId, savings],
  [checking.accountId, checking]
]);

const typeNames = new Map<number, string>([
  [1, "Savings"],
  [2, "Checking"]
]);

describe("AccountStatusService", () => {
  let clients: jest.Mocked<ClientDirectory>;
  let accounts: jest.Mocked<AccountLookup>;
  let accountTypes: jest.Mocked<AccountTypeLookup>;
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    clients = {
      getClientById: jest.fn(async (clientId: number) =>
        clientId === 1 ? { clientId, name: "Jose Lema" } : null
      )
    };
    accounts = {
      findAccount: jest.fn(async (accountId: number) => {
        // The first group resolves last
        await delay(accountId === savings.accountId ? 20 : 0);
        return accountsById.get(accountId) ?? null;
      })
    };
    accountTypes = {
      findAccountType: jest.fn(async (accountTypeId: number) => {
        const description = typeNames.get(accountTypeId);
        return description ? { accountTypeId, description } : null;
      })
    };
    logger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn()
    };
  });

  test("groups rows by first appearance and orders each group chronologically", async () => {
    const service = new AccountStatusService(clients, accounts, accountTypes, 4, logger);

    const rows = await service.getAccountStatus(
      [
        movement(3, 10, "2024-01-02T00:00:00.000Z", -100, 900),
        movement(2, 20, "2024-01-01T12:00:00.000Z", 500, 2500),
        movement(1, 10, "2024-01-01T00:00:00.000Z", 1000, 1000)
      ],
      1
    );

    expect(rows).toEqual([
      {
        date: "2024-01-01T00:00:00.000Z",
        clientName: "Jose Lema",
        accountNumber: "A-10",
        accountType: "Savings",
        initialBalance: 0,
        movement: 1000,
        status: true,
        finalBalance: 1000
      },
      {
        date: "2024-01-02T00:00:00.000Z",
        clientName: "Jose Lema",
        accountNumber: "A-10",
        accountType: "Savings",
        initialBalance: 1000,
        movement: -100,
        status: true,
        finalBalance: 900
      },
      {
        date: "2024-01-01T12:00:00.000Z",
        clientName: "Jose Lema",
        accountNumber: "A-20",
        accountType: "Checking",
        initialBalance: 2000,
        movement: 500,
        status: false,
        finalBalance: 2500
      }
    ]);
    expect(clients.getClientById).toHaveBeenCalledTimes(1);
  });

  test("skips groups whose account or account type is missing", async () => {
    accountsById.set(30, { ...savings, accountId: 30, accountNumber: "A-30", accountTypeId: 99 });
    const service = new AccountStatusService(clients, accounts, accountTypes, 4, logger);

    try {
      const rows = await service.getAccountStatus(
        [
          movement(1, 40, "2024-01-01T00:00:00.000Z", 100, 100),
          movement(2, 30, "2024-01-01T00:00:00.000Z", 100, 100),
          movement(3, 20, "2024-01-01T00:00:00.000Z", 100, 2100)
        ],
        1
      );

      expect(rows.map((row) => row.accountNumber)).toEqual(["A-20"]);
      expect(logger.warn).toHaveBeenCalledWith(
        { accountId: 40 },
        "Skipping statement group: account not found"
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { accountId: 30, accountTypeId: 99 },
        "Skipping statement group: account type not found"
      );
    } finally {
      accountsById.delete(30);
    }
  });

  test("unknown client is not found before any account lookup", async () => {
    const service = new AccountStatusService(clients, accounts, accountTypes);

    await expect(
      service.getAccountStatus([movement(1, 10, "2024-01-01T00:00:00.000Z", 1, 1)], 7)
    ).rejects.toThrow(new NotFoundError("Client not found: 7"));
    expect(accounts.findAccount).not.toHaveBeenCalled();
  });

  test("no movements gives an empty statement", async () => {
    const service = new AccountStatusService(clients, accounts, accountTypes);

    await expect(service.getAccountStatus([], 1)).resolves.toEqual([]);
    expect(accounts.findAccount).not.toHaveBeenCalled();
  });

  test("keeps at most `concurrency` account lookups in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    accounts.findAccount.mockImplementation(async (accountId: number) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
      return { ...savings, accountId, accountNumber: `N-${accountId}` };
    });
    const service = new AccountStatusService(clients, accounts, accountTypes, 2);

    const rows = await service.getAccountStatus(
      [1, 2, 3, 4, 5].map((id) => movement(id, id, "2024-01-01T00:00:00.000Z", 1, 1)),
      1
    );

    expect(peak).toBe(2);
    expect(rows.map((row) => row.accountNumber)).toEqual(["N-1", "N-2", "N-3", "N-4", "N-5"]);
  });
});

describe("groupMovementsByAccount", () => {
  test("breaks date ties by movement id", () => {
    const groups = groupMovementsByAccount([
      movement(5, 1, "2024-01-01T00:00:00.000Z", 1, 1),
      movement(4, 1, "2024-01-01T00:00:00.000Z", 1, 1),
      movement(6, 2, "2023-12-31T00:00:00.000Z", 1, 1)
    ]);

    expect([...groups.keys()]).toEqual([1, 2]);
    expect(groups.get(1)?.map((entry) => entry.movementId)).toEqual([4, 5]);
  });
});

describe("buildStatementRows", () => {
  test("takes the opening balance from the account, then from the previous movement", () => {
    const rows = buildStatementRows("Jose Lema", checking, "Checking", [
      movement(1, 20, "2024-01-01T00:00:00.000Z", -500, 1500),
      movement(2, 20, "2024-01-02T00:00:00.000Z", 250, 1750)
    ]);

    expect(rows.map((row) => [row.initialBalance, row.movement, row.finalBalance])).toEqual([
      [2000, -500, 1500],
      [1500, 250, 1750]
    ]);
  });
});
