import {
  Account,
  AccountsRepository,
  CreateAccountInput
} from "../../modules/accounts/repository";
import type { Logger } from "../../common/logger";
import { getPool } from "./pool";
import { withRetry } from "./retry";

// initial_balance_cents is BIGINT, which pg hands back as a string
type AccountRow = Omit<Account, "initialBalanceCents"> & {
  initialBalanceCents: string | number;
};

const ACCOUNT_COLUMNS = `
  account_id AS "accountId",
  client_id AS "clientId",
  account_number AS "accountNumber",
  account_type_id AS "accountTypeId",
  initial_balance_cents AS "initialBalanceCents",
  status
`;

function mapAccountRow(row: AccountRow): Account {
  return {
    accountId: row.accountId,
    clientId: row.clientId,
    accountNumber: row.accountNumber,
    accountTypeId: row.accountTypeId,
    initialBalanceCents: Number(row.initialBalanceCents),
    status: row.status
  };
}

export class PostgresAccountsRepository implements AccountsRepository {
  constructor(private readonly logger?: Logger) {}

  async create(input: CreateAccountInput): Promise<Account> {
    return withRetry(
      async () => {
        const pool = getPool();
        const result = await pool.query<AccountRow>(
          `
          INSERT INTO account (
            client_id,
            account_number,
            account_type_id,
            initial_balance_cents,
            status
          )
          VALUES ($1, $2, $3, $4, $5)
          RETURNING ${ACCOUNT_COLUMNS};
          `,
          [
            input.clientId,
            input.accountNumber,
            input.accountTypeId,
            input.initialBalanceCents,
            input.status
          ]
        );

        return mapAccountRow(result.rows[0]);
      },
      "account creation",
      { logger: this.logger }
    );
  }

  async getById(accountId: number): Promise<Account | null> {
    const pool = getPool();
    const result = await pool.query<AccountRow>(
      `
      SELECT ${ACCOUNT_COLUMNS}
      FROM account
      WHERE account_id = $1;
      `,
      [accountId]
    );

    const row = result.rows[0];
    return row ? mapAccountRow(row) : null;
  }

  async list(): Promise<Account[]> {
    const pool = getPool();
    const result = await pool.query<AccountRow>(
      `
      SELECT ${ACCOUNT_COLUMNS}
      FROM account
      ORDER BY account_id ASC;
      `
    );

    return result.rows.map(mapAccountRow);
  }

  async setStatus(accountId: number, status: boolean): Promise<Account | null> {
    const pool = getPool();
    const result = await pool.query<AccountRow>(
      `
      UPDATE account
      SET status = $2
      WHERE account_id = $1
      RETURNING ${ACCOUNT_COLUMNS};
      `,
      [accountId, status]
    );

    const row = result.rows[0];
    return row ? mapAccountRow(row) : null;
  }

  async delete(accountId: number): Promise<boolean> {
    const pool = getPool();
    const result = await pool.query("DELETE FROM account WHERE account_id = $1;", [accountId]);
    return (result.rowCount ?? 0) > 0;
  }
}
