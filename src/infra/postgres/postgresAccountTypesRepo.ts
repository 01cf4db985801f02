import { AccountType, AccountTypesRepository } from "../../modules/account-types/repository";
import { getPool } from "./pool";

export class PostgresAccountTypesRepository implements AccountTypesRepository {
  async getById(accountTypeId: number): Promise<AccountType | null> {
    const pool = getPool();
    const result = await pool.query<AccountType>(
      `
      SELECT
        account_type_id AS "accountTypeId",
        description
      FROM account_type
      WHERE account_type_id = $1;
      `,
      [accountTypeId]
    );

    return result.rows[0] ?? null;
  }

  async list(): Promise<AccountType[]> {
    const pool = getPool();
    const result = await pool.query<AccountType>(
      `
      SELECT
        account_type_id AS "accountTypeId",
        description
      FROM account_type
      ORDER BY account_type_id ASC;
      `
    );

    return result.rows;
  }
}
