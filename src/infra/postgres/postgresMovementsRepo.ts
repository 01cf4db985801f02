import {
  Movement,
  MovementFields,
  MovementsRepository
} from "../../modules/movements/repository";
import type { Logger } from "../../common/logger";
import { getPool } from "./pool";
import { withRetry } from "./retry";

type MovementRow = {
  movementId: number;
  accountId: number;
  movementDate: Date | string;
  valueCents: string | number;
  balanceCents: string | number;
};

const MOVEMENT_COLUMNS = `
  m.movement_id AS "movementId",
  m.account_id AS "accountId",
  m.movement_date AS "movementDate",
  m.value_cents AS "valueCents",
  m.balance_cents AS "balanceCents"
`;

function mapMovementRow(row: MovementRow): Movement {
  return {
    movementId: row.movementId,
    accountId: row.accountId,
    movementDate: new Date(row.movementDate).toISOString(),
    valueCents: Number(row.valueCents),
    balanceCents: Number(row.balanceCents)
  };
}

export class PostgresMovementsRepository implements MovementsRepository {
  constructor(private readonly logger?: Logger) {}

  async create(input: MovementFields): Promise<Movement> {
    return withRetry(
      async () => {
        const pool = getPool();
        const result = await pool.query<MovementRow>(
          `
          INSERT INTO movement AS m (account_id, movement_date, value_cents, balance_cents)
          VALUES ($1, $2, $3, $4)
          RETURNING ${MOVEMENT_COLUMNS};
          `,
          [input.accountId, input.movementDate, input.valueCents, input.balanceCents]
        );

        return mapMovementRow(result.rows[0]);
      },
      "movement creation",
      { logger: this.logger }
    );
  }

  async getById(movementId: number): Promise<Movement | null> {
    const pool = getPool();
    const result = await pool.query<MovementRow>(
      `
      SELECT ${MOVEMENT_COLUMNS}
      FROM movement m
      WHERE m.movement_id = $1;
      `,
      [movementId]
    );

    const row = result.rows[0];
    return row ? mapMovementRow(row) : null;
  }

  async list(): Promise<Movement[]> {
    const pool = getPool();
    const result = await pool.query<MovementRow>(
      `
      SELECT ${MOVEMENT_COLUMNS}
      FROM movement m
      ORDER BY m.movement_id ASC;
      `
    );

    return result.rows.map(mapMovementRow);
  }

  async update(movementId: number, fields: MovementFields): Promise<Movement | null> {
    return withRetry(
      async () => {
        const pool = getPool();
        const result = await pool.query<MovementRow>(
          `
          UPDATE movement AS m
          SET movement_date = $2,
              account_id = $3,
              value_cents = $4,
              balance_cents = $5
          WHERE m.movement_id = $1
          RETURNING ${MOVEMENT_COLUMNS};
          `,
          [movementId, fields.movementDate, fields.accountId, fields.valueCents, fields.balanceCents]
        );

        const row = result.rows[0];
        return row ? mapMovementRow(row) : null;
      },
      "movement update",
      { logger: this.logger }
    );
  }

  async delete(movementId: number): Promise<boolean> {
    const pool = getPool();
    const result = await pool.query("DELETE FROM movement WHERE movement_id = $1;", [movementId]);
    return (result.rowCount ?? 0) > 0;
  }

  async findLatestByAccount(accountId: number): Promise<Movement | null> {
    const pool = getPool();
    const result = await pool.query<MovementRow>(
      `
      SELECT ${MOVEMENT_COLUMNS}
      FROM movement m
      WHERE m.account_id = $1
      ORDER BY m.movement_date DESC, m.movement_id DESC
      LIMIT 1;
      `,
      [accountId]
    );

    const row = result.rows[0];
    return row ? mapMovementRow(row) : null;
  }

  async listByClientInRange(
    clientId: number,
    startDate: string,
    endDate: string
  ): Promise<Movement[]> {
    const pool = getPool();
    const result = await pool.query<MovementRow>(
      `
      SELECT ${MOVEMENT_COLUMNS}
      FROM movement m
      JOIN account a ON a.account_id = m.account_id
      WHERE a.client_id = $1
        AND m.movement_date >= $2
        AND m.movement_date <= $3
      ORDER BY m.movement_date ASC, m.movement_id ASC;
      `,
      [clientId, startDate, endDate]
    );

    return result.rows.map(mapMovementRow);
  }
}
