import {
  Client,
  ClientCredentials,
  ClientsRepository,
  CreateClientInput
} from "../../modules/clients/repository";
import { getPool } from "./pool";

const CLIENT_COLUMNS = `
  client_id AS "clientId",
  person_id AS "personId",
  password_hash AS "passwordHash",
  status
`;

export class PostgresClientsRepository implements ClientsRepository {
  async create(input: CreateClientInput): Promise<Client> {
    const pool = getPool();
    const result = await pool.query<Client>(
      `
      INSERT INTO client (person_id, password_hash, status)
      VALUES ($1, $2, $3)
      RETURNING ${CLIENT_COLUMNS};
      `,
      [input.personId, input.passwordHash, input.status]
    );

    return result.rows[0];
  }

  async getById(clientId: number): Promise<Client | null> {
    const pool = getPool();
    const result = await pool.query<Client>(
      `
      SELECT ${CLIENT_COLUMNS}
      FROM client
      WHERE client_id = $1;
      `,
      [clientId]
    );

    return result.rows[0] ?? null;
  }

  async list(): Promise<Client[]> {
    const pool = getPool();
    const result = await pool.query<Client>(
      `
      SELECT ${CLIENT_COLUMNS}
      FROM client
      ORDER BY client_id ASC;
      `
    );

    return result.rows;
  }

  async updateCredentials(clientId: number, fields: ClientCredentials): Promise<Client | null> {
    const pool = getPool();
    const result = await pool.query<Client>(
      `
      UPDATE client
      SET password_hash = $2,
          status = $3
      WHERE client_id = $1
      RETURNING ${CLIENT_COLUMNS};
      `,
      [clientId, fields.passwordHash, fields.status]
    );

    return result.rows[0] ?? null;
  }

  async delete(clientId: number): Promise<boolean> {
    const pool = getPool();
    const result = await pool.query("DELETE FROM client WHERE client_id = $1;", [clientId]);
    return (result.rowCount ?? 0) > 0;
  }
}
