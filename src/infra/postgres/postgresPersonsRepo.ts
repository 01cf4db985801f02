import { Person, PersonFields, PersonsRepository } from "../../modules/persons/repository";
import { getPool } from "./pool";

const PERSON_COLUMNS = `
  person_id AS "personId",
  name,
  gender,
  age,
  identification,
  address,
  phone
`;

export class PostgresPersonsRepository implements PersonsRepository {
  async create(input: PersonFields): Promise<Person> {
    const pool = getPool();
    const result = await pool.query<Person>(
      `
      INSERT INTO person (name, gender, age, identification, address, phone)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${PERSON_COLUMNS};
      `,
      [input.name, input.gender, input.age, input.identification, input.address, input.phone]
    );

    return result.rows[0];
  }

  async getById(personId: number): Promise<Person | null> {
    const pool = getPool();
    const result = await pool.query<Person>(
      `
      SELECT ${PERSON_COLUMNS}
      FROM person
      WHERE person_id = $1;
      `,
      [personId]
    );

    return result.rows[0] ?? null;
  }

  async list(): Promise<Person[]> {
    const pool = getPool();
    const result = await pool.query<Person>(
      `
      SELECT ${PERSON_COLUMNS}
      FROM person
      ORDER BY person_id ASC;
      `
    );

    return result.rows;
  }

  async update(personId: number, fields: PersonFields): Promise<Person | null> {
    const pool = getPool();
    const result = await pool.query<Person>(
      `
      UPDATE person
      SET name = $2,
          gender = $3,
          age = $4,
          identification = $5,
          address = $6,
          phone = $7
      WHERE person_id = $1
      RETURNING ${PERSON_COLUMNS};
      `,
      [
        personId,
        fields.name,
        fields.gender,
        fields.age,
        fields.identification,
        fields.address,
        fields.phone
      ]
    );

    return result.rows[0] ?? null;
  }

  async delete(personId: number): Promise<boolean> {
    const pool = getPool();
    const result = await pool.query("DELETE FROM person WHERE person_id = $1;", [personId]);
    return (result.rowCount ?? 0) > 0;
  }
}
