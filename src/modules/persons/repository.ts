export type Person = {
  personId: number;
  name: string;
  gender: string;
  age: number;
  identification: string;
  address: string;
  phone: string;
};

export type PersonFields = Omit<Person, "personId">;

export interface PersonsRepository {
  create(input: PersonFields): Promise<Person>;
  getById(personId: number): Promise<Person | null>;
  list(): Promise<Person[]>;
  update(personId: number, fields: PersonFields): Promise<Person | null>;
  delete(personId: number): Promise<boolean>;
}
