import { Person, PersonFields, PersonsRepository } from "../../modules/persons/repository";

export class MemoryPersonsRepository implements PersonsRepository {
  private nextId = 1;

  constructor(private readonly persons: Map<number, Person> = new Map()) {}

  async create(input: PersonFields): Promise<Person> {
    const person: Person = { ...input, personId: this.nextId++ };
    this.persons.set(person.personId, person);
    return { ...person };
  }

  async getById(personId: number): Promise<Person | null> {
    const person = this.persons.get(personId);
    return person ? { ...person } : null;
  }

  async list(): Promise<Person[]> {
    return [...this.persons.values()].map((person) => ({ ...person }));
  }

  async update(personId: number, fields: PersonFields): Promise<Person | null> {
    if (!this.persons.has(personId)) {
      return null;
    }
    const updated: Person = { ...fields, personId };
    this.persons.set(personId, updated);
    return { ...updated };
  }

  async delete(personId: number): Promise<boolean> {
    return this.persons.delete(personId);
  }
}
