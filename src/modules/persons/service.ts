import { NotFoundError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import { Person, PersonFields, PersonsRepository } from "./repository";

export class PersonsService {
  constructor(
    private readonly personsRepo: PersonsRepository,
    private readonly logger?: Logger
  ) {}

  async createPerson(input: PersonFields): Promise<Person> {
    const person = await this.personsRepo.create(input);
    this.logger?.info({ personId: person.personId }, "Person created");
    return person;
  }

  async findPerson(personId: number): Promise<Person | null> {
    return this.personsRepo.getById(personId);
  }

  async getPerson(personId: number): Promise<Person> {
    const person = await this.personsRepo.getById(personId);
    if (!person) {
      throw new NotFoundError(`Person not found: ${personId}`);
    }
    return person;
  }

  listPersons(): Promise<Person[]> {
    return this.personsRepo.list();
  }

  async updatePerson(personId: number, input: PersonFields): Promise<Person> {
    const updated = await this.personsRepo.update(personId, input);
    if (!updated) {
      throw new NotFoundError(`Person not found: ${personId}`);
    }
    return updated;
  }

  async deletePerson(personId: number): Promise<void> {
    const deleted = await this.personsRepo.delete(personId);
    if (!deleted) {
      throw new NotFoundError(`Person not found: ${personId}`);
    }
    this.logger?.info({ personId }, "Person deleted");
  }
}
