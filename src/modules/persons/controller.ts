import { PersonsService } from "./service";
import { PersonBody } from "./schemas";

export class PersonsController {
  constructor(private readonly service: PersonsService) {}

  createPerson(input: PersonBody) {
    return this.service.createPerson(input);
  }

  getPerson(personId: number) {
    return this.service.getPerson(personId);
  }

  listPersons() {
    return this.service.listPersons();
  }

  updatePerson(personId: number, input: PersonBody) {
    return this.service.updatePerson(personId, input);
  }

  deletePerson(personId: number) {
    return this.service.deletePerson(personId);
  }
}
