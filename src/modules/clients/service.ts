import { NotFoundError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import { Person, PersonFields } from "../persons/repository";
import { PersonsService } from "../persons/service";
import { Client, ClientsRepository } from "./repository";

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
}

export type CreateClientRequest = PersonFields & { password: string };

export type UpdateClientRequest = PersonFields & {
  password: string;
  status: boolean;
};

/** Client joined with its person; the password hash never leaves the service. */
export type ClientView = Person & {
  clientId: number;
  status: boolean;
};

export class ClientsService {
  constructor(
    private readonly clientsRepo: ClientsRepository,
    private readonly persons: PersonsService,
    private readonly hasher: PasswordHasher,
    private readonly logger?: Logger
  ) {}

  async createClient(input: CreateClientRequest): Promise<ClientView> {
    const { password, ...personFields } = input;
    const passwordHash = await this.hasher.hash(password);
    const person = await this.persons.createPerson(personFields);
    const client = await this.clientsRepo.create({
      personId: person.personId,
      passwordHash,
      status: true
    });
    this.logger?.info({ clientId: client.clientId, personId: person.personId }, "Client created");
    return toClientView(client, person);
  }

  async findClient(clientId: number): Promise<ClientView | null> {
    const client = await this.clientsRepo.getById(clientId);
    if (!client) {
      return null;
    }
    const person = await this.persons.findPerson(client.personId);
    return person ? toClientView(client, person) : null;
  }

  async getClient(clientId: number): Promise<ClientView> {
    const view = await this.findClient(clientId);
    if (!view) {
      throw new NotFoundError(`Client not found: ${clientId}`);
    }
    return view;
  }

  async listClients(): Promise<ClientView[]> {
    const clients = await this.clientsRepo.list();
    const views = await Promise.all(
      clients.map(async (client) => {
        const person = await this.persons.findPerson(client.personId);
        return person ? toClientView(client, person) : null;
      })
    );
    return views.filter((view): view is ClientView => view !== null);
  }

  async updateClient(clientId: number, input: UpdateClientRequest): Promise<ClientView> {
    const client = await this.clientsRepo.getById(clientId);
    if (!client) {
      throw new NotFoundError(`Client not found: ${clientId}`);
    }

    const { password, status, ...personFields } = input;
    const passwordHash = await this.hasher.hash(password);
    const person = await this.persons.updatePerson(client.personId, personFields);
    const updated = await this.clientsRepo.updateCredentials(clientId, { passwordHash, status });
    if (!updated) {
      throw new NotFoundError(`Client not found: ${clientId}`);
    }
    return toClientView(updated, person);
  }

  async deleteClient(clientId: number): Promise<void> {
    const client = await this.clientsRepo.getById(clientId);
    if (!client) {
      throw new NotFoundError(`Client not found: ${clientId}`);
    }

    const person = await this.persons.findPerson(client.personId);
    await this.clientsRepo.delete(clientId);
    if (person) {
      await this.persons.deletePerson(person.personId);
    }
    this.logger?.info({ clientId, personId: client.personId }, "Client deleted with its person");
  }
}

function toClientView(client: Client, person: Person): ClientView {
  return {
    clientId: client.clientId,
    personId: person.personId,
    name: person.name,
    gender: person.gender,
    age: person.age,
    identification: person.identification,
    address: person.address,
    phone: person.phone,
    status: client.status
  };
}
