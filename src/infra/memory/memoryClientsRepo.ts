import {
  Client,
  ClientCredentials,
  ClientsRepository,
  CreateClientInput
} from "../../modules/clients/repository";

export class MemoryClientsRepository implements ClientsRepository {
  private nextId = 1;

  constructor(private readonly clients: Map<number, Client> = new Map()) {}

  async create(input: CreateClientInput): Promise<Client> {
    const client: Client = { ...input, clientId: this.nextId++ };
    this.clients.set(client.clientId, client);
    return { ...client };
  }

  async getById(clientId: number): Promise<Client | null> {
    const client = this.clients.get(clientId);
    return client ? { ...client } : null;
  }

  async list(): Promise<Client[]> {
    return [...this.clients.values()].map((client) => ({ ...client }));
  }

  async updateCredentials(clientId: number, fields: ClientCredentials): Promise<Client | null> {
    const client = this.clients.get(clientId);
    if (!client) {
      return null;
    }
    const updated: Client = { ...client, ...fields };
    this.clients.set(clientId, updated);
    return { ...updated };
  }

  async delete(clientId: number): Promise<boolean> {
    return this.clients.delete(clientId);
  }
}
