import { ClientsService } from "./service";

export type ClientSummary = {
  clientId: number;
  name: string;
};

/** Lookup of a client's display name, local or behind the clients API. */
export interface ClientDirectory {
  getClientById(clientId: number): Promise<ClientSummary | null>;
}

export class LocalClientDirectory implements ClientDirectory {
  constructor(private readonly clients: ClientsService) {}

  async getClientById(clientId: number): Promise<ClientSummary | null> {
    const client = await this.clients.findClient(clientId);
    return client ? { clientId: client.clientId, name: client.name } : null;
  }
}
